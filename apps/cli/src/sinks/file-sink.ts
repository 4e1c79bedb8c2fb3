import type { RenderedReport, SourceDocument } from '@magtoc/model';
import type { OutputSink } from '@magtoc/toc-extractor';

import { appendFile, writeFile } from 'node:fs/promises';

/**
 * Writes reports to one file. The first report of a run truncates the file.
 * Text reports are appended one after another. Structured reports stay one
 * JSON document: a single report is written as is, and from the second
 * report on the file is rewritten as a JSON array of every report so far.
 */
export class FileSink implements OutputSink {
  private readonly structured: unknown[] = [];
  private started = false;

  constructor(readonly path: string) {}

  async write(report: RenderedReport, _document: SourceDocument): Promise<void> {
    if (report.format === 'structured') {
      this.structured.push(JSON.parse(report.content));
      const content =
        this.structured.length === 1
          ? report.content
          : `${JSON.stringify(this.structured, null, 2)}\n`;
      await writeFile(this.path, content, 'utf-8');
      this.started = true;
      return;
    }

    if (this.started) {
      await appendFile(this.path, report.content, 'utf-8');
      return;
    }

    await writeFile(this.path, report.content, 'utf-8');
    this.started = true;
  }
}
