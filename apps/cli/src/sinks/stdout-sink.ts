import type { RenderedReport, SourceDocument } from '@magtoc/model';
import type { OutputSink } from '@magtoc/toc-extractor';

/**
 * Writes each report to a stream (stdout unless given)
 */
export class StdoutSink implements OutputSink {
  constructor(
    private readonly stream: NodeJS.WritableStream = process.stdout,
  ) {}

  async write(report: RenderedReport, _document: SourceDocument): Promise<void> {
    if (report.content === '') {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      this.stream.write(report.content, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
