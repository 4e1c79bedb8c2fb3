import type { OutputSink } from '@magtoc/toc-extractor';

import { Logger } from '@magtoc/logger';
import { PageTextProvider } from '@magtoc/pdf-parser';
import { TocPipeline } from '@magtoc/toc-extractor';

import { USAGE, UsageError, parseCliOptions } from './config/cli-options';
import { FileSink } from './sinks/file-sink';
import { StdoutSink } from './sinks/stdout-sink';

export interface CliStreams {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * Run the command line and resolve to the exit status:
 * 0 when every document succeeded, 1 when any failed, 2 for usage errors.
 */
export async function run(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  streams: CliStreams = { stdout: process.stdout, stderr: process.stderr },
): Promise<number> {
  let command: ReturnType<typeof parseCliOptions>;
  try {
    command = parseCliOptions(argv, env);
  } catch (error) {
    if (error instanceof UsageError) {
      streams.stderr.write(`magtoc: ${error.message}\n\n${USAGE}\n`);
      return 2;
    }
    throw error;
  }

  if (command.kind === 'help') {
    streams.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const { options } = command;
  const logger = Logger.toStderr(options.logLevel);
  const sink: OutputSink = options.out
    ? new FileSink(options.out)
    : new StdoutSink(streams.stdout);

  const pipeline = new TocPipeline({
    logger,
    textProvider: new PageTextProvider(logger),
    sink,
    brandHint: options.brand,
    maxPages: options.pages,
    ocrFirstPages: options.ocrFirst,
    parseOptions: { joinWrappedLines: options.joinWrappedLines },
    renderOptions: {
      format: options.format,
      includeMail: options.includeMail,
      includeContributors: options.includeContributors,
      suppressEmpty: options.suppressEmpty,
      maxItemsPerSection: options.maxItems,
    },
  });

  const { exitCode } = await pipeline.processAll(options.paths);
  return exitCode;
}
