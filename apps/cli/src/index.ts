export { run } from './main';
export type { CliStreams } from './main';
export {
  CliOptionsSchema,
  USAGE,
  UsageError,
  parseCliOptions,
} from './config/cli-options';
export type { CliCommand, CliOptions } from './config/cli-options';
export { FileSink } from './sinks/file-sink';
export { StdoutSink } from './sinks/stdout-sink';
