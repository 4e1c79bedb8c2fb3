import { TOC_PIPELINE } from '@magtoc/toc-extractor';
import { parseArgs } from 'node:util';
import { z } from 'zod';

export const USAGE = `Usage: magtoc [options] <pdf...>

Options:
  --pages <n>              Leading pages scanned per document (env MAGTOC_PAGES, default 16)
  --ocr-first <n>          Leading pages eligible for OCR (env MAGTOC_OCR_FIRST, default 3)
  --brand <brand>          auto | newyorker | atlantic | harpers (env MAGTOC_BRAND, default auto)
  --include-mail           Keep letters sections (env MAGTOC_INCLUDE_MAIL)
  --include-contributors   Keep contributor sections (env MAGTOC_INCLUDE_CONTRIBUTORS)
  --suppress-empty         Drop headings without items (env MAGTOC_SUPPRESS_EMPTY)
  --format <format>        text | structured (env MAGTOC_FORMAT, default text)
  --json                   Same as --format structured
  --out <path>             Write reports to a file instead of stdout
  --max-items <n>          Maximum items per section
  --no-join                Do not join page numbers wrapped onto their own line
  --verbose                Log debug messages
  --quiet                  Log errors only
  -h, --help               Show this help`;

/**
 * Invalid command line; the CLI exits with status 2
 */
export class UsageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UsageError';
  }
}

const ENV_FLAG_VALUES = ['1', '0', 'true', 'false', 'yes', 'no'] as const;

/**
 * A flag given on the command line, or its environment default
 */
const FlagSchema = z.union([
  z.boolean(),
  z
    .enum(ENV_FLAG_VALUES)
    .transform((value) => value === '1' || value === 'true' || value === 'yes'),
]);

export const CliOptionsSchema = z.object({
  paths: z
    .array(z.string().min(1))
    .min(1, 'at least one PDF path is required')
    .describe('Documents to process, in order'),
  pages: z.coerce.number().int().min(1).describe('Leading pages scanned'),
  ocrFirst: z.coerce
    .number()
    .int()
    .min(0)
    .describe('Leading pages eligible for OCR'),
  brand: z.enum(['auto', 'newyorker', 'atlantic', 'harpers']),
  includeMail: FlagSchema,
  includeContributors: FlagSchema,
  suppressEmpty: FlagSchema,
  format: z.enum(['text', 'structured']),
  out: z.string().min(1).optional().describe('Report file path'),
  maxItems: z.coerce
    .number()
    .int()
    .min(1)
    .optional()
    .describe('Maximum items per section'),
  joinWrappedLines: z.boolean(),
  logLevel: z.enum(['debug', 'info', 'error']),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Result of reading the command line: options to run with, or a help request
 */
export type CliCommand =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' };

const OPTION_NAMES: Record<keyof CliOptions, string> = {
  paths: '<pdf>',
  pages: '--pages',
  ocrFirst: '--ocr-first',
  brand: '--brand',
  includeMail: '--include-mail',
  includeContributors: '--include-contributors',
  suppressEmpty: '--suppress-empty',
  format: '--format',
  out: '--out',
  maxItems: '--max-items',
  joinWrappedLines: '--no-join',
  logLevel: '--verbose/--quiet',
};

function isOptionKey(key: unknown): key is keyof CliOptions {
  return typeof key === 'string' && key in OPTION_NAMES;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const [key] = issue.path;
      const name = isOptionKey(key) ? OPTION_NAMES[key] : 'options';
      return `${name}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Read the command line. Options given explicitly win over MAGTOC_*
 * environment defaults.
 *
 * @throws UsageError on unknown options, missing values or invalid values
 */
export function parseCliOptions(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
): CliCommand {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    throw new UsageError(
      error instanceof Error ? error.message : String(error),
      { cause: error },
    );
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return { kind: 'help' };
  }

  const candidate = {
    paths: positionals,
    pages: values.pages ?? env.MAGTOC_PAGES ?? TOC_PIPELINE.DEFAULT_MAX_PAGES,
    ocrFirst:
      values['ocr-first'] ??
      env.MAGTOC_OCR_FIRST ??
      TOC_PIPELINE.DEFAULT_OCR_FIRST_PAGES,
    brand: values.brand ?? env.MAGTOC_BRAND?.toLowerCase() ?? 'auto',
    includeMail:
      values['include-mail'] ??
      env.MAGTOC_INCLUDE_MAIL?.toLowerCase() ??
      false,
    includeContributors:
      values['include-contributors'] ??
      env.MAGTOC_INCLUDE_CONTRIBUTORS?.toLowerCase() ??
      false,
    suppressEmpty:
      values['suppress-empty'] ??
      env.MAGTOC_SUPPRESS_EMPTY?.toLowerCase() ??
      false,
    format: values.json
      ? 'structured'
      : (values.format ?? env.MAGTOC_FORMAT?.toLowerCase() ?? 'text'),
    out: values.out,
    maxItems: values['max-items'],
    joinWrappedLines: !values['no-join'],
    logLevel: values.quiet ? 'error' : values.verbose ? 'debug' : 'info',
  };

  const result = CliOptionsSchema.safeParse(candidate);
  if (!result.success) {
    throw new UsageError(describeIssues(result.error));
  }

  return { kind: 'run', options: result.data };
}

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      pages: { type: 'string' },
      'ocr-first': { type: 'string' },
      brand: { type: 'string' },
      'include-mail': { type: 'boolean' },
      'include-contributors': { type: 'boolean' },
      'suppress-empty': { type: 'boolean' },
      format: { type: 'string' },
      json: { type: 'boolean' },
      out: { type: 'string' },
      'max-items': { type: 'string' },
      'no-join': { type: 'boolean' },
      verbose: { type: 'boolean' },
      quiet: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}
