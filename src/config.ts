import { type ParseArgsConfig, parseArgs } from 'node:util';

import { z } from 'zod';

type OptionsConfig = NonNullable<ParseArgsConfig['options']>;

/** Bad or missing command line arguments, the only errors that abort an operation */
export class CliError extends Error {
  override name = 'CliError';
}

const count = (def: number, min = 1): z.ZodDefault<z.ZodNumber> => z.coerce.number().int().min(min).default(def);
const seconds = (def: number): z.ZodDefault<z.ZodNumber> => z.coerce.number().min(0).default(def);
const flag = z.boolean().default(false);

const CrawlBase = z.object({
  url: z.string().url(),
  output: z.string().default('erddap_datasets.xml'),
  maxDepth: count(5, 0),
  threads: count(10),
  catalogThreads: count(5),
  filter: flag,
  retries: count(3),
  retryDelay: seconds(1),
  timeout: seconds(30),
  verbose: flag,
});

export const ThreddsArgs = CrawlBase.extend({
  delay: seconds(0),
  threddsVersion: z.enum(['auto', '4', '5']).default('auto'),
  keepEmpty: flag,
});
export type ThreddsArgs = z.infer<typeof ThreddsArgs>;

export const HyraxArgs = CrawlBase.extend({
  delay: seconds(0.5),
  /** Comma separated list of extensions, or `auto` to detect them from the root page */
  extensions: z.string().default('auto'),
  dropEmpty: flag,
});
export type HyraxArgs = z.infer<typeof HyraxArgs>;

export const RemoteArgs = z.object({
  url: z.string().url(),
  output: z.string().default('erddap_remote_datasets.xml'),
  reload: count(180),
  timeout: seconds(60),
  verbose: flag,
});
export type RemoteArgs = z.infer<typeof RemoteArgs>;

export const UrlCheckArgs = z.object({
  input: z.string().min(1),
  output: z.string().default('url_test_results.csv'),
  threads: count(10),
  retries: count(3),
  retryDelay: seconds(2),
  timeout: seconds(10),
  verbose: flag,
});
export type UrlCheckArgs = z.infer<typeof UrlCheckArgs>;

export const DuplicatesArgs = z.object({
  input: z.string().min(1),
  /** Write a copy of the input without the duplicates */
  output: z.string().optional(),
  keep: z.enum(['first', 'last']).default('first'),
  report: z.string().default('duplicate_report.txt'),
  verbose: flag,
});
export type DuplicatesArgs = z.infer<typeof DuplicatesArgs>;

export const StatusArgs = z.object({
  input: z.string().min(1),
  list: z.string().min(1),
  output: z.string().min(1),
  mode: z.enum(['toggle', 'deactivate']).default('toggle'),
  verbose: flag,
});
export type StatusArgs = z.infer<typeof StatusArgs>;

export const CompareArgs = z.object({
  positionals: z.tuple([z.string().min(1), z.string().min(1)]),
  output: z.string().optional(),
  verbose: flag,
});
export type CompareArgs = z.infer<typeof CompareArgs>;

export const MirrorArgs = z.object({
  input: z.string().min(1),
  output: z.string().min(1),
  /** ERDDAP serving the mirrored copies, eg `https://mirror.example.org/erddap` */
  mirror: z.string().url(),
  /** Origin that ERDDAP source urls are moved to, defaults to the origin of `mirror` */
  host: z.string().url().optional(),
  mode: z.enum(['erddap', 'rehost']).default('erddap'),
  verbose: flag,
});
export type MirrorArgs = z.infer<typeof MirrorArgs>;

const str = { type: 'string' } as const;
const bool = { type: 'boolean' } as const;

export const CrawlOptions = {
  url: str,
  output: str,
  'max-depth': str,
  threads: str,
  'catalog-threads': str,
  filter: bool,
  delay: str,
  retries: str,
  'retry-delay': str,
  timeout: str,
  verbose: bool,
} satisfies OptionsConfig;

export const ThreddsOptions = { ...CrawlOptions, 'thredds-version': str, 'keep-empty': bool } satisfies OptionsConfig;
export const HyraxOptions = { ...CrawlOptions, extensions: str, 'drop-empty': bool } satisfies OptionsConfig;
export const RemoteOptions = { url: str, output: str, reload: str, timeout: str, verbose: bool } satisfies OptionsConfig;
export const UrlCheckOptions = {
  input: str,
  output: str,
  threads: str,
  retries: str,
  'retry-delay': str,
  timeout: str,
  verbose: bool,
} satisfies OptionsConfig;
export const DuplicatesOptions = { input: str, output: str, keep: str, report: str, verbose: bool } satisfies OptionsConfig;
export const StatusOptions = { input: str, list: str, output: str, mode: str, verbose: bool } satisfies OptionsConfig;
export const CompareOptions = { output: str, verbose: bool } satisfies OptionsConfig;
export const MirrorOptions = { input: str, output: str, mirror: str, host: str, mode: str, verbose: bool } satisfies OptionsConfig;

function camelCase(key: string): string {
  return key.replace(/-([a-z])/g, (_, ch: string) => ch.toUpperCase());
}

/**
 * Parse command line arguments and validate them against a schema
 *
 * Flags are matched in kebab case (`--max-depth`) and validated in camel case (`maxDepth`), positionals are passed
 * through as `positionals`.
 *
 * @throws {CliError} on unknown flags or values the schema rejects
 */
export function parseCli<T extends z.ZodTypeAny>(schema: T, options: OptionsConfig, args: string[]): z.infer<T> {
  let parsed: { values: Record<string, unknown>; positionals: string[] };
  try {
    parsed = parseArgs({ args, options, allowPositionals: true, strict: true });
  } catch (e) {
    throw new CliError(e instanceof Error ? e.message : String(e));
  }

  const input: Record<string, unknown> = { positionals: parsed.positionals };
  for (const [key, value] of Object.entries(parsed.values)) input[camelCase(key)] = value;

  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `--${i.path.join('.')}: ${i.message}`);
    throw new CliError('Invalid arguments ' + issues.join(', '));
  }
  return result.data;
}
