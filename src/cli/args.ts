import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { Config } from '../config.js';
import { InvalidInputError } from '../errors.js';
import type { HintPreference } from '../types/adapter.js';
import { parseTimestamp } from '../utils/date.js';

export const USAGE = `Usage: vod-resolver <command> [arguments] [options]

Commands:
  exact <login> <video-id> <timestamp>       Check the playlist for a known start time
  bruteforce <login> <video-id> <from> <to>  Search a start-time window
  link <stream-url>                          Use a TwitchTracker or StreamsCharts stream page
  live <login>                               Find the playlist of a running stream
  clip <slug-or-url>                         Find the VOD a clip was cut from
  clipforce <video-id> <start> <end>         Scan VOD offsets (seconds) for clips
  fix <playlist-url>                         Write a playable copy of an unmuted playlist

Options:
  -c, --concurrency <n>   Candidates checked at once
      --cdn-file <path>   Extra CDN hosts (.json, .toml or .yaml with a cdns list, or .txt, one per line)
      --timeout <ms>      Per-request timeout
      --retries <n>       Retries for a request that failed transiently
      --mode <mode>       Hint precision for link: exact, bruteforce or auto
      --stride <n>        Seconds between clipforce offsets
      --hints             Seed bruteforce with TwitchTracker's start time
  -o, --output <path>     Output file for fix
      --probe-segments    Make fix ask the CDN about each segment instead of renaming
  -s, --simple            Print bare URLs only
  -v, --verbose           Debug logging
  -h, --help              Show this help

Timestamps are Unix seconds, "YYYY-MM-DD hh:mm:ss" (UTC), RFC 3339 or "DD-MM-YYYY hh:mm".`;

export type CliCommand =
  | { name: 'exact'; login: string; videoId: string; timestamp: number }
  | { name: 'bruteforce'; login: string; videoId: string; from: number; to: number }
  | { name: 'link'; url: string }
  | { name: 'live'; login: string }
  | { name: 'clip'; clip: string }
  | { name: 'clipforce'; videoId: string; start: number; end: number }
  | { name: 'fix'; url: string }
  | { name: 'help' };

export interface CliOptions {
  concurrency: number;
  cdnFile: string | undefined;
  timeoutMs: number;
  retries: number;
  mode: HintPreference;
  stride: number;
  hints: boolean;
  output: string | undefined;
  probeSegments: boolean;
  simple: boolean;
  verbose: boolean;
}

export interface ParsedCli {
  command: CliCommand;
  options: CliOptions;
}

const ARITY: Record<Exclude<CliCommand['name'], 'help'>, number> = {
  exact: 3,
  bruteforce: 4,
  link: 1,
  live: 1,
  clip: 1,
  clipforce: 3,
  fix: 1,
};

function isCommandName(name: string): name is keyof typeof ARITY {
  return Object.hasOwn(ARITY, name);
}

const positiveInt = (flag: string) =>
  z.coerce
    .number({ invalid_type_error: `--${flag} must be a number` })
    .int(`--${flag} must be an integer`)
    .positive(`--${flag} must be positive`);

const flagsSchema = z.object({
  concurrency: positiveInt('concurrency').optional(),
  timeout: positiveInt('timeout').optional(),
  retries: z.coerce.number().int('--retries must be an integer').nonnegative('--retries must not be negative').optional(),
  stride: positiveInt('stride').optional(),
  mode: z
    .enum(['exact', 'bruteforce', 'auto'], { errorMap: () => ({ message: '--mode must be exact, bruteforce or auto' }) })
    .optional(),
});

function parseOffset(raw: string, what: string): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(value)) {
    throw new InvalidInputError(`${what} must be a whole number of seconds: ${raw}`);
  }
  return value;
}

function buildCommand(name: keyof typeof ARITY, args: string[]): CliCommand {
  const arg = (i: number): string => args[i] ?? '';
  switch (name) {
    case 'exact':
      return { name, login: arg(0), videoId: arg(1), timestamp: parseTimestamp(arg(2)) };
    case 'bruteforce':
      return { name, login: arg(0), videoId: arg(1), from: parseTimestamp(arg(2)), to: parseTimestamp(arg(3)) };
    case 'link':
    case 'fix':
      return { name, url: arg(0) };
    case 'live':
      return { name, login: arg(0) };
    case 'clip':
      return { name, clip: arg(0) };
    case 'clipforce':
      return { name, videoId: arg(0), start: parseOffset(arg(1), 'start'), end: parseOffset(arg(2), 'end') };
  }
}

/** Turns `argv` (without the node and script entries) into a command and its options. */
export function parseCli(argv: string[], defaults: Config): ParsedCli {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (err) {
    throw new InvalidInputError(err instanceof Error ? err.message : String(err));
  }
  const { values, positionals } = parsed;

  const flags = flagsSchema.safeParse(values);
  if (!flags.success) {
    const issues = flags.error.issues.map((i) => i.message);
    throw new InvalidInputError(issues.join('; '), issues);
  }

  const options: CliOptions = {
    concurrency: flags.data.concurrency ?? defaults.SEARCH_CONCURRENCY,
    cdnFile: values['cdn-file'] ?? defaults.CDN_FILE,
    timeoutMs: flags.data.timeout ?? defaults.REQUEST_TIMEOUT_MS,
    retries: flags.data.retries ?? defaults.RETRY_MAX,
    mode: flags.data.mode ?? 'auto',
    stride: flags.data.stride ?? defaults.CLIP_STRIDE,
    hints: values.hints ?? false,
    output: values.output,
    probeSegments: values['probe-segments'] ?? false,
    simple: values.simple ?? false,
    verbose: values.verbose ?? false,
  };

  const [name, ...args] = positionals;
  if (values.help || name === undefined || name === 'help') {
    return { command: { name: 'help' }, options };
  }
  if (!isCommandName(name)) throw new InvalidInputError(`Unknown command: ${name}`);
  if (args.length !== ARITY[name]) {
    throw new InvalidInputError(`${name} takes ${ARITY[name]} argument(s), got ${args.length}`);
  }

  return { command: buildCommand(name, args), options };
}

function parseRaw(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      concurrency: { type: 'string', short: 'c' },
      'cdn-file': { type: 'string' },
      timeout: { type: 'string' },
      retries: { type: 'string' },
      mode: { type: 'string' },
      stride: { type: 'string' },
      hints: { type: 'boolean' },
      output: { type: 'string', short: 'o' },
      'probe-segments': { type: 'boolean' },
      simple: { type: 'boolean', short: 's' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}
