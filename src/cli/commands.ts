import type { Logger } from 'pino';
import type { Dispatcher } from 'undici';
import { getAdapter } from '../adapters/index.js';
import { extractClipSlug } from '../clips/slug.js';
import { scanClips } from '../clips/scan.js';
import type { RateLimiter } from '../compliance/rate-limiter.js';
import { AdapterHintSource, deriveFromUrl, fetchStreamHint, type HintFetchOptions } from '../hints/hint-source.js';
import { validateVodTarget } from '../pipeline/targets.js';
import { fixPlaylist } from '../playlist/fix.js';
import { findClipBroadcast, findLiveStream } from '../twitch/gql.js';
import type { StreamRef } from '../types/adapter.js';
import type { RetryPolicy, Verifier } from '../types/probe.js';
import type { SearchDiagnostics, SearchProgress, VodSearchResult } from '../types/search.js';
import type { VodMode } from '../types/target.js';
import { logger } from '../utils/logger.js';
import type { HostPools } from '../vods/host-pool.js';
import { checkAvailability, searchVod } from '../vods/search.js';
import type { CliCommand, CliOptions } from './args.js';

export const EXIT_CODES = {
  ok: 0,
  error: 1,
  notFound: 2,
  aborted: 130,
} as const;

export interface CommandContext {
  hosts: HostPools;
  vodVerifier: Verifier;
  clipVerifier: Verifier;
  retry: RetryPolicy;
  options: CliOptions;
  signal: AbortSignal;
  /** Result lines for the user; logs go to the logger */
  print: (line: string) => void;
  dispatcher?: Dispatcher;
  rateLimiter?: RateLimiter;
}

/** Logs search progress at every tenth of the candidate space. */
export function progressLogger(log: Logger): (progress: SearchProgress) => void {
  let lastDecile = 0;
  return ({ checked, total, fraction }) => {
    const decile = Math.floor(fraction * 10);
    if (decile <= lastDecile) return;
    lastDecile = decile;
    log.info({ checked, total }, `Checked ${decile * 10}%`);
  };
}

function hintOptions(ctx: CommandContext): HintFetchOptions {
  return {
    preference: ctx.options.mode,
    dispatcher: ctx.dispatcher,
    rateLimiter: ctx.rateLimiter,
    signal: ctx.signal,
  };
}

function formatTimestamp(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString().replace('.000Z', 'Z');
}

function reportDegraded(ctx: CommandContext, diagnostics: SearchDiagnostics, what: string): void {
  const count = diagnostics.degraded.length;
  if (count > 0) {
    ctx.print(`${count} ${what} could not be checked reliably because of network errors; try again with more --retries`);
  }
}

async function reportVodResult(ctx: CommandContext, ref: StreamRef, result: VodSearchResult): Promise<number> {
  switch (result.status) {
    case 'aborted':
      ctx.print(`Search aborted at ${Math.floor(result.progress * 100)}%: ${result.reason}`);
      return EXIT_CODES.aborted;
    case 'exhausted':
      ctx.print('No playlist found');
      reportDegraded(ctx, result.diagnostics, 'timestamp(s)');
      return EXIT_CODES.notFound;
    case 'found':
      break;
  }

  const { hit } = result;
  if (ctx.options.simple) {
    ctx.print(hit.url);
    return EXIT_CODES.ok;
  }

  ctx.print(`Found ${ref.login}'s VOD ${ref.videoId}, started ${formatTimestamp(hit.timestamp)} (${hit.timestamp})`);
  const available = await checkAvailability(
    { login: ref.login, videoId: ref.videoId, timestamp: hit.timestamp },
    {
      hosts: ctx.hosts.vods,
      verifier: ctx.vodVerifier,
      retry: ctx.retry,
      concurrency: ctx.options.concurrency,
      signal: ctx.signal,
    },
  );
  const urls = available.urls.length > 0 ? available.urls : [hit];
  for (const { url, muted } of urls) {
    ctx.print(muted ? `${url} (muted)` : url);
  }
  if (urls.some((u) => u.muted)) {
    ctx.print('Muted playlists play after running: vod-resolver fix <url>');
  }
  if (!available.complete) {
    ctx.print('Host check interrupted; other hosts may serve this VOD too');
    return EXIT_CODES.aborted;
  }
  return EXIT_CODES.ok;
}

async function runVodSearch(
  ctx: CommandContext,
  ref: StreamRef,
  mode: VodMode,
  hints: readonly number[] = [],
): Promise<number> {
  // Normalised up front so the availability check hashes the same login
  const target = validateVodTarget({ login: ref.login, videoId: ref.videoId, mode });
  const result = await searchVod(target, {
    hosts: ctx.hosts.vods,
    verifier: ctx.vodVerifier,
    retry: ctx.retry,
    concurrency: ctx.options.concurrency,
    hints,
    signal: ctx.signal,
    onProgress: progressLogger(logger.child({ videoId: target.videoId })),
  });
  return reportVodResult(ctx, target, result);
}

async function runLink(ctx: CommandContext, url: string): Promise<number> {
  const hint = await deriveFromUrl(url, hintOptions(ctx));
  const useExact = hint.precision === 'exact' && ctx.options.mode !== 'bruteforce';
  const mode: VodMode = useExact
    ? { kind: 'exact', timestamp: hint.start }
    : { kind: 'range', from: hint.window.from, to: hint.window.to };
  return runVodSearch(ctx, hint, mode, [hint.start]);
}

async function runLive(ctx: CommandContext, login: string): Promise<number> {
  const stream = await findLiveStream(login.trim().toLowerCase(), {
    dispatcher: ctx.dispatcher,
    signal: ctx.signal,
  });
  if (!stream) {
    ctx.print(`${login} is not live`);
    return EXIT_CODES.notFound;
  }
  return runVodSearch(ctx, stream, { kind: 'exact', timestamp: stream.startedAt });
}

async function runClip(ctx: CommandContext, input: string): Promise<number> {
  const slug = extractClipSlug(input);
  const broadcast = await findClipBroadcast(slug, { dispatcher: ctx.dispatcher, signal: ctx.signal });
  if (!broadcast) {
    ctx.print(`Clip ${slug} was not found or its VOD is gone`);
    return EXIT_CODES.notFound;
  }

  const hint = await fetchStreamHint(getAdapter('twitchtracker'), broadcast, hintOptions(ctx));
  return runVodSearch(ctx, broadcast, { kind: 'exact', timestamp: hint.start });
}

async function runBruteforce(ctx: CommandContext, ref: StreamRef, from: number, to: number): Promise<number> {
  let hints: number[] = [];
  if (ctx.options.hints) {
    const source = new AdapterHintSource(getAdapter('twitchtracker'), hintOptions(ctx));
    hints = await source.hintsFor(ref, ctx.signal);
  }
  return runVodSearch(ctx, ref, { kind: 'range', from, to }, hints);
}

async function runClipforce(ctx: CommandContext, videoId: string, start: number, end: number): Promise<number> {
  const result = await scanClips(
    { videoId, start, end, stride: ctx.options.stride },
    {
      hosts: ctx.hosts.clips,
      verifier: ctx.clipVerifier,
      retry: ctx.retry,
      concurrency: ctx.options.concurrency,
      signal: ctx.signal,
      onProgress: progressLogger(logger.child({ videoId })),
    },
  );

  for (const clip of result.clips) {
    ctx.print(ctx.options.simple ? clip.url : `${clip.offset}s ${clip.url}`);
  }

  if (result.status === 'aborted') {
    ctx.print(`Scan aborted at ${Math.floor(result.progress * 100)}%: ${result.reason}`);
    return EXIT_CODES.aborted;
  }
  if (result.clips.length === 0) {
    ctx.print('No clips found');
    reportDegraded(ctx, result.diagnostics, 'offset(s)');
    return EXIT_CODES.notFound;
  }
  if (!ctx.options.simple) ctx.print(`${result.clips.length} clip(s) found`);
  reportDegraded(ctx, result.diagnostics, 'offset(s)');
  return EXIT_CODES.ok;
}

async function runFix(ctx: CommandContext, url: string): Promise<number> {
  const { path } = await fixPlaylist(url, {
    output: ctx.options.output,
    method: ctx.options.probeSegments ? 'probe' : 'rewrite',
    concurrency: ctx.options.concurrency,
    timeoutMs: ctx.options.timeoutMs,
    dispatcher: ctx.dispatcher,
    signal: ctx.signal,
  });
  ctx.print(ctx.options.simple ? path : `Wrote ${path}`);
  return EXIT_CODES.ok;
}

/** Runs one parsed command and returns the process exit code. Errors propagate. */
export async function runCommand(command: CliCommand, ctx: CommandContext): Promise<number> {
  switch (command.name) {
    case 'help':
      return EXIT_CODES.ok;
    case 'exact':
      return runVodSearch(ctx, command, { kind: 'exact', timestamp: command.timestamp });
    case 'bruteforce':
      return runBruteforce(ctx, command, command.from, command.to);
    case 'link':
      return runLink(ctx, command.url);
    case 'live':
      return runLive(ctx, command.login);
    case 'clip':
      return runClip(ctx, command.clip);
    case 'clipforce':
      return runClipforce(ctx, command.videoId, command.start, command.end);
    case 'fix':
      return runFix(ctx, command.url);
  }
}
