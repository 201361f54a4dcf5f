import fs from 'node:fs';
import path from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

const DEFAULT_HOSTS_FILE = new URL('../../data/cdn-hosts.json', import.meta.url);

const HOSTNAME_RE = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]*[a-z0-9])?)+$/;

const defaultHostsSchema = z.object({
  vods: z.array(z.string().min(1)).nonempty(),
  clips: z.array(z.string().min(1)).nonempty(),
});

const cdnFileSchema = z.object({
  cdns: z.array(z.string()),
});

export interface HostPools {
  /** CDN hosts serving `index-dvr.m3u8` playlists, probed in this order */
  vods: readonly string[];
  /** Hosts serving `{videoId}-offset-{offset}.mp4` clip media */
  clips: readonly string[];
}

/** Lowercases and strips a scheme or trailing path; returns null for anything that is not a hostname. */
export function normalizeHost(raw: string): string | null {
  const host = raw
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\//, '')
    .replace(/\/.*$/, '');
  return HOSTNAME_RE.test(host) ? host : null;
}

export function loadDefaultHosts(file: URL | string = DEFAULT_HOSTS_FILE): HostPools {
  const parsed = defaultHostsSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
  return { vods: parsed.vods, clips: parsed.clips };
}

/**
 * Reads extra hosts from a `.json`, `.toml` or `.yaml`/`.yml` file holding a
 * `cdns` list, or a plain text file with one host per line. Throws on
 * unreadable or malformed files.
 */
export function readHostFile(filePath: string): string[] {
  const ext = path.extname(filePath).toLowerCase();
  const text = fs.readFileSync(filePath, 'utf-8');

  let raw: string[];
  if (ext === '.json') {
    raw = cdnFileSchema.parse(JSON.parse(text)).cdns;
  } else if (ext === '.toml') {
    raw = cdnFileSchema.parse(parseToml(text)).cdns;
  } else if (ext === '.yaml' || ext === '.yml') {
    raw = cdnFileSchema.parse(parseYaml(text)).cdns;
  } else if (ext === '.txt' || ext === '') {
    raw = text.split(/\r?\n/).filter((l) => l.trim().length > 0);
  } else {
    throw new Error(`Unsupported CDN list format "${ext}" (use .json, .toml, .yaml or .txt)`);
  }

  const hosts: string[] = [];
  for (const entry of raw) {
    const host = normalizeHost(entry);
    if (host) {
      hosts.push(host);
    } else {
      logger.warn({ filePath, entry }, 'Skipping invalid host in CDN list');
    }
  }
  return hosts;
}

/** Keeps the default order and appends hosts it does not already contain. */
export function mergeHosts(defaults: readonly string[], extra: readonly string[]): string[] {
  const merged = [...defaults];
  const seen = new Set(defaults);
  for (const host of extra) {
    if (seen.has(host)) continue;
    seen.add(host);
    merged.push(host);
  }
  return merged;
}

export function compileHostPool(defaults: readonly string[], extraFile?: string): string[] {
  if (!extraFile) return [...defaults];

  let extra: string[];
  try {
    extra = readHostFile(extraFile);
  } catch (err) {
    logger.warn({ extraFile, err }, 'Failed to load CDN list file, using the default hosts');
    return [...defaults];
  }

  const merged = mergeHosts(defaults, extra);
  logger.debug(
    { initial: defaults.length, compiled: merged.length },
    merged.length === defaults.length ? 'No new CDN hosts added' : 'Compiled the CDN host list',
  );
  return merged;
}
