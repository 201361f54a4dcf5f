import type { HintAdapter } from '../types/adapter.js';
import { StreamsChartsAdapter } from './streamscharts.js';
import { TwitchTrackerAdapter } from './twitchtracker.js';

const adapters: Map<string, HintAdapter> = new Map();

function register(adapter: HintAdapter): void {
  adapters.set(adapter.config.id, adapter);
}

register(new TwitchTrackerAdapter());
register(new StreamsChartsAdapter());

export function getAdapter(id: string): HintAdapter {
  const adapter = adapters.get(id);
  if (!adapter) throw new Error(`Unknown adapter: ${id}`);
  return adapter;
}

export function getAllAdapters(): HintAdapter[] {
  return Array.from(adapters.values());
}

export function findAdapterByHost(hostname: string): HintAdapter | undefined {
  const host = hostname.toLowerCase();
  return getAllAdapters().find((a) => a.config.hostnames.includes(host));
}

export { adapters };
