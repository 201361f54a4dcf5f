import type { Dispatcher } from 'undici';
import { z } from 'zod';
import { TwitchApiError } from '../errors.js';
import { fetchHttp } from '../net/http-client.js';
import type { StreamRef } from '../types/adapter.js';
import { parseTimestamp } from '../utils/date.js';
import { logger } from '../utils/logger.js';

const GQL_ENDPOINT = 'https://gql.twitch.tv/gql';
/** Public client id of the twitch.tv web player; identifies the caller, grants nothing */
const WEB_CLIENT_ID = 'kimne78kx3ncx6brgo4mv6wki5h1ko';

const LIVE_QUERY = 'query($login:String){user(login: $login){stream{id createdAt}}}';
const CLIP_QUERY = 'query($slug:ID!){clip(slug: $slug){broadcaster{login}broadcast{id}}}';

const liveResponseSchema = z.object({
  data: z.object({
    user: z
      .object({
        stream: z.object({ id: z.string(), createdAt: z.string() }).nullable(),
      })
      .nullable(),
  }),
});

const clipResponseSchema = z.object({
  data: z.object({
    clip: z
      .object({
        broadcaster: z.object({ login: z.string() }).nullable(),
        broadcast: z.object({ id: z.string() }).nullable(),
      })
      .nullable(),
  }),
});

export interface GqlOptions {
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
}

export interface LiveStream extends StreamRef {
  /** Stream start, Unix seconds */
  startedAt: number;
}

async function gqlQuery<S extends z.ZodTypeAny>(
  schema: S,
  query: string,
  variables: Record<string, string>,
  options: GqlOptions,
): Promise<z.output<S>> {
  const { status, body } = await fetchHttp(GQL_ENDPOINT, {
    method: 'POST',
    headers: { 'Client-ID': WEB_CLIENT_ID, 'Content-Type': 'application/json' },
    body: JSON.stringify({ query, variables }),
    dispatcher: options.dispatcher,
    signal: options.signal,
  });
  if (status !== 200) throw new TwitchApiError(`Twitch GQL returned HTTP ${status}`);

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new TwitchApiError('Twitch GQL returned invalid JSON');
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new TwitchApiError(`Unexpected Twitch GQL response: ${result.error.issues[0]?.message ?? 'unknown'}`);
  }
  return result.data;
}

/** The running broadcast of `login`, or null when the channel is offline or unknown. */
export async function findLiveStream(login: string, options: GqlOptions = {}): Promise<LiveStream | null> {
  const { data } = await gqlQuery(liveResponseSchema, LIVE_QUERY, { login }, options);
  const stream = data.user?.stream;
  if (!stream) {
    logger.info({ login }, 'Channel is not live');
    return null;
  }
  return { login, videoId: stream.id, startedAt: parseTimestamp(stream.createdAt) };
}

/** Broadcaster login and broadcast id a clip was cut from, or null for unknown clips. */
export async function findClipBroadcast(slug: string, options: GqlOptions = {}): Promise<StreamRef | null> {
  const { data } = await gqlQuery(clipResponseSchema, CLIP_QUERY, { slug }, options);
  const login = data.clip?.broadcaster?.login;
  const videoId = data.clip?.broadcast?.id;
  if (!login || !videoId) {
    logger.info({ slug }, 'Clip not found or has no broadcast');
    return null;
  }
  return { login: login.toLowerCase(), videoId };
}
