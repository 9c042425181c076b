import { retry } from '@cadence/core';
import type { Logger } from '@cadence/logger';
import {
  errorResponseSchema,
  legacyLoadResultSchema,
  loadResultSchema,
  nodeInfoSchema,
  type NodeInfo,
  type Track,
} from '@cadence/schemas';
import { RestError } from './errors.js';
import type { LoadResult } from './types.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface RestNode {
  id: string;
  host: string;
  port: number;
  password: string;
  secure: boolean;
}

export interface RestClientOptions {
  node: RestNode;
  clientName: string;
  logger: Logger;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  timeoutMs?: number;
  searchPrefix?: string;
  fetch?: FetchLike;
}

export interface PlayerPatch {
  encodedTrack?: string | null;
  position?: number;
  endTime?: number;
  paused?: boolean;
  volume?: number;
  voice?: {
    token: string;
    endpoint: string;
    sessionId: string;
  };
}

export interface SessionPatch {
  resuming: boolean;
  timeoutSeconds: number;
}

type HttpMethod = 'GET' | 'PATCH' | 'DELETE';

interface RequestOptions {
  body?: unknown;
  signal?: AbortSignal;
}

/**
 * Stateless HTTP client for one node. Network failures and 5xx responses are
 * retried with exponential backoff; 4xx responses surface immediately.
 */
export class RestClient {
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly retryAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly timeoutMs: number;
  private readonly searchPrefix: string;

  constructor(private readonly options: RestClientOptions) {
    const { node } = options;
    this.baseUrl = `${node.secure ? 'https' : 'http'}://${node.host}:${node.port}`;
    this.logger = options.logger.child({ scope: 'rest', nodeId: node.id });
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.retryAttempts = options.retryAttempts ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 250;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.searchPrefix = options.searchPrefix ?? 'ytsearch:';
  }

  public normaliseQuery(query: string): string {
    const trimmed = query.trim();
    return looksLikeIdentifier(trimmed) ? trimmed : `${this.searchPrefix}${trimmed}`;
  }

  public async resolveTracks(query: string, signal?: AbortSignal): Promise<LoadResult> {
    const identifier = this.normaliseQuery(query);
    const body = await this.request('GET', `/v4/loadtracks?identifier=${encodeURIComponent(identifier)}`, { signal });
    const result = parseLoadResult(body);
    this.logger.debug({ identifier, resultType: result.type }, 'Resolved tracks');
    return result;
  }

  public async updatePlayer(
    sessionId: string,
    guildId: string,
    patch: PlayerPatch,
    options: { noReplace?: boolean; signal?: AbortSignal } = {},
  ): Promise<void> {
    const noReplace = options.noReplace ?? false;
    await this.request('PATCH', `/v4/sessions/${sessionId}/players/${guildId}?noReplace=${noReplace}`, {
      body: patch,
      signal: options.signal,
    });
  }

  public async destroyPlayer(sessionId: string, guildId: string, signal?: AbortSignal): Promise<void> {
    await this.request('DELETE', `/v4/sessions/${sessionId}/players/${guildId}`, { signal });
  }

  public async updateSession(sessionId: string, patch: SessionPatch, signal?: AbortSignal): Promise<void> {
    await this.request('PATCH', `/v4/sessions/${sessionId}`, {
      body: { resuming: patch.resuming, timeout: patch.timeoutSeconds },
      signal,
    });
  }

  public async fetchInfo(signal?: AbortSignal): Promise<NodeInfo> {
    const body = await this.request('GET', '/v4/info', { signal });
    const parsed = nodeInfoSchema.safeParse(body);
    if (!parsed.success) {
      throw new RestError('rejected', 'Node returned malformed info payload');
    }
    return parsed.data;
  }

  private request(method: HttpMethod, path: string, options: RequestOptions): Promise<unknown> {
    return retry(() => this.send(method, path, options), {
      attempts: this.retryAttempts,
      baseDelayMs: this.retryBaseDelayMs,
      signal: options.signal,
      shouldRetry: (error) => error instanceof RestError && error.kind === 'network',
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn({ err: error, method, path, attempt, delayMs }, 'Retrying node REST call');
      },
    });
  }

  private async send(method: HttpMethod, path: string, options: RequestOptions): Promise<unknown> {
    const { signal } = options;
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    const headers: Record<string, string> = {
      Authorization: this.options.node.password,
      'Client-Name': this.options.clientName,
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs}ms` : describeError(error);
      throw new RestError('network', `${method} ${path} failed: ${reason}`, undefined, { cause: error });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }

    if (response.status >= 500) {
      throw new RestError('network', `${method} ${path} returned ${response.status}`, response.status);
    }

    const text = await response.text();
    if (!response.ok) {
      throw new RestError(
        'rejected',
        `${method} ${path} was rejected (${response.status}): ${describeErrorBody(text, response.statusText)}`,
        response.status,
      );
    }

    if (text.length === 0) {
      return undefined;
    }
    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (error) {
      throw new RestError('rejected', `${method} ${path} returned invalid JSON`, response.status, { cause: error });
    }
  }
}

export function parseLoadResult(body: unknown): LoadResult {
  const current = loadResultSchema.safeParse(body);
  if (current.success) {
    const result = current.data;
    switch (result.loadType) {
      case 'track':
        return { type: 'track', track: result.data };
      case 'playlist':
        return playlistResult(result.data.info.name, result.data.tracks, result.data.info.selectedTrack);
      case 'search':
        return result.data.length > 0 ? { type: 'search', tracks: result.data } : { type: 'noMatches' };
      case 'empty':
        return { type: 'noMatches' };
      case 'error':
        return { type: 'failed', cause: result.data };
    }
  }

  const legacy = legacyLoadResultSchema.safeParse(body);
  if (legacy.success) {
    const result = legacy.data;
    const [first] = result.tracks;
    switch (result.loadType) {
      case 'TRACK_LOADED':
        return first ? { type: 'track', track: first } : { type: 'noMatches' };
      case 'PLAYLIST_LOADED':
        return playlistResult(
          result.playlistInfo?.name ?? 'Untitled playlist',
          result.tracks,
          result.playlistInfo?.selectedTrack ?? -1,
        );
      case 'SEARCH_RESULT':
        return result.tracks.length > 0 ? { type: 'search', tracks: result.tracks } : { type: 'noMatches' };
      case 'NO_MATCHES':
        return { type: 'noMatches' };
      case 'LOAD_FAILED':
        return {
          type: 'failed',
          cause: result.exception ?? { message: 'Unknown error', severity: 'common', cause: null },
        };
    }
  }

  throw new RestError('rejected', 'Node returned an unrecognised load result');
}

function playlistResult(name: string, tracks: Track[], selected: number): LoadResult {
  if (tracks.length === 0) {
    return { type: 'noMatches' };
  }
  const selectedIndex = Number.isInteger(selected) && selected >= 0 && selected < tracks.length ? selected : 0;
  return { type: 'playlist', name, tracks, selectedIndex };
}

function looksLikeIdentifier(query: string): boolean {
  return /^https?:\/\//i.test(query) || /^[a-z]{2,}search:/i.test(query) || /^(spotify|soundcloud):/i.test(query);
}

function describeErrorBody(text: string, fallback: string): string {
  if (text.length === 0) {
    return fallback || 'no details';
  }
  try {
    const parsed = errorResponseSchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      return parsed.data.message ?? parsed.data.error ?? fallback;
    }
  } catch {
    return text.slice(0, 200);
  }
  return text.slice(0, 200);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason;
  }
  const error = new Error('Request aborted');
  error.name = 'AbortError';
  return error;
}
