import { AuthRequiredError, NotFoundError, TransientError, ValidationError } from '../errors';
import type { AuthContext } from '../types';

export const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface DataApiClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export interface WordFieldsUpdate {
  text?: string;
  translation?: string;
}

export function getAuthHeaders(auth: AuthContext): Record<string, string> {
  return { Authorization: `Bearer ${auth.token}` };
}

/**
 * Client for the remote data API (system of record for word content).
 * The session is passed into every call; nothing is kept between calls.
 */
export class DataApiClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: DataApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  // Raw snapshot; validation happens at ingest
  async getSnapshot(auth: AuthContext): Promise<unknown> {
    return this.fetchJSON(auth, '/snapshot');
  }

  async updateWord(auth: AuthContext, wordId: string, fields: WordFieldsUpdate): Promise<void> {
    await this.fetchJSON(auth, `/words/${encodeURIComponent(wordId)}`, {
      method: 'PATCH',
      body: JSON.stringify(fields),
    }, { entity: 'word', id: wordId });
  }

  private async fetchJSON(
    auth: AuthContext,
    path: string,
    init: RequestInit = {},
    subject?: { entity: 'card' | 'word'; id: string }
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        ...init,
        headers: {
          'Content-Type': 'application/json',
          ...getAuthHeaders(auth),
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      // Network failure or timeout
      throw new TransientError(`Request to ${path} failed`, { cause: error });
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthRequiredError();
    }
    if (response.status === 404 && subject) {
      throw new NotFoundError(subject.entity, subject.id);
    }
    if (response.status >= 500 || response.status === 429) {
      throw new TransientError(`Data API responded ${response.status} for ${path}`);
    }
    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new ValidationError(`Data API rejected ${path} (HTTP ${response.status})`, text ? [text] : []);
    }

    if (response.status === 204) {
      return null;
    }
    try {
      return await response.json();
    } catch (error) {
      throw new TransientError(`Unreadable response from ${path}`, { cause: error });
    }
  }
}
