/**
 * HttpPublisher - Publisher that POSTs to a content-management endpoint
 *
 * Request: `{ payload, scheduledTime }` with a bearer token and an
 * Idempotency-Key header. The created post's id is read from the response
 * body's `id`.
 *
 * Status mapping:
 *   401, 403               auth
 *   400, 409, 422, other 4xx   validation
 *   408, 429, 5xx, network transient
 *   aborted                timeout
 *
 * @module deploy/slotcast/collaborators/http-publisher
 */

import {
  AuthPublishError,
  PublishError,
  PublishTimeoutError,
  TransientPublishError,
  ValidationPublishError,
  errorMessage,
} from '../errors.js';
import type { JsonObject, PublishOptions, PublishReceipt, Publisher } from '../types.js';

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type HttpFetch = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<HttpResponseLike>;

export interface HttpPublisherConfig {
  endpoint: string;
  token?: string;
  fetch?: HttpFetch;
}

const TRANSIENT_STATUSES = new Set([408, 429]);

export class HttpPublisher implements Publisher {
  private readonly fetchImpl: HttpFetch;

  constructor(private readonly config: HttpPublisherConfig) {
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init));
  }

  async publish(payload: JsonObject, scheduledTime: Date, options: PublishOptions): Promise<PublishReceipt> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Idempotency-Key': options.idempotencyKey,
    };
    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }

    let response: HttpResponseLike;
    try {
      response = await this.fetchImpl(this.config.endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify({ payload, scheduledTime: scheduledTime.toISOString() }),
        signal: options.signal,
      });
    } catch (e) {
      if (options.signal.aborted) {
        const reason: unknown = options.signal.reason;
        throw reason instanceof PublishError ? reason : new PublishTimeoutError();
      }
      throw new TransientPublishError(`Network error: ${errorMessage(e)}`);
    }

    if (!response.ok) {
      throw classifyStatus(response.status, `${response.status} ${response.statusText}`);
    }

    const id = readPostId(await response.text());
    if (id === null) {
      throw new TransientPublishError(`Response ${response.status} carried no post id`);
    }
    return { externalPostId: id };
  }
}

export function classifyStatus(status: number, detail: string): PublishError {
  if (status === 401 || status === 403) {
    return new AuthPublishError(`Publish rejected: ${detail}`);
  }
  if (TRANSIENT_STATUSES.has(status) || status >= 500) {
    return new TransientPublishError(`Publish failed: ${detail}`);
  }
  if (status >= 400) {
    return new ValidationPublishError(`Publish rejected: ${detail}`);
  }
  return new TransientPublishError(`Unexpected response: ${detail}`);
}

function readPostId(body: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('id' in parsed)) return null;
  const { id } = parsed;
  if (typeof id === 'string' && id.length > 0) return id;
  if (typeof id === 'number') return String(id);
  return null;
}
