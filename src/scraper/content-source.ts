/**
 * Content Source Client
 *
 * Item API client (`maxitem.json`, `item/{id}.json` and the `top`/`new`/`best`
 * story lists).
 * Every call has its own AbortController timeout and every failure is
 * classified as transient (worth retrying) or permanent.
 */

import { z } from 'zod';
import { PermanentFetchError, TransientFetchError, errorMessage } from '../utils/errors.js';
import type { ContentSource, SourceItem, StoryList } from '../types/index.js';

export interface ContentSourceOptions {
  baseUrl: string;
  timeoutMs: number;
}

const itemSchema = z.object({
  id: z.number().int().positive(),
  type: z.string(),
  by: z.string().optional(),
  time: z.number().optional(),
  title: z.string().optional(),
  url: z.string().optional(),
  score: z.number().optional(),
  descendants: z.number().optional(),
  deleted: z.boolean().optional(),
  dead: z.boolean().optional(),
});

const idListSchema = z.array(z.number().int());

const maxItemSchema = z.number().int().nonnegative();

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export class HttpContentSource implements ContentSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: ContentSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
  }

  async getMaxItemId(): Promise<number> {
    const body = await this.fetchJson('maxitem.json', null);
    const parsed = maxItemSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransientFetchError(null, 'maxitem returned an unexpected payload');
    }
    return parsed.data;
  }

  async getItem(id: number): Promise<SourceItem> {
    const body = await this.fetchJson(`item/${id}.json`, id);

    if (body === null) {
      throw new PermanentFetchError(id, `Item ${id} not found`);
    }

    const parsed = itemSchema.safeParse(body);
    if (!parsed.success) {
      throw new PermanentFetchError(id, `Item ${id} is malformed: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const item = parsed.data;
    if (item.deleted || item.dead) {
      throw new PermanentFetchError(id, `Item ${id} is ${item.deleted ? 'deleted' : 'dead'}`);
    }

    return item;
  }

  async getStoryListIds(list: StoryList, limit: number): Promise<number[]> {
    if (limit <= 0) {
      return [];
    }
    const body = await this.fetchJson(`${list}stories.json`, null);
    const parsed = idListSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransientFetchError(null, `${list}stories returned an unexpected payload`);
    }
    return parsed.data.slice(0, limit);
  }

  /**
   * One deadline covers the request and the body read; a body stalled after the headers times out too
   */
  private async fetchJson(path: string, itemId: number | null): Promise<unknown> {
    const url = `${this.baseUrl}/${path}`;
    const controller = new AbortController();
    const deadline = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(new Error(`timed out after ${this.timeoutMs}ms`)),
        { once: true }
      );
    });
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await Promise.race([
          fetch(url, {
            method: 'GET',
            headers: { Accept: 'application/json' },
            signal: controller.signal,
          }),
          deadline,
        ]);
      } catch (error) {
        throw new TransientFetchError(itemId, `GET ${path} failed: ${errorMessage(error)}`, { cause: error });
      }

      if (!response.ok) {
        const message = `GET ${path} returned HTTP ${response.status}`;
        if (isRetryableStatus(response.status)) {
          throw new TransientFetchError(itemId, message, { status: response.status });
        }
        throw new PermanentFetchError(itemId, message);
      }

      let raw: string;
      try {
        raw = await Promise.race([response.text(), deadline]);
      } catch (error) {
        throw new TransientFetchError(itemId, `GET ${path} body read failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }

      try {
        return JSON.parse(raw);
      } catch (error) {
        throw new PermanentFetchError(itemId, `GET ${path} returned invalid JSON`, { cause: error });
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
