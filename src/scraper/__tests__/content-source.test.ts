import { describe, it, expect, vi, afterEach } from 'vitest';
import { HttpContentSource } from '../content-source.js';
import { PermanentFetchError, TransientFetchError } from '../../utils/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch(response: Response | Error) {
  const fetchMock = vi.fn(async () => {
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

const source = new HttpContentSource({ baseUrl: 'https://items.example.com/v0/', timeoutMs: 1000 });

describe('HttpContentSource', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches an item by id', async () => {
    const fetchMock = stubFetch(
      jsonResponse({ id: 101, type: 'story', title: 'Hello', by: 'alice', time: 1_700_000_000, score: 5 })
    );

    const item = await source.getItem(101);

    expect(item).toMatchObject({ id: 101, type: 'story', title: 'Hello', by: 'alice' });
    expect(fetchMock).toHaveBeenCalledWith(
      'https://items.example.com/v0/item/101.json',
      expect.objectContaining({ method: 'GET' })
    );
  });

  it('treats a null body as a missing item', async () => {
    stubFetch(jsonResponse(null));

    await expect(source.getItem(5)).rejects.toBeInstanceOf(PermanentFetchError);
  });

  it('treats deleted and dead items as permanent', async () => {
    stubFetch(jsonResponse({ id: 6, type: 'story', deleted: true }));
    await expect(source.getItem(6)).rejects.toThrow('Item 6 is deleted');

    stubFetch(jsonResponse({ id: 7, type: 'comment', dead: true }));
    await expect(source.getItem(7)).rejects.toThrow('Item 7 is dead');
  });

  it('treats malformed items as permanent', async () => {
    stubFetch(jsonResponse({ id: 'eight', type: 'story' }));

    await expect(source.getItem(8)).rejects.toBeInstanceOf(PermanentFetchError);
  });

  it('classifies 5xx and 429 as transient', async () => {
    stubFetch(jsonResponse({ error: 'unavailable' }, 503));
    const error = await source.getItem(9).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransientFetchError);
    expect(error instanceof TransientFetchError ? error.status : null).toBe(503);

    stubFetch(jsonResponse({ error: 'slow down' }, 429));
    await expect(source.getItem(9)).rejects.toBeInstanceOf(TransientFetchError);
  });

  it('classifies other 4xx as permanent', async () => {
    stubFetch(jsonResponse({ error: 'forbidden' }, 403));

    await expect(source.getItem(10)).rejects.toBeInstanceOf(PermanentFetchError);
  });

  it('classifies network failures as transient', async () => {
    stubFetch(new TypeError('fetch failed'));

    await expect(source.getItem(11)).rejects.toThrow('GET item/11.json failed: fetch failed');
  });

  it('reads the max item id', async () => {
    stubFetch(jsonResponse(41_000_000));

    await expect(source.getMaxItemId()).resolves.toBe(41_000_000);
  });

  it('limits a curated story list', async () => {
    const fetchMock = stubFetch(jsonResponse([5, 4, 3, 2, 1]));

    await expect(source.getStoryListIds('best', 3)).resolves.toEqual([5, 4, 3]);
    expect(fetchMock).toHaveBeenCalledWith('https://items.example.com/v0/beststories.json', expect.anything());
  });

  it('times out a request that never answers', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(() => new Promise<Response>(() => undefined))
    );
    const slow = new HttpContentSource({ baseUrl: 'https://items.example.com/v0', timeoutMs: 50 });

    await expect(slow.getItem(12)).rejects.toThrow('GET item/12.json failed: timed out after 50ms');
  });

  it('times out a body that stalls after the headers', async () => {
    const stalled = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('{"id":1,'));
      },
    });
    stubFetch(new Response(stalled, { status: 200 }));
    const slow = new HttpContentSource({ baseUrl: 'https://items.example.com/v0', timeoutMs: 50 });

    const error = await slow.getItem(1).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransientFetchError);
    expect(error instanceof Error ? error.message : null).toBe(
      'GET item/1.json body read failed: timed out after 50ms'
    );
  });
});
