import { describe, it, expect, vi } from 'vitest';
import { HttpEmbedder, joinUrl } from '../../../../src/services/embedding/embedder.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('joinUrl', () => {
  it('joins with exactly one slash', () => {
    expect(joinUrl('http://embed.test', 'embed')).toBe('http://embed.test/embed');
    expect(joinUrl('http://embed.test//', 'embed')).toBe('http://embed.test/embed');
  });
});

describe('HttpEmbedder', () => {
  it('posts the text and returns the first vector', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse([[0.5, -0.25, 1]])
    );
    const embedder = new HttpEmbedder({
      endpoint: 'http://embed.test/',
      model: 'test-embedder',
      dimensions: 3,
      fetch: fetchMock,
    });

    const vector = await embedder.encode('When is open house?');

    expect(vector).toBeInstanceOf(Float32Array);
    expect(Array.from(vector)).toEqual([0.5, -0.25, 1]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://embed.test/embed');
    expect(init.method).toBe('POST');
    expect(JSON.parse(String(init.body))).toEqual({
      inputs: ['When is open house?'],
      model: 'test-embedder',
    });
  });

  it('fails when the vector has the wrong dimension', async () => {
    const embedder = new HttpEmbedder({
      endpoint: 'http://embed.test',
      model: 'test-embedder',
      dimensions: 4,
      fetch: async () => jsonResponse([[0.5, -0.25, 1]]),
    });
    await expect(embedder.encode('q')).rejects.toThrow(
      'Embedding model test-embedder returned 3 dimensions, expected 4'
    );
  });

  it('fails on an unexpected payload', async () => {
    const embedder = new HttpEmbedder({
      endpoint: 'http://embed.test',
      model: 'test-embedder',
      dimensions: 3,
      fetch: async () => jsonResponse({ error: 'nope' }),
    });
    await expect(embedder.encode('q')).rejects.toThrow(
      'Embedding endpoint returned an unexpected payload'
    );
  });

  it('fails on a non-2xx response', async () => {
    const embedder = new HttpEmbedder({
      endpoint: 'http://embed.test',
      model: 'test-embedder',
      dimensions: 3,
      fetch: async () => new Response('overloaded', { status: 429 }),
    });
    await expect(embedder.encode('q')).rejects.toThrow(
      'http://embed.test/embed responded 429: overloaded'
    );
  });
});
