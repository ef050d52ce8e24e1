import { describe, it, expect, vi, afterEach } from 'vitest';
import OpenAI from 'openai';
import { OpenAIEmbedder } from '../embeddings.js';
import { HttpImageEmbedder, decodeBase64Image } from '../image-embeddings.js';
import { ProviderFailure } from '../../utils/errors.js';

function embeddingResponse(vectors: Array<{ index: number; embedding: number[] }>) {
  return {
    object: 'list' as const,
    model: 'test-embedding',
    usage: { prompt_tokens: 1, total_tokens: 1 },
    data: vectors.map(v => ({ object: 'embedding' as const, index: v.index, embedding: v.embedding })),
  };
}

describe('OpenAIEmbedder', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createClient() {
    const client = new OpenAI({ apiKey: 'test-secret', maxRetries: 0 });
    const create = vi.spyOn(client.embeddings, 'create');
    return { client, create };
  }

  it('embeds a single text with the configured model', async () => {
    const { client, create } = createClient();
    create.mockResolvedValue(embeddingResponse([{ index: 0, embedding: [0.1, 0.2] }]));
    const embedder = new OpenAIEmbedder(client, { model: 'text-embedding-3-small' });

    await expect(embedder.embedText('blue jacket')).resolves.toEqual([0.1, 0.2]);
    expect(create).toHaveBeenCalledWith({
      model: 'text-embedding-3-small',
      input: ['blue jacket'],
      encoding_format: 'float',
    });
  });

  it('batches texts and keeps the input order', async () => {
    const { client, create } = createClient();
    create
      .mockResolvedValueOnce(embeddingResponse([
        { index: 1, embedding: [2] },
        { index: 0, embedding: [1] },
      ]))
      .mockResolvedValueOnce(embeddingResponse([{ index: 0, embedding: [3] }]));
    const embedder = new OpenAIEmbedder(client, { model: 'm', batchSize: 2, batchDelayMs: 0 });

    const vectors = await embedder.embedTexts(['a', 'b', 'c']);

    expect(vectors).toEqual([[1], [2], [3]]);
    expect(create).toHaveBeenCalledTimes(2);
    expect(create.mock.calls[1][0].input).toEqual(['c']);
  });

  it('wraps API errors in ProviderFailure', async () => {
    const { client, create } = createClient();
    create.mockRejectedValue(new Error('quota exceeded'));
    const embedder = new OpenAIEmbedder(client, { model: 'm' });

    const result = embedder.embedText('x');
    await expect(result).rejects.toBeInstanceOf(ProviderFailure);
    await expect(result).rejects.toThrow('openai-embeddings request failed: quota exceeded');
  });

  it('fails when the response carries no vectors', async () => {
    const { client, create } = createClient();
    create.mockResolvedValue(embeddingResponse([]));
    const embedder = new OpenAIEmbedder(client, { model: 'm' });

    await expect(embedder.embedText('x')).rejects.toThrow('Embedding response contained no vectors');
  });
});

describe('decodeBase64Image', () => {
  it('decodes bare base64 and data URLs alike', () => {
    expect(decodeBase64Image('aW1hZ2U=').toString('utf-8')).toBe('image');
    expect(decodeBase64Image('data:image/jpeg;base64,aW1hZ2U=').toString('utf-8')).toBe('image');
  });

  it('rejects an empty payload', () => {
    expect(() => decodeBase64Image('')).toThrow('Image payload is empty or not base64');
  });
});

describe('HttpImageEmbedder', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('posts the image as base64 and returns the embedding', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(JSON.stringify({ embedding: [0.5, 0.25] }), { status: 200 }),
    );
    const embedder = new HttpImageEmbedder('http://embedder.test/embed/image');

    await expect(embedder.embedImage(Buffer.from('image'))).resolves.toEqual([0.5, 0.25]);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://embedder.test/embed/image');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ image: 'aW1hZ2U=' }));
  });

  it('fails on a non-2xx status', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('model not loaded', { status: 503 }));
    const embedder = new HttpImageEmbedder('http://embedder.test/embed/image');

    await expect(embedder.embedImage(Buffer.from('image')))
      .rejects.toThrow('Image embedding service error (503): model not loaded');
  });

  it('fails on a malformed body', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(JSON.stringify({ vector: [1] }), { status: 200 }),
    );
    const embedder = new HttpImageEmbedder('http://embedder.test/embed/image');

    await expect(embedder.embedImage(Buffer.from('image')))
      .rejects.toThrow('Image embedding service returned a malformed response');
  });

  it('wraps network errors in ProviderFailure', async () => {
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
    const embedder = new HttpImageEmbedder('http://embedder.test/embed/image');

    const result = embedder.embedImage(Buffer.from('image'));
    await expect(result).rejects.toBeInstanceOf(ProviderFailure);
    await expect(result).rejects.toThrow('image-embeddings request failed: fetch failed');
  });
});
