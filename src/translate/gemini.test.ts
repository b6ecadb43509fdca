import { describe, expect, it, vi } from 'vitest';
import { GeminiTranslator } from './gemini';
import { extractJson, geminiEndpoint, partsText, readTranslation, type FetchLike } from '../utils/ai';

function reply(text: string): Response {
  return new Response(JSON.stringify({ candidates: [{ content: { parts: [{ text }] } }] }), { status: 200 });
}

describe('GeminiTranslator', () => {
  it('posts a word prompt and reads the JSON translation', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => reply('```json\n{ "translation": "house" }\n```'));
    const g = new GeminiTranslator({ apiKey: 'test-secret', fetchImpl });
    expect(await g.translateWord('Haus', 'de', 'en')).toBe('house');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(geminiEndpoint('gemini-1.5-flash', 'test-secret'));
    expect(init?.method).toBe('POST');
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({ generationConfig: { temperature: 0 } });
    expect(String(init?.body)).toContain('\\"Haus\\"');
  });

  it('returns the full-text reply as is, trimmed', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => reply('  The house is big.\n'));
    const g = new GeminiTranslator({ apiKey: 'test-secret', model: 'test-model', fetchImpl });
    expect(await g.translateText('Das Haus ist groß.', 'de', 'en')).toBe('The house is big.');
    expect(fetchImpl.mock.calls[0][0]).toContain('/test-model:generateContent');
  });

  it('rejects on HTTP errors with status and body', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response('quota exceeded', { status: 429 }));
    const g = new GeminiTranslator({ apiKey: 'test-secret', fetchImpl });
    await expect(g.translateWord('Haus', 'de', 'en')).rejects.toThrow('Gemini API error 429: quota exceeded');
  });

  it('rejects when the reply carries no text', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response('{"candidates":[]}', { status: 200 }));
    const g = new GeminiTranslator({ apiKey: 'test-secret', fetchImpl });
    await expect(g.translateText('x', 'de', 'en')).rejects.toThrow('Gemini returned no text parts');
  });

  it('needs an API key', () => {
    expect(() => new GeminiTranslator({ apiKey: '' })).toThrow('Gemini API key missing');
  });
});

describe('model output helpers', () => {
  it('joins text parts', () => {
    expect(partsText({ candidates: [{ content: { parts: [{ text: 'a' }, { inline: 1 }, { text: 'b' }] } }] })).toBe('a\nb');
    expect(partsText(null)).toBeUndefined();
  });

  it('finds the JSON object inside chatter', () => {
    expect(extractJson('Sure! {"translation": "tree"} Hope that helps.')).toEqual({ translation: 'tree' });
  });

  it('requires a non-empty translation field', () => {
    expect(readTranslation('{"translation": " big "}')).toBe('big');
    expect(() => readTranslation('{"translation": ""}')).toThrow('no "translation" field');
  });
});
