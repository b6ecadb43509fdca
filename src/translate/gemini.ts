import type { Lang } from '../types';
import type { Translator } from './translator';
import { buildTextPrompt, buildWordPrompt, callGemini, readTranslation, type FetchLike } from '../utils/ai';

export type GeminiTranslatorOptions = {
  apiKey: string;
  model?: string;
  fetchImpl?: FetchLike;
};

export class GeminiTranslator implements Translator {
  readonly name = 'Gemini';
  private readonly apiKey: string;
  private readonly model: string;
  private readonly fetchImpl?: FetchLike;

  constructor(opts: GeminiTranslatorOptions) {
    if (!opts.apiKey) throw new Error('Gemini API key missing');
    this.apiKey = opts.apiKey;
    this.model = opts.model ?? 'gemini-1.5-flash';
    this.fetchImpl = opts.fetchImpl;
  }

  async translateWord(word: string, sourceLang: Lang, targetLang: Lang): Promise<string> {
    const out = await callGemini({
      apiKey: this.apiKey,
      model: this.model,
      prompt: buildWordPrompt({ word, sourceLang, targetLang }),
      temperature: 0,
      fetchImpl: this.fetchImpl,
    });
    return readTranslation(out);
  }

  async translateText(text: string, sourceLang: Lang, targetLang: Lang): Promise<string> {
    return callGemini({
      apiKey: this.apiKey,
      model: this.model,
      prompt: buildTextPrompt({ text, sourceLang, targetLang }),
      fetchImpl: this.fetchImpl,
    });
  }
}
