// Gemini REST calls used by GeminiTranslator.
// Only the basic text output is read: candidates[0].content.parts[].text.

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type GeminiParams = {
  apiKey: string;
  model: string;
  prompt: string;
  temperature?: number;
  fetchImpl?: FetchLike;
};

export const GEMINI_BASE = 'https://generativelanguage.googleapis.com/v1beta/models';

export function geminiEndpoint(model: string, apiKey: string) {
  return `${GEMINI_BASE}/${model}:generateContent?key=${encodeURIComponent(apiKey)}`;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

// data.candidates[0].content.parts[].text
export function partsText(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.candidates)) return undefined;
  const first: unknown = data.candidates[0];
  if (!isRecord(first) || !isRecord(first.content) || !Array.isArray(first.content.parts)) return undefined;
  const texts = first.content.parts
    .map((p: unknown) => (isRecord(p) && typeof p.text === 'string' ? p.text : ''))
    .filter(Boolean);
  return texts.length ? texts.join('\n') : undefined;
}

export async function callGemini(params: GeminiParams): Promise<string> {
  const { apiKey, model, prompt, temperature = 0.2, fetchImpl = fetch } = params;
  const body = {
    contents: [{ role: 'user', parts: [{ text: prompt }] }],
    generationConfig: { temperature },
  };
  const res = await fetchImpl(geminiEndpoint(model, apiKey), {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
  if (!res.ok) {
    const errTxt = await res.text();
    throw new Error(`Gemini API error ${res.status}: ${errTxt}`);
  }
  const text = partsText(await res.json());
  if (text === undefined) throw new Error('Gemini returned no text parts');
  return text.trim();
}

// Models like to wrap JSON in ``` fences or add text around it; take the
// first {...} block.
export function extractJson(text: string): unknown {
  let jsonStr = text.trim();
  if (jsonStr.startsWith('```')) {
    jsonStr = jsonStr.replace(/^```[a-zA-Z]*\n?/, '').replace(/```$/, '').trim();
  }
  if (!jsonStr.startsWith('{')) {
    const m = jsonStr.match(/\{[\s\S]*\}/);
    if (m) jsonStr = m[0];
  }
  return JSON.parse(jsonStr);
}

export function readTranslation(text: string): string {
  const parsed = extractJson(text);
  if (isRecord(parsed) && typeof parsed.translation === 'string' && parsed.translation.trim()) {
    return parsed.translation.trim();
  }
  throw new Error(`no "translation" field in model output: ${text.slice(0, 120)}`);
}

export function buildWordPrompt(params: { word: string; sourceLang: string; targetLang: string }): string {
  const { word, sourceLang, targetLang } = params;
  return `# Goal\nTranslate one ${sourceLang} word or fixed phrase into ${targetLang} for a word-by-word (interlinear) reading aid.\nInput: ${JSON.stringify(word)}\n\nRules:\n1. Give the most literal common equivalent, as short as possible (ideally one word).\n2. Do not add articles or explanations that are not in the input.\n3. Keep numbers and names unchanged.\n\n# Output (JSON ONLY)\n{ "translation": "..." }`;
}

export function buildTextPrompt(params: { text: string; sourceLang: string; targetLang: string }): string {
  const { text, sourceLang, targetLang } = params;
  return `Translate the following ${sourceLang} text into natural, fluent ${targetLang}. Keep the line breaks. Reply with the translation only, no commentary.\n\n${text}`;
}
