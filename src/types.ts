export type Lang = string; // ISO 639-1 code, e.g. 'de', 'en', 'pt'

export type TokenKind = 'word' | 'punctuation' | 'whitespace' | 'linebreak';

export type Token = Readonly<{
  kind: TokenKind;
  text: string;
  sourceIndex: number; // UTF-16 offset in the input
}>;

export type TranslationUnit = {
  kind: 'unit';
  sourceSpan: readonly Token[]; // word tokens, plus the single spaces inside a phrase
  sourceText: string;
  translatedText: string;
  isPhrase: boolean;
  fallback: boolean; // lookup failed, translatedText is the source verbatim
};

export type Passthrough = {
  kind: 'passthrough';
  token: Token;
};

export type DecodedSegment = TranslationUnit | Passthrough;

export type DecodedText = {
  sourceText: string;
  sourceLang: Lang;
  targetLang: Lang;
  segments: DecodedSegment[];
};

export type ReviewOutcome = 'correct' | 'incorrect';

export type ReviewEntry = {
  at: number;
  outcome: ReviewOutcome | 'reset';
  fromBox: number;
  toBox: number;
};

export type Card = {
  id: string;
  word: string;
  translation: string;
  exampleSentence?: string;
  sourceLang: Lang;
  targetLang: Lang;
  box: number; // 1..boxCount
  dueAt: number; // ms
  lastReviewedAt?: number;
  createdAt: number;
  updatedAt: number;
  history: ReviewEntry[];
  deleted?: boolean; // soft delete marker, same as the remote row
};

export type StoredText = {
  id: string;
  title: string;
  sourceLang: Lang;
  targetLang: Lang;
  raw: string; // original text
  decoded: DecodedText;
  contextual?: string; // fluent translation, absent when the translator failed
  notes?: string;
  folderId?: string;
  createdAt: number;
  updatedAt: number;
  deleted?: boolean;
};

export type CsvRecord = {
  word: string;
  translation: string;
  example?: string;
};

export interface CardStore {
  all(): Promise<Card[]>;
  get(id: string): Promise<Card | undefined>;
  findByKey(key: string): Promise<Card | undefined>;
  put(card: Card): Promise<void>;
  putMany(cards: Card[]): Promise<void>;
  remove(id: string): Promise<void>;
}

export interface TextStore {
  save(text: StoredText): Promise<void>;
  get(id: string): Promise<StoredText | undefined>;
  list(limit?: number): Promise<StoredText[]>;
  remove(id: string): Promise<void>;
}
