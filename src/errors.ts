export type ErrorCode =
  | 'TRANSLATION_UNAVAILABLE'
  | 'CARD_NOT_FOUND'
  | 'MALFORMED_IMPORT_RECORD'
  | 'TOKENIZATION_FAILURE'
  | 'DECODE_CANCELLED'
  | 'CSV_PARSE_ERROR'
  | 'CONFIG_ERROR';

export class DecoderError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TranslationUnavailable extends DecoderError {
  constructor(readonly unit: string, readonly translator: string, cause?: unknown) {
    super('TRANSLATION_UNAVAILABLE', `${translator} could not translate "${unit}": ${messageOf(cause)}`, { cause });
  }
}

export class CardNotFound extends DecoderError {
  constructor(readonly cardId: string) {
    super('CARD_NOT_FOUND', `card ${cardId} not found`);
  }
}

export class MalformedImportRecord extends DecoderError {
  constructor(readonly line: number, readonly reason: string) {
    super('MALFORMED_IMPORT_RECORD', `line ${line}: ${reason}`);
  }
}

export class TokenizationFailure extends DecoderError {
  constructor(reason: string) {
    super('TOKENIZATION_FAILURE', `cannot tokenize input: ${reason}`);
  }
}

export class DecodeCancelled extends DecoderError {
  constructor(cause?: unknown) {
    super('DECODE_CANCELLED', 'decode cancelled', { cause });
  }
}

export class CsvParseError extends DecoderError {
  constructor(readonly line: number, reason: string) {
    super('CSV_PARSE_ERROR', `CSV line ${line}: ${reason}`);
  }
}

export class ConfigError extends DecoderError {
  constructor(readonly key: string, reason: string) {
    super('CONFIG_ERROR', `${key}: ${reason}`);
  }
}

export function messageOf(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
