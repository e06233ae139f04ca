export type TranslatorErrorCode =
  | 'PARSE_ERROR'
  | 'PROVIDER_ERROR'
  | 'PROVIDER_UNAVAILABLE'
  | 'PROGRESS_CORRUPT'
  | 'CONFIG_MISMATCH'
  | 'REDISTRIBUTION_FAILED'
  | 'CONFIG_INVALID';

export class TranslatorError extends Error {
  readonly code: TranslatorErrorCode;
  readonly operatorHint: string;

  constructor(opts: {
    code: TranslatorErrorCode;
    message: string;
    operatorHint: string;
    cause?: unknown;
  }) {
    super(opts.message);
    this.name = 'TranslatorError';
    this.code = opts.code;
    this.operatorHint = opts.operatorHint;
    if (opts.cause !== undefined) {
      this.cause = opts.cause;
    }
  }
}

export class ParseError extends TranslatorError {
  readonly line: number;

  constructor(message: string, line: number) {
    super({
      code: 'PARSE_ERROR',
      message: `Line ${line}: ${message}`,
      operatorHint: 'Fix the malformed subtitle block; no output is written for this file.'
    });
    this.name = 'ParseError';
    this.line = line;
  }
}

export type ProviderFailureKind = 'timeout' | 'transport' | 'count_mismatch' | 'malformed';

export class ProviderError extends TranslatorError {
  readonly kind: ProviderFailureKind;
  readonly providerId: string;
  readonly unitIds: number[];

  constructor(opts: {
    kind: ProviderFailureKind;
    providerId: string;
    unitIds: number[];
    message: string;
    cause?: unknown;
  }) {
    super({
      code: 'PROVIDER_ERROR',
      message: opts.message,
      operatorHint: 'Retried per policy; check provider credentials, model name and reachability.',
      cause: opts.cause
    });
    this.name = 'ProviderError';
    this.kind = opts.kind;
    this.providerId = opts.providerId;
    this.unitIds = opts.unitIds;
  }
}

export class ProviderUnavailableError extends TranslatorError {
  readonly reasons: string[];

  constructor(reasons: string[]) {
    super({
      code: 'PROVIDER_UNAVAILABLE',
      message: `No translation provider is available: ${reasons.join(' ')}`,
      operatorHint: 'Start the backend, pull or correct the model, or set the API key, then run again.'
    });
    this.name = 'ProviderUnavailableError';
    this.reasons = reasons;
  }
}

export class ProgressCorruptionError extends TranslatorError {
  readonly progressPath: string;

  constructor(progressPath: string, message: string, cause?: unknown) {
    super({
      code: 'PROGRESS_CORRUPT',
      message: `Progress file ${progressPath} is unreadable: ${message}`,
      operatorHint: 'The run starts from scratch; the corrupt file is overwritten on first save.',
      cause
    });
    this.name = 'ProgressCorruptionError';
    this.progressPath = progressPath;
  }
}

export class ConfigMismatchError extends TranslatorError {
  readonly mismatched: string[];

  constructor(progressPath: string, mismatched: string[]) {
    super({
      code: 'CONFIG_MISMATCH',
      message: `Progress file ${progressPath} is stale (${mismatched.join(', ')} changed).`,
      operatorHint: 'The stale record is discarded and the file is translated from scratch.'
    });
    this.name = 'ConfigMismatchError';
    this.mismatched = mismatched;
  }
}

export class RedistributionError extends TranslatorError {
  readonly memberCount: number;
  readonly tokenCount: number;

  constructor(memberCount: number, tokenCount: number) {
    super({
      code: 'REDISTRIBUTION_FAILED',
      message: `Cannot split ${tokenCount} token(s) across ${memberCount} entries without an empty entry.`,
      operatorHint: 'The full translation is kept on the first entry; the others carry the continuation marker.'
    });
    this.name = 'RedistributionError';
    this.memberCount = memberCount;
    this.tokenCount = tokenCount;
  }
}

export class ConfigValidationError extends TranslatorError {
  constructor(message: string) {
    super({
      code: 'CONFIG_INVALID',
      message,
      operatorHint: 'Correct the translation settings and run again.'
    });
    this.name = 'ConfigValidationError';
  }
}

export function isTranslatorError(value: unknown): value is TranslatorError {
  return value instanceof TranslatorError;
}

export function isProviderError(value: unknown): value is ProviderError {
  return value instanceof ProviderError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error && error.message.trim()) {
    return error.message.trim();
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'unknown error';
}
