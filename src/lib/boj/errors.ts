/**
 * BOJ 統計 API クライアントのエラー
 *
 * 入力検証エラー（Unknown* / Invalid* / EmptyCodes / TooManyCodes）はネットワークに到達する前に投げる
 */

export type BojStatErrorCode =
  | 'UNKNOWN_DATABASE'
  | 'UNKNOWN_FREQUENCY'
  | 'INVALID_CONFIG'
  | 'INVALID_LANGUAGE'
  | 'INVALID_LAYER'
  | 'INVALID_SERIES_CODE'
  | 'EMPTY_CODES'
  | 'TOO_MANY_CODES'
  | 'TRANSPORT_ERROR'
  | 'SERVER_ERROR'
  | 'MALFORMED_SERIES'
  | 'PAGINATION_LOOP';

/**
 * 全エラーの基底クラス
 */
export class BojStatError extends Error {
  constructor(
    message: string,
    public readonly code: BojStatErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BojStatError';
  }
}

export class UnknownDatabaseError extends BojStatError {
  constructor(public readonly db: string) {
    super(`Unknown DB name: ${db}. See listDatabases() for available DBs.`, 'UNKNOWN_DATABASE');
    this.name = 'UnknownDatabaseError';
  }
}

export class UnknownFrequencyError extends BojStatError {
  constructor(
    public readonly frequency: string,
    validValues: readonly string[]
  ) {
    super(`Unknown frequency: ${frequency}. Valid values: ${validValues.join(', ')}`, 'UNKNOWN_FREQUENCY');
    this.name = 'UnknownFrequencyError';
  }
}

export class InvalidConfigError extends BojStatError {
  constructor(reason: string) {
    super(`Invalid client configuration: ${reason}`, 'INVALID_CONFIG');
    this.name = 'InvalidConfigError';
  }
}

export class InvalidLanguageError extends BojStatError {
  constructor(public readonly lang: string) {
    super(`lang must be one of "jp", "en": ${lang}`, 'INVALID_LANGUAGE');
    this.name = 'InvalidLanguageError';
  }
}

export class InvalidLayerError extends BojStatError {
  constructor(
    public readonly layer: string,
    reason: string
  ) {
    super(`Invalid layer "${layer}": ${reason}`, 'INVALID_LAYER');
    this.name = 'InvalidLayerError';
  }
}

export class InvalidSeriesCodeError extends BojStatError {
  constructor(
    public readonly seriesCode: string,
    reason: string
  ) {
    super(`Invalid series code "${seriesCode}": ${reason}`, 'INVALID_SERIES_CODE');
    this.name = 'InvalidSeriesCodeError';
  }
}

export class EmptyCodesError extends BojStatError {
  constructor() {
    super('codes must contain at least one series code.', 'EMPTY_CODES');
    this.name = 'EmptyCodesError';
  }
}

export class TooManyCodesError extends BojStatError {
  constructor(
    public readonly count: number,
    public readonly limit: number
  ) {
    super(
      `codes exceeds the limit of ${limit} codes per request (got ${count}). Use getDataAll() for automatic pagination.`,
      'TOO_MANY_CODES'
    );
    this.name = 'TooManyCodesError';
  }
}

/**
 * ネットワーク障害・タイムアウト・デコード不能なレスポンス
 */
export class TransportError extends BojStatError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly details: { statusCode?: number; timedOut?: boolean } = {},
    options?: { cause?: unknown }
  ) {
    super(message, 'TRANSPORT_ERROR', options);
    this.name = 'TransportError';
  }

  get statusCode(): number | undefined {
    return this.details.statusCode;
  }

  get timedOut(): boolean {
    return this.details.timedOut ?? false;
  }
}

/**
 * レスポンスの STATUS が 200 以外
 */
export class ServerError extends BojStatError {
  constructor(
    public readonly status: number,
    public readonly messageId: string,
    public readonly serverMessage: string
  ) {
    super(`[${status}] ${messageId}: ${serverMessage}`, 'SERVER_ERROR');
    this.name = 'ServerError';
  }
}

/**
 * 系列ブロックがスキーマに合わない、または SURVEY_DATES と VALUES の長さが異なる
 */
export class MalformedSeriesError extends BojStatError {
  constructor(
    public readonly seriesCode: string | null,
    reason: string
  ) {
    super(`Malformed series ${seriesCode ?? '(unknown)'}: ${reason}`, 'MALFORMED_SERIES');
    this.name = 'MalformedSeriesError';
  }
}

/**
 * 同じ NEXTPOSITION が繰り返された
 */
export class PaginationLoopError extends BojStatError {
  constructor(
    public readonly endpoint: string,
    public readonly position: string,
    public readonly pageCount: number
  ) {
    super(
      `NEXTPOSITION ${position} was returned again by ${endpoint} after ${pageCount} pages`,
      'PAGINATION_LOOP'
    );
    this.name = 'PaginationLoopError';
  }
}
