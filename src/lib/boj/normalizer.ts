/**
 * RESULTSET の正規化
 *
 * @description 系列ごとの入れ子 JSON を縦持ち（系列 × 期で1行）の行に展開する
 */

import type { Language } from './constants';
import { MalformedSeriesError } from './errors';
import { describeIssues, metadataBlockSchema, observationBlockSchema } from './schemas';
import type { MetadataRow, ObservationRow } from './types';
import { createLogger, type Logger } from '../utils/logger';

const defaultLogger = createLogger({ module: 'boj-normalizer' });

/**
 * 言語別フィールド表（日本語キー / 英語キー）
 *
 * 言語間のフォールバックはしない
 */
export const LOCALIZED_FIELDS = {
  name: { jp: 'NAME_OF_TIME_SERIES_J', en: 'NAME_OF_TIME_SERIES' },
  unit: { jp: 'UNIT_J', en: 'UNIT' },
  category: { jp: 'CATEGORY_J', en: 'CATEGORY' },
  notes: { jp: 'NOTES_J', en: 'NOTES' },
} as const satisfies Record<string, Record<Language, string>>;

type ObservationFieldKeys = {
  [F in 'name' | 'unit' | 'category']: (typeof LOCALIZED_FIELDS)[F][Language];
};

type MetadataFieldKeys = {
  [F in keyof typeof LOCALIZED_FIELDS]: (typeof LOCALIZED_FIELDS)[F][Language];
};

export interface NormalizeOptions {
  logger?: Logger;
}

function resolveObservationKeys(lang: Language): ObservationFieldKeys {
  return {
    name: LOCALIZED_FIELDS.name[lang],
    unit: LOCALIZED_FIELDS.unit[lang],
    category: LOCALIZED_FIELDS.category[lang],
  };
}

function resolveMetadataKeys(lang: Language): MetadataFieldKeys {
  return {
    name: LOCALIZED_FIELDS.name[lang],
    unit: LOCALIZED_FIELDS.unit[lang],
    category: LOCALIZED_FIELDS.category[lang],
    notes: LOCALIZED_FIELDS.notes[lang],
  };
}

/**
 * 文字列・数値をテキストに。null/undefined は null
 */
function toText(value: string | number | null | undefined): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  return String(value);
}

export interface ParsedValue {
  value: number | null;
  /** 数値として解釈できなかった（欠損ではなく不正値） */
  invalid: boolean;
}

/**
 * 観測値を数値に変換する
 *
 * null・空文字は欠損（invalid=false）、数値にならない文字列や真偽値などは null（invalid=true）
 */
export function parseValue(raw: unknown): ParsedValue {
  if (raw === null || raw === undefined) {
    return { value: null, invalid: false };
  }
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { value: raw, invalid: false } : { value: null, invalid: true };
  }
  if (typeof raw !== 'string') {
    return { value: null, invalid: true };
  }
  const trimmed = raw.trim();
  if (trimmed === '') {
    return { value: null, invalid: false };
  }
  const numValue = Number(trimmed);
  if (!Number.isFinite(numValue)) {
    return { value: null, invalid: true };
  }
  return { value: numValue, invalid: false };
}

/**
 * 階層番号を整数に。欠けている・整数でない場合は null
 */
export function parseLayer(raw: string | number | null | undefined): number | null {
  if (raw === undefined || raw === null) {
    return null;
  }
  if (typeof raw === 'number') {
    return Number.isInteger(raw) ? raw : null;
  }
  const trimmed = raw.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

function seriesCodeOf(block: unknown): string | null {
  if (typeof block === 'object' && block !== null && 'SERIES_CODE' in block) {
    return toText(typeof block.SERIES_CODE === 'string' ? block.SERIES_CODE : null);
  }
  return null;
}

/**
 * 観測値ブロックを縦持ちの行に展開する
 *
 * @throws {MalformedSeriesError} ブロックがスキーマに合わない、または期と値の件数が異なる
 */
export function normalizeObservations(
  resultSet: readonly unknown[],
  lang: Language,
  options?: NormalizeOptions
): ObservationRow[] {
  const logger = options?.logger ?? defaultLogger;
  const keys = resolveObservationKeys(lang);
  const rows: ObservationRow[] = [];

  for (const rawBlock of resultSet) {
    const parsed = observationBlockSchema.safeParse(rawBlock);
    if (!parsed.success) {
      throw new MalformedSeriesError(seriesCodeOf(rawBlock), describeIssues(parsed.error));
    }
    const block = parsed.data;

    const dates = block.VALUES?.SURVEY_DATES ?? [];
    const values = block.VALUES?.VALUES ?? [];
    if (dates.length !== values.length) {
      throw new MalformedSeriesError(
        block.SERIES_CODE,
        `SURVEY_DATES has ${dates.length} entries but VALUES has ${values.length}`
      );
    }

    const seriesCode = block.SERIES_CODE;
    const name = toText(block[keys.name]);
    const unit = toText(block[keys.unit]);
    const frequency = toText(block.FREQUENCY);
    const category = toText(block[keys.category]);
    const lastUpdate = toText(block.LAST_UPDATE);

    const invalidSamples: Array<{ date: string; value: unknown }> = [];
    let invalidCount = 0;

    for (let i = 0; i < dates.length; i++) {
      const date = String(dates[i]);
      const raw = values[i];
      const { value, invalid } = parseValue(raw);
      if (invalid) {
        invalidCount++;
        if (invalidSamples.length < 3) {
          invalidSamples.push({ date, value: raw });
        }
      }
      rows.push({ seriesCode, name, unit, frequency, category, lastUpdate, date, value });
    }

    if (invalidCount > 0) {
      logger.warn('Series has non-numeric values', {
        seriesCode,
        invalidCount,
        samples: invalidSamples,
      });
    }
  }

  return rows;
}

/**
 * メタデータブロックを1系列1行に変換する（期での展開はしない）
 *
 * @throws {MalformedSeriesError} ブロックがスキーマに合わない
 */
export function normalizeMetadata(resultSet: readonly unknown[], lang: Language): MetadataRow[] {
  const keys = resolveMetadataKeys(lang);

  return resultSet.map((rawBlock) => {
    const parsed = metadataBlockSchema.safeParse(rawBlock);
    if (!parsed.success) {
      throw new MalformedSeriesError(seriesCodeOf(rawBlock), describeIssues(parsed.error));
    }
    const block = parsed.data;

    return {
      seriesCode: block.SERIES_CODE,
      name: toText(block[keys.name]),
      unit: toText(block[keys.unit]),
      frequency: toText(block.FREQUENCY),
      category: toText(block[keys.category]),
      layer1: parseLayer(block.LAYER1),
      layer2: parseLayer(block.LAYER2),
      layer3: parseLayer(block.LAYER3),
      layer4: parseLayer(block.LAYER4),
      layer5: parseLayer(block.LAYER5),
      startOfSeries: toText(block.START_OF_THE_TIME_SERIES),
      endOfSeries: toText(block.END_OF_THE_TIME_SERIES),
      lastUpdate: toText(block.LAST_UPDATE),
      notes: toText(block[keys.notes]),
    };
  });
}
