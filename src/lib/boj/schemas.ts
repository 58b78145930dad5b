/**
 * BOJ API レスポンスの zod スキーマ
 *
 * 数値系のフィールド（期、最終更新日、階層番号）は JSON 上で文字列・数値のどちらでも届く
 */

import { z } from 'zod';

const scalar = z.union([z.string(), z.number()]).nullish();

/**
 * レスポンス共通のエンベロープ
 */
export const envelopeSchema = z
  .object({
    STATUS: z.number(),
    MESSAGEID: z.string().nullish(),
    MESSAGE: z.string().nullish(),
    DATE: z.string().nullish(),
    RESULTSET: z.array(z.unknown()).nullish(),
    NEXTPOSITION: z.union([z.string(), z.number()]).nullish(),
  })
  .passthrough();

export type Envelope = z.infer<typeof envelopeSchema>;

/**
 * コード API / 階層 API の系列ブロック
 */
export const observationBlockSchema = z
  .object({
    SERIES_CODE: z.string().min(1),
    NAME_OF_TIME_SERIES_J: scalar,
    NAME_OF_TIME_SERIES: scalar,
    UNIT_J: scalar,
    UNIT: scalar,
    FREQUENCY: scalar,
    CATEGORY_J: scalar,
    CATEGORY: scalar,
    LAST_UPDATE: scalar,
    VALUES: z
      .object({
        SURVEY_DATES: z.array(z.union([z.string(), z.number()])).nullish(),
        // 値の型は normalizer で判定する（数値にならない値は欠損扱い）
        VALUES: z.array(z.unknown()).nullish(),
      })
      .nullish(),
  })
  .passthrough();

/**
 * メタデータ API の系列ブロック
 *
 * 階層の見出し行は SERIES_CODE が空文字で届く
 */
export const metadataBlockSchema = z
  .object({
    SERIES_CODE: z.string(),
    NAME_OF_TIME_SERIES_J: scalar,
    NAME_OF_TIME_SERIES: scalar,
    UNIT_J: scalar,
    UNIT: scalar,
    FREQUENCY: scalar,
    CATEGORY_J: scalar,
    CATEGORY: scalar,
    LAYER1: scalar,
    LAYER2: scalar,
    LAYER3: scalar,
    LAYER4: scalar,
    LAYER5: scalar,
    START_OF_THE_TIME_SERIES: scalar,
    END_OF_THE_TIME_SERIES: scalar,
    LAST_UPDATE: scalar,
    NOTES_J: scalar,
    NOTES: scalar,
  })
  .passthrough();

/**
 * zod のエラーを1行の説明にまとめる
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
