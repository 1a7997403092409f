/**
 * JSON テキスト ⇔ 設定オブジェクトの変換
 */

import { z } from 'zod';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { ConfigObject } from '../../types/config-value.ts';
import { configParseError, type ConfigParseError } from '../../types/errors.ts';

const ConfigDocumentSchema = z.record(z.string(), z.unknown());

/**
 * JSON テキストを設定オブジェクトに変換する
 *
 * トップレベルがオブジェクトでない文書はエラーとする。
 *
 * @param filePath - エラーメッセージ用（テキスト由来なら null）
 */
export function decodeConfig(
  text: string,
  filePath: string | null = null,
): Result<ConfigObject, ConfigParseError> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return createErr(configParseError(filePath, error instanceof Error ? error.message : String(error)));
  }

  const parsed = ConfigDocumentSchema.safeParse(data);
  if (!parsed.success) {
    return createErr(configParseError(filePath, 'top-level value must be an object'));
  }

  return createOk(parsed.data);
}

/**
 * 設定オブジェクトを JSON テキストに変換する（2スペースインデント、末尾改行）
 */
export function encodeConfig(data: ConfigObject): string {
  return JSON.stringify(data, null, 2) + '\n';
}
