/**
 * 設定ファイルのデータ表現
 *
 * セクション → ネストしたオブジェクト、項目 → 任意の JSON 値
 */
export interface ConfigObject {
  [key: string]: unknown;
}

export function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
