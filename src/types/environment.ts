/**
 * 環境変数ストア（読み取り専用）
 */
export interface EnvironmentSource {
  has(key: string): boolean;
  get(key: string): string | undefined;
}
