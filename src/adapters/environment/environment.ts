/**
 * 環境変数ストアの実装
 */

import type { EnvironmentSource } from '../../types/environment.ts';

/**
 * 固定の値を持つ環境変数ストアを作成する
 */
export const createRecordEnvironment = (
  record: Readonly<Record<string, string | undefined>>,
): EnvironmentSource => {
  const snapshot = new Map<string, string>();
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) {
      snapshot.set(key, value);
    }
  }

  return {
    has: (key) => snapshot.has(key),
    get: (key) => snapshot.get(key),
  };
};

/**
 * 現在の process.env のスナップショットを作成する
 */
export const createProcessEnvironment = (): EnvironmentSource => createRecordEnvironment(process.env);
