/**
 * 設定ファイルの読み書き
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { ConfigObject } from '../../types/config-value.ts';
import {
  configFileNotFound,
  configIOError,
  type ConfigFileError,
} from '../../types/errors.ts';
import { decodeConfig, encodeConfig } from './codec.ts';

const isNotFound = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

/**
 * 設定ファイルを読み込む
 */
export function readConfigFile(filePath: string): Result<ConfigObject, ConfigFileError> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return createErr(configFileNotFound(filePath));
    }
    return createErr(configIOError(filePath, 'read', error));
  }

  return decodeConfig(content, filePath);
}

/**
 * 設定ファイルを書き込む（親ディレクトリがなければ作成する）
 */
export function writeConfigFile(filePath: string, data: ConfigObject): Result<void, ConfigFileError> {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, encodeConfig(data), 'utf-8');
    return createOk(undefined);
  } catch (error) {
    return createErr(configIOError(filePath, 'write', error));
  }
}
