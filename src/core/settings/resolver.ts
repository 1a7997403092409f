/**
 * Settings Resolver
 *
 * 設定ファイル・環境変数・コマンドライン引数を固定の優先順位で統合する。
 *
 * 優先度: コマンドライン引数 > 環境変数 > 設定ファイル > 組み込みデフォルト
 */

import * as fs from 'node:fs';
import type { Command } from 'commander';
import type { EnvironmentSource } from '../../types/environment.ts';
import type { ParsedOptions } from '../../types/registrar.ts';
import { SettingsError } from '../../types/errors.ts';
import { createCommanderRegistrar } from '../../adapters/commander/registrar.ts';
import { createProcessEnvironment } from '../../adapters/environment/environment.ts';
import { readConfigFile } from './config-file.ts';
import { buildDestName, normalizeOptionStrings } from './option-string.ts';
import type { Section } from './section.ts';

export const DEFAULT_CONFIG_FILE_OPTION = ['--config-file'] as const;

export interface ParseOptions {
  /** 最初に読み込む設定ファイルの候補（先頭から順に試す） */
  readonly baseConfigFiles?: string | readonly string[];
  /** 環境変数を適用しない */
  readonly skipEnv?: boolean;
  /** コマンドライン引数を解析しない */
  readonly skipOptparse?: boolean;
  /** 設定ファイルを指定するオプション。null または空配列で無効 */
  readonly optFileArg?: string | readonly string[] | null;
  /** 解析する引数。省略時は process.argv */
  readonly optArgs?: readonly string[];
  /** 環境変数ストア。省略時は process.env のスナップショット */
  readonly env?: EnvironmentSource;
  /** 名前・バージョン・exitOverride などを設定済みの commander Command */
  readonly program?: Command;
}

/**
 * 候補のうち最初に読み込めた設定ファイルを適用する
 *
 * 存在しない・読めない・JSON として不正な候補は飛ばす。
 *
 * @returns 適用したファイルのパス（なければ null）
 */
export function applyBaseConfigFiles(section: Section, candidates: string | readonly string[]): string | null {
  const files = typeof candidates === 'string' ? [candidates] : candidates;

  for (const filePath of files) {
    if (!fs.existsSync(filePath)) {
      continue;
    }

    const result = readConfigFile(filePath);
    if (!result.ok) {
      continue;
    }

    section.fromDict(result.val);
    return filePath;
  }

  return null;
}

/**
 * コマンドラインオプションを登録して解析する
 *
 * 設定ファイル指定オプションが与えられた場合はそのファイルを読み込む。
 *
 * @throws SettingsError 指定された設定ファイルが読めない場合
 */
function applyCommandLineFile(section: Section, options: ParseOptions): ParsedOptions {
  const registrar = section.toOptArgs(
    options.program === undefined ? undefined : createCommanderRegistrar(options.program, section.description),
  );

  const optFileArg = options.optFileArg === undefined ? DEFAULT_CONFIG_FILE_OPTION : options.optFileArg;
  const fileFlags = optFileArg === null ? [] : normalizeOptionStrings(optFileArg);

  let fileDest: string | null = null;
  if (fileFlags.length > 0) {
    fileDest = registrar.addOption({
      flags: fileFlags,
      dest: buildDestName(fileFlags),
      help: 'path to configuration file',
      metavar: 'path',
    });
  }

  const parsed = registrar.parse(options.optArgs);

  const configFile = fileDest === null ? undefined : parsed.get(fileDest);
  if (typeof configFile === 'string') {
    const result = readConfigFile(configFile);
    if (!result.ok) {
      throw new SettingsError(result.err);
    }
    section.fromDict(result.val);
  }

  return parsed;
}

/**
 * 3つのソースを順に適用する
 *
 * 1. baseConfigFiles（任意）
 * 2. コマンドラインの解析と設定ファイル指定オプションの読み込み（skipOptparse でなければ）
 * 3. 環境変数（skipEnv でなければ）
 * 4. コマンドライン引数の値（2 を実行した場合のみ）
 */
export function resolveSettings(section: Section, options: ParseOptions = {}): Section {
  if (options.baseConfigFiles !== undefined) {
    applyBaseConfigFiles(section, options.baseConfigFiles);
  }

  const parsed = options.skipOptparse === true ? null : applyCommandLineFile(section, options);

  if (options.skipEnv !== true) {
    section.fromEnv(options.env ?? createProcessEnvironment());
  }

  if (parsed !== null) {
    section.fromOptArgs(parsed);
  }

  return section;
}
