/**
 * Option Registrar Types
 *
 * コマンドラインパーサとの境界。Section/Entry はこのインターフェースだけに依存する。
 */

import type { ArgumentProps } from './binding.ts';

/**
 * 登録するオプションの定義
 */
export interface OptionSpec extends Omit<ArgumentProps, 'dest'> {
  /** オプション文字列（例: ['-n', '--num']） */
  readonly flags: readonly string[];
  /** 解析結果を参照するための名前 */
  readonly dest: string;
}

/**
 * 解析結果
 *
 * 登録済みの全 dest をキーに持つ。指定もデフォルトもない場合の値は undefined。
 */
export type ParsedOptions = ReadonlyMap<string, unknown>;

export interface OptionRegistrar {
  /**
   * オプションを登録する
   *
   * @returns レジストラが割り当てた dest
   */
  addOption(spec: OptionSpec): string;

  /** 名前付きグループを作成する（ヘルプ表示上の見出し） */
  addGroup(name: string, description?: string): OptionRegistrar;

  /**
   * 引数を解析する
   *
   * @param argv - ユーザー引数（node/スクリプトパスを含まない）。省略時は process.argv
   */
  parse(argv?: readonly string[]): ParsedOptions;

  helpText(): string;
}
