/**
 * Binding Types
 *
 * 設定項目と外部ソース（環境変数・コマンドラインオプション）の紐付け定義
 */

import { z } from 'zod';

/**
 * 値の読み書きオプション
 *
 * raw: true のときはカスタム getter/setter を経由せず、格納値を直接扱う
 */
export interface AccessOptions {
  readonly raw?: boolean;
}

/**
 * getter/setter に渡される値スロット
 */
export interface ValueSlot {
  readonly name: string | null;
  get(options?: AccessOptions): unknown;
  set(value: unknown, options?: AccessOptions): unknown;
}

/** 環境変数・オプション引数の文字列を変換する関数 */
export type Coercion = (raw: string) => unknown;

/** 書き込み時の変換。格納は `slot.set(value, { raw: true })` で行う */
export type Setter = (slot: ValueSlot, value: unknown) => void;

/** 読み出し時の変換 */
export type Getter = (slot: ValueSlot) => unknown;

export const OPTION_ACTIONS = ['store', 'store_true', 'store_false', 'store_const', 'append', 'count'] as const;

export type OptionAction = (typeof OPTION_ACTIONS)[number];

/**
 * 値の個数指定
 *
 * - '?': 0 または 1 個（省略時は const）
 * - '*': 0 個以上
 * - '+': 1 個以上
 * - number: ちょうど N 個（リストとして格納）
 */
export type Nargs = '?' | '*' | '+' | number;

/**
 * コマンドラインパーサに渡すメタデータ
 */
export interface ArgumentProps {
  readonly dest?: string;
  readonly nargs?: Nargs;
  readonly const?: unknown;
  readonly default?: unknown;
  readonly type?: Coercion;
  readonly choices?: readonly unknown[];
  readonly help?: string;
  readonly required?: boolean;
  readonly metavar?: string;
  readonly action?: OptionAction;
}

/**
 * 追加可能なバインディング一式
 */
export interface BindingOptions extends ArgumentProps {
  readonly envvar?: string;
  readonly argvar?: string | readonly string[];
  readonly setter?: Setter;
  readonly getter?: Getter;
}

export interface EntryOptions extends BindingOptions {
  readonly hidden?: boolean;
}

/**
 * ArgumentProps の実行時検証スキーマ
 *
 * 型注釈のない呼び出し元（JSON 由来の定義など）から渡された値を検査する。
 * type の検査は呼び出し側で InvalidCoercionError に変換するため別扱い。
 */
export const ArgumentPropsSchema = z.object({
  dest: z.string().min(1).optional(),
  nargs: z.union([z.enum(['?', '*', '+']), z.number().int().positive()]).optional(),
  choices: z.array(z.unknown()).optional(),
  help: z.string().optional(),
  required: z.boolean().optional(),
  metavar: z.string().min(1).optional(),
  action: z.enum(OPTION_ACTIONS).optional(),
});

export const isCoercion = (value: unknown): value is Coercion => typeof value === 'function';
