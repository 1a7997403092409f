/**
 * Settings Entry
 *
 * 設定ツリーの葉。値（または転送先）と、環境変数・コマンドラインオプション・
 * カスタム getter/setter のバインディングを保持する。
 */

import {
  ArgumentPropsSchema,
  isCoercion,
  type AccessOptions,
  type ArgumentProps,
  type BindingOptions,
  type EntryOptions,
  type Getter,
  type Setter,
  type ValueSlot,
} from '../../types/binding.ts';
import type { EnvironmentSource } from '../../types/environment.ts';
import type { OptionRegistrar, ParsedOptions } from '../../types/registrar.ts';
import {
  SettingsError,
  invalidBinding,
  invalidCoercion,
  missingBinding,
} from '../../types/errors.ts';
import { buildDestName, normalizeOptionStrings } from './option-string.ts';

/**
 * Entry を所有するコンテナ（Section）
 */
export interface EntryOwner {
  addItem(name: string, value?: unknown, options?: EntryOptions): Entry;
  attach<T extends AbstractEntry>(entry: T): T;
}

export interface FromOptArgsOptions {
  /** true のとき、解析結果が undefined でも上書きする */
  readonly allowUnset?: boolean;
}

/**
 * バインディング指定から ArgumentProps に該当するキーだけを取り出す（undefined は除く）
 */
function pickArgumentProps(options: BindingOptions): ArgumentProps {
  return {
    ...(options.dest !== undefined && { dest: options.dest }),
    ...(options.nargs !== undefined && { nargs: options.nargs }),
    ...(options.const !== undefined && { const: options.const }),
    ...(options.default !== undefined && { default: options.default }),
    ...(options.type !== undefined && { type: options.type }),
    ...(options.choices !== undefined && { choices: options.choices }),
    ...(options.help !== undefined && { help: options.help }),
    ...(options.required !== undefined && { required: options.required }),
    ...(options.metavar !== undefined && { metavar: options.metavar }),
    ...(options.action !== undefined && { action: options.action }),
  };
}

/**
 * バインディング指定の実行時検証
 *
 * @throws SettingsError(InvalidCoercionError | InvalidBindingError)
 */
function validateBinding(options: BindingOptions): void {
  if (options.type !== undefined && !isCoercion(options.type)) {
    throw new SettingsError(invalidCoercion(options.type));
  }
  if (options.setter !== undefined && typeof options.setter !== 'function') {
    throw new SettingsError(invalidBinding('setter must be a function'));
  }
  if (options.getter !== undefined && typeof options.getter !== 'function') {
    throw new SettingsError(invalidBinding('getter must be a function'));
  }

  const parsed = ArgumentPropsSchema.safeParse(options);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new SettingsError(invalidBinding(details));
  }
}

const hasBinding = (bindings: BindingOptions): boolean =>
  bindings.envvar !== undefined ||
  bindings.argvar !== undefined ||
  bindings.setter !== undefined ||
  bindings.getter !== undefined;

/**
 * Entry と HandlerEntry の共通部分（バインディングの保持と適用）
 */
export abstract class AbstractEntry implements ValueSlot {
  abstract readonly name: string | null;
  abstract readonly hidden: boolean;

  readonly owner: EntryOwner;
  protected envvar: string | null = null;
  protected optionStrings: readonly string[] | null = null;
  protected destName: string | null = null;
  protected setter: Setter | null = null;
  protected getter: Getter | null = null;
  protected props: ArgumentProps = {};

  protected constructor(owner: EntryOwner, options: BindingOptions) {
    validateBinding(options);
    this.owner = owner;
    this.props = pickArgumentProps(options);
    if (options.envvar !== undefined) {
      this.envvar = options.envvar;
    }
    if (options.argvar !== undefined) {
      this.bindOptionStrings(options.argvar);
    }
    this.setter = options.setter ?? null;
    this.getter = options.getter ?? null;
  }

  abstract set(value: unknown, options?: AccessOptions): unknown;
  abstract get(options?: AccessOptions): unknown;

  /** 紐付けられた環境変数名 */
  get envName(): string | null {
    return this.envvar;
  }

  /** コマンドラインオプションの dest 名（未設定なら null） */
  get destination(): string | null {
    return this.destName;
  }

  get flags(): readonly string[] {
    return this.optionStrings ?? [];
  }

  get argumentProps(): ArgumentProps {
    return this.props;
  }

  get hasSetter(): boolean {
    return this.setter !== null;
  }

  get hasGetter(): boolean {
    return this.getter !== null;
  }

  /**
   * 解析済みコマンドライン引数から値を取り込む
   *
   * 解析結果が undefined（未指定かつデフォルトなし）の場合は、既に値が決まっていれば
   * 上書きしない。
   *
   * @returns 適用した値。何もしなかった場合は undefined
   */
  fromOptArgs(parsed: ParsedOptions, options: FromOptArgsOptions = {}): unknown {
    if (this.destName === null || !parsed.has(this.destName)) {
      return undefined;
    }

    const value = parsed.get(this.destName);
    if (options.allowUnset === true || this.get() === undefined || value !== undefined) {
      return this.set(value);
    }

    return undefined;
  }

  /**
   * コマンドラインオプションを登録する
   */
  toOptArgs(registrar: OptionRegistrar): OptionRegistrar {
    if (this.optionStrings === null || this.destName === null) {
      return registrar;
    }

    const { dest: _dest, ...props } = this.props;
    this.destName = registrar.addOption({
      ...props,
      flags: this.optionStrings,
      dest: this.destName,
    });

    return registrar;
  }

  /**
   * 環境変数から値を取り込む
   *
   * @returns 適用した値。変数がなければ undefined
   */
  fromEnv(environment: EnvironmentSource): unknown {
    if (this.envvar === null || !environment.has(this.envvar)) {
      return undefined;
    }

    const raw = environment.get(this.envvar);
    if (raw === undefined) {
      return undefined;
    }

    const coerce = this.props.type;
    return this.set(coerce === undefined ? raw : coerce(raw));
  }

  /**
   * バインディングを追加する
   *
   * 同種のバインディングが既にある場合は、この Entry に転送する HandlerEntry を
   * 所有 Section に追加する。ない場合はこの Entry 自身に追加する。
   *
   * @returns 転送先の Entry
   * @throws SettingsError(MissingBindingError) バインディングが1つもない場合
   */
  addHandler(bindings: BindingOptions): AbstractEntry {
    if (!hasBinding(bindings)) {
      throw new SettingsError(missingBinding());
    }
    if (this.conflictsWith(bindings)) {
      this.owner.attach(new HandlerEntry(this.owner, this, bindings));
      return this;
    }

    validateBinding(bindings);
    this.props = { ...this.props, ...pickArgumentProps(bindings) };
    if (bindings.envvar !== undefined) {
      this.envvar = bindings.envvar;
    }
    if (bindings.argvar !== undefined) {
      this.bindOptionStrings(bindings.argvar);
    }
    if (bindings.setter !== undefined) {
      this.setter = bindings.setter;
    }
    if (bindings.getter !== undefined) {
      this.getter = bindings.getter;
    }

    return this;
  }

  /**
   * 所有 Section に項目を追加する（メソッドチェーン用）
   */
  addItem(name: string, value?: unknown, options?: EntryOptions): Entry {
    return this.owner.addItem(name, value, options);
  }

  private conflictsWith(bindings: BindingOptions): boolean {
    return (
      (bindings.envvar !== undefined && this.envvar !== null) ||
      (bindings.argvar !== undefined && this.optionStrings !== null) ||
      (bindings.setter !== undefined && this.setter !== null) ||
      (bindings.getter !== undefined && this.getter !== null)
    );
  }

  // dest は登録時に一度だけ決まる。登録後のオプション文字列変更は想定しない
  private bindOptionStrings(argvar: string | readonly string[]): void {
    const optionStrings = normalizeOptionStrings(argvar);
    this.destName = buildDestName(optionStrings, this.props.dest);
    this.optionStrings = optionStrings;
  }
}

/**
 * 値を持つ設定項目
 */
export class Entry extends AbstractEntry {
  readonly name: string;
  readonly hidden: boolean;
  private value: unknown;

  constructor(owner: EntryOwner, name: string, value?: unknown, options: EntryOptions = {}) {
    super(owner, options);
    this.name = name;
    this.hidden = options.hidden ?? name.startsWith('_');

    if (value !== undefined) {
      this.value = value;
    } else if (this.props.default !== undefined) {
      this.set(this.props.default);
    } else if (this.props.const !== undefined) {
      this.set(this.props.const);
    }
  }

  /**
   * 値を書き込む
   *
   * setter があれば `(this, value)` で呼び出す。値の検証は setter の責務。
   *
   * @returns 書き込み後の格納値
   */
  set(value: unknown, options: AccessOptions = {}): unknown {
    if (this.setter !== null && options.raw !== true) {
      this.setter(this, value);
    } else {
      this.value = value;
    }

    return this.value;
  }

  get(options: AccessOptions = {}): unknown {
    if (this.getter !== null && options.raw !== true) {
      return this.getter(this);
    }

    return this.value;
  }
}

/**
 * 値を持たず、別の Entry に読み書きを転送するバインディング
 *
 * 1つの値に複数の環境変数・オプションを紐付けるために使う。
 */
export class HandlerEntry extends AbstractEntry {
  readonly name = null;
  readonly hidden = true;
  readonly delegate: AbstractEntry;

  /**
   * @throws SettingsError(MissingBindingError) バインディングが1つもない場合
   */
  constructor(owner: EntryOwner, delegate: AbstractEntry, bindings: BindingOptions) {
    if (!hasBinding(bindings)) {
      throw new SettingsError(missingBinding());
    }

    super(owner, bindings);
    this.delegate = delegate;
  }

  set(value: unknown, options: AccessOptions = {}): unknown {
    if (this.setter !== null && options.raw !== true) {
      this.setter(this.delegate, value);
    } else {
      this.delegate.set(value, options);
    }

    return this.delegate.get({ raw: true });
  }

  get(options: AccessOptions = {}): unknown {
    if (this.getter !== null && options.raw !== true) {
      return this.getter(this.delegate);
    }

    return this.delegate.get(options);
  }

  override addHandler(bindings: BindingOptions): AbstractEntry {
    return this.delegate.addHandler(bindings);
  }
}
