/**
 * Settings Section
 *
 * 設定項目（Entry）と子セクションを保持するツリーの節。
 *
 * アクセス経路は2つ:
 * - フィルタ付き（属性アクセス相当）: getItem / getSection / setItem / setSection
 *   `_` で始まる名前は常に見えない
 * - 生アクセス（辞書アクセス相当）: lookup / assign / has
 *   隠し項目を含む全ての Entry/Section に届く
 */

import { createOk, type Result } from 'option-t/plain_result';
import type { AccessOptions, BindingOptions, EntryOptions } from '../../types/binding.ts';
import { isConfigObject, type ConfigObject } from '../../types/config-value.ts';
import type { EnvironmentSource } from '../../types/environment.ts';
import type { OptionRegistrar, ParsedOptions } from '../../types/registrar.ts';
import {
  SettingsError,
  attributeNotFound,
  duplicateName,
  entryNotFound,
  invalidSectionValue,
  itemNotFound,
  nameMismatch,
  type ConfigFileError,
} from '../../types/errors.ts';
import { createCommanderRegistrar } from '../../adapters/commander/registrar.ts';
import { createProcessEnvironment } from '../../adapters/environment/environment.ts';
import { decodeConfig, encodeConfig } from './codec.ts';
import { readConfigFile, writeConfigFile } from './config-file.ts';
import { AbstractEntry, Entry, HandlerEntry, type EntryOwner } from './entry.ts';
import { resolveSettings, type ParseOptions } from './resolver.ts';

export const HIDDEN_PREFIX = '_';

export interface ToDictOptions extends AccessOptions {
  /** hidden な項目・セクションも出力する */
  readonly includeHidden?: boolean;
}

export interface SaveOptions {
  readonly includeHidden?: boolean;
}

/**
 * assign() に渡された値の分類
 */
export type Assignment =
  | { readonly kind: 'entry'; readonly entry: AbstractEntry }
  | { readonly kind: 'section'; readonly section: Section }
  | { readonly kind: 'value'; readonly value: unknown };

export function classifyAssignment(value: unknown): Assignment {
  if (value instanceof AbstractEntry) {
    return { kind: 'entry', entry: value };
  }
  if (value instanceof Section) {
    return { kind: 'section', section: value };
  }
  return { kind: 'value', value };
}

const isPublicName = (name: string): boolean => !name.startsWith(HIDDEN_PREFIX);

function filterPublic<T>(source: ReadonlyMap<string, T>): ReadonlyMap<string, T> {
  return new Map([...source].filter(([name]) => isPublicName(name)));
}

export class Section implements EntryOwner {
  readonly name: string | null;
  readonly description: string | undefined;
  readonly parent: Section | null;
  readonly hidden: boolean;
  private readonly items = new Map<string, AbstractEntry>();
  private readonly sections = new Map<string, Section>();

  constructor(
    parent: Section | null = null,
    name: string | null = null,
    description?: string,
    hidden?: boolean,
  ) {
    this.parent = parent;
    this.name = name;
    this.description = description;
    this.hidden = hidden ?? (name !== null && name.startsWith(HIDDEN_PREFIX));
  }

  // ===== 定義 =====

  /**
   * 項目を追加する
   *
   * @throws SettingsError(DuplicateNameError) 項目名・セクション名と重複する場合
   */
  addItem(name: string, value?: unknown, options: EntryOptions = {}): Entry {
    this.assertNameAvailable(name);
    return this.attach(new Entry(this, name, value, options));
  }

  /**
   * 子セクションを追加する
   *
   * name が null の場合は自分自身を返す（任意のグルーピング用）。
   */
  addSection(name: string | null, description?: string, hidden?: boolean): Section {
    if (name === null) {
      return this;
    }

    this.assertNameAvailable(name);
    const section = new Section(this, name, description, hidden);
    this.sections.set(name, section);
    return section;
  }

  /**
   * dest にバインディングを追加する
   *
   * dest が同種のバインディングを既に持つ場合は、dest の所有 Section に
   * HandlerEntry が追加される。
   *
   * @returns dest
   */
  addHandler(dest: AbstractEntry, bindings: BindingOptions): AbstractEntry {
    return dest.addHandler(bindings);
  }

  /**
   * 生成済みの Entry を登録する
   *
   * 名前のない HandlerEntry には `_<登録済み項目数>` を割り当てる。
   */
  attach<T extends AbstractEntry>(entry: T): T {
    const name = entry.name ?? `${HIDDEN_PREFIX}${this.items.size}`;
    if (this.items.has(name)) {
      throw new SettingsError(duplicateName(name));
    }

    this.items.set(name, entry);
    return entry;
  }

  // ===== メソッドアクセス =====

  /**
   * @throws SettingsError(ItemNotFoundError)
   */
  get(name: string, options: AccessOptions = {}): unknown {
    const item = this.items.get(name);
    if (item === undefined) {
      throw new SettingsError(itemNotFound(name));
    }

    return item.get(options);
  }

  /**
   * 複数の項目に書き込む。存在しないキーは警告して無視する。
   */
  set(values: Readonly<Record<string, unknown>>, options: AccessOptions = {}): this {
    for (const [key, value] of Object.entries(values)) {
      const item = this.items.get(key);
      if (item === undefined) {
        console.warn(`⚠️  '${key}' does not exist. ignored.`);
        continue;
      }
      item.set(value, options);
    }

    return this;
  }

  // ===== フィルタ付きアクセス（属性アクセス相当） =====

  get publicItems(): ReadonlyMap<string, AbstractEntry> {
    return filterPublic(this.items);
  }

  get publicSections(): ReadonlyMap<string, Section> {
    return filterPublic(this.sections);
  }

  get publicEntries(): ReadonlyMap<string, AbstractEntry | Section> {
    return new Map<string, AbstractEntry | Section>([...this.publicItems, ...this.publicSections]);
  }

  /**
   * 公開項目の格納値（getter を経由しない）
   *
   * @throws SettingsError(AttributeNotFoundError)
   */
  getItem(name: string): unknown {
    const item = isPublicName(name) ? this.items.get(name) : undefined;
    if (item === undefined) {
      throw new SettingsError(attributeNotFound(name));
    }

    return item.get({ raw: true });
  }

  /**
   * @throws SettingsError(AttributeNotFoundError)
   */
  getSection(name: string): Section {
    const section = isPublicName(name) ? this.sections.get(name) : undefined;
    if (section === undefined) {
      throw new SettingsError(attributeNotFound(name));
    }

    return section;
  }

  /**
   * 公開項目（または公開セクション）を置き換える
   *
   * Entry 以外の値は setter を経由せず格納値として書き込む。
   *
   * @throws SettingsError(AttributeNotFoundError | NameMismatchError | InvalidSectionValueError)
   */
  setItem(name: string, value: unknown): void {
    if (isPublicName(name) && this.items.has(name)) {
      this.replaceItem(name, classifyAssignment(value));
      return;
    }
    if (isPublicName(name) && this.sections.has(name)) {
      this.replaceSection(name, classifyAssignment(value));
      return;
    }

    throw new SettingsError(attributeNotFound(name));
  }

  /**
   * @throws SettingsError(AttributeNotFoundError | NameMismatchError)
   */
  setSection(name: string, section: Section): void {
    if (!isPublicName(name) || !this.sections.has(name)) {
      throw new SettingsError(attributeNotFound(name));
    }

    this.replaceSection(name, { kind: 'section', section });
  }

  // ===== 生アクセス（辞書アクセス相当） =====

  get allEntries(): ReadonlyMap<string, AbstractEntry | Section> {
    return new Map<string, AbstractEntry | Section>([...this.items, ...this.sections]);
  }

  get size(): number {
    return this.items.size + this.sections.size;
  }

  has(name: string): boolean {
    return this.items.has(name) || this.sections.has(name);
  }

  /**
   * 隠し項目を含めて Entry / Section を取得する
   *
   * @throws SettingsError(EntryNotFoundError)
   */
  lookup(name: string): AbstractEntry | Section {
    const found = this.items.get(name) ?? this.sections.get(name);
    if (found === undefined) {
      throw new SettingsError(entryNotFound(name));
    }

    return found;
  }

  /**
   * 名前を指定して値・Entry・Section を割り当てる
   *
   * - 既存の項目名: 置き換え（Entry なら名前一致が必要、それ以外は格納値を更新）
   * - 既存のセクション名: 同名の Section でのみ置き換え可能
   * - 新しい名前: Entry / Section はそのまま登録、それ以外は addItem
   */
  assign(name: string, value: unknown): void {
    const assignment = classifyAssignment(value);

    if (this.items.has(name)) {
      this.replaceItem(name, assignment);
      return;
    }
    if (this.sections.has(name)) {
      this.replaceSection(name, assignment);
      return;
    }

    switch (assignment.kind) {
      case 'entry': {
        this.warnOnRename(name, assignment.entry.name);
        if (assignment.entry.name !== null) {
          this.assertNameAvailable(assignment.entry.name);
        }
        this.attach(assignment.entry);
        return;
      }
      case 'section': {
        const resolved = assignment.section.name ?? name;
        this.warnOnRename(name, resolved);
        this.assertNameAvailable(resolved);
        this.sections.set(resolved, assignment.section);
        return;
      }
      case 'value': {
        this.addItem(name, assignment.value);
        return;
      }
    }
  }

  // ===== ソースとの変換 =====

  /**
   * 辞書の値を取り込む。未知のキーは無視する。
   */
  fromDict(data: Readonly<ConfigObject>, options: AccessOptions = {}): this {
    for (const [key, value] of Object.entries(data)) {
      const item = this.items.get(key);
      if (item !== undefined) {
        item.set(value, options);
        continue;
      }

      const section = this.sections.get(key);
      if (section === undefined) {
        continue;
      }
      if (!isConfigObject(value)) {
        console.warn(`⚠️  '${key}' is a section but the value is not an object. ignored.`);
        continue;
      }
      section.fromDict(value, options);
    }

    return this;
  }

  /**
   * 辞書に書き出す
   *
   * 既定では `_` で始まる名前と hidden 指定のものを除く。includeHidden のときは
   * 名前付きの全項目と全セクションを含む。HandlerEntry は常に除く。
   */
  toDict(options: ToDictOptions = {}): ConfigObject {
    const includeHidden = options.includeHidden === true;
    const result: ConfigObject = {};

    const items = includeHidden ? this.items : this.publicItems;
    for (const [name, item] of items) {
      if (item instanceof HandlerEntry || (!includeHidden && item.hidden)) {
        continue;
      }
      result[name] = item.get(options);
    }

    const sections = includeHidden ? this.sections : this.publicSections;
    for (const [name, section] of sections) {
      if (!includeHidden && section.hidden) {
        continue;
      }
      result[name] = section.toDict(options);
    }

    return result;
  }

  /**
   * コマンドラインオプションを登録する
   *
   * registrar 省略時はこのセクションの説明で新しいパーサを作る。名前付きセクションに
   * 既存の registrar が渡された場合は、セクション名のグループを作って登録する。
   * 子セクションは公開のものだけを辿る。
   */
  toOptArgs(registrar?: OptionRegistrar): OptionRegistrar {
    let target: OptionRegistrar;
    if (registrar === undefined) {
      target = createCommanderRegistrar(undefined, this.description);
    } else if (this.name !== null) {
      target = registrar.addGroup(this.name, this.description);
    } else {
      target = registrar;
    }

    for (const item of this.items.values()) {
      item.toOptArgs(target);
    }
    for (const section of this.publicSections.values()) {
      section.toOptArgs(target);
    }

    return target;
  }

  /**
   * 解析済みコマンドライン引数を取り込む（隠し項目・セクションを含む）
   */
  fromOptArgs(parsed: ParsedOptions): this {
    for (const item of this.items.values()) {
      item.fromOptArgs(parsed);
    }
    for (const section of this.sections.values()) {
      section.fromOptArgs(parsed);
    }

    return this;
  }

  /**
   * 環境変数を取り込む（隠し項目・セクションを含む）
   */
  fromEnv(environment: EnvironmentSource = createProcessEnvironment()): this {
    for (const item of this.items.values()) {
      item.fromEnv(environment);
    }
    for (const section of this.sections.values()) {
      section.fromEnv(environment);
    }

    return this;
  }

  /**
   * JSON テキストを取り込む
   *
   * @throws SettingsError(ConfigParseError)
   */
  load(text: string): this {
    const decoded = decodeConfig(text);
    if (!decoded.ok) {
      throw new SettingsError(decoded.err);
    }

    return this.fromDict(decoded.val);
  }

  save(options: SaveOptions = {}): string {
    return encodeConfig(this.toDict({ includeHidden: options.includeHidden }));
  }

  loadFile(filePath: string): Result<this, ConfigFileError> {
    const result = readConfigFile(filePath);
    if (!result.ok) {
      return result;
    }

    return createOk(this.fromDict(result.val));
  }

  saveFile(filePath: string, options: SaveOptions = {}): Result<this, ConfigFileError> {
    const result = writeConfigFile(filePath, this.toDict({ includeHidden: options.includeHidden }));
    if (!result.ok) {
      return result;
    }

    return createOk(this);
  }

  /**
   * 設定ファイル → コマンドライン（設定ファイル指定）→ 環境変数 → コマンドライン引数
   * の順に値を解決する
   */
  parse(options: ParseOptions = {}): this {
    resolveSettings(this, options);
    return this;
  }

  // ===== 内部処理 =====

  private assertNameAvailable(name: string): void {
    if (this.has(name)) {
      throw new SettingsError(duplicateName(name));
    }
  }

  private replaceItem(name: string, assignment: Assignment): void {
    switch (assignment.kind) {
      case 'entry': {
        if (assignment.entry.name !== name) {
          throw new SettingsError(nameMismatch(name, assignment.entry.name));
        }
        this.items.set(name, assignment.entry);
        return;
      }
      case 'section': {
        // 項目の位置にセクションは置けない
        throw new SettingsError(duplicateName(name));
      }
      case 'value': {
        this.items.get(name)?.set(assignment.value, { raw: true });
        return;
      }
    }
  }

  private replaceSection(name: string, assignment: Assignment): void {
    if (assignment.kind !== 'section') {
      throw new SettingsError(invalidSectionValue(name));
    }
    if (assignment.section.name !== name) {
      throw new SettingsError(nameMismatch(name, assignment.section.name));
    }

    this.sections.set(name, assignment.section);
  }

  private warnOnRename(requested: string, actual: string | null): void {
    if (actual !== null && actual !== requested) {
      console.warn(`⚠️  '${requested}' will be replaced to '${actual}'.`);
    }
  }
}

/**
 * ルートセクションを作成する
 */
export function createSettings(description?: string): Section {
  return new Section(null, null, description);
}
