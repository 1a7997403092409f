/**
 * Domain Error Types
 *
 * 設定ツリーのエラー型定義。タグ付きユニオン型でエラーの種類を区別する。
 *
 * - 構造エラー / 参照エラー: `SettingsError` として即座に throw される
 * - ファイルエラー: option-t の Result 型で返される
 */

// ===== Definition Errors =====

export type DefinitionError =
  | DuplicateNameError
  | MissingBindingError
  | InvalidCoercionError
  | InvalidBindingError
  | NameMismatchError
  | InvalidSectionValueError
  | InvalidOptionStringError;

export interface DuplicateNameError {
  readonly type: 'DuplicateNameError';
  readonly name: string;
  readonly message: string;
}

export interface MissingBindingError {
  readonly type: 'MissingBindingError';
  readonly message: string;
}

export interface InvalidCoercionError {
  readonly type: 'InvalidCoercionError';
  readonly received: string;
  readonly message: string;
}

export interface InvalidBindingError {
  readonly type: 'InvalidBindingError';
  readonly details: string;
  readonly message: string;
}

export interface NameMismatchError {
  readonly type: 'NameMismatchError';
  readonly expected: string;
  readonly actual: string | null;
  readonly message: string;
}

export interface InvalidSectionValueError {
  readonly type: 'InvalidSectionValueError';
  readonly name: string;
  readonly message: string;
}

export interface InvalidOptionStringError {
  readonly type: 'InvalidOptionStringError';
  readonly optionString: string;
  readonly message: string;
}

export const duplicateName = (name: string): DuplicateNameError => ({
  type: 'DuplicateNameError',
  name,
  message: `${name} is in use`,
});

export const missingBinding = (): MissingBindingError => ({
  type: 'MissingBindingError',
  message: 'One or more of envvar, argvar, setter or getter is required',
});

export const invalidCoercion = (received: unknown): InvalidCoercionError => {
  const label = typeof received === 'object' ? JSON.stringify(received) : String(received);
  return {
    type: 'InvalidCoercionError',
    received: label,
    message: `unknown type "${label}": type must be a function`,
  };
};

export const invalidBinding = (details: string): InvalidBindingError => ({
  type: 'InvalidBindingError',
  details,
  message: `Invalid binding: ${details}`,
});

export const nameMismatch = (expected: string, actual: string | null): NameMismatchError => ({
  type: 'NameMismatchError',
  expected,
  actual,
  message: `Name does not match ${expected} and ${actual ?? '(anonymous)'}`,
});

export const invalidSectionValue = (name: string): InvalidSectionValueError => ({
  type: 'InvalidSectionValueError',
  name,
  message: `The value for section '${name}' must be a Section`,
});

export const invalidOptionString = (optionString: string, reason: string): InvalidOptionStringError => ({
  type: 'InvalidOptionStringError',
  optionString,
  message: `invalid option string '${optionString}': ${reason}`,
});

// ===== Lookup Errors =====

export type LookupError = ItemNotFoundError | EntryNotFoundError | AttributeNotFoundError;

export interface ItemNotFoundError {
  readonly type: 'ItemNotFoundError';
  readonly name: string;
  readonly message: string;
}

export interface EntryNotFoundError {
  readonly type: 'EntryNotFoundError';
  readonly name: string;
  readonly message: string;
}

export interface AttributeNotFoundError {
  readonly type: 'AttributeNotFoundError';
  readonly name: string;
  readonly message: string;
}

export const itemNotFound = (name: string): ItemNotFoundError => ({
  type: 'ItemNotFoundError',
  name,
  message: `Item not found: ${name}`,
});

export const entryNotFound = (name: string): EntryNotFoundError => ({
  type: 'EntryNotFoundError',
  name,
  message: `Entry not found: ${name}`,
});

export const attributeNotFound = (name: string): AttributeNotFoundError => ({
  type: 'AttributeNotFoundError',
  name,
  message: `The section has no attribute '${name}'`,
});

// ===== Config File Errors =====

export type ConfigFileError = ConfigFileNotFoundError | ConfigParseError | ConfigIOError;

export interface ConfigFileNotFoundError {
  readonly type: 'ConfigFileNotFoundError';
  readonly filePath: string;
  readonly message: string;
}

export interface ConfigParseError {
  readonly type: 'ConfigParseError';
  readonly filePath: string | null;
  readonly details: string;
  readonly message: string;
}

export interface ConfigIOError {
  readonly type: 'ConfigIOError';
  readonly filePath: string;
  readonly operation: 'read' | 'write';
  readonly cause?: unknown;
  readonly message: string;
}

export const configFileNotFound = (filePath: string): ConfigFileNotFoundError => ({
  type: 'ConfigFileNotFoundError',
  filePath,
  message: `Configuration file not found: ${filePath}`,
});

export const configParseError = (filePath: string | null, details: string): ConfigParseError => ({
  type: 'ConfigParseError',
  filePath,
  details,
  message:
    filePath === null
      ? `Failed to parse configuration: ${details}`
      : `Failed to parse configuration file ${filePath}: ${details}`,
});

export const configIOError = (
  filePath: string,
  operation: 'read' | 'write',
  cause?: unknown,
): ConfigIOError => ({
  type: 'ConfigIOError',
  filePath,
  operation,
  cause,
  message: `Failed to ${operation} configuration file ${filePath}: ${
    cause instanceof Error ? cause.message : String(cause)
  }`,
});

// ===== Throwable =====

export type SettingsErrorDetail = DefinitionError | LookupError | ConfigFileError;

/**
 * タグ付きエラーを保持する例外
 *
 * 設定スキーマ定義の誤りはプログラマのミスなので、Result で返さず throw する。
 */
export class SettingsError extends Error {
  public readonly detail: SettingsErrorDetail;

  constructor(detail: SettingsErrorDetail) {
    super(detail.message);
    this.name = 'SettingsError';
    this.detail = detail;
  }
}

/**
 * 特定の種類の SettingsError かどうかを判定する
 */
export const isSettingsError = <K extends SettingsErrorDetail['type']>(
  error: unknown,
  type: K,
): error is SettingsError & { readonly detail: Extract<SettingsErrorDetail, { type: K }> } =>
  error instanceof SettingsError && error.detail.type === type;
