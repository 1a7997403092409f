import { SettingsError, invalidOptionString } from '../../types/errors.ts';

export const OPTION_PREFIX = '-';

/**
 * 長形式オプション（`--foo`）かどうか
 */
export function isLongOption(optionString: string): boolean {
  return optionString.length > 1 && optionString[1] === OPTION_PREFIX;
}

/**
 * オプション文字列から dest 名を導出する
 *
 * - 全てのオプション文字列は `-` で始まる必要がある
 * - dest が明示されていればそれを使う
 * - 長形式を短形式より優先する（`--foo-bar` → `foo_bar`, `-x` → `x`）
 *
 * @throws SettingsError(InvalidOptionStringError)
 */
export function buildDestName(optionStrings: readonly string[], dest?: string): string {
  const [first] = optionStrings;
  if (first === undefined) {
    throw new SettingsError(invalidOptionString('', 'at least one option string is required'));
  }

  for (const optionString of optionStrings) {
    if (!optionString.startsWith(OPTION_PREFIX)) {
      throw new SettingsError(
        invalidOptionString(optionString, `must start with a character '${OPTION_PREFIX}'`),
      );
    }
    // commander の短形式は1文字のみ
    if (!isLongOption(optionString) && optionString.length > 2) {
      throw new SettingsError(
        invalidOptionString(
          optionString,
          'a single dash must be followed by a single character (commander does not accept longer short options)',
        ),
      );
    }
  }

  if (dest !== undefined) {
    return dest;
  }

  const source = optionStrings.find(isLongOption) ?? first;
  const name = source.replace(/^-+/, '');
  if (name === '') {
    throw new SettingsError(invalidOptionString(source, 'dest is required for options like this'));
  }

  return name.replaceAll('-', '_');
}

/**
 * argvar 指定を配列に正規化する
 */
export function normalizeOptionStrings(argvar: string | readonly string[]): readonly string[] {
  return typeof argvar === 'string' ? [argvar] : [...argvar];
}
