/**
 * commander による OptionRegistrar 実装
 *
 * OptionSpec を commander の Option に変換して登録し、解析結果を dest 名で引ける
 * Map として返す。
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { OptionRegistrar, OptionSpec, ParsedOptions } from '../../types/registrar.ts';
import { isLongOption } from '../../core/settings/option-string.ts';

interface Registration {
  readonly spec: OptionSpec;
  readonly primary: Option;
  readonly aliases: readonly Option[];
}

interface GroupHeading {
  readonly path: string;
  readonly description: string | undefined;
}

/** 値を取らないアクション */
const FLAG_ACTIONS = new Set(['store_true', 'store_false', 'store_const', 'count']);

const formatFlags = (spec: OptionSpec): string => spec.flags.join(', ');

const isFlagAction = (spec: OptionSpec): boolean => spec.action !== undefined && FLAG_ACTIONS.has(spec.action);

/**
 * commander の Option を作る
 *
 * `--no-` で始まる長形式も否定オプションにはせず、書かれた名前のまま値を持たせる。
 */
function createOption(flags: string, description?: string): Option {
  const option = new Option(flags, description);
  option.negate = false;
  return option;
}

/**
 * 値なしで指定された `[X]` オプションは commander では true になるため、const がなければ未設定に戻す
 */
function normalizeValue(spec: OptionSpec, value: unknown): unknown {
  if (spec.nargs === '?' && spec.const === undefined && !isFlagAction(spec) && value === true) {
    return undefined;
  }
  return value;
}

/**
 * 値プレースホルダ（`<NUM>`, `[NUM]`, `<NUM...>` など）
 */
function valuePlaceholder(spec: OptionSpec): string {
  if (isFlagAction(spec)) {
    return '';
  }

  const metavar = spec.metavar ?? spec.dest.toUpperCase();
  switch (spec.nargs) {
    case '?':
      return ` [${metavar}]`;
    case '*':
      return ` [${metavar}...]`;
    case '+':
      return ` <${metavar}...>`;
    case undefined:
      return ` <${metavar}>`;
    default:
      return ` <${metavar}...>`;
  }
}

/**
 * type による変換と choices の検査
 *
 * preset（const）経由の値は文字列ではないのでそのまま通す。
 */
function createConverter(spec: OptionSpec): (raw: unknown) => unknown {
  return (raw) => {
    if (typeof raw !== 'string') {
      return raw;
    }

    let value: unknown = raw;
    if (spec.type !== undefined) {
      try {
        value = spec.type(raw);
      } catch (error) {
        throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
      }
    }

    if (spec.choices !== undefined && !spec.choices.includes(value)) {
      throw new InvalidArgumentError(`Allowed choices are ${spec.choices.map(String).join(', ')}.`);
    }

    return value;
  };
}

/**
 * 値をリストに追加する（デフォルト値は置き換える）
 */
const collect =
  (spec: OptionSpec, convert: (raw: unknown) => unknown) =>
  (raw: string, previous: unknown): unknown[] => {
    const value = convert(raw);
    if (Array.isArray(previous) && previous !== spec.default) {
      return [...previous, value];
    }
    return [value];
  };

function configureOption(option: Option, spec: OptionSpec): Option {
  const convert = createConverter(spec);
  const isList = spec.nargs === '*' || spec.nargs === '+' || typeof spec.nargs === 'number';

  if (spec.choices !== undefined) {
    // ヘルプ表示用。値の検査は下の argParser で行う
    option.choices(spec.choices.map(String));
  }

  switch (spec.action) {
    case 'store_true':
      return option;
    case 'store_false':
      return option.preset(false);
    case 'store_const':
      return option.preset(spec.const);
    case 'count':
      return option
        .preset(1)
        .argParser((_value: string, previous: unknown) => (typeof previous === 'number' ? previous : 0) + 1);
    case 'append':
      return option.argParser(collect(spec, convert));
    case 'store':
    case undefined:
      break;
  }

  if (spec.nargs === '?') {
    option.preset(spec.const);
  }
  if (isList && (spec.type !== undefined || spec.choices !== undefined)) {
    return option.argParser(collect(spec, convert));
  }
  if (spec.type !== undefined || spec.choices !== undefined) {
    return option.argParser((raw: string) => convert(raw));
  }

  return option;
}

/**
 * OptionSpec から commander の Option を作る
 *
 * 最初の短形式と最初の長形式をまとめて1つの Option にし、残りのオプション文字列は
 * ヘルプに出ない別名として同じ dest に紐付ける。
 */
function createOptions(spec: OptionSpec, heading: GroupHeading | null): Registration {
  const short = spec.flags.find((flag) => !isLongOption(flag));
  const long = spec.flags.find(isLongOption);
  const primaryFlags = [short, long].filter((flag): flag is string => flag !== undefined);
  const aliasFlags = spec.flags.filter((flag) => !primaryFlags.includes(flag));
  const placeholder = valuePlaceholder(spec);

  const primary = configureOption(createOption(`${primaryFlags.join(', ')}${placeholder}`, spec.help ?? ''), spec);
  if (spec.default !== undefined) {
    primary.default(spec.default);
  }
  if (heading !== null) {
    primary.helpGroup(
      heading.description === undefined ? `${heading.path}:` : `${heading.path} (${heading.description}):`,
    );
  }

  const aliases = aliasFlags.map((flag) => configureOption(createOption(`${flag}${placeholder}`), spec).hideHelp());

  return { spec, primary, aliases };
}

/**
 * 解析後に commander では表現できない制約を検査する
 */
function checkConstraints(program: Command, spec: OptionSpec, given: boolean, value: unknown): void {
  if (spec.required === true && !given) {
    program.error(`error: required option '${formatFlags(spec)}' not specified`);
  }

  if (given && typeof spec.nargs === 'number' && Array.isArray(value) && value.length !== spec.nargs) {
    program.error(`error: option '${formatFlags(spec)}' expected ${spec.nargs} argument(s), got ${value.length}`);
  }
}

function buildRegistrar(
  program: Command,
  registrations: Registration[],
  heading: GroupHeading | null,
): OptionRegistrar {
  return {
    addOption(spec: OptionSpec): string {
      const registration = createOptions(spec, heading);
      program.addOption(registration.primary);
      for (const alias of registration.aliases) {
        program.addOption(alias);
      }
      registrations.push(registration);

      return spec.dest;
    },

    addGroup(name: string, description?: string): OptionRegistrar {
      const path = heading === null ? name : `${heading.path}.${name}`;
      return buildRegistrar(program, registrations, { path, description });
    },

    parse(argv?: readonly string[]): ParsedOptions {
      if (argv === undefined) {
        program.parse();
      } else {
        program.parse([...argv], { from: 'user' });
      }

      const parsed = new Map<string, unknown>();
      for (const { spec, primary, aliases } of registrations) {
        const given = [primary, ...aliases].find(
          (option) => program.getOptionValueSource(option.attributeName()) === 'cli',
        );
        const value = normalizeValue(spec, program.getOptionValue((given ?? primary).attributeName()));
        checkConstraints(program, spec, given !== undefined, value);

        // 同じ dest を共有する登録が複数ある場合は、実際に指定されたものを優先する
        if (!parsed.has(spec.dest) || given !== undefined) {
          parsed.set(spec.dest, value);
        }
      }

      return parsed;
    },

    helpText(): string {
      return program.helpInformation();
    },
  };
}

/**
 * commander を使う OptionRegistrar を作成する
 *
 * @param program - 設定済みの Command（省略時は新規作成）
 * @param description - Command に説明が未設定の場合に使う説明
 */
export function createCommanderRegistrar(program: Command = new Command(), description?: string): OptionRegistrar {
  if (description !== undefined && program.description() === '') {
    program.description(description);
  }

  return buildRegistrar(program, [], null);
}
