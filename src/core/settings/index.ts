/**
 * Settings module public exports
 */

export { Section, createSettings, classifyAssignment, HIDDEN_PREFIX } from './section.ts';
export type { Assignment, SaveOptions, ToDictOptions } from './section.ts';
export { AbstractEntry, Entry, HandlerEntry } from './entry.ts';
export type { EntryOwner, FromOptArgsOptions } from './entry.ts';
export { resolveSettings, applyBaseConfigFiles, DEFAULT_CONFIG_FILE_OPTION } from './resolver.ts';
export type { ParseOptions } from './resolver.ts';
export { buildDestName, normalizeOptionStrings, isLongOption } from './option-string.ts';
export { decodeConfig, encodeConfig } from './codec.ts';
export { readConfigFile, writeConfigFile } from './config-file.ts';
