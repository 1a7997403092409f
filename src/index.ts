/**
 * settings-tree public exports
 */

export * from './core/settings/index.ts';
export { createCommanderRegistrar } from './adapters/commander/registrar.ts';
export { createProcessEnvironment, createRecordEnvironment } from './adapters/environment/environment.ts';
export * from './types/binding.ts';
export type * from './types/registrar.ts';
export type * from './types/environment.ts';
export * from './types/config-value.ts';
export * from './types/errors.ts';
