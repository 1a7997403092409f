#!/usr/bin/env node

import { Command } from 'commander';
import { createDemoSettings } from './demo-settings.ts';

const program = new Command();

program
  .name('settings-demo')
  .option('--with-hidden', 'include hidden entries in the output')
  .option('--save <path>', 'write the resolved settings to a file');

const settings = createDemoSettings().parse({
  program,
  baseConfigFiles: ['settings-demo.json', '.settings-demo.json'],
});

const options = program.opts<{ withHidden?: boolean; save?: string }>();

if (options.save !== undefined) {
  const result = settings.saveFile(options.save, { includeHidden: options.withHidden });
  if (!result.ok) {
    console.error(`Error: ${result.err.message}`);
    process.exit(1);
  }
  console.log(`✅ Settings saved: ${options.save}`);
} else {
  console.log(settings.save({ includeHidden: options.withHidden }).trimEnd());
}
