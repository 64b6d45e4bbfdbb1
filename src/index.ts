#!/usr/bin/env node

import chalk from 'chalk';
import { program } from './cli';

export { ModuleScaffolder } from './module-scaffolder';
export type { GroupOverrides } from './module-scaffolder';
export * from './files';
export * from './overwrite-guard';
export * from './echo';
export * from './types';
export * from './constants';
export { createProgram } from './cli';

if (require.main === module) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    console.error(chalk.red('Error:'), errorMessage);
    process.exit(1);
  });
}
