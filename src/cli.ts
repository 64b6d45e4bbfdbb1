import { Command } from 'commander';
import { ModuleScaffolder } from './module-scaffolder';
import { echoAll } from './echo';
import { VERSION } from './constants';
import { ScaffoldOptions, ScaffoldResult } from './types';

interface FlagOptions {
  force?: boolean;
  interactive?: boolean;
  dryRun?: boolean;
}

interface ScaffoldCommandOptions extends FlagOptions {
  app?: string[];
  lib?: string[];
  test?: string[];
}

function toFlags(options: FlagOptions): Partial<ScaffoldOptions> {
  return {
    force: options.force,
    noInteractive: options.interactive === undefined ? undefined : !options.interactive,
    dryRun: options.dryRun
  };
}

function exitOnFailure(results: readonly ScaffoldResult[]): void {
  if (results.some((result) => result.status === 'failed')) {
    process.exit(1);
  }
}

function withFlags(command: Command): Command {
  return command
    .option('-f, --force', 'overwrite existing files without asking')
    .option('--no-force', 'keep existing files even if the configuration forces overwrites')
    .option('--interactive', 'ask before overwriting even if the configuration disables prompts')
    .option('--no-interactive', 'never prompt; skip files that already exist')
    .option('--dry-run', 'show what would be created without touching the file system or prompting');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('cabal-scaffold')
    .description('Scaffold Haskell module files for a Cabal project')
    .version(VERSION);

  withFlags(
    program
      .command('scaffold', { isDefault: true })
      .description('Create the app, library and test modules')
      .option('--app <names...>', 'modules to create in the app directory')
      .option('--lib <names...>', 'modules to create in the library directory')
      .option('--test <names...>', 'modules to create in the test directory')
  ).action(async (options: ScaffoldCommandOptions) => {
    const scaffolder = new ModuleScaffolder();
    await scaffolder.init();

    const results = await scaffolder.scaffoldProject(
      scaffolder.resolveOptions(toFlags(options)),
      { app: options.app, library: options.lib, test: options.test }
    );
    exitOnFailure(results);
  });

  withFlags(
    program
      .command('file <directory> <names...>')
      .description('Create one or more modules in a single directory')
  ).action(async (directory: string, names: string[], options: FlagOptions) => {
    const scaffolder = new ModuleScaffolder();
    await scaffolder.init();

    const results = await scaffolder.scaffoldBatch(directory, names, scaffolder.resolveOptions(toFlags(options)));
    ModuleScaffolder.printSummary(results);
    exitOnFailure(results);
  });

  program
    .command('list')
    .description('List the modules found in the app, library and test directories')
    .action(async () => {
      const scaffolder = new ModuleScaffolder();
      await scaffolder.init();
      await scaffolder.printModules();
    });

  program
    .command('init')
    .description('Write a default scaffold configuration to the current directory')
    .action(async () => {
      await ModuleScaffolder.initProject();
    });

  program
    .command('echo [messages...]')
    .description('Print each message on its own line')
    .action((messages: string[]) => {
      echoAll(messages);
    });

  return program;
}

export const program = createProgram();
