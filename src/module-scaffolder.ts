import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import * as glob from 'glob';
import {
  Configuration,
  ConfirmOverwrite,
  GroupName,
  ModuleListing,
  ScaffoldOptions,
  ScaffoldRequest,
  ScaffoldResult,
  ScaffoldStatus
} from './types';
import { CONFIG_FILE, GROUP_ORDER, HASKELL_EXTENSION, configSchema } from './constants';
import {
  ensureDirectory,
  moduleNameOf,
  parseModuleHeader,
  resolvePath,
  withExtension,
  writeHeader
} from './files';
import { canOverwrite, promptOverwrite } from './overwrite-guard';

const reportPrompt: ConfirmOverwrite = async (filePath: string) => {
  console.log(chalk.cyan('[dry-run]'), `Would ask before overwriting ${filePath}`);
  return true;
};

export type GroupOverrides = Partial<Record<GroupName, string[]>>;

export class ModuleScaffolder {
  private config: Configuration;

  constructor(private readonly confirm: ConfirmOverwrite = promptOverwrite) {
    this.config = ModuleScaffolder.defaultConfig();
  }

  static defaultConfig(): Configuration {
    return ModuleScaffolder.parseConfig({});
  }

  static parseConfig(configData: unknown): Configuration {
    const result = configSchema.validate(configData);
    if (result.error) {
      throw new Error(`Configuration validation failed: ${result.error.message}`);
    }
    return result.value;
  }

  getConfig(): Configuration {
    return this.config;
  }

  async init(): Promise<void> {
    try {
      await this.loadConfig();
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      console.error(chalk.red('Initialization failed:'), errorMessage);
      process.exit(1);
    }
  }

  async loadConfig(): Promise<void> {
    const configPath = path.resolve(CONFIG_FILE);

    if (!await fs.pathExists(configPath)) {
      this.config = ModuleScaffolder.defaultConfig();
      return;
    }

    let configData: unknown;
    try {
      configData = await fs.readJson(configPath);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to load configuration: ${errorMessage}`);
    }

    this.config = ModuleScaffolder.parseConfig(configData);
    console.log(chalk.green('✓'), `Configuration loaded from ${CONFIG_FILE}`);
  }

  /** Merges command-line flags over the configured defaults. */
  resolveOptions(flags: Partial<ScaffoldOptions>): ScaffoldOptions {
    return {
      force: flags.force ?? this.config.force,
      noInteractive: flags.noInteractive ?? this.config.noInteractive,
      dryRun: flags.dryRun ?? false
    };
  }

  async scaffoldFile(directory: string, request: ScaffoldRequest): Promise<ScaffoldResult> {
    if (!request.fileName.trim()) {
      throw new Error('File name must not be empty');
    }

    const fileName = withExtension(request.fileName);
    const filePath = await resolvePath(path.join(directory, fileName));
    const parentDirectory = path.dirname(filePath);
    const moduleName = moduleNameOf(filePath);
    const existed = await fs.pathExists(filePath);

    const confirm = request.dryRun ? reportPrompt : this.confirm;
    if (!await canOverwrite(filePath, request, confirm)) {
      return { filePath, moduleName, status: 'skipped' };
    }

    if (request.dryRun) {
      await ensureDirectory(parentDirectory, true);
      console.log(chalk.cyan('[dry-run]'), `Would write ${filePath}`);
      return { filePath, moduleName, status: 'dry-run' };
    }

    await ensureDirectory(parentDirectory);
    await writeHeader(filePath);
    console.log(chalk.green('✓'), `${existed ? 'Overwrote' : 'Created'} ${filePath}`);
    return { filePath, moduleName, status: 'written' };
  }

  async scaffoldBatch(
    directory: string,
    fileNames: readonly string[],
    options: ScaffoldOptions
  ): Promise<ScaffoldResult[]> {
    const results: ScaffoldResult[] = [];

    for (const fileName of fileNames) {
      try {
        results.push(await this.scaffoldFile(directory, { ...options, fileName }));
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        const filePath = path.join(directory, withExtension(fileName));
        console.error(chalk.red('✗'), `Failed to scaffold ${filePath}:`, errorMessage);
        results.push({
          filePath,
          moduleName: moduleNameOf(filePath),
          status: 'failed',
          error: errorMessage
        });
      }
    }

    return results;
  }

  async scaffoldProject(options: ScaffoldOptions, overrides: GroupOverrides = {}): Promise<ScaffoldResult[]> {
    const results: ScaffoldResult[] = [];

    for (const group of GROUP_ORDER) {
      const { directoryName, fileNames } = this.config.groups[group];
      const names = overrides[group] ?? fileNames;
      if (names.length === 0) continue;

      console.log(chalk.bold(`\n${group} (${directoryName})`));
      results.push(...await this.scaffoldBatch(directoryName, names, options));
    }

    ModuleScaffolder.printSummary(results);
    return results;
  }

  async listModules(): Promise<ModuleListing[]> {
    const listings: ModuleListing[] = [];

    for (const group of GROUP_ORDER) {
      const directory = this.config.groups[group].directoryName;
      if (!await fs.pathExists(directory)) continue;

      const matches = await glob.glob(`**/*${HASKELL_EXTENSION}`, { cwd: directory, nodir: true });

      for (const match of matches.sort()) {
        const filePath = path.join(directory, match);
        const content = await fs.readFile(filePath, 'utf8');
        listings.push({ group, filePath, moduleName: parseModuleHeader(content) });
      }
    }

    return listings;
  }

  async printModules(): Promise<void> {
    const listings = await this.listModules();

    console.log(chalk.bold('\nScaffolded modules\n'));

    if (listings.length === 0) {
      console.log(chalk.yellow('No modules found'));
      return;
    }

    for (const listing of listings) {
      const name = listing.moduleName ?? chalk.yellow('(no module header)');
      console.log(`  ${listing.group}: ${listing.filePath} - ${name}`);
    }
  }

  static printSummary(results: readonly ScaffoldResult[]): void {
    const counts: Record<ScaffoldStatus, number> = { written: 0, skipped: 0, 'dry-run': 0, failed: 0 };
    for (const result of results) {
      counts[result.status] += 1;
    }

    const line = `${counts.written} written, ${counts.skipped} skipped, ${counts['dry-run']} simulated, ${counts.failed} failed`;
    if (counts.failed > 0) {
      console.log(chalk.red('\n✗'), line);
    } else {
      console.log(chalk.green('\n✓'), line);
    }
  }

  static async initProject(): Promise<void> {
    if (await fs.pathExists(CONFIG_FILE)) {
      console.log(chalk.yellow('Scaffold configuration already exists'));
      return;
    }

    await fs.writeJson(CONFIG_FILE, ModuleScaffolder.defaultConfig(), { spaces: 2 });
    console.log(chalk.green('✓'), `Created ${CONFIG_FILE}`);
  }
}
