import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import { HASKELL_EXTENSION } from './constants';

/**
 * Returns the absolute form of `target` when something exists there,
 * otherwise `target` untouched.
 */
export async function resolvePath(target: string): Promise<string> {
  if (await fs.pathExists(target)) {
    return path.resolve(target);
  }
  return target;
}

/**
 * Creates `directory` and any missing parents. Empty and existing paths are
 * left alone, and so is everything in dry-run mode.
 *
 * @returns whether a directory was actually created
 */
export async function ensureDirectory(directory: string, dryRun = false): Promise<boolean> {
  if (!directory || await fs.pathExists(directory)) {
    return false;
  }

  if (dryRun) {
    console.log(chalk.cyan('[dry-run]'), `Would create directory ${directory}`);
    return false;
  }

  await fs.ensureDir(directory);
  console.log(chalk.green('✓'), `Created directory ${directory}`);
  return true;
}

export function withExtension(fileName: string): string {
  return fileName.endsWith(HASKELL_EXTENSION) ? fileName : `${fileName}${HASKELL_EXTENSION}`;
}

export function moduleNameOf(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export function moduleHeader(moduleName: string): string {
  return `module ${moduleName} where\n`;
}

const HEADER_PATTERN = /^module\s+([\w.']+)\s+where\b/;

export function parseModuleHeader(content: string): string | null {
  const firstLine = content.split('\n', 1)[0];
  const match = HEADER_PATTERN.exec(firstLine);
  return match ? match[1] : null;
}

/** Replaces the whole file with its module header. */
export async function writeHeader(filePath: string): Promise<string> {
  const moduleName = moduleNameOf(filePath);
  await fs.writeFile(filePath, moduleHeader(moduleName), 'utf8');
  return moduleName;
}
