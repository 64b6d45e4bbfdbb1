import * as fs from 'fs-extra';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { ConfirmOverwrite, OverwriteDecision, ScaffoldOptions } from './types';

export function decideOverwrite(exists: boolean, force: boolean, noInteractive: boolean): OverwriteDecision {
  if (!exists || force) return 'allow';
  if (noInteractive) return 'deny';
  return 'prompt';
}

export function isAffirmative(answer: string): boolean {
  const trimmed = answer.trim();
  return trimmed === 'y' || trimmed === 'Y';
}

export const promptOverwrite: ConfirmOverwrite = async (filePath: string) => {
  const { answer } = await inquirer.prompt<{ answer: string }>([
    {
      type: 'input',
      name: 'answer',
      message: `${filePath} already exists. Overwrite? [y/N]`,
      default: 'N'
    }
  ]);

  return isAffirmative(answer);
};

/**
 * Decides whether `filePath` may be written. Existing files are kept unless
 * `force` is set or the user agrees through `confirm`.
 */
export async function canOverwrite(
  filePath: string,
  options: Pick<ScaffoldOptions, 'force' | 'noInteractive'>,
  confirm: ConfirmOverwrite = promptOverwrite
): Promise<boolean> {
  const exists = await fs.pathExists(filePath);

  switch (decideOverwrite(exists, options.force, options.noInteractive)) {
    case 'allow':
      return true;
    case 'deny':
      console.warn(
        chalk.yellow('Warning:'),
        `${filePath} already exists, skipping (use --force to overwrite)`
      );
      return false;
    case 'prompt': {
      const approved = await confirm(filePath);
      if (!approved) {
        console.log(chalk.yellow('Skipped:'), filePath);
      }
      return approved;
    }
  }
}
