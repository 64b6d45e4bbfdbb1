import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import inquirer from 'inquirer';
import { canOverwrite, decideOverwrite, isAffirmative, promptOverwrite } from '../src/overwrite-guard';

jest.mock('inquirer');
jest.mock('chalk', () => ({
  green: jest.fn((text: string) => text),
  red: jest.fn((text: string) => text),
  yellow: jest.fn((text: string) => text),
  blue: jest.fn((text: string) => text),
  cyan: jest.fn((text: string) => text),
  gray: jest.fn((text: string) => text),
  bold: jest.fn((text: string) => text),
  default: {
    green: jest.fn((text: string) => text),
    red: jest.fn((text: string) => text),
    yellow: jest.fn((text: string) => text),
    blue: jest.fn((text: string) => text),
    cyan: jest.fn((text: string) => text),
    gray: jest.fn((text: string) => text),
    bold: jest.fn((text: string) => text),
  }
}));

describe('overwrite guard', () => {
  describe('decideOverwrite', () => {
    it.each([
      [false, false, false, 'allow'],
      [false, true, false, 'allow'],
      [false, false, true, 'allow'],
      [false, true, true, 'allow'],
      [true, true, false, 'allow'],
      [true, true, true, 'allow'],
      [true, false, true, 'deny'],
      [true, false, false, 'prompt']
    ] as const)('exists=%s force=%s noInteractive=%s -> %s', (exists, force, noInteractive, expected) => {
      expect(decideOverwrite(exists, force, noInteractive)).toBe(expected);
    });
  });

  describe('isAffirmative', () => {
    it('accepts only y and Y', () => {
      expect(isAffirmative('y')).toBe(true);
      expect(isAffirmative('Y')).toBe(true);
      expect(isAffirmative(' y ')).toBe(true);
      expect(isAffirmative('yes')).toBe(false);
      expect(isAffirmative('n')).toBe(false);
      expect(isAffirmative('')).toBe(false);
    });
  });

  describe('promptOverwrite', () => {
    const inquirerMock = inquirer as jest.Mocked<typeof inquirer>;

    afterEach(() => {
      inquirerMock.prompt.mockReset();
    });

    it('asks with a y/N question', async () => {
      inquirerMock.prompt.mockResolvedValueOnce({ answer: 'Y' });

      expect(await promptOverwrite('app/Main.hs')).toBe(true);
      expect(inquirerMock.prompt).toHaveBeenCalledWith([
        expect.objectContaining({
          type: 'input',
          name: 'answer',
          message: 'app/Main.hs already exists. Overwrite? [y/N]'
        })
      ]);
    });

    it('treats any other answer as no', async () => {
      inquirerMock.prompt.mockResolvedValueOnce({ answer: 'no' });

      expect(await promptOverwrite('app/Main.hs')).toBe(false);
    });
  });

  describe('canOverwrite', () => {
    let originalCwd: string;
    let testDir: string;
    let consoleLogSpy: jest.SpyInstance;
    let consoleWarnSpy: jest.SpyInstance;
    let confirm: jest.Mock<Promise<boolean>, [string]>;

    beforeAll(() => {
      originalCwd = process.cwd();
    });

    beforeEach(async () => {
      testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cabal-scaffold-guard-'));
      process.chdir(testDir);
      consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
      consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
      confirm = jest.fn<Promise<boolean>, [string]>();
      await fs.writeFile('Main.hs', 'module Main where\n');
    });

    afterEach(async () => {
      consoleLogSpy.mockRestore();
      consoleWarnSpy.mockRestore();
      process.chdir(originalCwd);
      await fs.remove(testDir);
    });

    it('allows writing a file that does not exist', async () => {
      expect(await canOverwrite('Lib.hs', { force: false, noInteractive: false }, confirm)).toBe(true);
      expect(confirm).not.toHaveBeenCalled();
    });

    it('always allows an existing file when forced', async () => {
      expect(await canOverwrite('Main.hs', { force: true, noInteractive: false }, confirm)).toBe(true);
      expect(await canOverwrite('Main.hs', { force: true, noInteractive: true }, confirm)).toBe(true);
      expect(confirm).not.toHaveBeenCalled();
    });

    it('denies an existing file without prompting in non-interactive mode', async () => {
      expect(await canOverwrite('Main.hs', { force: false, noInteractive: true }, confirm)).toBe(false);
      expect(confirm).not.toHaveBeenCalled();
      expect(consoleWarnSpy).toHaveBeenCalledWith(
        'Warning:',
        'Main.hs already exists, skipping (use --force to overwrite)'
      );
    });

    it('follows the answer of the confirmation callback', async () => {
      confirm.mockResolvedValueOnce(true).mockResolvedValueOnce(false);

      expect(await canOverwrite('Main.hs', { force: false, noInteractive: false }, confirm)).toBe(true);
      expect(await canOverwrite('Main.hs', { force: false, noInteractive: false }, confirm)).toBe(false);
      expect(confirm).toHaveBeenCalledTimes(2);
      expect(confirm).toHaveBeenCalledWith('Main.hs');
      expect(consoleLogSpy).toHaveBeenCalledWith('Skipped:', 'Main.hs');
    });
  });
});
