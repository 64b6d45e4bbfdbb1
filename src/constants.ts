import Joi from 'joi';
import { Configuration, DirectoryGroup, GroupName } from './types';

export const VERSION = '1.0.0';
export const CONFIG_FILE = 'scaffold-config.json';
export const HASKELL_EXTENSION = '.hs';

export const GROUP_ORDER: readonly GroupName[] = ['app', 'library', 'test'];

export const DEFAULT_GROUPS: Readonly<Record<GroupName, Readonly<DirectoryGroup>>> = {
  app: { directoryName: 'app', fileNames: ['Main'] },
  library: { directoryName: 'src-lib', fileNames: ['Lib'] },
  test: { directoryName: 'test', fileNames: ['Main'] }
};

const groupSchema = (group: GroupName) =>
  Joi.object<DirectoryGroup>({
    directoryName: Joi.string().default(DEFAULT_GROUPS[group].directoryName),
    fileNames: Joi.array().items(Joi.string().min(1)).default([...DEFAULT_GROUPS[group].fileNames])
  }).default();

export const configSchema = Joi.object<Configuration>({
  version: Joi.string().default(VERSION),
  groups: Joi.object({
    app: groupSchema('app'),
    library: groupSchema('library'),
    test: groupSchema('test')
  }).default(),
  force: Joi.boolean().default(false),
  noInteractive: Joi.boolean().default(false)
}).required();
