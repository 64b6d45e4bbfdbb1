export type GroupName = 'app' | 'library' | 'test';

export interface DirectoryGroup {
  directoryName: string;
  fileNames: string[];
}

export interface Configuration {
  version: string;
  groups: Record<GroupName, DirectoryGroup>;
  force: boolean;
  noInteractive: boolean;
}

export interface ScaffoldOptions {
  force: boolean;
  noInteractive: boolean;
  dryRun: boolean;
}

export interface ScaffoldRequest extends ScaffoldOptions {
  fileName: string;
}

export type ScaffoldStatus = 'written' | 'skipped' | 'dry-run' | 'failed';

export interface ScaffoldResult {
  filePath: string;
  moduleName: string;
  status: ScaffoldStatus;
  error?: string;
}

export type OverwriteDecision = 'allow' | 'deny' | 'prompt';

/** Asks whether an existing file may be overwritten. */
export type ConfirmOverwrite = (filePath: string) => Promise<boolean>;

export interface ModuleListing {
  group: GroupName;
  filePath: string;
  moduleName: string | null;
}
