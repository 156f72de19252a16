export { SpawnCommandRunner, formatCommand } from './command-runner';
export type { CommandRunner, CommandResult, RunOptions } from './command-runner';
export { DpkgPackageManager, parseContentListing } from './dpkg';
export type { PackageArchiveReader, PackageManager } from './dpkg';
export { Systemctl, parseUnitFileNames } from './systemctl';
export type { ServiceManager } from './systemctl';
export { requireRoot, requireTools, findTool, REQUIRED_TOOLS } from './preflight';
