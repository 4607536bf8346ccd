/**
 * @flightlog/locator
 * 
 * Finds the newest flight-controller log on local or removable storage.
 */

export {
  DEFAULT_LOG_EXTENSION,
  listLogFiles,
  selectLatest,
  locateLogs,
  findLatestLog,
} from './locator.js';

export {
  DEFAULT_MOUNT_BASE_DIRS,
  DEFAULT_VENDOR_TOKENS,
  DEFAULT_LOG_SUBDIRS,
  resolveMountBaseDirs,
  isVendorVolume,
  findMountLogDirs,
  probeDirectory,
} from './mounts.js';

export type {
  MountDiscoveryOptions,
  LocatorOptions,
  LogSource,
  LogFile,
  LocateResult,
} from './types.js';
