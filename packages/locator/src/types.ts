/**
 * Log Locator Types
 */

export interface MountDiscoveryOptions {
  /** Mount roots to inspect; `$USER` is substituted. Defaults to the usual Linux auto-mount roots. */
  baseDirs?: readonly string[];
  /** Value for `$USER`; falls back to the USER env var, then `pi`. */
  user?: string;
  /** Substrings that mark a volume as flight-controller storage (case-insensitive). */
  vendorTokens?: readonly string[];
  /** Log directories to try inside each matching volume, in order. */
  logSubdirs?: readonly (readonly string[])[];
}

export interface LocatorOptions extends MountDiscoveryOptions {
  logsDir?: string;
  extension?: string;
  includeMounts?: boolean;
}

export type LogSource = 'configured' | 'mount';

export interface LogFile {
  path: string;
  source: LogSource;
  sourceDir: string;
  size: number;
  modifiedAt: Date;
}

export interface LocateResult {
  latest: LogFile | null;
  candidates: LogFile[];
  searchedDirs: string[];
}
