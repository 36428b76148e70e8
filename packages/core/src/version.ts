/**
 * Version Information
 * Kept in step with packages/core/package.json
 */

export interface VersionInfo {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

export const VERSION = '0.4.0';

export const VERSION_INFO: VersionInfo = { major: 0, minor: 4, patch: 0 };
