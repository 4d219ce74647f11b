/**
 * Versioned table names for the bundle's Delta tables.
 *
 * Unity Catalog treats `.` as a path separator, so the dots of the version
 * become underscores: `user_events` at 0.1.0 is `user_events_v0_1_0`.
 */

import { getProjectVersion } from './version-reader';

export const DEFAULT_TABLE_SEPARATOR = '_';

/**
 * Append the project version to a base table name.
 *
 * @param version  Defaults to the version in `__version__.py` under the cwd
 * @throws VersionNotFoundError when no version is given and none can be resolved
 */
export function formatTableName(
  baseName: string,
  separator: string = DEFAULT_TABLE_SEPARATOR,
  version?: string
): string {
  const resolved = version ?? getProjectVersion();
  return `${baseName}${separator}v${resolved.replace(/\./g, '_')}`;
}

/**
 * `catalog.schema.table` path for a versioned table.
 */
export function formatFullTablePath(
  baseName: string,
  catalog: string,
  schema: string,
  separator: string = DEFAULT_TABLE_SEPARATOR,
  version?: string
): string {
  return `${catalog}.${schema}.${formatTableName(baseName, separator, version)}`;
}
