import * as fs from 'fs';
import * as path from 'path';
import {
  DEFAULT_BACKUP,
  DEFAULT_STRICT_UPDATE_YAML,
  type RepoVersionerConfig,
  type ResolvedSettings,
} from '../config/types';
import { ConfigError, errorMessage } from '../errors';

/**
 * Name of the project-level configuration file.
 */
export const VERSIONER_CONFIG_FILENAME = 'versioner.json';

/**
 * Flag values that take part in settings resolution.
 */
export interface SettingsOverrides {
  /** `--cwd` */
  cwd?: string;
  /** `--no-backup` leaves this false; commander sets true otherwise */
  backup?: boolean;
  /** `--strict` */
  strict?: boolean;
}

/**
 * Find the directory that contains `versioner.json`, walking up from `startDir`.
 *
 * @returns Absolute directory path, or `null` when no file is found.
 */
export function findRepoConfigDir(startDir: string = process.cwd()): string | null {
  let dir = path.resolve(startDir);

  while (true) {
    if (fs.existsSync(path.join(dir, VERSIONER_CONFIG_FILENAME))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function expectType(
  raw: Record<string, unknown>,
  key: keyof RepoVersionerConfig,
  type: 'string' | 'boolean',
  file: string
): void {
  if (raw[key] !== undefined && typeof raw[key] !== type) {
    throw new ConfigError(`Invalid ${file}: "${key}" must be a ${type}`);
  }
}

/**
 * Validate the parsed contents of `versioner.json`. Unknown keys are ignored.
 */
export function validateRepoConfig(raw: unknown, file: string): RepoVersionerConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Invalid ${file}: expected a JSON object`);
  }

  const record: Record<string, unknown> = { ...raw };
  expectType(record, 'notebookRoot', 'string', file);
  expectType(record, 'backup', 'boolean', file);
  expectType(record, 'strictUpdateYaml', 'boolean', file);

  const config: RepoVersionerConfig = {};
  if (typeof record.notebookRoot === 'string') config.notebookRoot = record.notebookRoot;
  if (typeof record.backup === 'boolean') config.backup = record.backup;
  if (typeof record.strictUpdateYaml === 'boolean') config.strictUpdateYaml = record.strictUpdateYaml;
  return config;
}

/**
 * Load `versioner.json`, searching from `startDir` up to the filesystem root.
 *
 * @returns The config and its directory, or `null` when no file is found.
 * @throws ConfigError when the file is not valid JSON or has a mistyped key
 */
export function loadRepoConfig(
  startDir: string = process.cwd()
): { config: RepoVersionerConfig; configDir: string } | null {
  const configDir = findRepoConfigDir(startDir);
  if (configDir === null) {
    return null;
  }

  const file = path.join(configDir, VERSIONER_CONFIG_FILENAME);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse ${file}: ${errorMessage(err)}`);
  }

  return { config: validateRepoConfig(raw, file), configDir };
}

/**
 * Merge flags, `versioner.json` and defaults.
 *
 * The project root is `--cwd` (or `process.cwd()`); a configured
 * `notebookRoot` resolves relative to the directory holding versioner.json.
 * Since `--no-backup` is the only backup flag, an explicit `backup: false`
 * from the flags wins and `true` defers to the config file.
 */
export function resolveSettings(overrides: SettingsOverrides = {}): ResolvedSettings {
  const projectRoot = path.resolve(overrides.cwd ?? process.cwd());
  const loaded = loadRepoConfig(projectRoot);
  const config = loaded?.config ?? {};

  const notebookRoot =
    loaded && config.notebookRoot !== undefined
      ? path.resolve(loaded.configDir, config.notebookRoot)
      : projectRoot;

  const backup = overrides.backup === false ? false : config.backup ?? DEFAULT_BACKUP;

  return {
    projectRoot,
    notebookRoot,
    backup,
    strictUpdateYaml: overrides.strict ?? config.strictUpdateYaml ?? DEFAULT_STRICT_UPDATE_YAML,
    configFile: loaded ? path.join(loaded.configDir, VERSIONER_CONFIG_FILENAME) : undefined,
  };
}
