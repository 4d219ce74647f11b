/**
 * Configuration Type Definitions
 *
 * Settings come from two places:
 *
 * 1. Command-line flags
 * 2. Repo config: ./versioner.json (found by walking up from the search root)
 *
 * Resolution order: flags override versioner.json, which overrides the
 * built-in defaults below.
 */

/**
 * Repo-level configuration stored in versioner.json.
 *
 * Example:
 * ```json
 * {
 *   "notebookRoot": "notebooks",
 *   "backup": false,
 *   "strictUpdateYaml": true
 * }
 * ```
 */
export interface RepoVersionerConfig {
  /**
   * Directory to search for notebooks, relative to the directory that
   * contains versioner.json. Defaults to the project root.
   */
  notebookRoot?: string;

  /** Whether YAML updates write a .yml.bak backup first (default: true) */
  backup?: boolean;

  /**
   * When true, `update-yaml` exits 1 if neither databricks.yml nor
   * resources/variables.yml could be found (default: false).
   */
  strictUpdateYaml?: boolean;
}

/**
 * Settings after flags, versioner.json and defaults have been merged.
 */
export interface ResolvedSettings {
  /** Project root: where __version__.py and the bundle YAML files are looked up */
  projectRoot: string;
  /** Where notebook discovery starts */
  notebookRoot: string;
  backup: boolean;
  strictUpdateYaml: boolean;
  /** Absolute path of the versioner.json that was applied, if any */
  configFile?: string;
}

export const DEFAULT_BACKUP = true;

export const DEFAULT_STRICT_UPDATE_YAML = false;
