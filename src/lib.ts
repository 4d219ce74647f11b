/**
 * Library entry point for use from scripts and notebooks.
 *
 * @example
 * import { formatTableName } from 'nb-versioner';
 * const table = formatTableName('user_events'); // "user_events_v0_1_0"
 */

export { ConfigError, VersionNotFoundError, YamlUpdateError } from './errors';
export {
  DEFAULT_TABLE_SEPARATOR,
  formatFullTablePath,
  formatTableName,
} from './services/table-namer';
export {
  findVersionFile,
  getProjectVersion,
  parseVersionSource,
  resolveProjectVersion,
  VERSION_FILENAME,
  type ResolvedVersion,
} from './services/version-reader';
export {
  createVersionedName,
  parseNotebookName,
  type NotebookName,
} from './services/notebook-name';
export {
  findNotebooks,
  summarizeNotebookResults,
  versionAllNotebooks,
  versionNotebook,
  type NotebookSummary,
  type NotebookVersionResult,
  type VersionNotebooksOptions,
} from './services/notebook-versioner';
export {
  BUNDLE_YAML,
  getBundleVersion,
  getVariablesVersion,
  updateAllYamlFiles,
  updateBundleYaml,
  updateVariablesYaml,
  updateYamlField,
  VARIABLES_YAML,
  type YamlFieldTarget,
  type YamlUpdateOptions,
  type YamlUpdateResult,
} from './services/yaml-updater';
export type { RepoVersionerConfig } from './config/types';
