import * as fs from 'fs';
import * as path from 'path';
import { Document, isCollection, isMap, isScalar, parseDocument, visit, YAMLMap } from 'yaml';
import { errorMessage, YamlUpdateError } from '../errors';
import { atomicWriteFileSync } from './atomic-write';
import { getProjectVersion } from './version-reader';

/**
 * A version field inside one of the bundle's YAML documents.
 */
export interface YamlFieldTarget {
  /** Document location relative to the project root */
  relativePath: string;
  /** Nested mapping keys leading to the version value */
  fieldPath: string[];
  /** How the field is named in messages */
  fieldLabel: string;
}

/**
 * `databricks.yml`: top-level `version`.
 */
export const BUNDLE_YAML: YamlFieldTarget = {
  relativePath: 'databricks.yml',
  fieldPath: ['version'],
  fieldLabel: 'version',
};

/**
 * `resources/variables.yml`: `variables.pkg_version.default`.
 */
export const VARIABLES_YAML: YamlFieldTarget = {
  relativePath: path.join('resources', 'variables.yml'),
  fieldPath: ['variables', 'pkg_version', 'default'],
  fieldLabel: 'pkg_version.default',
};

/**
 * Outcome of updating one document.
 *
 * - `updated`   the field was (or, in a dry run, would be) rewritten
 * - `unchanged` the field already holds the target version
 * - `skipped`   the document does not exist (batch updates only)
 */
export type YamlResultStatus = 'updated' | 'unchanged' | 'skipped';

export interface YamlUpdateResult {
  status: YamlResultStatus;
  /** True only for `updated` */
  changed: boolean;
  /** Document path, relative to the project root */
  file: string;
  message: string;
}

export interface YamlUpdateOptions {
  /** Explicit document path. Located under `rootDir` when omitted. */
  yamlPath?: string;
  /** Project root used to locate the document (default: `process.cwd()`) */
  rootDir?: string;
  /** Version to write. Resolved from `__version__.py` when omitted. */
  targetVersion?: string;
  /** Copy the document to `<name>.yml.bak` before writing (default: true) */
  createBackup?: boolean;
  /** Report what would change without writing anything */
  dryRun?: boolean;
}

/**
 * Locate a target document under the project root.
 *
 * @throws YamlUpdateError naming the expected location when the file is missing
 */
export function findYamlFile(target: YamlFieldTarget, rootDir: string = process.cwd()): string {
  const yamlPath = path.join(rootDir, target.relativePath);

  if (!fs.existsSync(yamlPath)) {
    throw new YamlUpdateError(
      `Could not find ${target.relativePath} in ${rootDir}\nExpected location: ${target.relativePath}`
    );
  }

  return yamlPath;
}

export function findBundleYaml(rootDir?: string): string {
  return findYamlFile(BUNDLE_YAML, rootDir);
}

export function findVariablesYaml(rootDir?: string): string {
  return findYamlFile(VARIABLES_YAML, rootDir);
}

/**
 * Project root implied by a document's location: the directory that holds
 * `relativePath`. For `resources/variables.yml` that is two levels up from
 * the file itself.
 */
export function projectRootFor(target: YamlFieldTarget, yamlPath: string): string {
  const depth = target.relativePath.split(path.sep).length;
  let root = path.resolve(yamlPath);
  for (let i = 0; i < depth; i++) {
    root = path.dirname(root);
  }
  return root;
}

/**
 * Sibling backup path: the final extension is replaced with `.yml.bak`.
 */
export function backupPathFor(yamlPath: string): string {
  const base = path.basename(yamlPath, path.extname(yamlPath));
  return path.join(path.dirname(yamlPath), `${base}.yml.bak`);
}

/**
 * Copy a document to its backup path, overwriting any previous backup.
 */
export function createBackup(yamlPath: string): string {
  const backupPath = backupPathFor(yamlPath);
  fs.copyFileSync(yamlPath, backupPath);
  return backupPath;
}

function loadDocument(yamlPath: string): Document {
  let content: string;
  try {
    content = fs.readFileSync(yamlPath, 'utf-8');
  } catch (err) {
    throw new YamlUpdateError(`Failed to read YAML file ${yamlPath}: ${errorMessage(err)}`, err);
  }

  const doc = parseDocument(content);
  if (doc.errors.length > 0) {
    throw new YamlUpdateError(
      `Failed to parse YAML file ${yamlPath}: ${doc.errors[0].message}`,
      doc.errors[0]
    );
  }

  // An empty file parses to null contents and is treated as an empty mapping
  if (doc.contents !== null && !isMap(doc.contents)) {
    throw new YamlUpdateError(`Failed to parse YAML file ${yamlPath}: top level is not a mapping`);
  }

  return doc;
}

/**
 * Value at `fieldPath`, or undefined when any level is missing or null.
 */
function readField(doc: Document, fieldPath: string[]): string | undefined {
  const value = doc.getIn(fieldPath);

  if (value === undefined || value === null) {
    return undefined;
  }
  if (isCollection(value)) {
    return JSON.stringify(value.toJSON());
  }
  return String(value);
}

/**
 * Set `fieldPath` to `value`, creating missing (or null) intermediate mappings.
 */
function writeField(doc: Document, fieldPath: string[], value: string, yamlPath: string): void {
  for (let depth = 1; depth < fieldPath.length; depth++) {
    const prefix = fieldPath.slice(0, depth);
    const node = doc.getIn(prefix, true);

    if (isMap(node)) {
      continue;
    }
    if (node === undefined || node === null || (isScalar(node) && node.value === null)) {
      doc.setIn(prefix, new YAMLMap(doc.schema));
      continue;
    }

    throw new YamlUpdateError(
      `Failed to update YAML file ${yamlPath}: ${prefix.join('.')} is not a mapping`
    );
  }

  doc.setIn(fieldPath, value);
}

function serializeDocument(doc: Document): string {
  visit(doc, {
    Collection(_, node) {
      node.flow = false;
    },
  });
  return doc.toString({ lineWidth: 0 });
}

/**
 * Read the current version stored in a target document.
 *
 * @returns the value, or undefined when the field (or a parent level) is absent
 * @throws YamlUpdateError when the document is missing or unparsable
 */
export function readYamlVersion(
  target: YamlFieldTarget,
  yamlPath?: string,
  rootDir?: string
): string | undefined {
  const resolvedPath = yamlPath ?? findYamlFile(target, rootDir);
  return readField(loadDocument(resolvedPath), target.fieldPath);
}

export function getBundleVersion(yamlPath?: string, rootDir?: string): string | undefined {
  return readYamlVersion(BUNDLE_YAML, yamlPath, rootDir);
}

export function getVariablesVersion(yamlPath?: string, rootDir?: string): string | undefined {
  return readYamlVersion(VARIABLES_YAML, yamlPath, rootDir);
}

/**
 * Bring the version field of one document in line with the project version.
 *
 * Writes nothing when the stored value already equals the target.
 *
 * @throws YamlUpdateError when the document is missing, unparsable or unwritable
 * @throws VersionNotFoundError when no target is given and none can be resolved
 */
export function updateYamlField(
  target: YamlFieldTarget,
  options: YamlUpdateOptions = {}
): YamlUpdateResult {
  const { createBackup: backup = true, dryRun = false } = options;

  const yamlPath = options.yamlPath ?? findYamlFile(target, options.rootDir);
  const projectRoot = projectRootFor(target, yamlPath);
  const targetVersion = options.targetVersion ?? getProjectVersion(projectRoot);
  const file = path.relative(projectRoot, path.resolve(yamlPath));

  const doc = loadDocument(yamlPath);
  const currentVersion = readField(doc, target.fieldPath);

  if (currentVersion === targetVersion) {
    return {
      status: 'unchanged',
      changed: false,
      file,
      message: `Already at version ${targetVersion}: ${file}`,
    };
  }

  writeField(doc, target.fieldPath, targetVersion, yamlPath);

  const action = dryRun ? 'Would update' : 'Updated';
  let message = `${action} ${target.fieldLabel} in ${file}: ${currentVersion || '(no version)'} -> ${targetVersion}`;

  if (!dryRun) {
    if (backup) {
      message += ` (backup: ${path.basename(createBackup(yamlPath))})`;
    }

    try {
      atomicWriteFileSync(yamlPath, serializeDocument(doc));
    } catch (err) {
      throw new YamlUpdateError(`Failed to write YAML file ${yamlPath}: ${errorMessage(err)}`, err);
    }
  }

  return { status: 'updated', changed: true, file, message };
}

export function updateBundleYaml(options?: YamlUpdateOptions): YamlUpdateResult {
  return updateYamlField(BUNDLE_YAML, options);
}

export function updateVariablesYaml(options?: YamlUpdateOptions): YamlUpdateResult {
  return updateYamlField(VARIABLES_YAML, options);
}

/**
 * Update `databricks.yml` and `resources/variables.yml` independently.
 *
 * A document that does not exist becomes a `skipped` result and the other
 * document is still processed. A document that exists but cannot be parsed,
 * updated or written raises, as do version resolution failures.
 */
export function updateAllYamlFiles(
  rootDir: string = process.cwd(),
  options: Omit<YamlUpdateOptions, 'yamlPath' | 'rootDir'> = {}
): YamlUpdateResult[] {
  return [BUNDLE_YAML, VARIABLES_YAML].map((target): YamlUpdateResult => {
    let yamlPath: string;
    try {
      yamlPath = findYamlFile(target, rootDir);
    } catch (err) {
      if (!(err instanceof YamlUpdateError)) {
        throw err;
      }
      return {
        status: 'skipped',
        changed: false,
        file: target.relativePath,
        message: `Skipped ${target.relativePath}: ${err.message}`,
      };
    }

    return updateYamlField(target, { ...options, yamlPath });
  });
}
