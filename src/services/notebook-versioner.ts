import * as fs from 'fs';
import * as path from 'path';
import { createVersionedName, NOTEBOOK_EXTENSION, parseNotebookName } from './notebook-name';
import { getProjectVersion } from './version-reader';

/**
 * Outcome of versioning a single notebook.
 *
 * - `renamed`   the file was (or, in a dry run, would be) renamed
 * - `unchanged` the filename already carries the target version
 * - `error`     the rename was refused; see `message`
 */
export type NotebookResultStatus = 'renamed' | 'unchanged' | 'error';

export interface NotebookVersionResult {
  status: NotebookResultStatus;
  /** True only for `renamed` */
  changed: boolean;
  sourcePath: string;
  /** Set when `changed` is true */
  newPath?: string;
  message: string;
}

export interface VersionNotebooksOptions {
  /** Version to apply. Resolved from `__version__.py` under the root when omitted. */
  targetVersion?: string;
  /** Report what would change without renaming anything */
  dryRun?: boolean;
}

/**
 * Aggregate counts over a batch of notebook results.
 */
export interface NotebookSummary {
  processed: number;
  renamed: number;
  skipped: number;
}

/**
 * Recursively find every `*.ipynb` file under `rootDir`.
 *
 * Entries are visited in sorted order so runs are reproducible.
 */
export function findNotebooks(rootDir: string = process.cwd()): string[] {
  const notebooks: string[] = [];

  if (!fs.existsSync(rootDir)) {
    return notebooks;
  }

  function walk(currentDir: string) {
    const entries = fs
      .readdirSync(currentDir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(currentDir, entry.name);

      if (entry.isDirectory()) {
        walk(fullPath);
      } else if (entry.isFile() && entry.name.endsWith(NOTEBOOK_EXTENSION)) {
        notebooks.push(fullPath);
      }
    }
  }

  walk(rootDir);

  return notebooks;
}

/**
 * Rename one notebook so its filename carries `targetVersion`.
 *
 * Never throws for a naming collision: the collision is reported as an
 * `error` result and the file is left alone.
 */
export function versionNotebook(
  notebookPath: string,
  targetVersion: string,
  dryRun = false
): NotebookVersionResult {
  const filename = path.basename(notebookPath);
  const { baseName, version: currentVersion } = parseNotebookName(filename);

  if (currentVersion === targetVersion) {
    return {
      status: 'unchanged',
      changed: false,
      sourcePath: notebookPath,
      message: `Already at version ${targetVersion}: ${filename}`,
    };
  }

  const newName = createVersionedName(baseName, targetVersion);
  const newPath = path.join(path.dirname(notebookPath), newName);

  if (fs.existsSync(newPath) && newPath !== notebookPath) {
    return {
      status: 'error',
      changed: false,
      sourcePath: notebookPath,
      message: `Error: Target file already exists: ${newName}`,
    };
  }

  const action = dryRun ? 'Would rename' : 'Renamed';
  const message = currentVersion
    ? `${action}: ${filename} -> ${newName} (from v${currentVersion})`
    : `${action}: ${filename} -> ${newName} (added version)`;

  if (!dryRun && newPath !== notebookPath) {
    fs.renameSync(notebookPath, newPath);
  }

  return { status: 'renamed', changed: true, sourcePath: notebookPath, newPath, message };
}

/**
 * Version every notebook under `rootDir`.
 *
 * A failure to resolve the project version propagates; per-file problems
 * are returned in that file's result and never stop the batch.
 *
 * @throws VersionNotFoundError when no target version is given and none can be resolved
 */
export function versionAllNotebooks(
  rootDir: string = process.cwd(),
  options: VersionNotebooksOptions = {}
): NotebookVersionResult[] {
  const { dryRun = false } = options;
  const targetVersion = options.targetVersion ?? getProjectVersion(rootDir);

  return findNotebooks(rootDir).map((notebook) =>
    versionNotebook(notebook, targetVersion, dryRun)
  );
}

/**
 * Count processed, renamed and skipped notebooks. Anything not renamed is skipped.
 */
export function summarizeNotebookResults(results: NotebookVersionResult[]): NotebookSummary {
  const renamed = results.filter((result) => result.changed).length;
  return {
    processed: results.length,
    renamed,
    skipped: results.length - renamed,
  };
}
