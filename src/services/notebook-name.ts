/**
 * Parsing and construction of versioned notebook filenames.
 *
 * A versioned notebook is named `<baseName>_v<major>.<minor>.<patch>.ipynb`.
 */

export const NOTEBOOK_EXTENSION = '.ipynb';

/**
 * Trailing `_v<semver>.ipynb` of a versioned notebook filename.
 */
export const VERSIONED_NOTEBOOK_REGEX = /_v(\d+\.\d+\.\d+)\.ipynb$/;

/**
 * A notebook filename split into its base name and optional version.
 */
export interface NotebookName {
  baseName: string;
  version?: string;
}

/**
 * Split a notebook filename into base name and version.
 *
 * @example
 * parseNotebookName('analysis.ipynb')          // { baseName: 'analysis' }
 * parseNotebookName('analysis_v0.1.0.ipynb')   // { baseName: 'analysis', version: '0.1.0' }
 */
export function parseNotebookName(filename: string): NotebookName {
  const match = VERSIONED_NOTEBOOK_REGEX.exec(filename);
  if (match) {
    return { baseName: filename.slice(0, match.index), version: match[1] };
  }

  if (filename.endsWith(NOTEBOOK_EXTENSION)) {
    return { baseName: filename.slice(0, -NOTEBOOK_EXTENSION.length) };
  }

  return { baseName: filename };
}

/**
 * Build a versioned notebook filename. The version is interpolated as-is.
 */
export function createVersionedName(baseName: string, version: string): string {
  return `${baseName}_v${version}${NOTEBOOK_EXTENSION}`;
}
