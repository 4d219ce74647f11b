import chalk from 'chalk';
import ora from 'ora';
import { errorMessage, VersionNotFoundError } from '../errors';
import {
  summarizeNotebookResults,
  versionAllNotebooks,
  type NotebookVersionResult,
} from '../services/notebook-versioner';
import { resolveProjectVersion } from '../services/version-reader';
import { resolveSettings } from '../services/versioner-config-loader';

/**
 * Options for notebooks command.
 */
export interface NotebooksOptions {
  /** Project root (default: current directory) */
  cwd?: string;

  /** Show what would be renamed without renaming anything */
  dryRun?: boolean;

  /** Apply this version instead of the one in __version__.py */
  versionOverride?: string;

  /** Verbose output */
  verbose?: boolean;
}

/**
 * Print the summary block followed by one line per notebook.
 */
export function printNotebookResults(results: NotebookVersionResult[]): void {
  const { processed, renamed, skipped } = summarizeNotebookResults(results);

  console.log('');
  console.log(chalk.white('Versioning complete:'));
  console.log(`  Files processed: ${processed}`);
  console.log(`  Files renamed: ${renamed}`);
  console.log(`  Files skipped: ${skipped}`);
  console.log('');

  for (const result of results) {
    if (result.status === 'renamed') {
      console.log(chalk.green(`✓ ${result.message}`));
    } else if (result.status === 'error') {
      console.log(chalk.red(`○ ${result.message}`));
    } else {
      console.log(chalk.gray(`○ ${result.message}`));
    }
  }
}

/**
 * Rename every notebook under the notebook root to carry the project version.
 *
 * @returns exit code: 1 when the version cannot be resolved or any rename was refused
 */
export async function notebooksCommand(options: NotebooksOptions = {}): Promise<number> {
  const { dryRun = false, verbose = false } = options;

  try {
    const settings = resolveSettings({ cwd: options.cwd });

    console.log(`Searching for notebooks in: ${settings.notebookRoot}`);
    if (dryRun) {
      console.log(chalk.yellow('DRY RUN - no files will be renamed'));
    }

    let targetVersion = options.versionOverride;
    if (targetVersion === undefined) {
      const resolved = resolveProjectVersion(settings.projectRoot);
      targetVersion = resolved.version;
      if (verbose) {
        console.log(chalk.gray(`Version ${resolved.version} from ${resolved.file}`));
      }
    }
    if (verbose && settings.configFile) {
      console.log(chalk.gray(`Config: ${settings.configFile}`));
    }

    const spinner = ora(`Applying version ${targetVersion}...`).start();
    let results: NotebookVersionResult[];
    try {
      results = versionAllNotebooks(settings.notebookRoot, { targetVersion, dryRun });
    } catch (error) {
      spinner.fail('Notebook versioning failed');
      throw error;
    }
    spinner.stop();

    if (results.length === 0) {
      console.log(chalk.yellow('No notebooks found.'));
      return 0;
    }

    printNotebookResults(results);

    return results.some((result) => result.status === 'error') ? 1 : 0;
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    if (error instanceof VersionNotFoundError) {
      console.error('');
      console.error(chalk.gray('Make sure your project has a __version__.py file.'));
    }
    return 1;
  }
}
