import chalk from 'chalk';
import { errorMessage } from '../errors';
import { updateAllYamlFiles, type YamlUpdateResult } from '../services/yaml-updater';
import { resolveSettings } from '../services/versioner-config-loader';

/**
 * Options for update-yaml command.
 */
export interface UpdateYamlOptions {
  /** Project root (default: current directory) */
  cwd?: string;

  /** Show what would change without writing */
  dryRun?: boolean;

  /** false when --no-backup is given */
  backup?: boolean;

  /** Exit 1 when neither YAML file is found */
  strict?: boolean;

  /** Write this version instead of the one in __version__.py */
  versionOverride?: string;
}

function printYamlResult(result: YamlUpdateResult): void {
  switch (result.status) {
    case 'updated':
      console.log(chalk.green(result.message));
      break;
    case 'skipped':
      console.log(chalk.yellow(result.message));
      break;
    default:
      console.log(chalk.gray(result.message));
  }
}

/**
 * Set the version in databricks.yml and resources/variables.yml.
 *
 * A missing document is reported and skipped. Under strict mode, finding
 * neither document is a failure.
 */
export async function updateYamlCommand(options: UpdateYamlOptions = {}): Promise<number> {
  const { dryRun = false } = options;

  try {
    const settings = resolveSettings({
      cwd: options.cwd,
      backup: options.backup,
      strict: options.strict,
    });

    if (dryRun) {
      console.log(chalk.yellow('DRY RUN - no files will be modified'));
    }

    const results = updateAllYamlFiles(settings.projectRoot, {
      targetVersion: options.versionOverride,
      createBackup: settings.backup,
      dryRun,
    });

    results.forEach(printYamlResult);

    if (settings.strictUpdateYaml && results.every((result) => result.status === 'skipped')) {
      console.error(chalk.red('No YAML files found to update.'));
      return 1;
    }

    return 0;
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    return 1;
  }
}
