import chalk from 'chalk';
import * as path from 'path';
import { VersionNotFoundError, YamlUpdateError } from '../errors';
import { getCliVersion } from '../services/package-info';
import { getProjectVersion } from '../services/version-reader';
import {
  BUNDLE_YAML,
  findYamlFile,
  readYamlVersion,
  VARIABLES_YAML,
  type YamlFieldTarget,
} from '../services/yaml-updater';

export interface VersionOptions {
  cwd?: string;
}

function describeYamlVersion(target: YamlFieldTarget, projectRoot: string): string {
  let yamlPath: string;
  try {
    yamlPath = findYamlFile(target, projectRoot);
  } catch (error) {
    if (error instanceof YamlUpdateError) {
      return chalk.gray('(not found)');
    }
    throw error;
  }

  try {
    return readYamlVersion(target, yamlPath) ?? '(no version)';
  } catch (error) {
    if (error instanceof YamlUpdateError) {
      return chalk.red(`(unreadable: ${error.message})`);
    }
    throw error;
  }
}

/**
 * Show the CLI version, the project version and the versions stored in the
 * bundle YAML files. Always succeeds.
 */
export async function versionCommand(options: VersionOptions = {}): Promise<number> {
  const projectRoot = path.resolve(options.cwd ?? process.cwd());

  console.log(`versioner version ${getCliVersion()}`);

  try {
    console.log(`Project version: ${chalk.green(getProjectVersion(projectRoot))}`);
  } catch (error) {
    if (!(error instanceof VersionNotFoundError)) {
      throw error;
    }
    console.log(`Project version: ${chalk.gray('(not found)')}`);
  }

  console.log(`${BUNDLE_YAML.relativePath} ${BUNDLE_YAML.fieldLabel}: ${describeYamlVersion(BUNDLE_YAML, projectRoot)}`);
  console.log(
    `${VARIABLES_YAML.relativePath} ${VARIABLES_YAML.fieldLabel}: ${describeYamlVersion(VARIABLES_YAML, projectRoot)}`
  );

  return 0;
}
