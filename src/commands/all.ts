import chalk from 'chalk';
import { notebooksCommand } from './notebooks';
import { updateYamlCommand, type UpdateYamlOptions } from './update-yaml';

export interface AllOptions extends UpdateYamlOptions {
  verbose?: boolean;
}

/**
 * Version notebooks, then update the bundle YAML files.
 *
 * Both steps always run; the exit code is the worse of the two.
 */
export async function allCommand(options: AllOptions = {}): Promise<number> {
  console.log(chalk.cyan('=== Versioning Notebooks ==='));
  const notebooksResult = await notebooksCommand(options);

  console.log('');
  console.log(chalk.cyan('=== Updating Databricks YAML ==='));
  const yamlResult = await updateYamlCommand(options);

  return Math.max(notebooksResult, yamlResult);
}
