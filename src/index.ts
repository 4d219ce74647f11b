#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { allCommand, type AllOptions } from './commands/all';
import { notebooksCommand, type NotebooksOptions } from './commands/notebooks';
import { tableNameCommand, type TableNameOptions } from './commands/table-name';
import { updateYamlCommand, type UpdateYamlOptions } from './commands/update-yaml';
import { versionCommand, type VersionOptions } from './commands/version';
import { errorMessage } from './errors';
import { getCliVersion } from './services/package-info';

const program = new Command();

program
  .name('versioner')
  .description('Version management tool for notebooks and Databricks assets')
  .version(getCliVersion());

program
  .command('notebooks')
  .description('Version all Jupyter notebooks in the project')
  .option('--dry-run', 'Show what would be changed without modifying files')
  .option('--version-override <version>', 'Apply this version instead of the one in __version__.py')
  .option('--cwd <dir>', 'Project root (default: current directory)')
  .option('--verbose', 'Show where the version and config were read from')
  .action(async (options: NotebooksOptions) => process.exit(await notebooksCommand(options)));

program
  .command('update-yaml')
  .description('Update version in databricks.yml and resources/variables.yml')
  .option('--dry-run', 'Show what would be changed without modifying files')
  .option('--no-backup', 'Do not create backup files')
  .option('--strict', 'Fail when neither YAML file is found')
  .option('--version-override <version>', 'Write this version instead of the one in __version__.py')
  .option('--cwd <dir>', 'Project root (default: current directory)')
  .action(async (options: UpdateYamlOptions) => process.exit(await updateYamlCommand(options)));

program
  .command('all')
  .description('Run all versioning operations (notebooks + YAML)')
  .option('--dry-run', 'Show what would be changed without modifying files')
  .option('--no-backup', 'Do not create backup files')
  .option('--strict', 'Fail when neither YAML file is found')
  .option('--version-override <version>', 'Apply this version instead of the one in __version__.py')
  .option('--cwd <dir>', 'Project root (default: current directory)')
  .option('--verbose', 'Show where the version and config were read from')
  .action(async (options: AllOptions) => process.exit(await allCommand(options)));

program
  .command('version')
  .description('Show version information')
  .option('--cwd <dir>', 'Project root (default: current directory)')
  .action(async (options: VersionOptions) => process.exit(await versionCommand(options)));

program
  .command('table-name')
  .description('Print the versioned name of a Delta table')
  .argument('<baseName>', 'Base table name (e.g., user_events)')
  .option('--catalog <catalog>', 'Catalog name (requires --schema)')
  .option('--schema <schema>', 'Schema name (requires --catalog)')
  .option('--separator <separator>', 'Separator between name and version', '_')
  .option('--version-override <version>', 'Use this version instead of the one in __version__.py')
  .option('--cwd <dir>', 'Project root (default: current directory)')
  .action(async (baseName: string, options: TableNameOptions) => process.exit(await tableNameCommand(baseName, options)));

// Show usage if no command provided
if (process.argv.length <= 2) {
  console.log(chalk.blue(`Versioner v${getCliVersion()}`));
  console.log('Usage: versioner <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  notebooks    - Version all Jupyter notebooks');
  console.log('  update-yaml  - Update version in databricks.yml and resources/variables.yml');
  console.log('  all          - Version notebooks and update YAML files');
  console.log('  version      - Show version information');
  console.log('  table-name   - Print the versioned name of a Delta table');
  console.log('');
  console.log('Use \'versioner <command> --help\' for more information');
  process.exit(1);
}

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Error:'), errorMessage(error));
  process.exit(1);
});
