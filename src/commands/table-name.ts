import chalk from 'chalk';
import * as path from 'path';
import { errorMessage } from '../errors';
import { formatFullTablePath, formatTableName } from '../services/table-namer';
import { getProjectVersion } from '../services/version-reader';

export interface TableNameOptions {
  cwd?: string;
  catalog?: string;
  schema?: string;
  separator?: string;
  versionOverride?: string;
}

/**
 * Print the versioned name of a table, or its full `catalog.schema.table`
 * path when both --catalog and --schema are given.
 */
export async function tableNameCommand(
  baseName: string,
  options: TableNameOptions = {}
): Promise<number> {
  const { catalog, schema, separator } = options;

  if ((catalog === undefined) !== (schema === undefined)) {
    console.error(chalk.red('Error: --catalog and --schema must be given together'));
    return 1;
  }

  try {
    const version =
      options.versionOverride ?? getProjectVersion(path.resolve(options.cwd ?? process.cwd()));

    const name =
      catalog !== undefined && schema !== undefined
        ? formatFullTablePath(baseName, catalog, schema, separator, version)
        : formatTableName(baseName, separator, version);

    console.log(name);
    return 0;
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    return 1;
  }
}
