import { readFileSync } from 'fs';
import { join } from 'path';

/**
 * Version of this CLI, read from its package.json (src/ and dist/ both sit
 * one level below the package root).
 */
export function getCliVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}
