import * as fs from 'fs';
import * as path from 'path';
import { VersionNotFoundError } from '../errors';

/**
 * Name of the version source file in the target project.
 */
export const VERSION_FILENAME = '__version__.py';

/**
 * The version string together with the file it was read from.
 */
export interface ResolvedVersion {
  version: string;
  file: string;
}

/**
 * Textual fallbacks, tried in order when no top-level string binding is found.
 */
const FALLBACK_PATTERNS: RegExp[] = [
  /__version__\s*=\s*["']([^"']+)["']/,
  /__version__\s*:[^=\n]*=\s*["']([^"']+)["']/,
];

/**
 * Start of a top-level `__version__` binding, with or without an annotation.
 * Anchored at column 0: indented bindings live inside a block.
 */
const BINDING_HEAD = /^__version__[ \t]*(?::[^=\n]+)?=[ \t]*/;

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '0': '\0',
};

/**
 * Build the ordered list of candidate locations for `__version__.py`.
 *
 * 1. `<startDir>/__version__.py`
 * 2. `<startDir>/src/__version__.py`
 * 3. `<startDir>/src/<package>/__version__.py` for every non-hidden
 *    package directory, sorted by name
 * 4. `<startDir>/../__version__.py`
 */
export function versionFileCandidates(startDir: string): string[] {
  const root = path.resolve(startDir);
  const srcDir = path.join(root, 'src');

  const candidates = [
    path.join(root, VERSION_FILENAME),
    path.join(srcDir, VERSION_FILENAME),
  ];

  if (fs.existsSync(srcDir) && fs.statSync(srcDir).isDirectory()) {
    const packages = fs
      .readdirSync(srcDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort();

    for (const pkg of packages) {
      candidates.push(path.join(srcDir, pkg, VERSION_FILENAME));
    }
  }

  candidates.push(path.join(path.dirname(root), VERSION_FILENAME));

  return candidates;
}

/**
 * Locate the project's `__version__.py` file.
 *
 * @throws VersionNotFoundError listing every searched location when none exists
 */
export function findVersionFile(startDir: string = process.cwd()): string {
  const candidates = versionFileCandidates(startDir);

  for (const candidate of candidates) {
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }

  throw new VersionNotFoundError(
    `Could not find ${VERSION_FILENAME} file. Searched locations:\n` +
      candidates.map((candidate) => `  - ${candidate}`).join('\n')
  );
}

/**
 * Read a quoted string literal starting at `start`.
 *
 * Handles an optional `r`/`u` prefix plus single, double and triple quotes.
 * Returns the decoded value and the offset just past the closing quote, or
 * null when no complete literal starts there.
 */
function readStringLiteral(
  source: string,
  start: number
): { value: string; end: number } | null {
  let pos = start;
  let raw = false;

  const prefix = source[pos];
  if (prefix === 'r' || prefix === 'R') {
    raw = true;
    pos++;
  } else if (prefix === 'u' || prefix === 'U') {
    pos++;
  }

  const quoteChar = source[pos];
  if (quoteChar !== '"' && quoteChar !== "'") {
    return null;
  }

  const triple = source.startsWith(quoteChar.repeat(3), pos);
  const quote = triple ? quoteChar.repeat(3) : quoteChar;
  pos += quote.length;

  let value = '';
  while (pos < source.length) {
    if (source.startsWith(quote, pos)) {
      return { value, end: pos + quote.length };
    }

    const ch = source[pos];
    if (ch === '\n' && !triple) {
      return null;
    }

    if (ch === '\\' && pos + 1 < source.length) {
      const next = source[pos + 1];
      value += raw ? ch + next : ESCAPES[next] ?? next;
      pos += 2;
      continue;
    }

    value += ch;
    pos++;
  }

  return null;
}

/**
 * Triple-quoted string still open at the end of `line`, given the one open
 * at its start. Comments and single-line literals are stepped over.
 */
function openTripleQuoteAfter(line: string, open: string | null): string | null {
  let current = open;
  let pos = 0;

  while (pos < line.length) {
    if (current !== null) {
      if (line[pos] === '\\') {
        pos += 2;
      } else if (line.startsWith(current, pos)) {
        pos += current.length;
        current = null;
      } else {
        pos++;
      }
      continue;
    }

    const ch = line[pos];
    if (ch === '#') {
      break;
    }
    if (ch !== '"' && ch !== "'") {
      pos++;
      continue;
    }

    if (line.startsWith(ch.repeat(3), pos)) {
      current = ch.repeat(3);
      pos += 3;
      continue;
    }

    pos++;
    while (pos < line.length && line[pos] !== ch) {
      pos += line[pos] === '\\' ? 2 : 1;
    }
    pos++;
  }

  return current;
}

/**
 * Scan top-level statements for `__version__ = "<literal>"`.
 *
 * Only a binding whose entire right-hand side is one string literal counts;
 * `__version__ = get_version()` or a concatenation is skipped. Lines inside
 * a triple-quoted string (a docstring, say) are not statements.
 */
function findTopLevelBinding(source: string): string | null {
  let offset = 0;
  let openQuote: string | null = null;

  for (const line of source.split('\n')) {
    const head = openQuote === null ? BINDING_HEAD.exec(line) : null;

    if (head) {
      const literal = readStringLiteral(source, offset + head[0].length);

      if (literal) {
        const lineEnd = source.indexOf('\n', literal.end);
        const trailing = source.slice(literal.end, lineEnd === -1 ? undefined : lineEnd);

        if (/^\s*(#.*)?$/.test(trailing)) {
          return literal.value;
        }
      }
    }

    openQuote = openTripleQuoteAfter(line, openQuote);
    offset += line.length + 1;
  }

  return null;
}

/**
 * Extract the `__version__` string from the contents of a version file.
 *
 * Supports:
 * - `__version__ = "x.y.z"` / `__version__ = 'x.y.z'`
 * - `__version__: <annotation> = "x.y.z"`
 *
 * @param filePath  Used in the error message only
 * @throws VersionNotFoundError when no assignment can be found
 */
export function parseVersionSource(content: string, filePath: string): string {
  const source = content.replace(/\r\n/g, '\n');

  const structured = findTopLevelBinding(source);
  if (structured !== null) {
    return structured;
  }

  for (const pattern of FALLBACK_PATTERNS) {
    const match = pattern.exec(source);
    if (match) {
      return match[1];
    }
  }

  throw new VersionNotFoundError(
    `Could not parse version from ${filePath}. Expected format: __version__ = "x.y.z"`
  );
}

/**
 * Read and parse a `__version__.py` file.
 */
export function parseVersionFile(versionFile: string): string {
  return parseVersionSource(fs.readFileSync(versionFile, 'utf-8'), versionFile);
}

/**
 * Resolve the project version and report which file it came from.
 */
export function resolveProjectVersion(startDir: string = process.cwd()): ResolvedVersion {
  const file = findVersionFile(startDir);
  return { version: parseVersionFile(file), file };
}

/**
 * Get the current project version from `__version__.py`.
 *
 * Recomputed on every call; nothing is cached between calls.
 *
 * @param startDir  Directory to begin the search (default: `process.cwd()`)
 * @throws VersionNotFoundError when the file cannot be found or parsed
 */
export function getProjectVersion(startDir: string = process.cwd()): string {
  return resolveProjectVersion(startDir).version;
}
