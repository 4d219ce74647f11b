import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * A throwaway project directory for filesystem tests.
 *
 * The project lives one level below a fresh temp directory so that the
 * parent-directory lookup for __version__.py never escapes into os.tmpdir().
 */
export interface ProjectFixture {
  /** Temp directory that holds the project */
  tmpDir: string;
  /** Project root */
  root: string;
  /** Write a file relative to the project root, creating parent directories */
  write(relativePath: string, content: string): string;
  /** Read a file relative to the project root */
  read(relativePath: string): string;
  /** Whether a file exists relative to the project root */
  exists(relativePath: string): boolean;
  /** Remove everything */
  cleanup(): void;
}

export function createProjectFixture(prefix = 'versioner-test-'): ProjectFixture {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  const root = path.join(tmpDir, 'project');
  fs.mkdirSync(root);

  return {
    tmpDir,
    root,
    write(relativePath, content) {
      const filePath = path.join(root, relativePath);
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, content);
      return filePath;
    },
    read(relativePath) {
      return fs.readFileSync(path.join(root, relativePath), 'utf-8');
    },
    exists(relativePath) {
      return fs.existsSync(path.join(root, relativePath));
    },
    cleanup() {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    },
  };
}
