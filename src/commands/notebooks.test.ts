import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createProjectFixture, type ProjectFixture } from '../test-utils/project-fixture';
import { notebooksCommand } from './notebooks';

// Silence spinners
vi.mock('ora', () => ({
  default: () => ({
    start() {
      return this;
    },
    stop() {},
    fail() {},
    succeed() {},
  }),
}));

describe('notebooksCommand', () => {
  let project: ProjectFixture;
  let originalConsoleLog: typeof console.log;
  let originalConsoleError: typeof console.error;

  beforeEach(() => {
    project = createProjectFixture('notebooks-command-test-');
    originalConsoleLog = console.log;
    originalConsoleError = console.error;
    console.log = vi.fn();
    console.error = vi.fn();
  });

  afterEach(() => {
    console.log = originalConsoleLog;
    console.error = originalConsoleError;
    vi.restoreAllMocks();
    project.cleanup();
  });

  it('should rename notebooks and print a summary', async () => {
    project.write('__version__.py', '__version__ = "0.1.0"\n');
    project.write('notebooks/ingest.ipynb', '{}');

    const code = await notebooksCommand({ cwd: project.root });

    expect(code).toBe(0);
    expect(project.exists('notebooks/ingest_v0.1.0.ipynb')).toBe(true);
    expect(console.log).toHaveBeenCalledWith('  Files processed: 1');
    expect(console.log).toHaveBeenCalledWith('  Files renamed: 1');
    expect(console.log).toHaveBeenCalledWith('  Files skipped: 0');
    expect(console.log).toHaveBeenCalledWith(
      expect.stringContaining('✓ Renamed: ingest.ipynb -> ingest_v0.1.0.ipynb (added version)')
    );
  });

  it('should apply a version override without reading __version__.py', async () => {
    project.write('draft.ipynb', '{}');

    const code = await notebooksCommand({ cwd: project.root, versionOverride: '9.9.9' });

    expect(code).toBe(0);
    expect(project.exists('draft_v9.9.9.ipynb')).toBe(true);
  });

  it('should only search the configured notebook root', async () => {
    project.write('__version__.py', '__version__ = "0.2.0"\n');
    project.write('versioner.json', JSON.stringify({ notebookRoot: 'notebooks' }));
    project.write('notebooks/a.ipynb', '{}');
    project.write('scratch/b.ipynb', '{}');

    const code = await notebooksCommand({ cwd: project.root });

    expect(code).toBe(0);
    expect(project.exists('notebooks/a_v0.2.0.ipynb')).toBe(true);
    expect(project.exists('scratch/b.ipynb')).toBe(true);
  });

  it('should leave files in place in a dry run', async () => {
    project.write('__version__.py', '__version__ = "0.1.0"\n');
    project.write('ingest.ipynb', '{}');

    const code = await notebooksCommand({ cwd: project.root, dryRun: true });

    expect(code).toBe(0);
    expect(project.exists('ingest.ipynb')).toBe(true);
    expect(console.log).toHaveBeenCalledWith(
      expect.stringContaining('Would rename: ingest.ipynb -> ingest_v0.1.0.ipynb')
    );
  });

  it('should report when no notebooks exist', async () => {
    project.write('__version__.py', '__version__ = "0.1.0"\n');

    const code = await notebooksCommand({ cwd: project.root });

    expect(code).toBe(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('No notebooks found.'));
  });

  it('should exit 1 when a rename collides', async () => {
    project.write('a.ipynb', '{}');
    project.write('a_v0.2.0.ipynb', '{}');

    const code = await notebooksCommand({ cwd: project.root, versionOverride: '0.2.0' });

    expect(code).toBe(1);
    expect(console.log).toHaveBeenCalledWith(
      expect.stringContaining('○ Error: Target file already exists: a_v0.2.0.ipynb')
    );
  });

  it('should exit 1 with a hint when the version cannot be found', async () => {
    project.write('a.ipynb', '{}');

    const code = await notebooksCommand({ cwd: project.root });

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Error:'),
      expect.stringContaining('Could not find __version__.py file.')
    );
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Make sure your project has a __version__.py file.')
    );
    expect(project.exists('a.ipynb')).toBe(true);
  });
});
