import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// Mock the command modules
vi.mock('./commands/notebooks', () => ({
  notebooksCommand: vi.fn(async () => 0),
}));

vi.mock('./commands/update-yaml', () => ({
  updateYamlCommand: vi.fn(async () => 1),
}));

vi.mock('./commands/all', () => ({
  allCommand: vi.fn(async () => 0),
}));

vi.mock('./commands/version', () => ({
  versionCommand: vi.fn(async () => 0),
}));

vi.mock('./commands/table-name', () => ({
  tableNameCommand: vi.fn(async () => 0),
}));

describe('CLI Entry Point', () => {
  let originalArgv: string[];

  beforeEach(() => {
    originalArgv = process.argv;
    vi.resetModules();
    vi.clearAllMocks();
  });

  afterEach(() => {
    process.argv = originalArgv;
    vi.restoreAllMocks();
  });

  it('should show usage and exit 1 when no command provided', async () => {
    process.argv = ['node', 'index.js'];
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await expect(import('./index')).rejects.toThrow('process.exit called');

    expect(process.exit).toHaveBeenCalledWith(1);
    expect(consoleLogSpy).toHaveBeenCalledWith('Usage: versioner <command> [options]');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('notebooks'));
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('update-yaml'));
  });

  it('should pass notebooks options through and exit with the command result', async () => {
    process.argv = ['node', 'index.js', 'notebooks', '--dry-run', '--cwd', '/work/project'];
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as typeof process.exit);

    await import('./index');
    const { notebooksCommand } = await import('./commands/notebooks');

    await vi.waitFor(() => expect(exitSpy).toHaveBeenCalledWith(0));
    expect(notebooksCommand).toHaveBeenCalledWith(
      expect.objectContaining({ dryRun: true, cwd: '/work/project' })
    );
  });

  it('should map --no-backup to backup: false for update-yaml', async () => {
    process.argv = ['node', 'index.js', 'update-yaml', '--no-backup', '--strict'];
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as typeof process.exit);

    await import('./index');
    const { updateYamlCommand } = await import('./commands/update-yaml');

    await vi.waitFor(() => expect(exitSpy).toHaveBeenCalledWith(1));
    expect(updateYamlCommand).toHaveBeenCalledWith(
      expect.objectContaining({ backup: false, strict: true })
    );
  });

  it('should pass the base name and options to table-name', async () => {
    process.argv = [
      'node',
      'index.js',
      'table-name',
      'user_events',
      '--catalog',
      'prod',
      '--schema',
      'analytics',
    ];
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as typeof process.exit);

    await import('./index');
    const { tableNameCommand } = await import('./commands/table-name');

    await vi.waitFor(() => expect(exitSpy).toHaveBeenCalledWith(0));
    expect(tableNameCommand).toHaveBeenCalledWith(
      'user_events',
      expect.objectContaining({ catalog: 'prod', schema: 'analytics', separator: '_' })
    );
  });
});
