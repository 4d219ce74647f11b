import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'path';
import { ConfigError } from '../errors';
import { createProjectFixture, type ProjectFixture } from '../test-utils/project-fixture';
import {
  findRepoConfigDir,
  loadRepoConfig,
  resolveSettings,
  validateRepoConfig,
} from './versioner-config-loader';

describe('versioner-config-loader', () => {
  let project: ProjectFixture;

  beforeEach(() => {
    project = createProjectFixture('config-loader-test-');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    project.cleanup();
  });

  describe('findRepoConfigDir', () => {
    it('should walk up to the directory holding versioner.json', () => {
      project.write('versioner.json', '{}');
      project.write('notebooks/etl/.keep', '');

      expect(findRepoConfigDir(path.join(project.root, 'notebooks', 'etl'))).toBe(project.root);
    });
  });

  describe('loadRepoConfig', () => {
    it('should load and validate the config', () => {
      project.write('versioner.json', JSON.stringify({ notebookRoot: 'notebooks', backup: false }));

      expect(loadRepoConfig(project.root)).toEqual({
        config: { notebookRoot: 'notebooks', backup: false },
        configDir: project.root,
      });
    });

    it('should throw ConfigError for invalid JSON', () => {
      project.write('versioner.json', '{ not json');

      expect(() => loadRepoConfig(project.root)).toThrow(ConfigError);
    });
  });

  describe('validateRepoConfig', () => {
    it('should ignore unknown keys', () => {
      expect(validateRepoConfig({ backup: true, extra: 1 }, 'versioner.json')).toEqual({
        backup: true,
      });
    });

    it('should name a mistyped key', () => {
      expect(() => validateRepoConfig({ backup: 'no' }, 'versioner.json')).toThrow(
        'Invalid versioner.json: "backup" must be a boolean'
      );
    });

    it('should reject a non-object', () => {
      expect(() => validateRepoConfig(['notebooks'], 'versioner.json')).toThrow(
        'Invalid versioner.json: expected a JSON object'
      );
    });
  });

  describe('resolveSettings', () => {
    it('should use defaults without a config file', () => {
      expect(resolveSettings({ cwd: project.root })).toEqual({
        projectRoot: project.root,
        notebookRoot: project.root,
        backup: true,
        strictUpdateYaml: false,
        configFile: undefined,
      });
    });

    it('should default the project root to the current directory', () => {
      vi.spyOn(process, 'cwd').mockReturnValue(project.root);

      expect(resolveSettings().projectRoot).toBe(project.root);
    });

    it('should apply versioner.json values', () => {
      project.write(
        'versioner.json',
        JSON.stringify({ notebookRoot: 'notebooks', backup: false, strictUpdateYaml: true })
      );

      expect(resolveSettings({ cwd: project.root, backup: true })).toEqual({
        projectRoot: project.root,
        notebookRoot: path.join(project.root, 'notebooks'),
        backup: false,
        strictUpdateYaml: true,
        configFile: path.join(project.root, 'versioner.json'),
      });
    });

    it('should let flags override versioner.json', () => {
      project.write('versioner.json', JSON.stringify({ backup: true, strictUpdateYaml: true }));

      const settings = resolveSettings({ cwd: project.root, backup: false, strict: false });

      expect(settings.backup).toBe(false);
      expect(settings.strictUpdateYaml).toBe(false);
    });
  });
});
