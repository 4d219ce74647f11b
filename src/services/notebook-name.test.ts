import { describe, it, expect } from 'vitest';
import { createVersionedName, parseNotebookName } from './notebook-name';

describe('notebook-name', () => {
  describe('parseNotebookName', () => {
    it('should return the base name for an unversioned notebook', () => {
      expect(parseNotebookName('analysis.ipynb')).toEqual({ baseName: 'analysis' });
    });

    it('should split a versioned notebook into base name and version', () => {
      expect(parseNotebookName('analysis_v0.1.0.ipynb')).toEqual({
        baseName: 'analysis',
        version: '0.1.0',
      });
    });

    it('should keep underscores in the base name', () => {
      expect(parseNotebookName('my_notebook_v1.2.3.ipynb')).toEqual({
        baseName: 'my_notebook',
        version: '1.2.3',
      });
    });

    it('should only match the trailing version', () => {
      expect(parseNotebookName('etl_v1.0.0_backfill_v2.10.3.ipynb')).toEqual({
        baseName: 'etl_v1.0.0_backfill',
        version: '2.10.3',
      });
    });

    it('should treat a partial version as part of the base name', () => {
      expect(parseNotebookName('report_v1.2.ipynb')).toEqual({ baseName: 'report_v1.2' });
    });

    it('should return non-notebook filenames unchanged', () => {
      expect(parseNotebookName('README.md')).toEqual({ baseName: 'README.md' });
    });
  });

  describe('createVersionedName', () => {
    it('should append the version and extension', () => {
      expect(createVersionedName('my_notebook', '0.1.0')).toBe('my_notebook_v0.1.0.ipynb');
    });

    it('should interpolate any version text verbatim', () => {
      expect(createVersionedName('draft', 'next')).toBe('draft_vnext.ipynb');
    });

    it('should round-trip through parseNotebookName', () => {
      for (const [baseName, version] of [
        ['ingest', '0.0.1'],
        ['feature_store_v1', '10.20.30'],
      ]) {
        expect(parseNotebookName(createVersionedName(baseName, version))).toEqual({
          baseName,
          version,
        });
      }
    });
  });
});
