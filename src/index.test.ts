import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import {
  VERSION,
  DEFAULT_CONFIG,
  TASK_IDS,
  WORKFLOW_STEPS,
  buildTaskPlan,
  detectState,
  formatSplitDirName,
  parseManifestContent,
  setupSession,
} from './index.js';

describe('splitplan', () => {
  describe('VERSION', () => {
    it('should match the package version', async () => {
      const packageJson = await readFile(new URL('../package.json', import.meta.url), 'utf-8');
      const { version }: { version: unknown } = JSON.parse(packageJson);

      expect(VERSION).toBe(version);
    });
  });

  describe('public API', () => {
    it('should export the session operations', () => {
      expect(typeof setupSession).toBe('function');
      expect(typeof detectState).toBe('function');
    });

    it('should expose workflow tables that agree with each other', () => {
      const { tasks } = buildTaskPlan(1, {
        pluginRoot: '/plugin',
        planningDir: '/plan',
        initialFile: '/plan/req.md',
      });

      expect(Object.keys(TASK_IDS)).toEqual(Object.keys(WORKFLOW_STEPS));
      expect(tasks).toHaveLength(11);
    });

    it('should export the collaborators', () => {
      expect(formatSplitDirName(3, 'Data Layer')).toBe('03-data-layer');
      expect(parseManifestContent('<!-- SPLIT_MANIFEST\n01-a\nEND_MANIFEST -->').splits).toEqual([
        '01-a',
      ]);
      expect(DEFAULT_CONFIG.files.manifest).toBe('project-manifest.md');
    });
  });
});
