import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { mkdir, mkdtemp, rm, symlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { isValidSplitDir } from '../session/detector.js';
import {
  MAX_NAME_LENGTH,
  NamingError,
  formatSplitDirName,
  generateUniqueName,
  getNextIndex,
  toKebabCase,
} from './naming.js';

describe('toKebabCase', () => {
  it('should lowercase and hyphenate separators', () => {
    expect(toKebabCase('API Gateway')).toBe('api-gateway');
    expect(toKebabCase('user_service')).toBe('user-service');
  });

  it('should strip other characters and collapse hyphens', () => {
    expect(toKebabCase('  API Gateway_v2!! ')).toBe('api-gateway-v2');
    expect(toKebabCase('a -- b')).toBe('a-b');
    expect(toKebabCase('Café & Bar')).toBe('caf-bar');
  });

  it('should truncate and trim a trailing hyphen', () => {
    const long = `${'a'.repeat(49)} bbbb`;
    expect(toKebabCase(long)).toBe('a'.repeat(49));
  });

  it('should return an empty string when nothing survives', () => {
    expect(toKebabCase('!!!')).toBe('');
  });

  it('should always produce kebab-case within the length limit (property-based)', () => {
    fc.assert(
      fc.property(fc.string(), (input) => {
        const result = toKebabCase(input);
        return result === '' || (result.length <= MAX_NAME_LENGTH && /^[a-z0-9]+(?:-[a-z0-9]+)*$/.test(result));
      })
    );
  });
});

describe('formatSplitDirName', () => {
  it('should prefix a two-digit index', () => {
    expect(formatSplitDirName(1, 'Backend')).toBe('01-backend');
    expect(formatSplitDirName(42, 'API Gateway')).toBe('42-api-gateway');
  });

  it('should reject indices outside 1..99', () => {
    expect(() => formatSplitDirName(0, 'x')).toThrow(NamingError);
    expect(() => formatSplitDirName(100, 'x')).toThrow('Split index must be 1-99, got 100');
  });

  it('should reject names that sanitize to nothing', () => {
    expect(() => formatSplitDirName(1, '???')).toThrow("Name '???' is empty after sanitization");
  });

  it('should always produce a valid split directory name (property-based)', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 99 }),
        fc.string().filter((s) => toKebabCase(s) !== ''),
        (index, name) => isValidSplitDir(formatSplitDirName(index, name))
      )
    );
  });
});

describe('directory-aware naming', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'naming-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('getNextIndex', () => {
    it('should return 1 for an empty directory', async () => {
      expect(await getNextIndex(dir)).toBe(1);
    });

    it('should continue after the highest index without filling gaps', async () => {
      await mkdir(join(dir, '01-first'));
      await mkdir(join(dir, '03-third'));

      expect(await getNextIndex(dir)).toBe(4);
    });

    it('should ignore files and malformed directories', async () => {
      await mkdir(join(dir, '01-first'));
      await mkdir(join(dir, '9-bad'));
      await writeFile(join(dir, '07-file'), 'x');

      expect(await getNextIndex(dir)).toBe(2);
    });

    it('should count a symlinked split directory', async () => {
      await mkdir(join(dir, 'elsewhere'));
      await symlink(join(dir, 'elsewhere'), join(dir, '05-linked'));

      expect(await getNextIndex(dir)).toBe(6);
    });
  });

  describe('generateUniqueName', () => {
    it('should return the base name when free', async () => {
      expect(await generateUniqueName(dir, 1, 'Backend')).toBe('01-backend');
    });

    it('should take the first free suffix', async () => {
      await mkdir(join(dir, '01-backend'));
      await mkdir(join(dir, '01-backend-2'));

      expect(await generateUniqueName(dir, 1, 'Backend')).toBe('01-backend-3');
    });

    it('should fail once every suffix is taken', async () => {
      await mkdir(join(dir, '01-x'));
      for (let suffix = 2; suffix <= 99; suffix++) {
        await mkdir(join(dir, `01-x-${String(suffix)}`));
      }

      await expect(generateUniqueName(dir, 1, 'x')).rejects.toMatchObject({
        name: 'NamingError',
        errorType: 'exhausted',
      });
    });
  });
});
