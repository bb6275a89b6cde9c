/**
 * Version command handler for the splitplan CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import type { CliCommandResult, CliIO } from '../types.js';
import { writeJson } from '../utils/errorHandling.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if the manifest has none.
 */
export function getVersionFromPackageJson(): string {
  const packageJsonPath = join(__dirname, '../../../package.json');
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof packageJson !== 'object' || packageJson === null) {
    return '(unknown)';
  }
  const version: unknown = Reflect.get(packageJson, 'version');
  return typeof version === 'string' ? version : '(unknown)';
}

/**
 * Handles the version command.
 */
export function handleVersionCommand(io: CliIO): CliCommandResult {
  writeJson(io, { success: true, name: 'splitplan', version: getVersionFromPackageJson() });
  return { exitCode: 0 };
}
