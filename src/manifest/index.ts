/**
 * Manifest module.
 *
 * @packageDocumentation
 */

export type { ParsedManifest } from './parser.js';
export { parseManifest, parseManifestContent } from './parser.js';
