/**
 * Split directory naming module.
 *
 * @packageDocumentation
 */

export type { NamingErrorType } from './naming.js';
export {
  MAX_NAME_LENGTH,
  MAX_SUFFIX,
  NamingError,
  toKebabCase,
  formatSplitDirName,
  getNextIndex,
  generateUniqueName,
} from './naming.js';
