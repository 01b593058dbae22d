/**
 * Hardware Description Services Index
 *
 * Exports the SVD importer, quirk handling and register map lookups.
 */

export { SvdImporter, parseInteger, parseDimIndex, expandName } from './svd-importer';
export type { ImportOptions, ImportSource } from './svd-importer';
export { applyQuirks, loadQuirks, findQuirkFile, quirkPathFor, QuirkFileSchema } from './quirks';
export type { Quirk } from './quirks';
export {
  getRegister,
  getBitfield,
  findBitfield,
  getPeripheral,
  findPeripheral,
  mergeIndexes,
  registerMapHash,
} from './register-map';
