/**
 * Metadata Services Index
 *
 * Exports descriptor loading, validation and the register operation parser.
 */

export {
  MetadataStore,
  detectFormat,
  parseDocument,
  parseRegisterInclude,
  descriptorId,
  mergeConstants,
} from './metadata-store';
export type { ResolveOptions } from './metadata-store';
export { parseOperations, parseOperand, referencedRegisters, OperationSyntaxError } from './operation-parser';
export {
  PeripheralDocumentSchema,
  VendorDocumentSchema,
  FamilyDocumentSchema,
  AddressSchema,
} from './metadata-schema';
export type { PeripheralDocument, VendorDocument, FamilyDocument } from './metadata-schema';
