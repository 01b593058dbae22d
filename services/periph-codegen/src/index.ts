/**
 * Peripheral Codegen - Library Entry Point
 *
 * Generates zero-overhead C++ hardware policy headers from declarative
 * peripheral descriptors and SVD register maps, and validates them.
 */

export * from './types';
export { config, loadConfig, getConfig } from './config';
export type { Config } from './config';
export { log } from './utils/logger';
export type { Logger, LogMetadata } from './utils/logger';
export {
  CodegenError,
  MetadataError,
  ImportError,
  RenderError,
  SemanticMismatch,
  SemanticMismatchCodes,
  ToolError,
  CacheError,
  InternalError,
  isCodegenError,
  handleError,
  toDiagnostic,
} from './utils/errors';
export { computeInputHash, sha256, hashFile, stableStringify } from './utils/hash';

export * from './services/metadata';
export * from './services/hardware';
export * from './services/renderer';
export * from './services/manifest';
export * from './services/toolchain';
export * from './services/validation';
export * from './services/generator';
