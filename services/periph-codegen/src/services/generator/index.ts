/**
 * Generator Services Index
 */

export { CodeGenerator } from './code-generator';
export type {
  GenerationTarget,
  GenerateOptions,
  GenerationFailure,
  GenerationRun,
  ValidateOptions,
  RecordValidation,
  CodeGeneratorConfig,
} from './code-generator';
export { CodegenContext } from './context';
export type { CodegenContextConfig, ResolvedRegisterMap } from './context';
