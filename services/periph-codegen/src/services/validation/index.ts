/**
 * Validation Services Index
 */

export { ValidationPipeline } from './validation-pipeline';
export type {
  ArtifactTarget,
  BatchValidationOptions,
  ValidationMode,
  ValidationPipelineConfig,
  ValidationRunOptions,
} from './validation-pipeline';
export { createErrorResult, createResult, toolchainOptions } from './validation-stage';
export type { StageInput, ToolchainOptions, ValidationStage } from './validation-stage';
export { SyntaxStage } from './syntax-stage';
export { SemanticStage, STATEFUL_POLICY_CODE } from './semantic-stage';
export { CompileStage, compileUnit, parseSizeOutput } from './compile-stage';
export type { CompileStageOptions, ObjectSize } from './compile-stage';
export { TestEmissionStage, layoutAssertions, renderTestFile, testFileName } from './test-emission-stage';
export type { LayoutAssertion, TestEmissionOptions } from './test-emission-stage';
export { parseSymbolTable, findRegister } from './symbol-table';
export type { SymbolTable, SymbolRegister, SymbolField, SymbolInstance, SymbolMethod, InstanceField } from './symbol-table';
