/**
 * Peripheral Codegen - Core Type Definitions
 *
 * Descriptors, register maps, generated artifacts and validation results
 * shared by the generator, the manifest tracker and the validation pipeline.
 */

// ============================================================================
// Peripheral Descriptors
// ============================================================================

export interface TemplateParam {
  name: string;
  type: string;
}

export type ConstantValue = number | string | boolean;

export interface ConstantSpec {
  name: string;
  type: string;
  value: ConstantValue;
}

export interface MethodParameter {
  name: string;
  type: string;
  default?: ConstantValue;
}

/**
 * A value written by a register operation: a numeric literal or the name of
 * a method parameter or descriptor constant.
 */
export type OperandValue =
  | { kind: 'literal'; value: number }
  | { kind: 'identifier'; name: string };

export type RegisterOperation =
  | { op: 'write'; register: string; value: OperandValue; line: number }
  | { op: 'set'; register: string; value: OperandValue; line: number }
  | { op: 'clear'; register: string; value: OperandValue; line: number }
  | { op: 'field-write'; register: string; field: string; value: OperandValue; line: number }
  | { op: 'read'; register: string; line: number }
  | { op: 'field-read'; register: string; field: string; line: number }
  | { op: 'wait'; register: string; field: string; until: 'set' | 'clear'; line: number };

export interface PolicyMethodSpec {
  name: string;
  description: string;
  parameters: MethodParameter[];
  returnType: string;
  code: string;
  operations: RegisterOperation[];
  testHook?: string;
}

export interface InstanceSpec {
  name: string;
  base: number;
  clock?: number;
  params: Record<string, ConstantValue>;
}

export interface DeclaredField {
  offset: number;
  width: number;
}

export interface DeclaredRegister {
  offset: number;
  fields: Record<string, DeclaredField>;
}

export interface RegisterInclude {
  document: string;
  peripheral?: string;
}

export interface PeripheralDescriptor {
  id: string;
  family: string;
  vendor: string;
  peripheralName: string;
  description?: string;
  registerInclude?: RegisterInclude;
  templateParams: TemplateParam[];
  constants: ConstantSpec[];
  policyMethods: Record<string, PolicyMethodSpec>;
  instances: InstanceSpec[];
  registers?: Record<string, DeclaredRegister>;
  sourcePath: string;
  sourceHash: string;
}

export interface VendorDescriptor {
  id: string;
  vendor: string;
  description?: string;
  constants: ConstantSpec[];
  sourcePath: string;
  sourceHash: string;
}

export interface FamilyDescriptor {
  id: string;
  vendor: string;
  family: string;
  description?: string;
  constants: ConstantSpec[];
  sourcePath: string;
  sourceHash: string;
}

export type MetadataFormat = 'json' | 'yaml';

// ============================================================================
// Register Maps
// ============================================================================

export type RegisterAccess = 'read-only' | 'write-only' | 'read-write' | 'writeOnce' | 'read-writeOnce';

export interface Bitfield {
  register: string;
  name: string;
  bitOffset: number;
  bitWidth: number;
  access?: RegisterAccess;
}

export interface Register {
  name: string;
  offset: number;
  size: number;
  access: RegisterAccess;
  resetValue?: number;
  fields: Bitfield[];
}

export interface RegisterMap {
  peripheralName: string;
  groupName?: string;
  baseAddress: number;
  registers: Register[];
  bitfields: Record<string, Bitfield>;
  sourceDocument: string;
  device?: string;
}

export interface RegisterMapIndex {
  peripherals: Record<string, RegisterMap>;
  documents: string[];
  devices: string[];
}

// ============================================================================
// Generated Artifacts & Manifest
// ============================================================================

export interface RenderedText {
  descriptorId: string;
  /** Output path relative to the generation root. */
  fileName: string;
  content: string;
  /** Hash of the descriptor and register map the text was rendered from. */
  inputHash: string;
}

export interface GeneratedArtifact {
  path: string;
  contentHash: string;
  outputHash: string;
  sourceHashes: string[];
  generatedAt: string;
  dependencies: string[];
  dependents: string[];
  registerSource?: RegisterSource;
}

/** Register document an artifact was rendered against, relative to the output directory. */
export interface RegisterSource {
  document: string;
  peripheral: string;
}

export interface ManifestRecord {
  content_hash: string;
  output_hash: string;
  source_hashes: string[];
  generated_at: string;
  dependencies: string[];
  validated_at?: string;
  stale?: boolean;
  register_source?: RegisterSource;
}

export interface ManifestDocument {
  version: string;
  updated_at: string;
  nodes: Record<string, string>;
  artifacts: Record<string, ManifestRecord>;
}

// ============================================================================
// Validation
// ============================================================================

export type StageId = 'syntax' | 'semantic' | 'compile' | 'test-emission';

export const STAGE_ORDER: readonly StageId[] = ['syntax', 'semantic', 'compile', 'test-emission'];

export type DiagnosticSeverity = 'error' | 'warning' | 'note';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  message: string;
  code?: string;
  file?: string;
  line?: number;
  column?: number;
  suggestion?: string;
}

export interface ValidationResult {
  stage: StageId | 'metadata';
  passed: boolean;
  diagnostics: Diagnostic[];
  metadata: Record<string, unknown>;
  duration: number;
}

export interface FileValidationResult {
  path: string;
  passed: boolean;
  stages: ValidationResult[];
  haltedAt?: StageId;
  /** Why no stage ran: the artifact could not be read or resolved. */
  error?: string;
  diagnostics?: Diagnostic[];
}

export interface ValidationSummary {
  passed: number;
  failed: number;
  cancelled: number;
  perFileResults: FileValidationResult[];
  duration: number;
}
