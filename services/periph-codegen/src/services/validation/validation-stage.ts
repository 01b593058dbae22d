/**
 * Validation stage contract shared by the four pipeline stages.
 */

import type { Diagnostic, RegisterMapIndex, StageId, ValidationResult } from '../../types';
import { config, Config } from '../../config';
import { toDiagnostic } from '../../utils/errors';
import { hasErrors } from '../toolchain/diagnostics';
import type { SymbolTable } from './symbol-table';

export interface StageInput {
  artifactPath: string;
  content: string;
  symbols: SymbolTable;
  registerIndex?: RegisterMapIndex;
  signal?: AbortSignal;
}

export interface ValidationStage {
  readonly id: StageId;
  readonly name: string;
  run(input: StageInput): Promise<ValidationResult>;
}

export type ToolchainOptions = Config['toolchain'];

export function toolchainOptions(overrides: Partial<ToolchainOptions> = {}): ToolchainOptions {
  return { ...config.toolchain, ...overrides };
}

export function createResult(
  stage: StageId,
  diagnostics: Diagnostic[],
  startTime: number,
  metadata: Record<string, unknown> = {}
): ValidationResult {
  return {
    stage,
    passed: !hasErrors(diagnostics),
    diagnostics,
    metadata,
    duration: Date.now() - startTime,
  };
}

/**
 * A stage that threw instead of reporting: the error becomes its only
 * diagnostic.
 */
export function createErrorResult(stage: StageId, error: unknown, startTime: number): ValidationResult {
  return {
    stage,
    passed: false,
    diagnostics: [toDiagnostic(error)],
    metadata: {},
    duration: Date.now() - startTime,
  };
}
