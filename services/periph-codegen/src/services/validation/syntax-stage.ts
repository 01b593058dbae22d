/**
 * Stage 1: parse the header with the host C++ compiler (`-fsyntax-only`).
 */

import * as path from 'path';
import type { Diagnostic, ValidationResult } from '../../types';
import { toDiagnostic, ToolError } from '../../utils/errors';
import { log as logger } from '../../utils/logger';
import { hasErrors, parseDiagnostics } from '../toolchain/diagnostics';
import type { ToolRunner } from '../toolchain/tool-runner';
import {
  createErrorResult,
  createResult,
  StageInput,
  ToolchainOptions,
  toolchainOptions,
  ValidationStage,
} from './validation-stage';

export class SyntaxStage implements ValidationStage {
  readonly id = 'syntax' as const;
  readonly name = 'C++ syntax check';
  private options: ToolchainOptions;

  constructor(private runner: ToolRunner, options: Partial<ToolchainOptions> = {}) {
    this.options = toolchainOptions(options);
  }

  argv(artifactPath: string): string[] {
    const { clangPath, cxxStandard, strictWarnings, includeDirs } = this.options;
    return [
      clangPath,
      `-std=${cxxStandard}`,
      '-fsyntax-only',
      '-x',
      'c++',
      '-Wno-pragma-once-outside-header',
      ...(strictWarnings ? ['-Wall', '-Wextra'] : []),
      ...includeDirs.map((dir) => `-I${dir}`),
      artifactPath,
    ];
  }

  async run(input: StageInput): Promise<ValidationResult> {
    const startTime = Date.now();
    try {
      const result = await this.runner.run(this.argv(input.artifactPath), {
        timeout: this.options.timeoutMs,
        cwd: path.dirname(input.artifactPath),
        signal: input.signal,
      });

      const diagnostics: Diagnostic[] = parseDiagnostics(result.stderr, 'CXX_SYNTAX');
      if (result.exitCode !== 0 && !hasErrors(diagnostics)) {
        const tool = path.basename(this.options.clangPath);
        diagnostics.push({ ...toDiagnostic(ToolError.nonZeroExit(tool, result.exitCode, result.stderr)), file: input.artifactPath });
      }

      logger.debug('Syntax check finished', {
        artifactPath: input.artifactPath,
        stage: this.id,
        exitCode: result.exitCode,
        diagnostics: diagnostics.length,
      });
      return createResult(this.id, diagnostics, startTime, { exitCode: result.exitCode });
    } catch (error) {
      return createErrorResult(this.id, error, startTime);
    }
  }
}
