/**
 * Stage 3: cross-compile a translation unit that calls every policy method
 * through every instance alias, then measure the object with the size tool.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { Diagnostic, ValidationResult } from '../../types';
import { config } from '../../config';
import { toDiagnostic, ToolError } from '../../utils/errors';
import { log as logger } from '../../utils/logger';
import { renderTemplate } from '../renderer/template';
import { getTemplate } from '../renderer/templates';
import { hasErrors, parseDiagnostics } from '../toolchain/diagnostics';
import type { ToolRunner } from '../toolchain/tool-runner';
import type { SymbolTable } from './symbol-table';
import {
  createErrorResult,
  createResult,
  StageInput,
  ToolchainOptions,
  toolchainOptions,
  ValidationStage,
} from './validation-stage';

export interface ObjectSize {
  text: number;
  data: number;
  bss: number;
  total: number;
}

export interface CompileStageOptions extends Partial<ToolchainOptions> {
  /** Parent of the scratch directories; the OS temp dir when empty. */
  workDir?: string;
}

/**
 * Parse berkeley-format size output:
 *
 *    text    data     bss     dec     hex filename
 *      64       0       0      64      40 unit.o
 */
export function parseSizeOutput(output: string): ObjectSize | undefined {
  const row = output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => /^\d+\s+\d+\s+\d+\s+\d+/.test(line));
  if (!row) return undefined;
  const [text, data, bss, total] = row.split(/\s+/).map(Number);
  return { text, data, bss, total };
}

/** The translation unit that instantiates every accessor. */
export function compileUnit(include: string, symbols: SymbolTable): string {
  const namespace = symbols.namespace ?? '';
  const calls = symbols.aliases.flatMap((alias) =>
    symbols.methods.map((method) =>
      renderTemplate(getTemplate('unitCall'), {
        namespace,
        alias,
        method: method.name,
        args: Array.from({ length: method.arity }, () => '{}').join(', '),
      })
    )
  );
  return [
    renderTemplate(getTemplate('unitHeader'), { include }),
    ...calls,
    renderTemplate(getTemplate('unitFooter'), {}),
  ].join('');
}

export class CompileStage implements ValidationStage {
  readonly id = 'compile' as const;
  readonly name = 'Cross-compile';
  private options: ToolchainOptions;
  private workDir: string;

  constructor(private runner: ToolRunner, options: CompileStageOptions = {}) {
    const { workDir, ...toolchain } = options;
    this.options = toolchainOptions(toolchain);
    this.workDir = workDir || config.validation.workDir || os.tmpdir();
  }

  compileArgv(unitPath: string, objectPath: string): string[] {
    const { gccArmPath, cxxStandard, mcu, optimization, strictWarnings, includeDirs } = this.options;
    return [
      gccArmPath,
      `-std=${cxxStandard}`,
      `-mcpu=${mcu}`,
      '-mthumb',
      `-O${optimization}`,
      '-ffunction-sections',
      '-fdata-sections',
      '-fno-exceptions',
      '-fno-rtti',
      ...(strictWarnings ? ['-Wall', '-Wextra'] : []),
      ...includeDirs.map((dir) => `-I${dir}`),
      '-c',
      unitPath,
      '-o',
      objectPath,
    ];
  }

  async run(input: StageInput): Promise<ValidationResult> {
    const startTime = Date.now();
    let scratch: string | undefined;

    try {
      scratch = await fs.mkdtemp(path.join(this.workDir, 'periph-codegen-'));
      const unitPath = path.join(scratch, 'unit.cpp');
      const objectPath = path.join(scratch, 'unit.o');
      await fs.writeFile(unitPath, compileUnit(path.resolve(input.artifactPath), input.symbols), 'utf-8');

      const compiled = await this.runner.run(this.compileArgv(unitPath, objectPath), {
        timeout: this.options.timeoutMs,
        cwd: scratch,
        signal: input.signal,
      });

      const diagnostics: Diagnostic[] = parseDiagnostics(compiled.stderr, 'CXX_COMPILE');
      if (compiled.exitCode !== 0 && !hasErrors(diagnostics)) {
        const tool = path.basename(this.options.gccArmPath);
        diagnostics.push({ ...toDiagnostic(ToolError.nonZeroExit(tool, compiled.exitCode, compiled.stderr)), file: input.artifactPath });
      }
      if (hasErrors(diagnostics)) {
        return createResult(this.id, diagnostics, startTime, { exitCode: compiled.exitCode });
      }

      const size = await this.measure(objectPath, scratch, input.signal, diagnostics);
      return createResult(this.id, diagnostics, startTime, {
        exitCode: compiled.exitCode,
        calls: input.symbols.aliases.length * input.symbols.methods.length,
        ...(size && { size }),
      });
    } catch (error) {
      return createErrorResult(this.id, error, startTime);
    } finally {
      if (scratch) {
        await fs.rm(scratch, { recursive: true, force: true }).catch((error: Error) => {
          logger.warn('Failed to remove compile scratch directory', { scratch, error: error.message });
        });
      }
    }
  }

  /** A size tool failure is a warning: the object itself compiled. */
  private async measure(
    objectPath: string,
    cwd: string,
    signal: AbortSignal | undefined,
    diagnostics: Diagnostic[]
  ): Promise<ObjectSize | undefined> {
    try {
      const result = await this.runner.run([this.options.sizePath, '--format=berkeley', objectPath], {
        timeout: this.options.timeoutMs,
        cwd,
        signal,
      });
      const size = result.exitCode === 0 ? parseSizeOutput(result.stdout) : undefined;
      if (!size) {
        diagnostics.push({
          severity: 'warning',
          code: 'SIZE_UNAVAILABLE',
          message: `could not read object size from ${path.basename(this.options.sizePath)}`,
        });
      }
      return size;
    } catch (error) {
      if (error instanceof ToolError && error.kind === 'ToolNotFound') {
        diagnostics.push({ ...toDiagnostic(error), severity: 'warning' });
        return undefined;
      }
      throw error;
    }
  }
}
