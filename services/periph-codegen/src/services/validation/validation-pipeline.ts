/**
 * Multi-Stage Validation Pipeline
 *
 * Runs the four validation stages over generated headers:
 * Stage 1: syntax        - host compiler, -fsyntax-only
 * Stage 2: semantic      - layout cross-check against the register map
 * Stage 3: compile       - cross-compile every accessor, report object size
 * Stage 4: test-emission - static_assert file pinning the layout
 *
 * An artifact halts at its first failing stage. A batch either stops
 * scheduling after the first failed artifact (failFast) or records every
 * failure and carries on (collectAll).
 */

import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import { Sema } from 'async-sema';
import type {
  Diagnostic,
  FileValidationResult,
  RegisterMapIndex,
  StageId,
  ValidationResult,
  ValidationSummary,
} from '../../types';
import { STAGE_ORDER } from '../../types';
import { config } from '../../config';
import { handleError } from '../../utils/errors';
import { log, Logger } from '../../utils/logger';
import type { ToolRunner } from '../toolchain/tool-runner';
import { CompileStage } from './compile-stage';
import { SemanticStage } from './semantic-stage';
import { parseSymbolTable } from './symbol-table';
import { SyntaxStage } from './syntax-stage';
import { TestEmissionStage } from './test-emission-stage';
import { createErrorResult, ToolchainOptions, ValidationStage } from './validation-stage';

export type ValidationMode = 'failFast' | 'collectAll';

export interface ArtifactTarget {
  path: string;
  /** Header text; read from `path` when omitted. */
  content?: string;
  registerIndex?: RegisterMapIndex;
  /** Set when the artifact could not be resolved; no stage runs. */
  failure?: Diagnostic;
}

export interface ValidationRunOptions {
  /** Run this stage alone. */
  stage?: StageId;
  signal?: AbortSignal;
}

export interface BatchValidationOptions extends ValidationRunOptions {
  mode?: ValidationMode;
  /** Stop scheduling new artifacts once this many have failed. */
  maxFailures?: number;
  concurrency?: number;
}

export interface ValidationPipelineConfig {
  stages: StageId[];
  toolchain: Partial<ToolchainOptions>;
  testOutputDir: string;
  workDir: string;
  concurrency: number;
  registerIndex?: RegisterMapIndex;
}

const DEFAULT_CONFIG: ValidationPipelineConfig = {
  stages: [...STAGE_ORDER],
  toolchain: {},
  testOutputDir: config.validation.testOutputDir,
  workDir: config.validation.workDir,
  concurrency: config.generation.maxConcurrency,
};

export class ValidationPipeline extends EventEmitter {
  private config: ValidationPipelineConfig;
  private stages: Map<StageId, ValidationStage>;
  private logger: Logger;

  constructor(runner: ToolRunner, pipelineConfig: Partial<ValidationPipelineConfig> = {}, stages?: ValidationStage[]) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...pipelineConfig };
    this.logger = log.child({ operation: 'validate' });
    const all = stages ?? [
      new SyntaxStage(runner, this.config.toolchain),
      new SemanticStage(),
      new CompileStage(runner, { ...this.config.toolchain, workDir: this.config.workDir }),
      new TestEmissionStage({ outputDir: this.config.testOutputDir }),
    ];
    this.stages = new Map(all.map((stage): [StageId, ValidationStage] => [stage.id, stage]));
  }

  setRegisterIndex(index: RegisterMapIndex | undefined): void {
    this.config.registerIndex = index;
  }

  /**
   * Run the configured stages over one artifact, halting at the first failure.
   */
  async runAll(target: ArtifactTarget, options: ValidationRunOptions = {}): Promise<FileValidationResult> {
    const startTime = Date.now();
    const order = options.stage ? [options.stage] : STAGE_ORDER.filter((id) => this.config.stages.includes(id));
    const stages: ValidationResult[] = [];

    this.emit('pipeline:start', { path: target.path, stages: order });

    if (target.failure) {
      this.logger.warn('Artifact not resolved', { artifactPath: target.path, code: target.failure.code });
      return { path: target.path, passed: false, stages, error: target.failure.message, diagnostics: [target.failure] };
    }

    let content: string;
    try {
      content = target.content ?? (await fs.readFile(target.path, 'utf-8'));
    } catch (error) {
      const failure = handleError(error);
      this.logger.error('Cannot read artifact', failure, { artifactPath: target.path });
      return { path: target.path, passed: false, stages, error: failure.message };
    }

    const symbols = parseSymbolTable(content);
    let haltedAt: StageId | undefined;

    for (const id of order) {
      const stage = this.stages.get(id);
      if (!stage) {
        continue;
      }

      const stageStart = Date.now();
      let result: ValidationResult;
      try {
        result = await stage.run({
          artifactPath: target.path,
          content,
          symbols,
          registerIndex: target.registerIndex ?? this.config.registerIndex,
          signal: options.signal,
        });
      } catch (error) {
        result = createErrorResult(id, error, stageStart);
      }

      stages.push(result);
      this.emit('validation:stage:complete', { path: target.path, stage: id, result });

      if (!result.passed) {
        haltedAt = id;
        this.emit('validation:stage:failed', { path: target.path, stage: id, result });
        break;
      }
    }

    const fileResult: FileValidationResult = {
      path: target.path,
      passed: haltedAt === undefined,
      stages,
      ...(haltedAt !== undefined && { haltedAt }),
    };

    this.logger.debug('Artifact validated', {
      artifactPath: target.path,
      passed: fileResult.passed,
      haltedAt,
      duration: Date.now() - startTime,
    });
    this.emit('pipeline:complete', { result: fileResult, duration: Date.now() - startTime });

    return fileResult;
  }

  /**
   * Validate many artifacts. Results keep the order of `targets`; artifacts
   * never started (fail-fast stop, maxFailures, abort) count as cancelled.
   */
  async validateBatch(targets: readonly ArtifactTarget[], options: BatchValidationOptions = {}): Promise<ValidationSummary> {
    const startTime = Date.now();
    const mode = options.mode ?? 'failFast';
    const sema = new Sema(Math.max(1, options.concurrency ?? this.config.concurrency));
    const results: Array<FileValidationResult | undefined> = targets.map(() => undefined);
    let failures = 0;
    let stopped = false;

    const shouldStop = (): boolean =>
      stopped || options.signal?.aborted === true || (options.maxFailures !== undefined && failures >= options.maxFailures);

    this.emit('batch:start', { count: targets.length, mode });

    await Promise.all(
      targets.map(async (target, index) => {
        await sema.acquire();
        try {
          if (shouldStop()) {
            return;
          }
          const result = await this.runAll(target, options);
          results[index] = result;
          if (!result.passed) {
            failures += 1;
            if (mode === 'failFast') {
              stopped = true;
            }
          }
          this.emit('batch:progress', { path: target.path, passed: result.passed, completed: results.filter(Boolean).length });
        } finally {
          sema.release();
        }
      })
    );

    const perFileResults = results.filter((result): result is FileValidationResult => result !== undefined);
    const summary: ValidationSummary = {
      passed: perFileResults.filter((r) => r.passed).length,
      failed: perFileResults.filter((r) => !r.passed).length,
      cancelled: targets.length - perFileResults.length,
      perFileResults,
      duration: Date.now() - startTime,
    };

    this.logger.info('Validation batch complete', {
      passed: summary.passed,
      failed: summary.failed,
      cancelled: summary.cancelled,
      duration: summary.duration,
    });
    this.emit('batch:complete', summary);

    return summary;
  }
}
