/**
 * Code Generator Service
 *
 * Entry points for generation and validation. Loads descriptors and their
 * vendor and family documents, resolves register maps, renders headers and
 * writes only what the manifest says has changed.
 */

import { EventEmitter } from 'events';
import * as path from 'path';
import { Sema } from 'async-sema';
import { v4 as uuidv4 } from 'uuid';
import type {
  Diagnostic,
  GeneratedArtifact,
  RegisterMapIndex,
  StageId,
  ValidationSummary,
} from '../../types';
import { config } from '../../config';
import { toDiagnostic } from '../../utils/errors';
import { computeInputHash, sha256 } from '../../utils/hash';
import { registerMapHash } from '../hardware/register-map';
import { artifactFileName } from '../renderer/policy-renderer';
import { ChildProcessToolRunner, ToolRunner } from '../toolchain/tool-runner';
import {
  ArtifactTarget,
  ValidationMode,
  ValidationPipeline,
  ValidationPipelineConfig,
} from '../validation/validation-pipeline';
import { CodegenContext, CodegenContextConfig } from './context';

// ============================================================================
// Types
// ============================================================================

export interface GenerationTarget {
  /** Peripheral descriptor (JSON or YAML). */
  descriptor: string;
  /** Vendor document whose constants the descriptor inherits. */
  vendor?: string;
  /** Family document whose constants the descriptor inherits. */
  family?: string;
}

export interface GenerateOptions {
  /** Skip artifacts whose inputs are unchanged. Defaults to true. */
  incremental?: boolean;
  force?: boolean;
  signal?: AbortSignal;
  /** Stop scheduling targets once this many have failed. */
  maxFailures?: number;
}

export interface GenerationFailure {
  target: string;
  diagnostic: Diagnostic;
}

export interface GenerationRun {
  artifacts: GeneratedArtifact[];
  written: string[];
  skipped: string[];
  failures: GenerationFailure[];
  cancelled: number;
  duration: number;
}

export type RecordValidation = 'passed' | 'always' | 'never';

export interface ValidateOptions {
  stage?: StageId;
  mode?: ValidationMode;
  signal?: AbortSignal;
  maxFailures?: number;
  /** When to stamp `validated_at` in the manifest. Defaults to 'passed'. */
  recordValidation?: RecordValidation;
}

export interface CodeGeneratorConfig extends CodegenContextConfig {
  maxConcurrency: number;
  validation: Partial<ValidationPipelineConfig>;
}

type TaskOutcome =
  | { kind: 'written'; artifact: GeneratedArtifact }
  | { kind: 'skipped'; artifact: GeneratedArtifact }
  | { kind: 'failed'; failure: GenerationFailure }
  | { kind: 'cancelled' };

const targetOf = (target: string | GenerationTarget): GenerationTarget =>
  typeof target === 'string' ? { descriptor: target } : target;

// ============================================================================
// Code Generator
// ============================================================================

export class CodeGenerator extends EventEmitter {
  readonly context: CodegenContext;
  readonly pipeline: ValidationPipeline;
  private config: CodeGeneratorConfig;
  /** Register index each artifact was rendered against. */
  private artifactIndexes = new Map<string, RegisterMapIndex>();

  constructor(generatorConfig: Partial<CodeGeneratorConfig> = {}, runner: ToolRunner = new ChildProcessToolRunner()) {
    super();
    const { maxConcurrency, validation, ...contextConfig } = generatorConfig;
    this.context = new CodegenContext(contextConfig);
    this.config = {
      ...this.context.config,
      maxConcurrency: maxConcurrency ?? config.generation.maxConcurrency,
      validation: validation ?? {},
    };
    this.pipeline = new ValidationPipeline(runner, {
      concurrency: this.config.maxConcurrency,
      ...this.config.validation,
    });
  }

  /**
   * Render every target and write the artifacts whose inputs changed.
   * Per-target failures are collected; they never abort the batch.
   */
  async generate(
    targets: readonly (string | GenerationTarget)[],
    options: GenerateOptions = {}
  ): Promise<GenerationRun> {
    const startTime = Date.now();
    const runId = uuidv4();
    const logger = this.context.logger.child({ runId });
    const sema = new Sema(this.config.maxConcurrency);
    const outcomes = targets.map((): TaskOutcome => ({ kind: 'cancelled' }));
    let failures = 0;

    this.context.invalidateCaches();
    await this.context.manifest.load();

    this.emit('generation:start', { runId, targets: targets.length });
    logger.info('Starting generation', { targets: targets.length, incremental: options.incremental ?? true });

    const shouldStop = (): boolean =>
      options.signal?.aborted === true || (options.maxFailures !== undefined && failures >= options.maxFailures);

    let completed = 0;
    await Promise.all(
      targets.map(async (raw, index) => {
        await sema.acquire();
        try {
          if (shouldStop()) return;
          const outcome = await this.generateOne(targetOf(raw), options);
          outcomes[index] = outcome;
          if (outcome.kind === 'failed') {
            failures += 1;
            logger.warn('Generation failed', { target: outcome.failure.target, code: outcome.failure.diagnostic.code });
          }
          completed += 1;
          this.emit('generation:progress', {
            runId,
            completed,
            total: targets.length,
            progress: Math.round((completed / targets.length) * 100),
          });
        } finally {
          sema.release();
        }
      })
    );

    const run: GenerationRun = {
      artifacts: [],
      written: [],
      skipped: [],
      failures: [],
      cancelled: 0,
      duration: 0,
    };
    for (const outcome of outcomes) {
      switch (outcome.kind) {
        case 'written':
          run.artifacts.push(outcome.artifact);
          run.written.push(outcome.artifact.path);
          break;
        case 'skipped':
          run.artifacts.push(outcome.artifact);
          run.skipped.push(outcome.artifact.path);
          break;
        case 'failed':
          run.failures.push(outcome.failure);
          break;
        case 'cancelled':
          run.cancelled += 1;
          break;
      }
    }
    run.duration = Date.now() - startTime;

    logger.info('Generation complete', {
      written: run.written.length,
      skipped: run.skipped.length,
      failed: run.failures.length,
      cancelled: run.cancelled,
      duration: run.duration,
    });
    this.emit('generation:complete', run);

    return run;
  }

  /**
   * Run the validation pipeline over generated artifacts. Targets are
   * artifact paths relative to the output directory, or descriptors whose
   * artifact should be validated.
   */
  async validate(
    targets: readonly (string | GenerationTarget)[],
    options: ValidateOptions = {}
  ): Promise<ValidationSummary> {
    const manifest = this.context.manifest;
    await manifest.load();

    const artifacts: ArtifactTarget[] = [];
    const keys = new Map<string, string>();
    for (const target of targets) {
      try {
        const { key, registerIndex } = await this.resolveArtifact(target);
        const file = manifest.resolve(key);
        keys.set(file, key);
        artifacts.push({ path: file, ...(registerIndex && { registerIndex }) });
      } catch (error) {
        // Reported in place; the remaining targets still run.
        artifacts.push({ path: targetOf(target).descriptor, failure: toDiagnostic(error) });
      }
    }

    const summary = await this.pipeline.validateBatch(artifacts, {
      stage: options.stage,
      mode: options.mode,
      signal: options.signal,
      maxFailures: options.maxFailures,
      concurrency: this.config.maxConcurrency,
    });

    const policy = options.recordValidation ?? 'passed';
    if (policy !== 'never') {
      for (const result of summary.perFileResults) {
        const key = keys.get(result.path);
        const fullRun = options.stage === undefined;
        if (key !== undefined && (policy === 'always' || (result.passed && fullRun))) {
          await manifest.markValidated(key);
        }
      }
    }

    return summary;
  }

  private async generateOne(target: GenerationTarget, options: GenerateOptions): Promise<TaskOutcome> {
    const { context } = this;
    const manifest = context.manifest;

    try {
      const descriptor = await context.descriptor(target.descriptor);
      const vendor = target.vendor ? await context.vendor(target.vendor) : undefined;
      const family = target.family ? await context.family(target.family) : undefined;

      // Vendor and family changes cascade before anything is compared.
      if (vendor) await manifest.observeNode(vendor.id, vendor.sourceHash);
      if (family) await manifest.observeNode(family.id, family.sourceHash);

      const resolved = context.store.resolve(descriptor, { vendor, family });
      const { index, map, document, peripheral } = await context.registerMapFor(resolved);
      const artifactPath = artifactFileName(resolved);
      this.artifactIndexes.set(artifactPath, index);

      const inputHashes = [
        descriptor.sourceHash,
        vendor?.sourceHash ?? '',
        family?.sourceHash ?? '',
        map ? registerMapHash(map) : '',
        `namespace:${context.config.namespaceRoot}`,
      ];

      const incremental = options.incremental ?? true;
      if (incremental && !(await manifest.shouldRegenerate(artifactPath, inputHashes, { force: options.force }))) {
        const existing = manifest.toArtifact(artifactPath);
        if (existing) {
          return { kind: 'skipped', artifact: existing };
        }
      }

      const rendered = context.renderer.render(resolved, map);
      const vendorId = vendor?.id ?? resolved.vendor.toLowerCase();
      const familyId = family?.id ?? `${resolved.vendor}/${resolved.family}`.toLowerCase();
      const artifact: GeneratedArtifact = {
        path: artifactPath,
        contentHash: computeInputHash(inputHashes),
        outputHash: sha256(rendered.content),
        sourceHashes: inputHashes,
        generatedAt: new Date().toISOString(),
        dependencies: [vendorId, familyId, resolved.id],
        dependents: [],
        ...(document !== undefined && {
          registerSource: { document: path.relative(context.config.outputDir, document), peripheral },
        }),
      };

      await manifest.commit(artifactPath, rendered.content, artifact);
      return { kind: 'written', artifact };
    } catch (error) {
      return { kind: 'failed', failure: { target: target.descriptor, diagnostic: toDiagnostic(error) } };
    }
  }

  private async resolveArtifact(
    target: string | GenerationTarget
  ): Promise<{ key: string; registerIndex?: RegisterMapIndex }> {
    if (typeof target === 'string') {
      const key = path.isAbsolute(target) ? path.relative(this.config.outputDir, target) : target;
      const known = this.artifactIndexes.get(key);
      if (known) return { key, registerIndex: known };
      // Another process generated it: use the register document its manifest entry names.
      const source = this.context.manifest.get(key)?.register_source;
      const registerIndex = source
        ? await this.context.registerIndex(path.resolve(this.config.outputDir, source.document))
        : await this.context.defaultRegisterIndex();
      return { key, registerIndex };
    }

    const descriptor = await this.context.descriptor(target.descriptor);
    const vendor = target.vendor ? await this.context.vendor(target.vendor) : undefined;
    const family = target.family ? await this.context.family(target.family) : undefined;
    const resolved = this.context.store.resolve(descriptor, { vendor, family });
    const { index } = await this.context.registerMapFor(resolved);
    return { key: artifactFileName(resolved), registerIndex: index };
  }
}
