/**
 * Manifest & Incremental Tracker
 *
 * Durable record of every generated artifact: the hash of the inputs it was
 * rendered from, the hash of the bytes written, its upstream nodes and when it
 * last passed validation. Decides what needs regenerating and cascades
 * invalidation from vendor and family documents down to artifacts.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Sema } from 'async-sema';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { GeneratedArtifact, ManifestDocument, ManifestRecord } from '../../types';
import { config } from '../../config';
import { CacheError, errorCode, errorMessage } from '../../utils/errors';
import { computeInputHash, hashFile } from '../../utils/hash';
import { log, Logger } from '../../utils/logger';
import { DependencyGraph } from './dependency-graph';

export const MANIFEST_VERSION = '1';

const ManifestRecordSchema = z.object({
  content_hash: z.string(),
  output_hash: z.string(),
  source_hashes: z.array(z.string()),
  generated_at: z.string(),
  dependencies: z.array(z.string()),
  validated_at: z.string().optional(),
  stale: z.boolean().optional(),
  register_source: z.object({ document: z.string(), peripheral: z.string() }).optional(),
});

const ManifestDocumentSchema = z.object({
  version: z.literal(MANIFEST_VERSION),
  updated_at: z.string(),
  nodes: z.record(z.string()),
  artifacts: z.record(ManifestRecordSchema),
});

export interface ManifestTrackerConfig {
  manifestPath: string;
  /** Root the artifact paths are relative to. */
  outputDir: string;
}

export type VerifyStatus = 'ok' | 'modified' | 'missing' | 'untracked';

export interface ManifestStatistics {
  artifacts: number;
  stale: number;
  validated: number;
  nodes: number;
}

export interface CleanOptions {
  dryRun?: boolean;
  /** Descriptor id or peripheral name; everything when omitted. */
  peripheral?: string;
}

const artifactNode = (artifactPath: string): string => `artifact:${artifactPath}`;

function emptyDocument(): ManifestDocument {
  return { version: MANIFEST_VERSION, updated_at: new Date(0).toISOString(), nodes: {}, artifacts: {} };
}

function sortKeys<T>(record: Record<string, T>): Record<string, T> {
  return Object.fromEntries(Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

function isMissing(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

async function writeAtomic(target: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  const temp = `${target}.${uuidv4()}.tmp`;
  try {
    await fs.writeFile(temp, content, 'utf-8');
    await fs.rename(temp, target);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw error;
  }
}

export class ManifestTracker extends EventEmitter {
  private config: ManifestTrackerConfig;
  private document: ManifestDocument = emptyDocument();
  private graph = new DependencyGraph();
  private locks = new Map<string, { sema: Sema; holders: number }>();
  private saveLock = new Sema(1);
  private logger: Logger;
  private loadError?: CacheError;

  constructor(trackerConfig: Partial<ManifestTrackerConfig> = {}) {
    super();
    this.config = {
      manifestPath: config.generation.manifestPath,
      outputDir: config.generation.outputDir,
      ...trackerConfig,
    };
    this.logger = log.child({ operation: 'manifest', manifestPath: this.config.manifestPath });
  }

  /** The error recovered from at the last load, if the manifest was unusable. */
  get recoveredFrom(): CacheError | undefined {
    return this.loadError;
  }

  /**
   * Load the manifest. A missing file is an empty manifest; an unreadable or
   * corrupt one is logged and replaced by an empty one, so every artifact is
   * regenerated.
   */
  async load(): Promise<void> {
    this.loadError = undefined;
    this.document = emptyDocument();
    this.graph.clear();

    let text: string;
    try {
      text = await fs.readFile(this.config.manifestPath, 'utf-8');
    } catch (error) {
      if (isMissing(error)) {
        return;
      }
      this.recover(
        new CacheError('Unreadable', `Cannot read manifest ${this.config.manifestPath}`, {
          operation: 'load',
          file: this.config.manifestPath,
          cause: errorMessage(error),
        })
      );
      return;
    }

    let parsed: ManifestDocument;
    try {
      const result = ManifestDocumentSchema.safeParse(JSON.parse(text));
      if (!result.success) {
        const issue = result.error.issues[0];
        throw new Error(`${issue.path.join('.') || '<root>'}: ${issue.message}`);
      }
      parsed = result.data;
    } catch (error) {
      this.recover(
        new CacheError('Corrupt', `Manifest ${this.config.manifestPath} is corrupt; all artifacts are stale`, {
          operation: 'load',
          file: this.config.manifestPath,
          cause: errorMessage(error),
        })
      );
      return;
    }

    try {
      for (const [artifactPath, record] of Object.entries(parsed.artifacts)) {
        this.link(artifactPath, record.dependencies);
      }
    } catch (error) {
      this.recover(
        error instanceof CacheError
          ? error
          : new CacheError('Corrupt', `Manifest ${this.config.manifestPath} has invalid dependencies`, {
              operation: 'load',
              file: this.config.manifestPath,
            })
      );
      return;
    }

    this.document = parsed;
    this.logger.debug('Manifest loaded', { artifacts: Object.keys(parsed.artifacts).length });
  }

  get(artifactPath: string): ManifestRecord | undefined {
    return Object.prototype.hasOwnProperty.call(this.document.artifacts, artifactPath)
      ? this.document.artifacts[artifactPath]
      : undefined;
  }

  paths(): string[] {
    return Object.keys(this.document.artifacts).sort();
  }

  resolve(artifactPath: string): string {
    return path.resolve(this.config.outputDir, artifactPath);
  }

  /**
   * True unless the artifact is tracked under the same input hash, is not
   * stale and still exists on disk.
   */
  async shouldRegenerate(
    artifactPath: string,
    inputHashes: readonly string[],
    options: { force?: boolean } = {}
  ): Promise<boolean> {
    if (options.force) return true;
    const record = this.get(artifactPath);
    if (!record || record.stale || record.content_hash !== computeInputHash(inputHashes)) {
      return true;
    }
    try {
      await fs.access(this.resolve(artifactPath));
      return false;
    } catch {
      return true;
    }
  }

  /**
   * Replace the manifest entry for one artifact. Writers to the same path are
   * serialized; the manifest on disk is replaced by rename.
   */
  async record(artifactPath: string, artifact: GeneratedArtifact): Promise<void> {
    await this.withLock(artifactPath, () => this.recordLocked(artifactPath, artifact));
  }

  /**
   * Write the artifact file and its manifest entry under the path lock. If the
   * file write fails the entry is left as it was.
   */
  async commit(artifactPath: string, content: string, artifact: GeneratedArtifact): Promise<void> {
    await this.withLock(artifactPath, async () => {
      await writeAtomic(this.resolve(artifactPath), content);
      await this.recordLocked(artifactPath, artifact);
    });
  }

  /**
   * Mark every artifact downstream of a vendor (`acme`), family
   * (`acme/ax1`) or descriptor (`acme/ax1/uart`) stale. Returns the affected
   * artifact paths.
   */
  async invalidateCascade(id: string): Promise<string[]> {
    const affected = this.cascadeTargets(id);
    if (affected.length === 0) {
      return [];
    }
    const artifacts = { ...this.document.artifacts };
    for (const artifactPath of affected) {
      artifacts[artifactPath] = { ...artifacts[artifactPath], stale: true };
    }
    this.document = { ...this.document, artifacts };
    await this.save();

    this.logger.info('Invalidated dependents', { node: id, affected: affected.length });
    this.emit('manifest:invalidated', { id, paths: affected });
    return affected;
  }

  /**
   * Record the current hash of a vendor or family document. A changed hash
   * cascades to every artifact built from it.
   */
  async observeNode(id: string, hash: string): Promise<string[]> {
    const previous = Object.prototype.hasOwnProperty.call(this.document.nodes, id) ? this.document.nodes[id] : undefined;
    if (previous === hash) {
      return [];
    }
    this.document = { ...this.document, nodes: { ...this.document.nodes, [id]: hash } };
    this.graph.addNode(id);

    if (previous === undefined) {
      await this.save();
      return [];
    }
    const affected = await this.invalidateCascade(id);
    if (affected.length === 0) {
      await this.save();
    }
    return affected;
  }

  async markValidated(artifactPath: string, at: Date = new Date()): Promise<void> {
    await this.withLock(artifactPath, async () => {
      const record = this.get(artifactPath);
      if (!record) return;
      this.document = {
        ...this.document,
        artifacts: { ...this.document.artifacts, [artifactPath]: { ...record, validated_at: at.toISOString() } },
      };
      await this.save();
    });
  }

  /** Detects artifacts edited or deleted since they were generated. */
  async verify(artifactPath: string): Promise<VerifyStatus> {
    const record = this.get(artifactPath);
    if (!record) return 'untracked';
    try {
      const hash = await hashFile(this.resolve(artifactPath));
      return hash === record.output_hash ? 'ok' : 'modified';
    } catch (error) {
      if (isMissing(error)) return 'missing';
      throw error;
    }
  }

  /** Paths with a writer holding or awaiting their lock. */
  lockedPaths(): string[] {
    return [...this.locks.keys()].sort();
  }

  statistics(): ManifestStatistics {
    const records = Object.values(this.document.artifacts);
    return {
      artifacts: records.length,
      stale: records.filter((r) => r.stale).length,
      validated: records.filter((r) => r.validated_at !== undefined).length,
      nodes: Object.keys(this.document.nodes).length,
    };
  }

  /**
   * Delete tracked artifacts and drop their entries. Files the manifest does
   * not track are never touched.
   */
  async clean(options: CleanOptions = {}): Promise<string[]> {
    const wanted = options.peripheral?.toLowerCase();
    const targets = this.paths().filter((artifactPath) => {
      if (wanted === undefined) return true;
      const descriptor = this.document.artifacts[artifactPath].dependencies.at(-1) ?? '';
      return descriptor === wanted || descriptor.endsWith(`/${wanted}`);
    });

    if (options.dryRun || targets.length === 0) {
      return targets;
    }

    for (const artifactPath of targets) {
      await this.withLock(artifactPath, async () => {
        await fs.rm(this.resolve(artifactPath), { force: true });
        const { [artifactPath]: _removed, ...artifacts } = this.document.artifacts;
        this.document = { ...this.document, artifacts };
        this.graph.removeNode(artifactNode(artifactPath));
      });
    }
    await this.save();

    this.logger.info('Cleaned artifacts', { removed: targets.length });
    return targets;
  }

  toArtifact(artifactPath: string): GeneratedArtifact | undefined {
    const record = this.get(artifactPath);
    if (!record) return undefined;
    return {
      path: artifactPath,
      contentHash: record.content_hash,
      outputHash: record.output_hash,
      sourceHashes: [...record.source_hashes],
      generatedAt: record.generated_at,
      dependencies: [...record.dependencies],
      dependents: this.graph.childrenOf(artifactNode(artifactPath)),
      ...(record.register_source && { registerSource: { ...record.register_source } }),
    };
  }

  private async recordLocked(artifactPath: string, artifact: GeneratedArtifact): Promise<void> {
    this.link(artifactPath, artifact.dependencies);
    const previous = this.get(artifactPath);
    const record: ManifestRecord = {
      content_hash: artifact.contentHash,
      output_hash: artifact.outputHash,
      source_hashes: [...artifact.sourceHashes],
      generated_at: artifact.generatedAt,
      dependencies: [...artifact.dependencies],
      ...(artifact.registerSource && { register_source: { ...artifact.registerSource } }),
      // A rewrite of identical bytes keeps its validation timestamp.
      ...(previous?.validated_at !== undefined &&
        previous.output_hash === artifact.outputHash && { validated_at: previous.validated_at }),
    };
    this.document = { ...this.document, artifacts: { ...this.document.artifacts, [artifactPath]: record } };
    await this.save();
    this.emit('manifest:recorded', { path: artifactPath });
  }

  private link(artifactPath: string, dependencies: readonly string[]): void {
    this.graph.addChain([...dependencies, artifactNode(artifactPath)]);
  }

  private cascadeTargets(id: string): string[] {
    const prefix = 'artifact:';
    return [...this.graph.dependentsOf(id)]
      .filter((node) => node.startsWith(prefix))
      .map((node) => node.slice(prefix.length))
      .filter((artifactPath) => this.get(artifactPath) !== undefined)
      .sort();
  }

  private recover(error: CacheError): void {
    this.loadError = error;
    this.document = emptyDocument();
    this.graph.clear();
    this.logger.error(error.message, error, { code: error.code });
  }

  private async withLock<T>(artifactPath: string, task: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(artifactPath);
    if (!lock) {
      lock = { sema: new Sema(1), holders: 0 };
      this.locks.set(artifactPath, lock);
    }
    lock.holders += 1;
    await lock.sema.acquire();
    try {
      return await task();
    } finally {
      lock.sema.release();
      lock.holders -= 1;
      if (lock.holders === 0) {
        this.locks.delete(artifactPath);
      }
    }
  }

  private async save(): Promise<void> {
    await this.saveLock.acquire();
    try {
      this.document = { ...this.document, updated_at: new Date().toISOString() };
      const snapshot: ManifestDocument = {
        version: MANIFEST_VERSION,
        updated_at: this.document.updated_at,
        nodes: sortKeys(this.document.nodes),
        artifacts: sortKeys(this.document.artifacts),
      };
      await writeAtomic(this.config.manifestPath, `${JSON.stringify(snapshot, null, 2)}\n`);
    } finally {
      this.saveLock.release();
    }
  }
}
