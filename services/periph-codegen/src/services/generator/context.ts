/**
 * Codegen Context
 *
 * Owns every cache a generation run uses: loaded descriptors, vendor and
 * family documents, and imported register map indexes. Nothing is cached at
 * module level, so two contexts never share state.
 */

import * as path from 'path';
import type {
  FamilyDescriptor,
  PeripheralDescriptor,
  RegisterMap,
  RegisterMapIndex,
  VendorDescriptor,
} from '../../types';
import { config } from '../../config';
import { log, Logger } from '../../utils/logger';
import { findPeripheral } from '../hardware/register-map';
import { ImportSource, SvdImporter } from '../hardware/svd-importer';
import { ManifestTracker } from '../manifest/manifest-tracker';
import { MetadataStore } from '../metadata/metadata-store';
import { PolicyRenderer } from '../renderer/policy-renderer';

export interface CodegenContextConfig {
  outputDir: string;
  manifestPath: string;
  namespaceRoot: string;
  /** Documents searched for descriptors without a `register_include`. */
  registerDocuments: (string | ImportSource)[];
}

export interface ResolvedRegisterMap {
  index: RegisterMapIndex;
  map?: RegisterMap;
  /** The `register_include` document, when the descriptor names one. */
  document?: string;
  peripheral: string;
}

type Loader<T> = (key: string) => Promise<T>;

export class CodegenContext {
  readonly config: CodegenContextConfig;
  readonly logger: Logger;
  readonly store: MetadataStore;
  readonly importer: SvdImporter;
  readonly renderer: PolicyRenderer;
  readonly manifest: ManifestTracker;

  private descriptors = new Map<string, Promise<PeripheralDescriptor>>();
  private vendors = new Map<string, Promise<VendorDescriptor>>();
  private families = new Map<string, Promise<FamilyDescriptor>>();
  private indexes = new Map<string, Promise<RegisterMapIndex>>();
  private defaultIndex?: Promise<RegisterMapIndex>;

  constructor(contextConfig: Partial<CodegenContextConfig> = {}) {
    this.config = {
      outputDir: config.generation.outputDir,
      manifestPath: config.generation.manifestPath,
      namespaceRoot: config.generation.namespaceRoot,
      registerDocuments: [...config.generation.registerDocuments],
      ...contextConfig,
    };
    this.logger = log.child({ operation: 'codegen' });
    this.store = new MetadataStore(this.logger);
    this.importer = new SvdImporter(this.logger);
    this.renderer = new PolicyRenderer({ namespaceRoot: this.config.namespaceRoot });
    this.manifest = new ManifestTracker({
      manifestPath: this.config.manifestPath,
      outputDir: this.config.outputDir,
    });
  }

  descriptor(file: string): Promise<PeripheralDescriptor> {
    return this.cached(this.descriptors, path.resolve(file), (key) => this.store.load(key));
  }

  vendor(file: string): Promise<VendorDescriptor> {
    return this.cached(this.vendors, path.resolve(file), (key) => this.store.loadVendor(key));
  }

  family(file: string): Promise<FamilyDescriptor> {
    return this.cached(this.families, path.resolve(file), (key) => this.store.loadFamily(key));
  }

  registerIndex(document: string): Promise<RegisterMapIndex> {
    return this.cached(this.indexes, path.resolve(document), (key) => this.importer.import(key));
  }

  defaultRegisterIndex(): Promise<RegisterMapIndex> {
    if (!this.defaultIndex) {
      const sources = this.config.registerDocuments.map((source) =>
        typeof source === 'string' ? path.resolve(source) : { ...source, path: path.resolve(source.path) }
      );
      const pending = this.importer.importAll(sources);
      this.defaultIndex = pending;
      // A failed import is not cached.
      pending.catch(() => {
        if (this.defaultIndex === pending) this.defaultIndex = undefined;
      });
      return pending;
    }
    return this.defaultIndex;
  }

  /**
   * The register map a descriptor renders against: its `register_include`
   * document when it names one, otherwise the configured documents.
   */
  async registerMapFor(descriptor: PeripheralDescriptor): Promise<ResolvedRegisterMap> {
    const include = descriptor.registerInclude;
    const document = include && path.resolve(path.dirname(descriptor.sourcePath), include.document);
    const index = document ? await this.registerIndex(document) : await this.defaultRegisterIndex();
    const name = include?.peripheral ?? descriptor.peripheralName;
    const map = findPeripheral(index, name);
    if (!map) {
      this.logger.warn('Peripheral not found in register map', { descriptorId: descriptor.id, peripheral: name });
    }
    return { index, peripheral: name, ...(map && { map }), ...(document !== undefined && { document }) };
  }

  /** Drop every cached document so the next access reads from disk. */
  invalidateCaches(): void {
    this.descriptors.clear();
    this.vendors.clear();
    this.families.clear();
    this.indexes.clear();
    this.defaultIndex = undefined;
  }

  private cached<T>(cache: Map<string, Promise<T>>, key: string, loader: Loader<T>): Promise<T> {
    const existing = cache.get(key);
    if (existing) {
      return existing;
    }
    const pending = loader(key);
    cache.set(key, pending);
    pending.catch(() => {
      if (cache.get(key) === pending) {
        cache.delete(key);
      }
    });
    return pending;
  }
}
