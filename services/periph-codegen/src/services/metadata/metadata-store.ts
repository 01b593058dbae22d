/**
 * Metadata Store
 *
 * Loads peripheral, family and vendor descriptors from JSON or YAML, validates
 * them and hands back frozen, typed structures. Every call reads the document
 * again; caching belongs to the caller's CodegenContext.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import type {
  ConstantSpec,
  FamilyDescriptor,
  MetadataFormat,
  PeripheralDescriptor,
  PolicyMethodSpec,
  RegisterInclude,
  ValidationResult,
  VendorDescriptor,
} from '../../types';
import { errorMessage, MetadataError, toDiagnostic } from '../../utils/errors';
import { sha256 } from '../../utils/hash';
import { deepFreeze, describeType, formatPath, getPath } from '../../utils/object';
import { log, Logger } from '../../utils/logger';
import {
  FamilyDocumentSchema,
  PeripheralDocument,
  PeripheralDocumentSchema,
  VendorDocumentSchema,
} from './metadata-schema';
import { OperationSyntaxError, parseOperations } from './operation-parser';

interface Analysis<T> {
  value?: T;
  errors: MetadataError[];
}

export function detectFormat(filePath: string, text: string): MetadataFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.json') return 'json';
  if (ext === '.yaml' || ext === '.yml') return 'yaml';

  const first = text.trimStart().charAt(0);
  return first === '{' || first === '[' ? 'json' : 'yaml';
}

function offsetToLineColumn(text: string, offset: number): { line: number; column: number } {
  const before = text.slice(0, offset).split('\n');
  return { line: before.length, column: before[before.length - 1].length + 1 };
}

/**
 * Parse a document into an untyped value. Syntax errors carry 1-based
 * line/column when the parser reports a position.
 */
export function parseDocument(text: string, filePath: string, format = detectFormat(filePath, text)): unknown {
  if (format === 'json') {
    try {
      return JSON.parse(text);
    } catch (error) {
      const message = errorMessage(error);
      const position = /at position (\d+)/.exec(message);
      if (position) {
        const { line, column } = offsetToLineColumn(text, Number(position[1]));
        return failSyntax(message, filePath, line, column);
      }
      return failSyntax(message, filePath);
    }
  }

  try {
    return yaml.load(text, { filename: filePath });
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      return error.mark
        ? failSyntax(error.reason, filePath, error.mark.line + 1, error.mark.column + 1)
        : failSyntax(error.reason, filePath);
    }
    throw error;
  }
}

function failSyntax(message: string, file: string, line?: number, column?: number): never {
  throw MetadataError.syntax(message, file, line, column);
}

function issuesToErrors(issues: z.ZodIssue[], raw: unknown, file: string): MetadataError[] {
  return issues.flatMap((issue) => {
    if (issue.code === 'unrecognized_keys') {
      return issue.keys.map((key) => MetadataError.unknownField(formatPath([...issue.path, key]), file));
    }

    const field = formatPath(issue.path) || '<document>';
    const value = issue.path.length > 0 ? getPath(raw, issue.path) : raw;
    if (value === undefined) {
      return [MetadataError.missingField(field, file)];
    }

    const expected = issue.code === 'invalid_type' ? issue.expected : issue.message;
    return [MetadataError.typeMismatch(field, expected, describeType(value), file)];
  });
}

export function parseRegisterInclude(reference: string): RegisterInclude {
  const hash = reference.lastIndexOf('#');
  if (hash < 0) {
    return { document: reference };
  }
  return { document: reference.slice(0, hash), peripheral: reference.slice(hash + 1) };
}

export function descriptorId(vendor: string, family: string, peripheral: string): string {
  return `${vendor}/${family}/${peripheral}`.toLowerCase();
}

function toDescriptor(
  doc: PeripheralDocument,
  sourcePath: string,
  sourceHash: string
): Analysis<PeripheralDescriptor> {
  const errors: MetadataError[] = [];
  const policyMethods: Record<string, PolicyMethodSpec> = {};

  for (const [name, method] of Object.entries(doc.policy_methods)) {
    try {
      policyMethods[name] = {
        name,
        description: method.description,
        parameters: method.parameters,
        returnType: method.return_type,
        code: method.code,
        operations: parseOperations(method.code),
        ...(method.test_hook !== undefined && { testHook: method.test_hook }),
      };
    } catch (error) {
      if (!(error instanceof OperationSyntaxError)) throw error;
      errors.push(MetadataError.codeSyntax(name, sourcePath, error.line, error.column, error.message));
    }
  }

  if (errors.length > 0) {
    return { errors };
  }

  const descriptor: PeripheralDescriptor = {
    id: descriptorId(doc.vendor, doc.family, doc.peripheral_name),
    family: doc.family,
    vendor: doc.vendor,
    peripheralName: doc.peripheral_name,
    ...(doc.description !== undefined && { description: doc.description }),
    ...(doc.register_include !== undefined && {
      registerInclude: parseRegisterInclude(doc.register_include),
    }),
    templateParams: doc.template_params,
    constants: doc.constants,
    policyMethods,
    instances: doc.instances.map((instance) => ({
      name: instance.name,
      base: instance.base,
      ...(instance.clock !== undefined && { clock: instance.clock }),
      params: instance.params ?? {},
    })),
    ...(doc.registers !== undefined && {
      registers: Object.fromEntries(
        Object.entries(doc.registers).map(([name, reg]) => [
          name,
          { offset: reg.offset, fields: reg.fields ?? {} },
        ])
      ),
    }),
    sourcePath,
    sourceHash,
  };

  return { value: descriptor, errors };
}

/**
 * Merge constant lists; a later list overrides earlier entries of the same
 * name in place and appends new ones.
 */
export function mergeConstants(...layers: readonly ConstantSpec[][]): ConstantSpec[] {
  const merged = new Map<string, ConstantSpec>();
  for (const layer of layers) {
    for (const constant of layer) {
      merged.set(constant.name, { ...constant });
    }
  }
  return [...merged.values()];
}

export interface ResolveOptions {
  vendor?: VendorDescriptor;
  family?: FamilyDescriptor;
}

export class MetadataStore {
  private logger: Logger;

  constructor(logger: Logger = log) {
    this.logger = logger.child({ operation: 'metadata' });
  }

  async load(filePath: string): Promise<PeripheralDescriptor> {
    const text = await fs.readFile(filePath, 'utf8');
    return this.parse(text, filePath);
  }

  /**
   * Validate an in-memory document as if it had been read from `filePath`.
   */
  parse(text: string, filePath: string): PeripheralDescriptor {
    const { value, errors } = this.analyze(text, filePath);
    if (!value) {
      throw errors[0];
    }
    this.logger.debug('Loaded peripheral descriptor', {
      descriptorId: value.id,
      methods: Object.keys(value.policyMethods).length,
      instances: value.instances.length,
    });
    return deepFreeze(value);
  }

  /**
   * Run every load-time check and report all problems instead of throwing on
   * the first one.
   */
  async validate(filePath: string): Promise<ValidationResult> {
    const started = Date.now();
    let analysis: Analysis<PeripheralDescriptor>;

    try {
      const text = await fs.readFile(filePath, 'utf8');
      analysis = this.analyze(text, filePath);
    } catch (error) {
      return {
        stage: 'metadata',
        passed: false,
        diagnostics: [toDiagnostic(error)],
        metadata: { file: filePath },
        duration: Date.now() - started,
      };
    }

    return {
      stage: 'metadata',
      passed: analysis.errors.length === 0,
      diagnostics: analysis.errors.map(toDiagnostic),
      metadata: {
        file: filePath,
        ...(analysis.value && { descriptorId: analysis.value.id }),
      },
      duration: Date.now() - started,
    };
  }

  async loadVendor(filePath: string): Promise<VendorDescriptor> {
    const text = await fs.readFile(filePath, 'utf8');
    const raw = parseDocument(text, filePath);
    const result = VendorDocumentSchema.safeParse(raw);
    if (!result.success) {
      throw issuesToErrors(result.error.issues, raw, filePath)[0];
    }
    return deepFreeze({
      id: result.data.vendor.toLowerCase(),
      vendor: result.data.vendor,
      ...(result.data.description !== undefined && { description: result.data.description }),
      constants: result.data.constants,
      sourcePath: filePath,
      sourceHash: sha256(text),
    });
  }

  async loadFamily(filePath: string): Promise<FamilyDescriptor> {
    const text = await fs.readFile(filePath, 'utf8');
    const raw = parseDocument(text, filePath);
    const result = FamilyDocumentSchema.safeParse(raw);
    if (!result.success) {
      throw issuesToErrors(result.error.issues, raw, filePath)[0];
    }
    return deepFreeze({
      id: `${result.data.vendor}/${result.data.family}`.toLowerCase(),
      vendor: result.data.vendor,
      family: result.data.family,
      ...(result.data.description !== undefined && { description: result.data.description }),
      constants: result.data.constants,
      sourcePath: filePath,
      sourceHash: sha256(text),
    });
  }

  /**
   * Produce a descriptor whose constants inherit from its vendor and family
   * documents (vendor < family < peripheral).
   */
  resolve(descriptor: PeripheralDescriptor, options: ResolveOptions = {}): PeripheralDescriptor {
    const { vendor, family } = options;

    if (vendor && vendor.vendor.toLowerCase() !== descriptor.vendor.toLowerCase()) {
      throw MetadataError.typeMismatch('vendor', vendor.vendor, descriptor.vendor, descriptor.sourcePath);
    }
    if (family) {
      if (family.vendor.toLowerCase() !== descriptor.vendor.toLowerCase()) {
        throw MetadataError.typeMismatch('vendor', family.vendor, descriptor.vendor, descriptor.sourcePath);
      }
      if (family.family.toLowerCase() !== descriptor.family.toLowerCase()) {
        throw MetadataError.typeMismatch('family', family.family, descriptor.family, descriptor.sourcePath);
      }
    }

    return deepFreeze({
      ...structuredClone(descriptor),
      constants: mergeConstants(vendor?.constants ?? [], family?.constants ?? [], descriptor.constants),
    });
  }

  private analyze(text: string, filePath: string): Analysis<PeripheralDescriptor> {
    const raw = parseDocument(text, filePath);
    const result = PeripheralDocumentSchema.safeParse(raw);
    if (!result.success) {
      return { errors: issuesToErrors(result.error.issues, raw, filePath) };
    }
    return toDescriptor(result.data, filePath, sha256(text));
  }
}
