/**
 * Declarative corrections for known errors in vendor register descriptions.
 *
 *   quirks:
 *     - peripheral: USART1
 *       register: BRR
 *       set: { offset: 0x08 }
 *     - peripheral: GPIOA
 *       register: "AFR[%s]"
 *       set: { dim: 2, dimIncrement: 4 }
 *     - peripheral: TIM2
 *       register: CR1
 *       field: CKD
 *       set: { bitOffset: 8, bitWidth: 2 }
 *     - peripheral: DBGMCU
 *       remove: true
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { RegisterAccess } from '../../types';
import { errorMessage, ImportError } from '../../utils/errors';
import { formatPath } from '../../utils/object';
import { AddressSchema } from '../metadata/metadata-schema';

const AccessSchema = z.enum(['read-only', 'write-only', 'read-write', 'writeOnce', 'read-writeOnce']);

const QuirkSchema = z
  .object({
    peripheral: z.string().min(1),
    register: z.string().min(1).optional(),
    field: z.string().min(1).optional(),
    remove: z.boolean().optional(),
    set: z
      .object({
        baseAddress: AddressSchema.optional(),
        offset: AddressSchema.optional(),
        dim: z.number().int().positive().optional(),
        dimIncrement: AddressSchema.optional(),
        size: z.number().int().positive().optional(),
        access: AccessSchema.optional(),
        bitOffset: z.number().int().nonnegative().optional(),
        bitWidth: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    reason: z.string().optional(),
  })
  .strict()
  .refine((quirk) => !quirk.field || quirk.register !== undefined, { message: 'field quirk needs a register' })
  .refine((quirk) => quirk.remove === true || quirk.set !== undefined, { message: 'quirk needs set or remove' });

export const QuirkFileSchema = z.object({ quirks: z.array(QuirkSchema) }).strict();

export type Quirk = z.infer<typeof QuirkSchema>;

// Unexpanded peripheral model the quirks operate on.

export interface DimSpec {
  count: number;
  increment: number;
  index?: string[];
}

export interface FieldNode {
  name: string;
  bitOffset: number;
  bitWidth: number;
  access?: RegisterAccess;
}

export interface RegisterNode {
  name: string;
  offset: number;
  size: number;
  access: RegisterAccess;
  resetValue?: number;
  dim?: DimSpec;
  fields: FieldNode[];
}

export interface PeripheralNode {
  name: string;
  groupName?: string;
  baseAddress: number;
  registers: RegisterNode[];
}

const PERIPHERAL_KEYS = new Set(['baseAddress']);
const REGISTER_KEYS = new Set(['offset', 'dim', 'dimIncrement', 'size', 'access']);
const FIELD_KEYS = new Set(['bitOffset', 'bitWidth', 'access']);

export function quirkPathFor(documentPath: string): string[] {
  const ext = path.extname(documentPath);
  const stem = ext ? documentPath.slice(0, -ext.length) : documentPath;
  return [`${stem}.quirks.yaml`, `${stem}.quirks.yml`, `${stem}.quirks.json`];
}

export async function loadQuirks(file: string): Promise<Quirk[]> {
  const text = await fs.readFile(file, 'utf8');
  let raw: unknown;
  try {
    raw = file.endsWith('.json') ? JSON.parse(text) : yaml.load(text, { filename: file });
  } catch (error) {
    throw new ImportError('MalformedDocument', `Cannot parse quirk file ${file}: ${errorMessage(error)}`, {
      operation: 'loadQuirks',
      file,
    });
  }

  const result = QuirkFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ImportError('MalformedDocument', `Invalid quirk file ${file} at '${formatPath(issue.path)}': ${issue.message}`, {
      operation: 'loadQuirks',
      file,
    });
  }
  return result.data.quirks;
}

/**
 * Find the quirk file that sits next to a document, if any.
 */
export async function findQuirkFile(documentPath: string): Promise<string | undefined> {
  for (const candidate of quirkPathFor(documentPath)) {
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      continue;
    }
  }
  return undefined;
}

function describeTarget(quirk: Quirk): string {
  return [quirk.peripheral, quirk.register, quirk.field].filter(Boolean).join('.');
}

function checkKeys(quirk: Quirk, allowed: Set<string>, level: string, document: string): void {
  for (const key of Object.keys(quirk.set ?? {})) {
    if (!allowed.has(key)) {
      throw new ImportError('MalformedDocument', `Quirk key '${key}' does not apply to a ${level} (${describeTarget(quirk)})`, {
        operation: 'applyQuirks',
        file: document,
      });
    }
  }
}

function unknownTarget(quirk: Quirk, document: string): ImportError {
  return new ImportError('UnknownQuirkTarget', `Quirk target ${describeTarget(quirk)} does not exist in ${document}`, {
    operation: 'applyQuirks',
    file: document,
    target: describeTarget(quirk),
  });
}

function applyToRegister(register: RegisterNode, quirk: Quirk): RegisterNode {
  const set = quirk.set ?? {};
  const next: RegisterNode = {
    ...register,
    ...(set.offset !== undefined && { offset: set.offset }),
    ...(set.size !== undefined && { size: set.size }),
    ...(set.access !== undefined && { access: set.access }),
  };
  if (set.dim !== undefined || set.dimIncrement !== undefined) {
    const count = set.dim ?? register.dim?.count ?? 1;
    next.dim = {
      count,
      increment: set.dimIncrement ?? register.dim?.increment ?? register.size / 8,
      // An explicit index list no longer fits once the count changes.
      ...(register.dim?.index && register.dim.index.length === count && { index: register.dim.index }),
    };
  }
  return next;
}

function applyToField(field: FieldNode, quirk: Quirk): FieldNode {
  const set = quirk.set ?? {};
  return {
    ...field,
    ...(set.bitOffset !== undefined && { bitOffset: set.bitOffset }),
    ...(set.bitWidth !== undefined && { bitWidth: set.bitWidth }),
    ...(set.access !== undefined && { access: set.access }),
  };
}

/**
 * Apply quirks in order to the unexpanded peripherals of one document.
 * Returns a new list; the input is left untouched.
 */
export function applyQuirks(
  peripherals: readonly PeripheralNode[],
  quirks: readonly Quirk[],
  document: string
): PeripheralNode[] {
  let result = peripherals.map((p) => ({ ...p, registers: [...p.registers] }));

  for (const quirk of quirks) {
    const pIndex = result.findIndex((p) => p.name === quirk.peripheral);
    if (pIndex < 0) {
      throw unknownTarget(quirk, document);
    }
    const peripheral = result[pIndex];

    if (!quirk.register) {
      if (quirk.remove) {
        result = result.filter((_, i) => i !== pIndex);
        continue;
      }
      checkKeys(quirk, PERIPHERAL_KEYS, 'peripheral', document);
      result[pIndex] = { ...peripheral, baseAddress: quirk.set?.baseAddress ?? peripheral.baseAddress };
      continue;
    }

    const rIndex = peripheral.registers.findIndex((r) => r.name === quirk.register);
    if (rIndex < 0) {
      throw unknownTarget(quirk, document);
    }
    const register = peripheral.registers[rIndex];
    const registers = [...peripheral.registers];

    if (!quirk.field) {
      if (quirk.remove) {
        registers.splice(rIndex, 1);
      } else {
        checkKeys(quirk, REGISTER_KEYS, 'register', document);
        registers[rIndex] = applyToRegister(register, quirk);
      }
      result[pIndex] = { ...peripheral, registers };
      continue;
    }

    const fIndex = register.fields.findIndex((f) => f.name === quirk.field);
    if (fIndex < 0) {
      throw unknownTarget(quirk, document);
    }
    const fields = [...register.fields];
    if (quirk.remove) {
      fields.splice(fIndex, 1);
    } else {
      checkKeys(quirk, FIELD_KEYS, 'field', document);
      fields[fIndex] = applyToField(fields[fIndex], quirk);
    }
    registers[rIndex] = { ...register, fields };
    result[pIndex] = { ...peripheral, registers };
  }

  return result;
}
