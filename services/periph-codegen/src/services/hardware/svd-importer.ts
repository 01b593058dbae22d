/**
 * SVD Importer
 *
 * Parses CMSIS SVD documents into normalized register maps. Register property
 * defaults cascade device → peripheral → cluster → register, `derivedFrom`
 * copies the base element, clusters are flattened into `CLUSTER_REG` names and
 * `dim` arrays are expanded after quirks have been applied.
 */

import * as fs from 'fs/promises';
import { parseStringPromise } from 'xml2js';
import type { Bitfield, Register, RegisterAccess, RegisterMap, RegisterMapIndex } from '../../types';
import { errorMessage, ImportError } from '../../utils/errors';
import { deepFreeze, formatPath } from '../../utils/object';
import { log, Logger } from '../../utils/logger';
import {
  applyQuirks,
  DimSpec,
  FieldNode,
  findQuirkFile,
  loadQuirks,
  PeripheralNode,
  Quirk,
  RegisterNode,
} from './quirks';
import { mergeIndexes } from './register-map';
import {
  elements,
  RawCluster,
  RawField,
  RawPeripheral,
  RawRegister,
  RawRegisterBlock,
  RawSvdDocument,
  RawSvdDocumentSchema,
} from './svd-schema';

interface RegisterProperties {
  size: number;
  access: RegisterAccess;
  resetValue?: number;
}

export interface ImportOptions {
  /** Quirk file path or inline quirks; `false` disables the sibling file lookup. */
  quirks?: string | Quirk[] | false;
}

export interface ImportSource extends ImportOptions {
  path: string;
}

const ACCESS_VALUES: readonly RegisterAccess[] = ['read-only', 'write-only', 'read-write', 'writeOnce', 'read-writeOnce'];

export function parseInteger(value: string): number | undefined {
  const v = value.trim().toLowerCase();
  if (/^0b[01]+$/.test(v)) return parseInt(v.substring(2), 2);
  if (/^0x[0-9a-f]+$/.test(v)) return parseInt(v.substring(2), 16);
  if (/^#[01]+$/.test(v)) return parseInt(v.substring(1), 2);
  if (/^[0-9]+$/.test(v)) return parseInt(v, 10);
  return undefined;
}

export function parseDimIndex(dimIndex: string, count: number): string[] {
  if (dimIndex.includes(',')) {
    const components = dimIndex.split(',').map((c) => c.trim());
    if (components.length !== count) {
      throw new Error(`dimIndex '${dimIndex}' lists ${components.length} entries, expected ${count}`);
    }
    return components;
  }

  const range = /^(\d+)-(\d+)$/.exec(dimIndex.trim());
  if (range) {
    const start = Number(range[1]);
    const end = Number(range[2]);
    if (end < start || end - start + 1 < count) {
      throw new Error(`dimIndex range '${dimIndex}' does not cover ${count} entries`);
    }
    return Array.from({ length: count }, (_, i) => `${start + i}`);
  }

  const letters = /^([A-Z])-([A-Z])$/.exec(dimIndex.trim());
  if (letters) {
    const start = letters[1].charCodeAt(0);
    return Array.from({ length: count }, (_, i) => String.fromCharCode(start + i));
  }

  throw new Error(`dimIndex '${dimIndex}' is not a list or a range`);
}

/** `AFR[%s]` and `AFR%s` both expand to `AFR0`, `AFR1`, ... */
export function expandName(template: string, index: string): string {
  return template.replace('[%s]', index).replace('%s', index);
}

class DocumentReader {
  constructor(private readonly document: string) {}

  malformed(message: string, extra: Record<string, unknown> = {}): ImportError {
    return new ImportError('MalformedDocument', `${this.document}: ${message}`, {
      operation: 'import',
      file: this.document,
      ...extra,
    });
  }

  integer(value: string[] | undefined, what: string): number | undefined {
    if (!value) return undefined;
    const parsed = parseInteger(value[0]);
    if (parsed === undefined) {
      throw this.malformed(`${what} '${value[0]}' is not an integer`);
    }
    return parsed;
  }

  required(value: string[] | undefined, what: string): number {
    const parsed = this.integer(value, what);
    if (parsed === undefined) {
      throw this.malformed(`${what} is missing`);
    }
    return parsed;
  }

  access(value: string[] | undefined, fallback: RegisterAccess): RegisterAccess {
    if (!value) return fallback;
    const match = ACCESS_VALUES.find((a) => a === value[0]);
    if (!match) {
      throw this.malformed(`unknown access '${value[0]}'`);
    }
    return match;
  }

  properties(
    node: { size?: string[]; access?: string[]; resetValue?: string[] },
    inherited: RegisterProperties,
    what: string
  ): RegisterProperties {
    const resetValue = this.integer(node.resetValue, `${what} resetValue`) ?? inherited.resetValue;
    return {
      size: this.integer(node.size, `${what} size`) ?? inherited.size,
      access: this.access(node.access, inherited.access),
      ...(resetValue !== undefined && { resetValue }),
    };
  }

  dim(node: { name: string[]; dim?: string[]; dimIncrement?: string[]; dimIndex?: string[] }): DimSpec | undefined {
    const name = node.name[0];
    const count = this.integer(node.dim, `${name} dim`);
    if (count === undefined) return undefined;
    if (count < 1) {
      throw this.malformed(`${name} has an invalid dim ${count}`);
    }
    const increment = this.integer(node.dimIncrement, `${name} dimIncrement`) ?? 0;
    if (!increment && count > 1) {
      throw this.malformed(`${name} has dim ${count} without a dimIncrement`);
    }
    if (!node.dimIndex) {
      return { count, increment };
    }
    try {
      return { count, increment, index: parseDimIndex(node.dimIndex[0], count) };
    } catch (error) {
      throw this.malformed(`${name}: ${errorMessage(error)}`);
    }
  }

  field(raw: RawField, register: string, size: number): FieldNode {
    const name = raw.name[0];
    const what = `field ${register}.${name}`;
    let bitOffset: number;
    let bitWidth: number;

    if (raw.bitOffset && raw.bitWidth) {
      bitOffset = this.required(raw.bitOffset, `${what} bitOffset`);
      bitWidth = this.required(raw.bitWidth, `${what} bitWidth`);
    } else if (raw.bitRange) {
      const range = /^\[(\w+):(\w+)\]$/.exec(raw.bitRange[0].trim());
      if (!range) {
        throw this.malformed(`${what} has an invalid bitRange '${raw.bitRange[0]}'`);
      }
      const msb = this.required([range[1]], `${what} msb`);
      const lsb = this.required([range[2]], `${what} lsb`);
      bitOffset = lsb;
      bitWidth = msb - lsb + 1;
    } else if (raw.lsb && raw.msb) {
      const lsb = this.required(raw.lsb, `${what} lsb`);
      bitOffset = lsb;
      bitWidth = this.required(raw.msb, `${what} msb`) - lsb + 1;
    } else {
      throw this.malformed(`${what} needs bitOffset and bitWidth, bitRange, or lsb and msb`);
    }

    if (bitWidth < 1 || bitOffset + bitWidth > size) {
      throw this.malformed(`${what} [${bitOffset}+${bitWidth}] does not fit a ${size}-bit register`);
    }

    return {
      name,
      bitOffset,
      bitWidth,
      ...(raw.access && { access: this.access(raw.access, 'read-write') }),
    };
  }

  register(raw: RawRegister, inherited: RegisterProperties, prefix: string, baseOffset: number): RegisterNode {
    const name = raw.name[0];
    const props = this.properties(raw, inherited, `register ${name}`);
    const dim = this.dim(raw);
    const fieldList = elements(raw.fields).flatMap((block) => block.field ?? []);

    return {
      name: prefix ? `${prefix}_${name}` : name,
      offset: baseOffset + this.required(raw.addressOffset, `register ${name} addressOffset`),
      ...props,
      ...(dim && { dim }),
      fields: fieldList.map((field) => this.field(field, name, props.size)),
    };
  }

  /**
   * Resolve register-level `derivedFrom` within one block; the derived
   * register keeps its own name and offset.
   */
  derivedRegisters(registers: RawRegister[]): RawRegister[] {
    const byName = new Map(registers.map((r) => [r.name[0], r]));
    return registers.map((r) => {
      const from = r.$?.derivedFrom;
      if (!from) return r;
      const base = byName.get(from);
      if (!base) {
        throw this.malformed(`register ${r.name[0]} derives from unknown register ${from}`);
      }
      return { ...base, ...r, $: {} };
    });
  }

  block(block: RawRegisterBlock, inherited: RegisterProperties, prefix: string, baseOffset: number): RegisterNode[] {
    const registers = this.derivedRegisters(block.register ?? []).map((r) =>
      this.register(r, inherited, prefix, baseOffset)
    );
    const clustered = (block.cluster ?? []).flatMap((c) => this.cluster(c, inherited, prefix, baseOffset));
    return [...registers, ...clustered];
  }

  cluster(raw: RawCluster, inherited: RegisterProperties, prefix: string, baseOffset: number): RegisterNode[] {
    const name = raw.name[0];
    const props = this.properties(raw, inherited, `cluster ${name}`);
    const offset = baseOffset + this.required(raw.addressOffset, `cluster ${name} addressOffset`);
    const dim = this.dim(raw);
    const copies = dim
      ? Array.from({ length: dim.count }, (_, i) => ({
          name: expandName(name, dim.index?.[i] ?? `${i}`),
          offset: offset + dim.increment * i,
        }))
      : [{ name, offset }];

    return copies.flatMap((copy) =>
      this.block(raw, props, prefix ? `${prefix}_${copy.name}` : copy.name, copy.offset)
    );
  }

  peripheral(raw: RawPeripheral, defaults: RegisterProperties): PeripheralNode {
    const name = raw.name[0];
    const props = this.properties(raw, defaults, `peripheral ${name}`);
    const registers = elements(raw.registers).flatMap((block) => this.block(block, props, '', 0));

    return {
      name,
      ...(raw.groupName && { groupName: raw.groupName[0] }),
      baseAddress: this.required(raw.baseAddress, `peripheral ${name} baseAddress`),
      registers,
    };
  }
}

type ExpandedRegister = Omit<RegisterNode, 'dim'>;

function expandRegisters(registers: readonly RegisterNode[]): ExpandedRegister[] {
  return registers.flatMap((node): ExpandedRegister[] => {
    const { dim, ...rest } = node;
    if (!dim) {
      return [{ ...rest }];
    }
    return Array.from({ length: dim.count }, (_, i) => ({
      ...rest,
      name: expandName(node.name, dim.index?.[i] ?? `${i}`),
      offset: node.offset + dim.increment * i,
    }));
  });
}

function toRegisterMap(
  node: PeripheralNode,
  sourceDocument: string,
  device: string | undefined,
  reader: DocumentReader
): RegisterMap {
  const registers = expandRegisters(node.registers)
    .map(({ fields, ...register }): Register => ({
      ...register,
      fields: fields.map((f) => ({ register: register.name, ...f })),
    }))
    .sort((a, b) => a.offset - b.offset || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const seen = new Set<string>();
  const bitfields: Record<string, Bitfield> = {};
  for (const register of registers) {
    if (seen.has(register.name)) {
      throw reader.malformed(`peripheral ${node.name} defines register ${register.name} twice`);
    }
    seen.add(register.name);
    for (const field of register.fields) {
      bitfields[`${register.name}.${field.name}`] = field;
    }
  }

  return {
    peripheralName: node.name,
    ...(node.groupName !== undefined && { groupName: node.groupName }),
    baseAddress: node.baseAddress,
    registers,
    bitfields,
    sourceDocument,
    ...(device !== undefined && { device }),
  };
}

export class SvdImporter {
  private logger: Logger;

  constructor(logger: Logger = log) {
    this.logger = logger.child({ operation: 'import' });
  }

  async import(documentPath: string, options: ImportOptions = {}): Promise<RegisterMapIndex> {
    const xml = await fs.readFile(documentPath, 'utf8');
    const quirks = await this.resolveQuirks(documentPath, options.quirks);
    return this.parse(xml, documentPath, quirks);
  }

  /**
   * Import several documents into one index. A peripheral defined by more
   * than one document is a Conflict.
   */
  async importAll(sources: readonly (string | ImportSource)[]): Promise<RegisterMapIndex> {
    const indexes: RegisterMapIndex[] = [];
    for (const source of sources) {
      const { path, ...options } = typeof source === 'string' ? { path: source } : source;
      indexes.push(await this.import(path, options));
    }
    return mergeIndexes(indexes);
  }

  async parse(xml: string, documentPath: string, quirks: readonly Quirk[] = []): Promise<RegisterMapIndex> {
    const reader = new DocumentReader(documentPath);
    let parsed: unknown;
    try {
      parsed = await parseStringPromise(xml, { explicitArray: true, trim: true });
    } catch (error) {
      throw reader.malformed(`invalid XML: ${errorMessage(error).split('\n')[0]}`);
    }

    const result = RawSvdDocumentSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw reader.malformed(`unexpected structure at '${formatPath(issue.path)}': ${issue.message}`);
    }

    const document: RawSvdDocument = result.data;
    const device = document.device;
    const defaults = reader.properties(device, { size: 32, access: 'read-write', resetValue: 0 }, 'device');
    const rawPeripherals = elements(device.peripherals).flatMap((block) => block.peripheral ?? []);

    const byName = new Map<string, RawPeripheral>();
    for (const p of rawPeripherals) {
      if (byName.has(p.name[0])) {
        throw reader.malformed(`peripheral ${p.name[0]} is defined twice`);
      }
      byName.set(p.name[0], p);
    }

    const nodes = rawPeripherals.map((p) => {
      const from = p.$?.derivedFrom;
      if (!from) return reader.peripheral(p, defaults);
      const base = byName.get(from);
      if (!base) {
        throw reader.malformed(`peripheral ${p.name[0]} derives from unknown peripheral ${from}`);
      }
      return reader.peripheral({ ...base, ...p, $: {} }, defaults);
    });

    const patched = applyQuirks(nodes, quirks, documentPath);
    const deviceName = device.name?.[0];
    const peripherals: Record<string, RegisterMap> = {};
    for (const node of patched) {
      peripherals[node.name] = toRegisterMap(node, documentPath, deviceName, reader);
    }

    this.logger.info('Imported register description', {
      file: documentPath,
      device: deviceName,
      peripherals: patched.length,
      quirks: quirks.length,
    });

    return deepFreeze({
      peripherals,
      documents: [documentPath],
      devices: deviceName ? [deviceName] : [],
    });
  }

  private async resolveQuirks(documentPath: string, quirks: ImportOptions['quirks']): Promise<Quirk[]> {
    if (quirks === false) return [];
    if (Array.isArray(quirks)) return quirks;
    if (typeof quirks === 'string') return loadQuirks(quirks);

    const sibling = await findQuirkFile(documentPath);
    if (!sibling) return [];
    this.logger.debug('Using sibling quirk file', { file: sibling });
    return loadQuirks(sibling);
  }
}
