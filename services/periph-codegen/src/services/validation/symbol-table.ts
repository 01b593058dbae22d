/**
 * Symbol table of a generated header: banner metadata, the register layout
 * (offsets, bitfield positions, widths and masks), instance base addresses and
 * any non-static members declared on the policy struct.
 */

import { parseInteger } from '../hardware/svd-importer';

export interface SymbolField {
  name: string;
  position?: number;
  width?: number;
  mask?: number;
  line: number;
}

export interface SymbolRegister {
  name: string;
  offset?: number;
  fields: SymbolField[];
  line: number;
}

export interface SymbolInstance {
  name: string;
  base: number;
  line: number;
}

export interface SymbolMethod {
  name: string;
  arity: number;
  line: number;
}

export interface InstanceField {
  text: string;
  line: number;
}

export interface SymbolTable {
  peripheral?: string;
  descriptorId?: string;
  inputHash?: string;
  namespace?: string;
  layoutName?: string;
  policyName?: string;
  registers: SymbolRegister[];
  instances: SymbolInstance[];
  /** `using XHardware = ...HardwarePolicy<...>;` aliases, in order. */
  aliases: string[];
  methods: SymbolMethod[];
  instanceFields: InstanceField[];
}

type Scope =
  | { kind: 'namespace'; name: string }
  | { kind: 'layout' }
  | { kind: 'register'; register: SymbolRegister }
  | { kind: 'field'; field: SymbolField }
  | { kind: 'policy' }
  | { kind: 'block' };

const STRUCT_OPEN = /^(?:template\s*<[^>]*>\s*)?struct\s+(\w+)\s*\{/;
const NAMESPACE_OPEN = /^namespace\s+([\w:]+)\s*\{/;
const OFFSET = /^static\s+constexpr\s+std::size_t\s+offset\s*=\s*(\w+?)[uU]?;/;
const FIELD_VALUE = /^static\s+constexpr\s+std::uint(?:8|16|32|64)_t\s+(position|width|mask)\s*=\s*(\w+?)[uU]?;/;
const INSTANCE_BASE = /^constexpr\s+std::uintptr_t\s+(\w+)_BASE\s*=\s*(\w+?)[uU]?;/;
const METHOD = /^static\s+inline\s+.+?\b(\w+)\s*\(([^)]*)\)\s*noexcept\s*\{/;
const ALIAS = /^using\s+(\w+)\s*=\s*\w+HardwarePolicy\s*</;
const ALLOWED_MEMBER = /^(static|using|template|typedef|friend|enum|struct|class|public:|private:|protected:|\/\/)/;

function numberOf(token: string): number | undefined {
  return parseInteger(token);
}

export function parseSymbolTable(text: string): SymbolTable {
  const table: SymbolTable = { registers: [], instances: [], aliases: [], methods: [], instanceFields: [] };
  const stack: Scope[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = index + 1;
    const trimmed = raw.trim();
    const top = stack[stack.length - 1];

    const banner = /^\/\/\s*(peripheral|descriptor|input-hash):\s*(\S+)/.exec(trimmed);
    if (banner && stack.length === 0) {
      if (banner[1] === 'peripheral') table.peripheral = banner[2];
      else if (banner[1] === 'descriptor') table.descriptorId = banner[2];
      else table.inputHash = banner[2];
      return;
    }

    let opened: Scope | undefined;
    const ns = NAMESPACE_OPEN.exec(trimmed);
    const struct = STRUCT_OPEN.exec(trimmed);

    if (ns) {
      opened = { kind: 'namespace', name: ns[1] };
      table.namespace = table.namespace ? `${table.namespace}::${ns[1]}` : ns[1];
    } else if (struct) {
      const name = struct[1];
      if (top?.kind === 'layout') {
        const register: SymbolRegister = { name, fields: [], line };
        table.registers.push(register);
        opened = { kind: 'register', register };
      } else if (top?.kind === 'register') {
        const field: SymbolField = { name, line };
        top.register.fields.push(field);
        opened = { kind: 'field', field };
      } else if (name.endsWith('RegisterLayout')) {
        table.layoutName = name;
        opened = { kind: 'layout' };
      } else if (name.endsWith('HardwarePolicy')) {
        table.policyName = name;
        opened = { kind: 'policy' };
      }
    } else if (top?.kind === 'register') {
      const offset = OFFSET.exec(trimmed);
      if (offset) top.register.offset = numberOf(offset[1]);
    } else if (top?.kind === 'field') {
      const value = FIELD_VALUE.exec(trimmed);
      if (value) top.field[value[1] === 'position' ? 'position' : value[1] === 'width' ? 'width' : 'mask'] = numberOf(value[2]);
    } else if (top?.kind === 'policy') {
      const method = METHOD.exec(trimmed);
      if (method && method[1] !== 'reg') {
        const params = method[2].trim();
        table.methods.push({ name: method[1], arity: params ? params.split(',').length : 0, line });
      }
      // Declarations only: a line that opens or closes a brace is a scope edge.
      if (trimmed.endsWith(';') && !/[{}]/.test(trimmed) && !ALLOWED_MEMBER.test(trimmed)) {
        table.instanceFields.push({ text: trimmed, line });
      }
    }

    if (top === undefined || top.kind === 'namespace') {
      const instance = INSTANCE_BASE.exec(trimmed);
      const base = instance ? numberOf(instance[2]) : undefined;
      if (instance && base !== undefined) {
        table.instances.push({ name: instance[1], base, line });
      }
      const alias = ALIAS.exec(trimmed);
      if (alias) {
        table.aliases.push(alias[1]);
      }
    }

    // Brace bookkeeping: the first `{` of a recognized declaration opens its
    // scope, every other `{` opens an anonymous block.
    for (const ch of trimmed.replace(/\/\/.*$/, '')) {
      if (ch === '{') {
        stack.push(opened ?? { kind: 'block' });
        opened = undefined;
      } else if (ch === '}') {
        stack.pop();
      }
    }
  });

  return table;
}

export function findRegister(table: SymbolTable, name: string): SymbolRegister | undefined {
  return table.registers.find((register) => register.name === name);
}
