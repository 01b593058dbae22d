/**
 * Policy Renderer
 *
 * Renders a descriptor and its register map into one C++17 header: the
 * register layout, a stateless policy struct template with one static accessor
 * per policy method, and a `using` alias per instance. Output depends only on
 * the inputs; there are no timestamps and every list has a fixed order.
 */

import * as path from 'path';
import type {
  ConstantValue,
  PeripheralDescriptor,
  PolicyMethodSpec,
  OperandValue,
  RegisterMap,
  RegisterOperation,
  RenderedText,
  TemplateParam,
} from '../../types';
import { config } from '../../config';
import { RenderError } from '../../utils/errors';
import { computeInputHash, sha256, stableStringify } from '../../utils/hash';
import { deepFreeze, toHex } from '../../utils/object';
import { getBitfield, getRegister, registerMapHash } from '../hardware/register-map';
import { renderTemplate, toCppType, toSnake, TemplateVariables } from './template';
import { getTemplate, TemplateName } from './templates';

export interface LayoutField {
  name: string;
  position: number;
  width: number;
  mask: number;
}

export interface LayoutRegister {
  name: string;
  offset: number;
  size: number;
  fields: LayoutField[];
}

export interface RenderOptions {
  namespaceRoot?: string;
}

const IMPLICIT_BASE: TemplateParam = { name: 'BASE_ADDR', type: 'uintptr_t' };

const byName = (a: { name: string }, b: { name: string }): number => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

export function fieldMask(position: number, width: number): number {
  return (2 ** width - 1) * 2 ** position;
}

/** Hex literal of a field mask, exact up to bit 63. */
export function maskLiteral(position: number, width: number): string {
  const mask = ((1n << BigInt(width)) - 1n) << BigInt(position);
  return `0x${mask.toString(16).toUpperCase().padStart(8, '0')}`;
}

function registerType(size: number): string {
  switch (size) {
    case 8:
      return 'std::uint8_t';
    case 16:
      return 'std::uint16_t';
    case 64:
      return 'std::uint64_t';
    default:
      return 'std::uint32_t';
  }
}

/**
 * The layout the header declares: the descriptor's own `registers` block when
 * present, otherwise the register map. Declared fields must fit their register.
 */
export function resolveLayout(descriptor: PeripheralDescriptor, map?: RegisterMap): LayoutRegister[] {
  if (descriptor.registers) {
    return Object.entries(descriptor.registers)
      .map(([name, declared]) => {
        const size = (map && getRegister(map, name)?.size) ?? 32;
        return {
          name,
          offset: declared.offset,
          size,
          fields: Object.entries(declared.fields)
            .map(([fieldName, f]) => {
              if (f.offset + f.width > size) {
                throw RenderError.fieldOutOfRange(name, fieldName, f.offset + f.width - 1, size);
              }
              return { name: fieldName, position: f.offset, width: f.width, mask: fieldMask(f.offset, f.width) };
            })
            .sort((a, b) => a.position - b.position || byName(a, b)),
        };
      })
      .sort((a, b) => a.offset - b.offset || byName(a, b));
  }

  if (!map) {
    return [];
  }

  return map.registers.map((register) => ({
    name: register.name,
    offset: register.offset,
    size: register.size,
    fields: [...register.fields]
      .sort((a, b) => a.bitOffset - b.bitOffset || byName(a, b))
      .map((f) => ({
        name: f.name,
        position: f.bitOffset,
        width: f.bitWidth,
        mask: fieldMask(f.bitOffset, f.bitWidth),
      })),
  }));
}

export function descriptorContentHash(descriptor: PeripheralDescriptor): string {
  const { sourcePath: _path, sourceHash: _hash, ...content } = descriptor;
  return sha256(stableStringify(content));
}

export function artifactFileName(descriptor: PeripheralDescriptor): string {
  return `${toSnake(descriptor.vendor)}/${toSnake(descriptor.family)}/${toSnake(descriptor.peripheralName)}_hal.hpp`;
}

function isUnsigned(type: string): boolean {
  return /uint|size_t|^u\d+$/.test(type);
}

export function formatValue(value: ConstantValue, type: string): string {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) && isUnsigned(type) && value >= 0 ? `${value}u` : String(value);
  }
  return type.includes('char') ? JSON.stringify(value) : value;
}

function policyParams(descriptor: PeripheralDescriptor): { params: TemplateParam[]; base: string } {
  const base = descriptor.templateParams.find((p) => /BASE/i.test(p.name));
  if (base) {
    return { params: descriptor.templateParams, base: base.name };
  }
  return { params: [IMPLICIT_BASE, ...descriptor.templateParams], base: IMPLICIT_BASE.name };
}

class HeaderWriter {
  private parts: string[] = [];

  emit(name: TemplateName, variables: TemplateVariables): this {
    this.parts.push(renderTemplate(getTemplate(name), variables));
    return this;
  }

  text(value: string): this {
    this.parts.push(value);
    return this;
  }

  toString(): string {
    return this.parts.join('');
  }
}

export class PolicyRenderer {
  private namespaceRoot: string;

  constructor(options: RenderOptions = {}) {
    this.namespaceRoot = options.namespaceRoot ?? config.generation.namespaceRoot;
  }

  render(descriptor: PeripheralDescriptor, registerMap?: RegisterMap): RenderedText {
    const layout = resolveLayout(descriptor, registerMap);
    const mockHook = [this.namespaceRoot.replace(/\W+/g, '_'), toSnake(descriptor.peripheralName), 'MOCK_HW']
      .join('_')
      .toUpperCase();
    const peripheral = registerMap?.peripheralName ?? descriptor.registerInclude?.peripheral ?? descriptor.peripheralName;
    const inputHash = computeInputHash([
      descriptorContentHash(descriptor),
      registerMap ? registerMapHash(registerMap) : '',
    ]);
    const namespace = `${this.namespaceRoot}::${toSnake(descriptor.vendor)}::${toSnake(descriptor.family)}`;
    const { params, base } = policyParams(descriptor);
    const out = new HeaderWriter();

    // Resolve every method body first so nothing is emitted for a descriptor
    // that cannot render.
    const methods = Object.values(descriptor.policyMethods).map((method) => ({
      method,
      body: this.renderBody(descriptor, method, layout, registerMap, params),
    }));
    const instances = descriptor.instances.map((instance) => ({
      name: instance.name,
      base: instance.base,
      args: params.map((param) => this.instanceArgument(instance, param, base)).join(', '),
    }));

    out.emit('banner', {
      source: path.basename(descriptor.sourcePath),
      peripheral,
      descriptor_id: descriptor.id,
      input_hash: inputHash,
      namespace,
    });

    out.emit('layoutOpen', { name: descriptor.peripheralName });
    for (const register of layout) {
      out.emit('registerOpen', { register: register.name, offset: register.offset });
      for (const field of register.fields) {
        out.emit('field', {
          field: field.name,
          position: field.position,
          width: field.width,
          mask_type: registerType(register.size),
          mask: maskLiteral(field.position, field.width),
        });
      }
      out.emit('registerClose', {});
    }
    out.emit('layoutClose', {});

    out.text('\n');
    if (descriptor.description) {
      out.emit('doc', { text: descriptor.description });
    }
    out.emit('policyOpen', {
      name: descriptor.peripheralName,
      params: params.map((p) => renderTemplate(getTemplate('templateParam'), { type: p.type, name: p.name })).join(', '),
    });

    for (const constant of descriptor.constants) {
      out.emit('constant', {
        type: constant.type,
        name: constant.name,
        value: formatValue(constant.value, toCppType(constant.type)),
      });
    }

    for (const { method, body } of methods) {
      out.emit('methodDoc', { text: method.description || method.name });
      out.emit('methodOpen', {
        return_type: method.returnType,
        name: method.name,
        parameters: method.parameters
          .map((p) =>
            p.default === undefined
              ? renderTemplate(getTemplate('parameter'), { type: p.type, name: p.name })
              : renderTemplate(getTemplate('parameterDefault'), {
                  type: p.type,
                  name: p.name,
                  value: formatValue(p.default, toCppType(p.type)),
                })
          )
          .join(', '),
      });
      if (method.testHook) {
        out.emit('hook', { hook: method.testHook, args: method.parameters.map((p) => p.name).join(', ') });
      }
      out.text(body);
      out.emit('methodClose', {});
    }

    out.emit('accessor', { base_param: base, mock_hook: mockHook });

    for (const instance of instances) {
      out.emit('instance', {
        name: instance.name,
        base: instance.base,
        policy: descriptor.peripheralName,
        args: instance.args,
      });
    }

    out.emit('namespaceClose', { namespace });

    return deepFreeze({
      descriptorId: descriptor.id,
      fileName: artifactFileName(descriptor),
      content: out.toString(),
      inputHash,
    });
  }

  private instanceArgument(
    instance: PeripheralDescriptor['instances'][number],
    param: TemplateParam,
    base: string
  ): string {
    const type = toCppType(param.type);
    if (Object.prototype.hasOwnProperty.call(instance.params, param.name)) {
      return formatValue(instance.params[param.name], type);
    }
    if (param.name === base) {
      return `${toSnake(instance.name).toUpperCase()}_BASE`;
    }
    if (/CLOCK|CLK|HZ/i.test(param.name)) {
      if (instance.clock === undefined) {
        throw RenderError.missingVariable(`${instance.name}.clock`, 'instance');
      }
      return formatValue(instance.clock, type);
    }
    throw RenderError.missingVariable(`${instance.name}.${param.name}`, 'instance');
  }

  private renderBody(
    descriptor: PeripheralDescriptor,
    method: PolicyMethodSpec,
    layout: readonly LayoutRegister[],
    registerMap: RegisterMap | undefined,
    params: readonly TemplateParam[]
  ): string {
    const known = new Set([
      ...method.parameters.map((p) => p.name),
      ...descriptor.constants.map((c) => c.name),
      ...params.map((p) => p.name),
    ]);
    const where = `${descriptor.id}#${method.name}`;
    const peripheral = registerMap?.peripheralName ?? descriptor.peripheralName;

    const operand = (value: OperandValue): string => {
      if (value.kind === 'literal') {
        return `${toHex(value.value)}u`;
      }
      if (!known.has(value.name)) {
        throw RenderError.missingVariable(value.name, where);
      }
      return value.name;
    };

    const resolveRegister = (operation: RegisterOperation): LayoutRegister => {
      const register = layout.find((r) => r.name === operation.register);
      if (!register || (registerMap && !getRegister(registerMap, operation.register))) {
        throw RenderError.unresolvedRegister(operation.register, peripheral);
      }
      return register;
    };

    const resolveField = (register: LayoutRegister, field: string): void => {
      const declared = register.fields.some((f) => f.name === field);
      if (!declared || (registerMap && !getBitfield(registerMap, register.name, field))) {
        throw RenderError.unresolvedRegister(`${register.name}.${field}`, peripheral);
      }
    };

    return method.operations
      .map((operation) => {
        const register = resolveRegister(operation);
        const common = { register: register.name, reg_type: registerType(register.size) };

        switch (operation.op) {
          case 'write':
          case 'set':
          case 'clear':
            return renderTemplate(getTemplate(operation.op), { ...common, value: operand(operation.value) });
          case 'field-write':
            resolveField(register, operation.field);
            return renderTemplate(getTemplate('fieldWrite'), {
              ...common,
              field: operation.field,
              value: operand(operation.value),
            });
          case 'read':
            return renderTemplate(getTemplate('read'), { ...common, return_type: method.returnType });
          case 'field-read':
            resolveField(register, operation.field);
            return renderTemplate(getTemplate('fieldRead'), {
              ...common,
              field: operation.field,
              return_type: method.returnType,
            });
          case 'wait':
            resolveField(register, operation.field);
            return renderTemplate(getTemplate('wait'), {
              ...common,
              field: operation.field,
              comparison: operation.until === 'set' ? '==' : '!=',
            });
        }
      })
      .join('');
  }
}

/**
 * Render with the configured namespace root.
 */
export function render(descriptor: PeripheralDescriptor, registerMap?: RegisterMap): RenderedText {
  return new PolicyRenderer().render(descriptor, registerMap);
}

export function contentHash(text: string): string {
  return sha256(text);
}
