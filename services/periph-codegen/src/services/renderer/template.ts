/**
 * Closed template representation.
 *
 * A template is compiled once into literal and placeholder segments. The
 * placeholder syntax is `{{ name | filter | filter }}` with a fixed filter
 * set; anything else is rejected at compile time with its line and column.
 */

import { RenderError } from '../../utils/errors';
import { toHex } from '../../utils/object';

export const FILTERS = ['upper', 'lower', 'pascal', 'snake', 'upper_snake', 'hex', 'hex8', 'cpp_type'] as const;

export type Filter = (typeof FILTERS)[number];

export type TemplateValue = string | number | boolean;

export type TemplateVariables = Readonly<Record<string, TemplateValue>>;

export type Segment =
  | { kind: 'literal'; text: string }
  | { kind: 'placeholder'; name: string; filters: Filter[]; line: number; column: number };

export interface CompiledTemplate {
  name: string;
  segments: readonly Segment[];
  variables: readonly string[];
}

const CPP_TYPES: Record<string, string> = {
  uint8_t: 'std::uint8_t',
  uint16_t: 'std::uint16_t',
  uint32_t: 'std::uint32_t',
  uint64_t: 'std::uint64_t',
  int8_t: 'std::int8_t',
  int16_t: 'std::int16_t',
  int32_t: 'std::int32_t',
  int64_t: 'std::int64_t',
  size_t: 'std::size_t',
  uintptr_t: 'std::uintptr_t',
  u8: 'std::uint8_t',
  u16: 'std::uint16_t',
  u32: 'std::uint32_t',
  u64: 'std::uint64_t',
};

function isFilter(value: string): value is Filter {
  return FILTERS.some((filter) => filter === value);
}

export function toSnake(value: string): string {
  return value
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
}

export function toPascal(value: string): string {
  return toSnake(value)
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
}

export function toCppType(value: string): string {
  return Object.prototype.hasOwnProperty.call(CPP_TYPES, value) ? CPP_TYPES[value] : value;
}

function locate(source: string, index: number): { line: number; column: number } {
  const before = source.slice(0, index).split('\n');
  return { line: before.length, column: before[before.length - 1].length + 1 };
}

export function compileTemplate(name: string, source: string): CompiledTemplate {
  const segments: Segment[] = [];
  const variables = new Set<string>();
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf('{{', cursor);
    if (open < 0) {
      segments.push({ kind: 'literal', text: source.slice(cursor) });
      break;
    }
    if (open > cursor) {
      segments.push({ kind: 'literal', text: source.slice(cursor, open) });
    }

    const { line, column } = locate(source, open);
    const close = source.indexOf('}}', open + 2);
    if (close < 0) {
      throw RenderError.templateSyntax(name, line, column, 'unterminated placeholder');
    }

    const [head, ...filterNames] = source
      .slice(open + 2, close)
      .split('|')
      .map((part) => part.trim());
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(head)) {
      throw RenderError.templateSyntax(name, line, column, `invalid variable name '${head}'`);
    }

    const filters: Filter[] = [];
    for (const filterName of filterNames) {
      if (!isFilter(filterName)) {
        throw RenderError.templateSyntax(name, line, column, `unknown filter '${filterName}'`);
      }
      filters.push(filterName);
    }

    segments.push({ kind: 'placeholder', name: head, filters, line, column });
    variables.add(head);
    cursor = close + 2;
  }

  return Object.freeze({ name, segments: Object.freeze(segments), variables: Object.freeze([...variables]) });
}

function applyFilter(template: CompiledTemplate, segment: Extract<Segment, { kind: 'placeholder' }>, filter: Filter, value: TemplateValue): TemplateValue {
  switch (filter) {
    case 'upper':
      return String(value).toUpperCase();
    case 'lower':
      return String(value).toLowerCase();
    case 'pascal':
      return toPascal(String(value));
    case 'snake':
      return toSnake(String(value));
    case 'upper_snake':
      return toSnake(String(value)).toUpperCase();
    case 'cpp_type':
      return toCppType(String(value));
    case 'hex':
    case 'hex8':
      if (typeof value !== 'number') {
        throw RenderError.templateSyntax(
          template.name,
          segment.line,
          segment.column,
          `filter '${filter}' needs a number for '${segment.name}'`
        );
      }
      return toHex(value, filter === 'hex8' ? 8 : 0);
  }
}

/**
 * Render a compiled template. Every variable is checked before any text is
 * produced.
 */
export function renderTemplate(template: CompiledTemplate, variables: TemplateVariables): string {
  for (const name of template.variables) {
    if (!Object.prototype.hasOwnProperty.call(variables, name)) {
      throw RenderError.missingVariable(name, template.name);
    }
  }

  return template.segments
    .map((segment) => {
      if (segment.kind === 'literal') return segment.text;
      const value = segment.filters.reduce<TemplateValue>(
        (current, filter) => applyFilter(template, segment, filter, current),
        variables[segment.name]
      );
      return String(value);
    })
    .join('');
}
