import { RenderError } from '../../utils/errors';
import { compileTemplate, renderTemplate, toCppType, toPascal, toSnake } from './template';
import { getTemplate, templateNames } from './templates';

describe('compileTemplate', () => {
  it('splits literals from placeholders and lists variables once', () => {
    const template = compileTemplate('t', 'struct {{name|pascal}} { {{ name }} {{size}} }');

    expect(template.variables).toEqual(['name', 'size']);
    expect(template.segments.filter((s) => s.kind === 'placeholder')).toHaveLength(3);
  });

  it('rejects unknown filters with their location', () => {
    expect(() => compileTemplate('t', 'a {{x|bogus}}')).toThrow("Template syntax error in t at 1:3: unknown filter 'bogus'");
  });

  it('rejects unterminated placeholders', () => {
    expect(() => compileTemplate('t', 'line one\n  {{ name')).toThrow(
      'Template syntax error in t at 2:3: unterminated placeholder'
    );
  });

  it('rejects invalid variable names', () => {
    expect(() => compileTemplate('t', '{{ 1abc }}')).toThrow(RenderError);
  });
});

describe('renderTemplate', () => {
  const template = compileTemplate('t', '{{name|upper_snake}} = {{value|hex8}};');

  it('applies filters in order', () => {
    expect(renderTemplate(template, { name: 'TxReady', value: 4 })).toBe('TX_READY = 0x00000004;');
  });

  it('checks every variable before producing output', () => {
    expect(() => renderTemplate(template, { name: 'TxReady' })).toThrow("Missing template variable 'value' in t");
  });

  it('rejects a numeric filter on text', () => {
    expect(() => renderTemplate(template, { name: 'a', value: 'b' })).toThrow(
      "Template syntax error in t at 1:24: filter 'hex8' needs a number for 'value'"
    );
  });
});

describe('case helpers', () => {
  it('converts names between cases', () => {
    expect(toSnake('TxReady')).toBe('tx_ready');
    expect(toSnake('AX1')).toBe('ax1');
    expect(toSnake('USARTControl')).toBe('usart_control');
    expect(toPascal('TIMER')).toBe('Timer');
    expect(toPascal('write_byte')).toBe('WriteByte');
  });

  it('maps fixed-width integer names onto std types', () => {
    expect(toCppType('uint8_t')).toBe('std::uint8_t');
    expect(toCppType('u32')).toBe('std::uint32_t');
    expect(toCppType('bool')).toBe('bool');
  });
});

describe('templates', () => {
  it('compiles every header template when the module loads', () => {
    expect(templateNames()).toEqual(expect.arrayContaining(['banner', 'layoutOpen', 'instance', 'staticAssert']));
    expect(getTemplate('doc').variables).toEqual(['text']);
  });
});
