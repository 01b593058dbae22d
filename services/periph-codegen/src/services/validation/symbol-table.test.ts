import { fixture, importFixture, renderFixture } from '../../test-utils';
import { MetadataStore } from '../metadata/metadata-store';
import { PolicyRenderer } from '../renderer/policy-renderer';
import { findRegister, parseSymbolTable } from './symbol-table';

describe('parseSymbolTable', () => {
  it('reads banner metadata, layout, methods and instances from a generated header', async () => {
    const table = parseSymbolTable(await renderFixture());

    expect(table.peripheral).toBe('UART');
    expect(table.descriptorId).toBe('acme/ax1/uart');
    expect(table.inputHash).toMatch(/^[0-9a-f]{64}$/);
    expect(table.namespace).toBe('hal::acme::ax1');
    expect(table.layoutName).toBe('UartRegisterLayout');
    expect(table.policyName).toBe('UartHardwarePolicy');
    expect(table.registers).toEqual([
      {
        name: 'CR',
        offset: 0,
        line: 13,
        fields: [
          { name: 'RXEN', position: 2, width: 1, mask: 4, line: 15 },
          { name: 'TXEN', position: 3, width: 1, mask: 8, line: 20 },
        ],
      },
    ]);
    expect(table.methods).toEqual([{ name: 'reset', arity: 0, line: 34 }]);
    expect(table.aliases).toEqual(['UartHardware']);
    expect(table.instances).toEqual([{ name: 'UART', base: 0x40001000, line: 48 }]);
    expect(table.instanceFields).toEqual([]);
  });

  it('counts method parameters', () => {
    const table = parseSymbolTable(
      [
        'struct UartHardwarePolicy {',
        '    static inline void write_byte(std::uint8_t value) noexcept {',
        '    }',
        '    static inline void configure(std::uint32_t baud, bool parity) noexcept {',
        '    }',
        '};',
      ].join('\n')
    );

    expect(table.methods.map((m) => [m.name, m.arity])).toEqual([
      ['write_byte', 1],
      ['configure', 2],
    ]);
  });

  it('flags data members declared on the policy struct', () => {
    const table = parseSymbolTable(
      [
        'struct UartHardwarePolicy {',
        '    using Layout = UartRegisterLayout;',
        '    static constexpr std::uint32_t MASK = 3u;',
        '    std::uint32_t shadow;',
        '};',
      ].join('\n')
    );

    expect(table.instanceFields).toEqual([{ text: 'std::uint32_t shadow;', line: 4 }]);
  });

  it('finds no instance state in any rendered fixture', async () => {
    const store = new MetadataStore();
    const renderer = new PolicyRenderer({ namespaceRoot: 'hal' });
    const acme = await importFixture('acme.svd');
    const headers = [
      renderer.render(await store.load(fixture('uart.yaml')), acme.peripherals.UART).content,
      renderer.render(await store.load(fixture('timer.json')), acme.peripherals.TIMER).content,
      await renderFixture(),
    ];

    expect(headers.map((header) => parseSymbolTable(header).instanceFields)).toEqual([[], [], []]);
  });

  it('treats the closing brace of a scope as a scope edge, not a member', () => {
    const table = parseSymbolTable(['struct UartHardwarePolicy {', '    struct Nested {', '    };', '};'].join('\n'));
    expect(table.instanceFields).toEqual([]);
  });

  it('looks registers up by name', async () => {
    const table = parseSymbolTable(await renderFixture());
    expect(findRegister(table, 'CR')?.offset).toBe(0);
    expect(findRegister(table, 'SR')).toBeUndefined();
  });
});
