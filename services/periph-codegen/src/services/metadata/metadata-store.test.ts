import * as fs from 'fs/promises';
import * as path from 'path';
import { MetadataError } from '../../utils/errors';
import { fixture, makeTempDir, removeDir } from '../../test-utils';
import { detectFormat, MetadataStore, mergeConstants, parseRegisterInclude } from './metadata-store';

const VALID = `vendor: Acme
family: AX1
peripheral_name: GPIO
template_params: []
constants: []
policy_methods:
  set:
    description: Drive the pin high
    parameters: []
    return_type: void
    code: ODR = 1
instances:
  - name: GPIOA
    base: 0x48000000
`;

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('MetadataStore', () => {
  const store = new MetadataStore();

  describe('load', () => {
    it('loads a YAML descriptor into a frozen structure', async () => {
      const descriptor = await store.load(fixture('uart.yaml'));

      expect(descriptor.id).toBe('acme/ax1/uart');
      expect(descriptor.peripheralName).toBe('UART');
      expect(descriptor.registerInclude).toEqual({ document: 'acme.svd', peripheral: 'UART' });
      expect(descriptor.templateParams.map((p) => p.name)).toEqual(['BASE_ADDR', 'CLOCK_HZ']);
      expect(descriptor.instances).toEqual([{ name: 'UART', base: 0x40001000, clock: 16000000, params: {} }]);
      expect(descriptor.policyMethods.write_byte.operations).toEqual([
        { op: 'wait', register: 'SR', field: 'TXE', until: 'set', line: 1 },
        { op: 'write', register: 'DR', value: { kind: 'identifier', name: 'value' }, line: 2 },
      ]);
      expect(Object.isFrozen(descriptor)).toBe(true);
      expect(Object.isFrozen(descriptor.instances[0])).toBe(true);
    });

    it('loads a JSON descriptor and accepts hex strings as addresses', async () => {
      const descriptor = await store.load(fixture('timer.json'));

      expect(descriptor.id).toBe('acme/ax1/timer');
      expect(descriptor.instances[0].base).toBe(0x40003000);
      expect(Object.keys(descriptor.policyMethods)).toEqual(['start', 'count']);
    });

    it('returns a fresh structure on every call', async () => {
      const first = await store.load(fixture('uart.yaml'));
      const second = await store.load(fixture('uart.yaml'));
      expect(second).not.toBe(first);
      expect(second).toEqual(first);
    });
  });

  describe('parse errors', () => {
    it('reports JSON syntax errors with their line', () => {
      const text = '{\n  "vendor": "Acme"\n  "family": "AX1"\n}';
      const error = captureError(() => store.parse(text, 'broken.json'));

      expect(error).toBeInstanceOf(MetadataError);
      expect(error).toMatchObject({ kind: 'Syntax', context: { file: 'broken.json', line: 3 } });
    });

    it('reports YAML syntax errors as Syntax', () => {
      const error = captureError(() => store.parse('vendor: [Acme\n', 'broken.yaml'));
      expect(error).toMatchObject({ kind: 'Syntax', code: 'METADATA_SYNTAX' });
    });

    it('reports a missing required field by name', () => {
      const error = captureError(() => store.parse(VALID.replace('family: AX1\n', ''), 'gpio.yaml'));

      expect(error).toMatchObject({
        kind: 'MissingField',
        field: 'family',
        message: "Missing required field 'family' in gpio.yaml",
      });
    });

    it('reports a field of the wrong type with expected and actual types', () => {
      const text = VALID.replace(/instances:[\s\S]*$/, 'instances: GPIOA\n');
      const error = captureError(() => store.parse(text, 'gpio.yaml'));

      expect(error).toMatchObject({
        kind: 'TypeMismatch',
        message: "Field 'instances' in gpio.yaml has type string, expected array",
      });
    });

    it('rejects unknown top-level keys', () => {
      const error = captureError(() => store.parse(`${VALID}colour: red\n`, 'gpio.yaml'));

      expect(error).toMatchObject({ kind: 'TypeMismatch', message: "Unrecognized field 'colour' in gpio.yaml" });
    });

    it('reports a bad method body as Syntax with the method and line', () => {
      const error = captureError(() => store.parse(VALID.replace('code: ODR = 1', 'code: ODR += 1'), 'gpio.yaml'));

      expect(error).toMatchObject({
        kind: 'Syntax',
        field: 'policy_methods.set.code',
        message: "Syntax error in gpio.yaml at policy_methods.set.code line 1: unrecognized register operation 'ODR += 1'",
      });
    });
  });

  describe('validate', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it('collects every issue instead of stopping at the first', async () => {
      const file = path.join(dir, 'gpio.yaml');
      const text = VALID.replace('family: AX1\n', '').replace(/instances:[\s\S]*$/, 'instances: GPIOA\n');
      await fs.writeFile(file, text);

      const result = await store.validate(file);

      expect(result.stage).toBe('metadata');
      expect(result.passed).toBe(false);
      expect(result.diagnostics.map((d) => d.code)).toEqual(['METADATA_MISSING_FIELD', 'METADATA_TYPE_MISMATCH']);
      expect(result.diagnostics.every((d) => d.file === file)).toBe(true);
    });

    it('passes a valid descriptor and reports its id', async () => {
      const result = await store.validate(fixture('uart.yaml'));

      expect(result.passed).toBe(true);
      expect(result.diagnostics).toEqual([]);
      expect(result.metadata.descriptorId).toBe('acme/ax1/uart');
    });

    it('turns an unreadable file into a diagnostic', async () => {
      const result = await store.validate(path.join(dir, 'absent.yaml'));

      expect(result.passed).toBe(false);
      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0].code).toBe('INTERNAL_ERROR');
    });
  });

  describe('resolve', () => {
    it('layers vendor, family and peripheral constants in that order', async () => {
      const descriptor = await store.load(fixture('uart.yaml'));
      const vendor = await store.loadVendor(fixture('acme.yaml'));
      const family = await store.loadFamily(fixture('ax1.yaml'));

      const resolved = store.resolve(descriptor, { vendor, family });

      expect(vendor.id).toBe('acme');
      expect(family.id).toBe('acme/ax1');
      expect(resolved.constants.map((c) => c.name)).toEqual(['VENDOR_ID', 'CORE_CLOCK_HZ', 'ENABLE_MASK']);
      expect(descriptor.constants.map((c) => c.name)).toEqual(['ENABLE_MASK']);
    });

    it('rejects a family that belongs to another vendor', async () => {
      const descriptor = await store.load(fixture('uart.yaml'));
      const family = { ...(await store.loadFamily(fixture('ax1.yaml'))), vendor: 'Other' };

      const error = captureError(() => store.resolve(descriptor, { family }));
      expect(error).toMatchObject({ kind: 'TypeMismatch', field: 'vendor' });
    });
  });
});

describe('mergeConstants', () => {
  it('overrides earlier entries in place and appends new ones', () => {
    const merged = mergeConstants(
      [
        { name: 'A', type: 'uint32_t', value: 1 },
        { name: 'B', type: 'uint32_t', value: 2 },
      ],
      [
        { name: 'A', type: 'uint32_t', value: 10 },
        { name: 'C', type: 'uint32_t', value: 3 },
      ]
    );
    expect(merged.map((c) => [c.name, c.value])).toEqual([
      ['A', 10],
      ['B', 2],
      ['C', 3],
    ]);
  });
});

describe('detectFormat', () => {
  it('uses the extension, then the first character', () => {
    expect(detectFormat('a.json', 'x: 1')).toBe('json');
    expect(detectFormat('a.yml', '{}')).toBe('yaml');
    expect(detectFormat('a.desc', '  {"vendor": "Acme"}')).toBe('json');
    expect(detectFormat('a.desc', 'vendor: Acme')).toBe('yaml');
  });
});

describe('parseRegisterInclude', () => {
  it('splits the document from the peripheral name', () => {
    expect(parseRegisterInclude('maps/acme.svd#UART')).toEqual({ document: 'maps/acme.svd', peripheral: 'UART' });
    expect(parseRegisterInclude('acme.svd')).toEqual({ document: 'acme.svd' });
  });
});
