import * as fs from 'fs/promises';
import * as path from 'path';
import { copyFixtures, FakeToolRunner, makeTempDir, removeDir } from '../../test-utils';
import { CodeGenerator, GenerationTarget } from './code-generator';

const UART = 'acme/ax1/uart_hal.hpp';
const TIMER = 'acme/ax1/timer_hal.hpp';
const SIZE_OUTPUT = '   text    data     bss     dec     hex filename\n      8       0       0       8       8 unit.o\n';

describe('CodeGenerator', () => {
  let dir: string;
  let outputDir: string;
  let runner: FakeToolRunner;
  let generator: CodeGenerator;

  function createGenerator(): CodeGenerator {
    return new CodeGenerator(
      {
        outputDir,
        manifestPath: path.join(outputDir, '.codegen-manifest.json'),
        namespaceRoot: 'hal',
        registerDocuments: [],
        maxConcurrency: 2,
        validation: { testOutputDir: path.join(dir, 'tests'), workDir: dir },
      },
      runner
    );
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    outputDir = path.join(dir, 'out');
    await copyFixtures(dir, ['uart.yaml', 'timer.json', 'acme.svd', 'acme.yaml', 'ax1.yaml']);
    runner = new FakeToolRunner((argv) => (argv[0] === 'arm-none-eabi-size' ? { stdout: SIZE_OUTPUT } : undefined));
    generator = createGenerator();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function target(descriptor: string): GenerationTarget {
    return {
      descriptor: path.join(dir, descriptor),
      vendor: path.join(dir, 'acme.yaml'),
      family: path.join(dir, 'ax1.yaml'),
    };
  }

  const both = (): GenerationTarget[] => [target('uart.yaml'), target('timer.json')];

  async function edit(file: string, from: string, to: string): Promise<void> {
    const full = path.join(dir, file);
    await fs.writeFile(full, (await fs.readFile(full, 'utf8')).replace(from, to));
  }

  const mtime = async (artifact: string): Promise<number> => (await fs.stat(path.join(outputDir, artifact))).mtimeMs;

  describe('generate', () => {
    it('writes one header per descriptor', async () => {
      const run = await generator.generate(both());

      expect(run.written).toEqual([UART, TIMER]);
      expect(run.failures).toEqual([]);
      expect(run.cancelled).toBe(0);
      const uart = await fs.readFile(path.join(outputDir, UART), 'utf8');
      expect(uart).toContain('    static constexpr std::uint32_t VENDOR_ID = 65u;');
      expect(uart).toContain('    static constexpr std::uint32_t CORE_CLOCK_HZ = 16000000u;');
      expect(run.artifacts[0].dependencies).toEqual(['acme', 'acme/ax1', 'acme/ax1/uart']);
    });

    it('rewrites nothing when no input changed', async () => {
      await generator.generate(both());
      const before = [await mtime(UART), await mtime(TIMER)];
      const manifest = await fs.readFile(path.join(outputDir, '.codegen-manifest.json'), 'utf8');

      const run = await generator.generate(both());

      expect(run.written).toEqual([]);
      expect(run.skipped).toEqual([UART, TIMER]);
      expect([await mtime(UART), await mtime(TIMER)]).toEqual(before);
      expect(await fs.readFile(path.join(outputDir, '.codegen-manifest.json'), 'utf8')).toBe(manifest);
    });

    it('rewrites only the artifact whose descriptor changed', async () => {
      await generator.generate(both());
      const timerBefore = await mtime(TIMER);
      await edit('uart.yaml', 'value: 0x3', 'value: 0x7');

      const run = await generator.generate(both());

      expect(run.written).toEqual([UART]);
      expect(run.skipped).toEqual([TIMER]);
      expect(await mtime(TIMER)).toBe(timerBefore);
      expect(await fs.readFile(path.join(outputDir, UART), 'utf8')).toContain('ENABLE_MASK = 7u;');
    });

    it('marks every artifact of a vendor stale when its document changes', async () => {
      await generator.generate(both());
      await edit('acme.yaml', 'value: 0x41', 'value: 0x42');

      const run = await generator.generate([target('uart.yaml')]);

      expect(run.written).toEqual([UART]);
      expect(generator.context.manifest.get(TIMER)?.stale).toBe(true);
      expect((await generator.generate([target('timer.json')])).written).toEqual([TIMER]);
    });

    it('regenerates everything when not incremental', async () => {
      await generator.generate(both());

      const run = await generator.generate(both(), { incremental: false });

      expect(run.written).toEqual([UART, TIMER]);
    });

    it('collects per-target failures without aborting the batch', async () => {
      const missing = path.join(dir, 'adc.yaml');

      const run = await generator.generate([missing, target('timer.json')]);

      expect(run.written).toEqual([TIMER]);
      expect(run.failures).toHaveLength(1);
      expect(run.failures[0].target).toBe(missing);
      expect(run.failures[0].diagnostic.severity).toBe('error');
    });

    it('cancels every target once aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const run = await generator.generate(both(), { signal: controller.signal });

      expect(run.cancelled).toBe(2);
      expect(run.written).toEqual([]);
    });
  });

  describe('validate', () => {
    it('validates a generated artifact and records the pass', async () => {
      await generator.generate(both());

      const summary = await generator.validate([target('uart.yaml')]);

      expect(summary.passed).toBe(1);
      expect(summary.failed).toBe(0);
      expect(summary.perFileResults[0].path).toBe(path.join(outputDir, UART));
      expect(generator.context.manifest.get(UART)?.validated_at).toEqual(expect.any(String));
      expect(runner.callsTo('clang++')).toHaveLength(1);
    });

    it('does not record a single-stage run as validated', async () => {
      await generator.generate(both());

      const summary = await generator.validate([TIMER], { stage: 'semantic' });

      expect(summary.passed).toBe(1);
      expect(summary.perFileResults[0].stages.map((s) => s.stage)).toEqual(['semantic']);
      expect(generator.context.manifest.get(TIMER)?.validated_at).toBeUndefined();
    });

    it('reports a target that cannot be resolved and validates the rest', async () => {
      await generator.generate(both());
      const missing = target('adc.yaml');

      const summary = await generator.validate([missing, target('uart.yaml')], { mode: 'collectAll' });

      expect(summary.passed).toBe(1);
      expect(summary.failed).toBe(1);
      expect(summary.perFileResults.map((result) => result.path)).toEqual([
        missing.descriptor,
        path.join(outputDir, UART),
      ]);
      const [unresolved] = summary.perFileResults;
      expect(unresolved.passed).toBe(false);
      expect(unresolved.stages).toEqual([]);
      expect(unresolved.diagnostics).toHaveLength(1);
      expect(unresolved.diagnostics?.[0].severity).toBe('error');
      expect(unresolved.error).toBe(unresolved.diagnostics?.[0].message);
    });

    it('resolves the register document from the manifest in a new generator', async () => {
      await generator.generate(both());
      const fresh = createGenerator();

      const summary = await fresh.validate([UART]);

      expect(summary.passed).toBe(1);
      expect(summary.failed).toBe(0);
      expect(fresh.context.manifest.get(UART)?.register_source).toEqual({
        document: path.join('..', 'acme.svd'),
        peripheral: 'UART',
      });
    });
  });
});
