import * as fs from 'fs/promises';
import * as path from 'path';
import type { RegisterMapIndex } from '../../types';
import { FakeToolRunner, importFixture, makeTempDir, removeDir, renderFixture } from '../../test-utils';
import { ArtifactTarget, ValidationPipeline } from './validation-pipeline';

const SIZE_OUTPUT = '   text    data     bss     dec     hex filename\n     12       0       0      12       c unit.o\n';

function healthyRunner(failing: readonly string[] = []): FakeToolRunner {
  return new FakeToolRunner((argv) => {
    const target = argv[argv.length - 1] ?? '';
    if (argv[0] === 'clang++' && failing.includes(target)) {
      return { exitCode: 1, stderr: `${target}:12:5: error: expected ';' after struct\n` };
    }
    if (argv[0] === 'arm-none-eabi-size') {
      return { stdout: SIZE_OUTPUT };
    }
    return undefined;
  });
}

describe('ValidationPipeline', () => {
  let dir: string;
  let header: string;
  let acme: RegisterMapIndex;

  beforeEach(async () => {
    dir = await makeTempDir();
    header = await renderFixture();
    acme = await importFixture('acme.svd');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function pipeline(runner: FakeToolRunner, registerIndex?: RegisterMapIndex): ValidationPipeline {
    return new ValidationPipeline(runner, {
      testOutputDir: path.join(dir, 'tests'),
      workDir: dir,
      toolchain: { clangPath: 'clang++', gccArmPath: 'arm-none-eabi-g++', sizePath: 'arm-none-eabi-size' },
      ...(registerIndex && { registerIndex }),
    });
  }

  async function writeHeader(name: string, content = header): Promise<string> {
    const file = path.join(dir, 'out', name);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content);
    return file;
  }

  describe('runAll', () => {
    it('passes a header whose layout matches the register map through every stage', async () => {
      const runner = healthyRunner();
      const file = await writeHeader('uart_hal.hpp');

      const result = await pipeline(runner, acme).runAll({ path: file });

      expect(result.passed).toBe(true);
      expect(result.haltedAt).toBeUndefined();
      expect(result.stages.map((s) => s.stage)).toEqual(['syntax', 'semantic', 'compile', 'test-emission']);
      expect(result.stages.flatMap((s) => s.diagnostics)).toEqual([]);
      expect(result.stages[2].metadata.size).toEqual({ text: 12, data: 0, bss: 0, total: 12 });
      expect(runner.calls.map((c) => c.argv[0])).toEqual(['clang++', 'arm-none-eabi-g++', 'arm-none-eabi-size']);
    });

    it('halts at the semantic stage on an offset mismatch and never compiles', async () => {
      const runner = healthyRunner();
      const file = await writeHeader('uart_hal.hpp');

      const result = await pipeline(runner, await importFixture('acme-shifted.svd')).runAll({ path: file });

      expect(result.passed).toBe(false);
      expect(result.haltedAt).toBe('semantic');
      expect(result.stages.map((s) => s.stage)).toEqual(['syntax', 'semantic']);
      expect(result.stages[1].diagnostics).toHaveLength(1);
      expect(result.stages[1].diagnostics[0].message).toBe('register CR offset mismatch: generated 0x0, expected 0x4');
      expect(runner.callsTo('arm-none-eabi-g++')).toHaveLength(0);
    });

    it('runs a single stage on request', async () => {
      const runner = healthyRunner();

      const result = await pipeline(runner, acme).runAll({ path: 'uart_hal.hpp', content: header }, { stage: 'semantic' });

      expect(result.stages.map((s) => s.stage)).toEqual(['semantic']);
      expect(runner.calls).toHaveLength(0);
    });

    it('prefers the register index given with the target', async () => {
      const result = await pipeline(healthyRunner(), acme).runAll(
        { path: 'uart_hal.hpp', content: header, registerIndex: await importFixture('acme-shifted.svd') },
        { stage: 'semantic' }
      );

      expect(result.passed).toBe(false);
    });

    it('reports an unreadable artifact without running any stage', async () => {
      const runner = healthyRunner();

      const result = await pipeline(runner, acme).runAll({ path: path.join(dir, 'missing.hpp') });

      expect(result.passed).toBe(false);
      expect(result.stages).toEqual([]);
      expect(result.error).toContain('ENOENT');
      expect(runner.calls).toHaveLength(0);
    });

    it('emits stage events in order', async () => {
      const validator = pipeline(healthyRunner(), acme);
      const events: string[] = [];
      validator.on('validation:stage:complete', (event: { stage: string }) => events.push(event.stage));

      await validator.runAll({ path: await writeHeader('uart_hal.hpp') });

      expect(events).toEqual(['syntax', 'semantic', 'compile', 'test-emission']);
    });
  });

  describe('validateBatch', () => {
    async function tenArtifacts(): Promise<ArtifactTarget[]> {
      const targets: ArtifactTarget[] = [];
      for (let i = 0; i < 10; i++) {
        const content = header.replace('// descriptor: acme/ax1/uart', `// descriptor: acme/ax1/uart${i}`);
        targets.push({ path: await writeHeader(`uart${i}_hal.hpp`, content) });
      }
      return targets;
    }

    it('collects every result in collectAll mode', async () => {
      const targets = await tenArtifacts();
      const broken = targets[4].path;

      const summary = await pipeline(healthyRunner([broken]), acme).validateBatch(targets, {
        mode: 'collectAll',
        concurrency: 3,
      });

      expect(summary.passed).toBe(9);
      expect(summary.failed).toBe(1);
      expect(summary.cancelled).toBe(0);
      expect(summary.perFileResults.map((r) => r.path)).toEqual(targets.map((t) => t.path));
      expect(typeof summary.duration).toBe('number');
      expect(summary.duration).toBeGreaterThanOrEqual(0);

      const failed = summary.perFileResults[4];
      expect(failed.haltedAt).toBe('syntax');
      expect(failed.stages[0].diagnostics).toEqual([
        { severity: 'error', file: broken, line: 12, column: 5, message: "expected ';' after struct", code: 'CXX_SYNTAX' },
      ]);
    });

    it('stops scheduling after the first failure in failFast mode', async () => {
      const targets = await tenArtifacts();

      const summary = await pipeline(healthyRunner([targets[4].path]), acme).validateBatch(targets, {
        mode: 'failFast',
        concurrency: 1,
      });

      expect(summary.passed).toBe(4);
      expect(summary.failed).toBe(1);
      expect(summary.cancelled).toBe(5);
      expect(summary.perFileResults).toHaveLength(5);
    });

    it('stops once maxFailures artifacts have failed', async () => {
      const targets = await tenArtifacts();

      const summary = await pipeline(healthyRunner([targets[1].path, targets[2].path, targets[3].path]), acme).validateBatch(
        targets,
        { mode: 'collectAll', concurrency: 1, maxFailures: 2 }
      );

      expect(summary.failed).toBe(2);
      expect(summary.passed).toBe(1);
      expect(summary.cancelled).toBe(7);
    });

    it('cancels every artifact when the signal is already aborted', async () => {
      const targets = await tenArtifacts();
      const controller = new AbortController();
      controller.abort();

      const summary = await pipeline(healthyRunner(), acme).validateBatch(targets, { signal: controller.signal });

      expect(summary.cancelled).toBe(10);
      expect(summary.perFileResults).toEqual([]);
    });
  });
});
