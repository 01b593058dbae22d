import * as fs from 'fs/promises';
import * as path from 'path';
import type { GeneratedArtifact, ManifestDocument } from '../../types';
import { computeInputHash, sha256 } from '../../utils/hash';
import { makeTempDir, removeDir } from '../../test-utils';
import { ManifestTracker } from './manifest-tracker';

const UART = 'acme/ax1/uart_hal.hpp';
const TIMER = 'acme/ax1/timer_hal.hpp';
const SPI = 'other/x1/spi_hal.hpp';

function artifact(artifactPath: string, dependencies: string[], content: string): GeneratedArtifact {
  return {
    path: artifactPath,
    contentHash: computeInputHash([content]),
    outputHash: sha256(content),
    sourceHashes: [content],
    generatedAt: '2026-01-01T00:00:00.000Z',
    dependencies,
    dependents: [],
  };
}

describe('ManifestTracker', () => {
  let dir: string;
  let manifestPath: string;
  let outputDir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    outputDir = path.join(dir, 'out');
    manifestPath = path.join(outputDir, '.codegen-manifest.json');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function tracker(): Promise<ManifestTracker> {
    const instance = new ManifestTracker({ manifestPath, outputDir });
    await instance.load();
    return instance;
  }

  async function commit(instance: ManifestTracker, artifactPath: string, deps: string[], content: string): Promise<void> {
    await instance.commit(artifactPath, content, artifact(artifactPath, deps, content));
  }

  async function populated(): Promise<ManifestTracker> {
    const instance = await tracker();
    await commit(instance, UART, ['acme', 'acme/ax1', 'acme/ax1/uart'], 'uart v1');
    await commit(instance, TIMER, ['acme', 'acme/ax1', 'acme/ax1/timer'], 'timer v1');
    await commit(instance, SPI, ['other', 'other/x1', 'other/x1/spi'], 'spi v1');
    return instance;
  }

  describe('load', () => {
    it('starts empty when no manifest exists', async () => {
      const instance = await tracker();

      expect(instance.recoveredFrom).toBeUndefined();
      expect(instance.statistics()).toEqual({ artifacts: 0, stale: 0, validated: 0, nodes: 0 });
    });

    it('treats a corrupt manifest as empty so everything regenerates', async () => {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(manifestPath, '{ not json');

      const instance = await tracker();

      expect(instance.recoveredFrom?.kind).toBe('Corrupt');
      expect(instance.recoveredFrom?.message).toBe(`Manifest ${manifestPath} is corrupt; all artifacts are stale`);
      expect(instance.paths()).toEqual([]);
      expect(await instance.shouldRegenerate(UART, ['uart v1'])).toBe(true);
    });

    it('rejects a manifest of another version', async () => {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(manifestPath, JSON.stringify({ version: '2', updated_at: '', nodes: {}, artifacts: {} }));

      expect((await tracker()).recoveredFrom?.code).toBe('CACHE_CORRUPT');
    });

    it('rejects a manifest whose dependencies form a cycle', async () => {
      await fs.mkdir(outputDir, { recursive: true });
      const record = {
        content_hash: 'a',
        output_hash: 'b',
        source_hashes: [],
        generated_at: '2026-01-01T00:00:00.000Z',
        dependencies: ['artifact:loop.hpp'],
      };
      await fs.writeFile(
        manifestPath,
        JSON.stringify({ version: '1', updated_at: '', nodes: {}, artifacts: { 'loop.hpp': record } })
      );

      const instance = await tracker();

      expect(instance.recoveredFrom?.kind).toBe('Cycle');
      expect(instance.get('loop.hpp')).toBeUndefined();
    });

    it('round-trips committed records through the file', async () => {
      await populated();

      const reloaded = await tracker();

      expect(reloaded.paths()).toEqual([TIMER, UART, SPI]);
      expect(reloaded.get(UART)?.dependencies).toEqual(['acme', 'acme/ax1', 'acme/ax1/uart']);
      expect(reloaded.toArtifact(UART)?.outputHash).toBe(sha256('uart v1'));
    });

    it('keeps the register document an artifact was rendered against', async () => {
      const instance = await tracker();
      const registerSource = { document: '../acme.svd', peripheral: 'UART' };
      const base = artifact(UART, ['acme', 'acme/ax1', 'acme/ax1/uart'], 'uart v1');
      await instance.commit(UART, 'uart v1', { ...base, registerSource });

      const reloaded = await tracker();

      expect(reloaded.get(UART)?.register_source).toEqual(registerSource);
      expect(reloaded.toArtifact(UART)?.registerSource).toEqual(registerSource);
    });
  });

  describe('shouldRegenerate', () => {
    it('skips an artifact with unchanged inputs that still exists', async () => {
      const instance = await populated();

      expect(await instance.shouldRegenerate(UART, ['uart v1'])).toBe(false);
      expect(await instance.shouldRegenerate(UART, ['uart v2'])).toBe(true);
      expect(await instance.shouldRegenerate(UART, ['uart v1'], { force: true })).toBe(true);
      expect(await instance.shouldRegenerate('acme/ax1/spi_hal.hpp', ['spi v1'])).toBe(true);
    });

    it('regenerates an artifact deleted from disk', async () => {
      const instance = await populated();
      await fs.rm(instance.resolve(UART));

      expect(await instance.shouldRegenerate(UART, ['uart v1'])).toBe(true);
    });
  });

  describe('commit', () => {
    it('writes the artifact and a manifest with sorted keys', async () => {
      const instance = await populated();

      expect(await fs.readFile(path.join(outputDir, UART), 'utf8')).toBe('uart v1');
      const saved: ManifestDocument = JSON.parse(await fs.readFile(manifestPath, 'utf8'));
      expect(saved.version).toBe('1');
      expect(Object.keys(saved.artifacts)).toEqual([TIMER, UART, SPI]);
      expect(instance.toArtifact(UART)?.dependents).toEqual([]);
    });

    it('serializes writers to the same path', async () => {
      const instance = await tracker();
      const deps = ['acme', 'acme/ax1', 'acme/ax1/uart'];

      await Promise.all([commit(instance, UART, deps, 'first'), commit(instance, UART, deps, 'second')]);

      expect(instance.get(UART)?.output_hash).toBe(sha256('second'));
      expect(await instance.verify(UART)).toBe('ok');
    });

    it('releases per-path locks once no writer is left', async () => {
      const instance = await tracker();
      const deps = ['acme', 'acme/ax1', 'acme/ax1/uart'];

      const pending = Promise.all([commit(instance, UART, deps, 'first'), commit(instance, UART, deps, 'second')]);
      expect(instance.lockedPaths()).toEqual([UART]);
      await pending;

      expect(instance.lockedPaths()).toEqual([]);
      await instance.markValidated(TIMER);
      expect(instance.lockedPaths()).toEqual([]);
    });
  });

  describe('invalidation', () => {
    it('cascades from a family to every artifact beneath it', async () => {
      const instance = await populated();

      expect(await instance.invalidateCascade('acme/ax1')).toEqual([TIMER, UART]);
      expect(instance.get(SPI)?.stale).toBeUndefined();
      expect(await instance.shouldRegenerate(UART, ['uart v1'])).toBe(true);

      const reloaded = await tracker();
      expect(reloaded.statistics().stale).toBe(2);
    });

    it('limits a descriptor invalidation to its own artifact', async () => {
      const instance = await populated();

      expect(await instance.invalidateCascade('acme/ax1/uart')).toEqual([UART]);
      expect(await instance.invalidateCascade('nobody')).toEqual([]);
    });

    it('clears the stale flag when the artifact is recommitted', async () => {
      const instance = await populated();
      await instance.invalidateCascade('acme');

      await commit(instance, UART, ['acme', 'acme/ax1', 'acme/ax1/uart'], 'uart v1');

      expect(instance.get(UART)?.stale).toBeUndefined();
      expect(instance.get(TIMER)?.stale).toBe(true);
    });

    it('cascades when an observed document hash changes', async () => {
      const instance = await populated();
      const events: string[][] = [];
      instance.on('manifest:invalidated', (event: { paths: string[] }) => events.push(event.paths));

      expect(await instance.observeNode('acme', 'h1')).toEqual([]);
      expect(await instance.observeNode('acme', 'h1')).toEqual([]);
      expect(await instance.observeNode('acme', 'h2')).toEqual([TIMER, UART]);
      expect(events).toEqual([[TIMER, UART]]);
      expect(instance.statistics().nodes).toBe(1);
    });
  });

  describe('markValidated', () => {
    it('keeps the timestamp across a rewrite of identical bytes only', async () => {
      const instance = await populated();
      const deps = ['acme', 'acme/ax1', 'acme/ax1/uart'];
      await instance.markValidated(UART, new Date('2026-02-01T00:00:00.000Z'));

      await commit(instance, UART, deps, 'uart v1');
      expect(instance.get(UART)?.validated_at).toBe('2026-02-01T00:00:00.000Z');

      await commit(instance, UART, deps, 'uart v2');
      expect(instance.get(UART)?.validated_at).toBeUndefined();
    });

    it('ignores untracked paths', async () => {
      const instance = await tracker();
      await instance.markValidated(UART);
      expect(instance.statistics().validated).toBe(0);
    });
  });

  describe('verify', () => {
    it('detects edited, deleted and untracked artifacts', async () => {
      const instance = await populated();
      await fs.writeFile(instance.resolve(TIMER), 'hand edited');
      await fs.rm(instance.resolve(SPI));

      expect(await instance.verify(UART)).toBe('ok');
      expect(await instance.verify(TIMER)).toBe('modified');
      expect(await instance.verify(SPI)).toBe('missing');
      expect(await instance.verify('acme/ax1/adc_hal.hpp')).toBe('untracked');
    });
  });

  describe('clean', () => {
    it('lists without deleting on a dry run', async () => {
      const instance = await populated();

      expect(await instance.clean({ peripheral: 'uart', dryRun: true })).toEqual([UART]);
      expect(await instance.verify(UART)).toBe('ok');
    });

    it('removes tracked artifacts of one peripheral and leaves other files alone', async () => {
      const instance = await populated();
      const stray = path.join(outputDir, 'acme', 'ax1', 'notes.txt');
      await fs.writeFile(stray, 'keep me');

      expect(await instance.clean({ peripheral: 'UART' })).toEqual([UART]);

      expect(instance.paths()).toEqual([TIMER, SPI]);
      expect((await fs.readdir(path.join(outputDir, 'acme', 'ax1'))).sort()).toEqual(['notes.txt', 'timer_hal.hpp']);
      expect((await tracker()).paths()).toEqual([TIMER, SPI]);
    });

    it('removes everything when no peripheral is named', async () => {
      const instance = await populated();

      expect(await instance.clean()).toEqual([TIMER, UART, SPI]);
      expect(instance.statistics().artifacts).toBe(0);
    });
  });
});
