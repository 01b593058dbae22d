/**
 * Shared helpers for the Jest suites: fixture paths, scratch directories and
 * an in-process tool runner.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { RegisterMapIndex } from './types';
import { SvdImporter } from './services/hardware/svd-importer';
import { MetadataStore } from './services/metadata/metadata-store';
import { PolicyRenderer } from './services/renderer/policy-renderer';
import type { ToolResult, ToolRunner, ToolRunOptions } from './services/toolchain/tool-runner';

export const FIXTURES = path.resolve(__dirname, '../test-data');

export function fixture(name: string): string {
  return path.join(FIXTURES, name);
}

export async function makeTempDir(prefix = 'periph-codegen-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Copy fixtures into a scratch directory so a test can edit them. */
export async function copyFixtures(dir: string, names: readonly string[]): Promise<void> {
  for (const name of names) {
    await fs.copyFile(fixture(name), path.join(dir, name));
  }
}

export function importFixture(name: string): Promise<RegisterMapIndex> {
  return new SvdImporter().import(fixture(name));
}

/** Header rendered from a descriptor fixture, without a register map. */
export async function renderFixture(name = 'scenario-uart.yaml'): Promise<string> {
  const descriptor = await new MetadataStore().load(fixture(name));
  return new PolicyRenderer({ namespaceRoot: 'hal' }).render(descriptor).content;
}

export interface ToolCall {
  argv: string[];
  options: ToolRunOptions;
}

export type ToolResponder = (argv: readonly string[], options: ToolRunOptions) => Partial<ToolResult> | undefined;

/**
 * Records every invocation and answers from `respond`. Unanswered calls exit 0
 * with empty output; a responder may throw to simulate a ToolError.
 */
export class FakeToolRunner implements ToolRunner {
  readonly calls: ToolCall[] = [];

  constructor(private respond: ToolResponder = () => undefined) {}

  async run(argv: readonly string[], options: ToolRunOptions): Promise<ToolResult> {
    this.calls.push({ argv: [...argv], options });
    const answer = this.respond(argv, options) ?? {};
    return { stdout: '', stderr: '', exitCode: 0, duration: 1, ...answer };
  }

  callsTo(tool: string): ToolCall[] {
    return this.calls.filter((call) => path.basename(call.argv[0] ?? '') === tool);
  }
}
