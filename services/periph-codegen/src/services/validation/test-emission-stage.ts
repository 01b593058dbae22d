/**
 * Stage 4: write a C++ test file of static_asserts that pins every offset,
 * bitfield position, width, mask and instance base address of the artifact.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { ValidationResult } from '../../types';
import { config } from '../../config';
import { renderTemplate } from '../renderer/template';
import { getTemplate } from '../renderer/templates';
import type { SymbolTable } from './symbol-table';
import { createErrorResult, createResult, StageInput, ValidationStage } from './validation-stage';

export interface TestEmissionOptions {
  outputDir?: string;
}

export type LayoutAssertion = {
  expression: string;
  expected: string;
  label: string;
};

function hexLiteral(value: number): string {
  return `0x${value.toString(16).toUpperCase()}`;
}

export function layoutAssertions(symbols: SymbolTable): LayoutAssertion[] {
  const ns = symbols.namespace ?? '';
  const layout = `${ns}::${symbols.layoutName ?? ''}`;
  const assertions: LayoutAssertion[] = [];

  for (const register of symbols.registers) {
    if (register.offset !== undefined) {
      assertions.push({
        expression: `${layout}::${register.name}::offset`,
        expected: hexLiteral(register.offset),
        label: `${register.name} offset`,
      });
    }
    for (const field of register.fields) {
      const scope = `${layout}::${register.name}::${field.name}`;
      const label = `${register.name}.${field.name}`;
      if (field.position !== undefined) {
        assertions.push({ expression: `${scope}::position`, expected: String(field.position), label: `${label} position` });
      }
      if (field.width !== undefined) {
        assertions.push({ expression: `${scope}::width`, expected: String(field.width), label: `${label} width` });
      }
      if (field.mask !== undefined) {
        assertions.push({ expression: `${scope}::mask`, expected: hexLiteral(field.mask), label: `${label} mask` });
      }
    }
  }

  for (const instance of symbols.instances) {
    assertions.push({
      expression: `${ns}::${instance.name}_BASE`,
      expected: hexLiteral(instance.base),
      label: `${instance.name} base address`,
    });
  }

  return assertions;
}

export function testFileName(artifactPath: string, symbols: SymbolTable): string {
  const stem = symbols.descriptorId
    ? symbols.descriptorId.replace(/[^A-Za-z0-9]+/g, '_')
    : path.basename(artifactPath).replace(/\.[^.]+$/, '');
  return `${stem}_test.cpp`;
}

export function renderTestFile(include: string, source: string, symbols: SymbolTable): string {
  return [
    renderTemplate(getTemplate('testHeader'), { source, include }),
    ...layoutAssertions(symbols).map((assertion) => renderTemplate(getTemplate('staticAssert'), assertion)),
    renderTemplate(getTemplate('testFooter'), {}),
  ].join('');
}

export class TestEmissionStage implements ValidationStage {
  readonly id = 'test-emission' as const;
  readonly name = 'Layout test emission';
  private outputDir: string;

  constructor(options: TestEmissionOptions = {}) {
    this.outputDir = options.outputDir ?? config.validation.testOutputDir;
  }

  async run(input: StageInput): Promise<ValidationResult> {
    const startTime = Date.now();
    const { symbols, artifactPath } = input;

    if (!symbols.namespace || !symbols.layoutName) {
      return createResult(
        this.id,
        [{ severity: 'error', code: 'TEST_EMISSION_NO_LAYOUT', message: 'artifact declares no register layout', file: artifactPath }],
        startTime
      );
    }

    try {
      const testPath = path.join(this.outputDir, testFileName(artifactPath, symbols));
      const include = path.relative(path.dirname(testPath), artifactPath).split(path.sep).join('/');
      const content = renderTestFile(include, path.basename(artifactPath), symbols);

      await fs.mkdir(path.dirname(testPath), { recursive: true });
      await fs.writeFile(testPath, content, 'utf-8');

      return createResult(this.id, [], startTime, {
        testFile: testPath,
        assertions: layoutAssertions(symbols).length,
      });
    } catch (error) {
      return createErrorResult(this.id, error, startTime);
    }
  }
}
