/**
 * Stage 2: compare the layout declared in a generated header against the
 * imported register map. Runs in process; no external tool is involved.
 *
 * Every mismatch is reported, not just the first. A policy struct must also be
 * stateless, so any non-static data member is an error.
 */

import type { Diagnostic, RegisterMap, ValidationResult } from '../../types';
import { SemanticMismatch, SemanticMismatchKind, toDiagnostic } from '../../utils/errors';
import { toHex } from '../../utils/object';
import { findPeripheral, getBitfield, getRegister } from '../hardware/register-map';
import { fieldMask } from '../renderer/policy-renderer';
import type { SymbolRegister } from './symbol-table';
import { createResult, StageInput, ValidationStage } from './validation-stage';

export const STATEFUL_POLICY_CODE = 'SEMANTIC_STATEFUL_POLICY';

export class SemanticStage implements ValidationStage {
  readonly id = 'semantic' as const;
  readonly name = 'Register map cross-check';

  async run(input: StageInput): Promise<ValidationResult> {
    const startTime = Date.now();
    const { symbols, artifactPath } = input;
    const diagnostics: Diagnostic[] = [];

    const report = (kind: SemanticMismatchKind, message: string, line?: number): void => {
      diagnostics.push(
        toDiagnostic(new SemanticMismatch(kind, message, { operation: 'validate', file: artifactPath, line }))
      );
    };

    const peripheral = symbols.peripheral;
    const map = peripheral && input.registerIndex ? findPeripheral(input.registerIndex, peripheral) : undefined;

    if (!peripheral) {
      report('MissingPeripheral', 'artifact does not name its peripheral');
    } else if (!map) {
      report('MissingPeripheral', `peripheral ${peripheral} not found in register map`);
    } else {
      for (const register of symbols.registers) {
        this.checkRegister(register, map, report);
      }

      for (const instance of symbols.instances) {
        const expected = input.registerIndex && findPeripheral(input.registerIndex, instance.name);
        if (expected && expected.baseAddress !== instance.base) {
          report(
            'Address',
            `instance ${instance.name} base address mismatch: generated ${toHex(instance.base)}, expected ${toHex(expected.baseAddress)}`,
            instance.line
          );
        }
      }
    }

    for (const member of symbols.instanceFields) {
      diagnostics.push({
        severity: 'error',
        code: STATEFUL_POLICY_CODE,
        message: `${symbols.policyName ?? 'policy'} declares instance state: ${member.text}`,
        file: artifactPath,
        line: member.line,
      });
    }

    return createResult(this.id, diagnostics, startTime, {
      peripheral: peripheral ?? null,
      registers: symbols.registers.length,
      instances: symbols.instances.length,
    });
  }

  private checkRegister(
    register: SymbolRegister,
    map: RegisterMap,
    report: (kind: SemanticMismatchKind, message: string, line?: number) => void
  ): void {
    const expected = getRegister(map, register.name);
    if (!expected) {
      report('Offset', `register ${register.name} not present in register map ${map.peripheralName}`, register.line);
      return;
    }
    if (register.offset !== expected.offset) {
      const generated = register.offset === undefined ? 'none' : toHex(register.offset);
      report(
        'Offset',
        `register ${register.name} offset mismatch: generated ${generated}, expected ${toHex(expected.offset)}`,
        register.line
      );
    }

    for (const field of register.fields) {
      const label = `${register.name}.${field.name}`;
      const bitfield = getBitfield(map, register.name, field.name);
      if (!bitfield) {
        report('BitfieldPosition', `bitfield ${label} not present in register map ${map.peripheralName}`, field.line);
        continue;
      }
      if (field.position !== bitfield.bitOffset) {
        report(
          'BitfieldPosition',
          `bitfield ${label} position mismatch: generated ${field.position ?? 'none'}, expected ${bitfield.bitOffset}`,
          field.line
        );
      }
      if (field.width !== bitfield.bitWidth) {
        report(
          'BitfieldWidth',
          `bitfield ${label} width mismatch: generated ${field.width ?? 'none'}, expected ${bitfield.bitWidth}`,
          field.line
        );
      }
      const expectedMask = fieldMask(bitfield.bitOffset, bitfield.bitWidth);
      if (field.position === bitfield.bitOffset && field.width === bitfield.bitWidth && field.mask !== expectedMask) {
        report(
          'BitfieldPosition',
          `bitfield ${label} mask mismatch: generated ${field.mask === undefined ? 'none' : toHex(field.mask, 8)}, expected ${toHex(expectedMask, 8)}`,
          field.line
        );
      }
    }
  }
}
