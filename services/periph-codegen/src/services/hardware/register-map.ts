/**
 * Register map lookups and index merging.
 */

import type { Bitfield, Register, RegisterMap, RegisterMapIndex } from '../../types';
import { ImportError } from '../../utils/errors';
import { sha256, stableStringify } from '../../utils/hash';
import { deepFreeze } from '../../utils/object';

export function getRegister(map: RegisterMap, name: string): Register | undefined {
  return map.registers.find((register) => register.name === name);
}

export function getBitfield(map: RegisterMap, register: string, field: string): Bitfield | undefined {
  return map.bitfields[`${register}.${field}`];
}

/** Every bitfield with the given name, in register order. */
export function findBitfield(map: RegisterMap, field: string): Bitfield[] {
  return map.registers.flatMap((register) => register.fields.filter((f) => f.name === field));
}

export function getPeripheral(index: RegisterMapIndex, name: string): RegisterMap | undefined {
  return Object.prototype.hasOwnProperty.call(index.peripherals, name) ? index.peripherals[name] : undefined;
}

/** Exact name first, then a case-insensitive match. */
export function findPeripheral(index: RegisterMapIndex, name: string): RegisterMap | undefined {
  const exact = getPeripheral(index, name);
  if (exact) return exact;
  const wanted = name.toUpperCase();
  const key = Object.keys(index.peripherals).find((candidate) => candidate.toUpperCase() === wanted);
  return key === undefined ? undefined : index.peripherals[key];
}

/**
 * Merge imported documents. A peripheral name defined in two documents is a
 * Conflict; the index never silently prefers one of them.
 */
export function mergeIndexes(indexes: readonly RegisterMapIndex[]): RegisterMapIndex {
  const peripherals: Record<string, RegisterMap> = {};
  const documents: string[] = [];
  const devices: string[] = [];

  for (const index of indexes) {
    for (const [name, map] of Object.entries(index.peripherals)) {
      const existing = getPeripheral({ peripherals, documents, devices }, name);
      if (existing) {
        throw new ImportError(
          'Conflict',
          `Peripheral ${name} is defined by both ${existing.sourceDocument} and ${map.sourceDocument}`,
          {
            operation: 'importAll',
            peripheral: name,
            documents: [existing.sourceDocument, map.sourceDocument],
          }
        );
      }
      peripherals[name] = map;
    }
    documents.push(...index.documents);
    devices.push(...index.devices.filter((d) => !devices.includes(d)));
  }

  return deepFreeze({ peripherals, documents, devices });
}

/**
 * Hash of the layout only: the document path and device name do not change
 * what gets generated.
 */
export function registerMapHash(map: RegisterMap): string {
  const { sourceDocument: _source, device: _device, ...layout } = map;
  return sha256(stableStringify(layout));
}
