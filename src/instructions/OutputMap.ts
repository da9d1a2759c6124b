// OutputMap: ordered, write-once collection of generated instructions

import { DuplicateInstructionError } from './errors.js';
import type { InstructionKey } from './types.js';

export type OutputMap = Map<InstructionKey, string>;

export function createOutputMap(): OutputMap {
  return new Map<InstructionKey, string>();
}

/**
 * Insert an instruction value.
 * An undefined value means the producer had nothing to emit; the entry is omitted.
 * @returns true when the entry was inserted
 * @throws DuplicateInstructionError if the key was already inserted
 */
export function addEntry(map: OutputMap, key: InstructionKey, value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }

  if (map.has(key)) {
    throw new DuplicateInstructionError(key);
  }

  map.set(key, value);
  return true;
}
