import { describe, it, expect } from 'vitest';

import { DuplicateInstructionError } from '../../../src/instructions/errors.js';
import { addEntry, createOutputMap } from '../../../src/instructions/OutputMap.js';

describe('OutputMap', () => {
  it('should insert defined values', () => {
    const map = createOutputMap();
    expect(addEntry(map, 'BuildSemver', '4.2.0')).toBe(true);
    expect(map.get('BuildSemver')).toBe('4.2.0');
  });

  it('should omit undefined values', () => {
    const map = createOutputMap();
    expect(addEntry(map, 'BuildDate', undefined)).toBe(false);
    expect(map.size).toBe(0);
  });

  it('should keep insertion order', () => {
    const map = createOutputMap();
    addEntry(map, 'BuildTimestamp', 'b');
    addEntry(map, 'BuildDate', 'a');
    expect([...map.keys()]).toEqual(['BuildTimestamp', 'BuildDate']);
  });

  it('should refuse to overwrite a key', () => {
    const map = createOutputMap();
    addEntry(map, 'BuildTime', '01-02-03');

    expect(() => addEntry(map, 'BuildTime', '04-05-06')).toThrow(DuplicateInstructionError);
    expect(map.get('BuildTime')).toBe('01-02-03');
  });
});
