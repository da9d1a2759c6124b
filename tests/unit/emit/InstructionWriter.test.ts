import { describe, it, expect } from 'vitest';

import { renderInstructions, writeInstructions } from '../../../src/emit/InstructionWriter.js';
import { addEntry, createOutputMap } from '../../../src/instructions/OutputMap.js';

function sampleMap() {
  const map = createOutputMap();
  addEntry(map, 'BuildTimestamp', '2021-02-12T01:54:15.134000Z');
  addEntry(map, 'BuildSemver', '4.2.0');
  return map;
}

describe('InstructionWriter', () => {
  describe('renderInstructions', () => {
    it('should render directive lines by default', () => {
      expect(renderInstructions(sampleMap())).toEqual([
        'build:env=BUILDSTAMP_BUILD_TIMESTAMP=2021-02-12T01:54:15.134000Z',
        'build:env=BUILDSTAMP_BUILD_SEMVER=4.2.0',
      ]);
    });

    it('should render dotenv lines', () => {
      expect(renderInstructions(sampleMap(), 'dotenv')).toEqual([
        'BUILDSTAMP_BUILD_TIMESTAMP=2021-02-12T01:54:15.134000Z',
        'BUILDSTAMP_BUILD_SEMVER=4.2.0',
      ]);
    });

    it('should render a single json line', () => {
      expect(renderInstructions(sampleMap(), 'json')).toEqual([
        '{"BUILDSTAMP_BUILD_TIMESTAMP":"2021-02-12T01:54:15.134000Z","BUILDSTAMP_BUILD_SEMVER":"4.2.0"}',
      ]);
    });

    it('should render nothing for an empty map', () => {
      expect(renderInstructions(createOutputMap())).toEqual([]);
      expect(renderInstructions(createOutputMap(), 'json')).toEqual(['{}']);
    });
  });

  describe('writeInstructions', () => {
    it('should write one newline-terminated line per entry', () => {
      const chunks: string[] = [];
      const written = writeInstructions(sampleMap(), 'dotenv', { write: (chunk: string) => chunks.push(chunk) });

      expect(written).toBe(2);
      expect(chunks).toEqual([
        'BUILDSTAMP_BUILD_TIMESTAMP=2021-02-12T01:54:15.134000Z\n',
        'BUILDSTAMP_BUILD_SEMVER=4.2.0\n',
      ]);
    });
  });
});
