/**
 * InstructionWriter: serializes an output map into the host build tool's
 * instruction stream, one line per entry in map order.
 */

import type { OutputMap } from '../instructions/OutputMap.js';
import { INSTRUCTION_CONSTANTS } from '../instructions/types.js';

/**
 * Output format:
 * - directive: `build:env=NAME=value`
 * - dotenv: `NAME=value`
 * - json: a single-line JSON object
 */
export type EmitFormat = 'directive' | 'dotenv' | 'json';

export const EMIT_FORMATS: readonly EmitFormat[] = ['directive', 'dotenv', 'json'];

export const DIRECTIVE_PREFIX = 'build:env=';

export interface InstructionSink {
  write(chunk: string): unknown;
}

export function renderInstructions(map: OutputMap, format: EmitFormat = 'directive'): string[] {
  const entries = [...map].map(([key, value]) => [INSTRUCTION_CONSTANTS[key], value] as const);

  switch (format) {
    case 'directive':
      return entries.map(([name, value]) => `${DIRECTIVE_PREFIX}${name}=${value}`);
    case 'dotenv':
      return entries.map(([name, value]) => `${name}=${value}`);
    case 'json':
      return [JSON.stringify(Object.fromEntries(entries))];
  }
}

export function writeInstructions(
  map: OutputMap,
  format: EmitFormat = 'directive',
  sink: InstructionSink = process.stdout
): number {
  const lines = renderInstructions(map, format);
  for (const line of lines) {
    sink.write(`${line}\n`);
  }
  return lines.length;
}
