/**
 * runCli: read configuration, generate the instructions and write them out.
 * Returns the process exit code instead of exiting so it can be driven in tests.
 */

import type { Logger } from 'winston';

import { loadEnvConfig } from '../config/envSchema.js';
import { writeInstructions, type InstructionSink } from '../emit/InstructionWriter.js';
import type { Clock } from '../instructions/clock.js';
import { BuildstampError } from '../instructions/errors.js';
import { Instructions, generateInstructions } from '../instructions/generate.js';
import { createBuildstampLogger } from '../utils/logger.js';

export interface CliDeps {
  stdout?: InstructionSink;
  stderr?: InstructionSink;
  clock?: Clock;
  logger?: Logger;
}

export function runCli(env: Record<string, string | undefined> = process.env, deps: CliDeps = {}): number {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  let logger = deps.logger;
  try {
    const envConfig = loadEnvConfig(env);
    logger ??= createBuildstampLogger(envConfig.logLevel);

    const instructions = new Instructions({ build: envConfig.build });
    logger.debug('[cli] build configuration', instructions.build.toSettings());

    const map = generateInstructions(instructions, {
      clock: deps.clock,
      env,
      semverVar: envConfig.semverVar,
      logger,
    });

    const written = writeInstructions(map, envConfig.format, stdout);
    logger.info(`[cli] wrote ${written} instruction line(s)`, { format: envConfig.format });
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const code = error instanceof BuildstampError ? error.code : undefined;
    logger?.error('[cli] instruction generation failed', { code, error: message });
    stderr.write(`error: ${message}\n`);
    return 1;
  }
}
