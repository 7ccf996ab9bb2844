import type { LogLevel, LoggerMethods } from '@tagsense/logger';

import { createConsoleLogger } from '@tagsense/logger';

import { type ModelFactory, createModel } from './runner/model-factory';

/**
 * Process-level collaborators of the CLI, replaced in tests
 */
export interface CliContext {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  createLogger: (level: LogLevel) => LoggerMethods;
  modelFactory: ModelFactory;
  now: () => Date;
}

export function createDefaultCliContext(): CliContext {
  return {
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    createLogger: (level) => createConsoleLogger({ level }),
    modelFactory: createModel,
    now: () => new Date(),
  };
}
