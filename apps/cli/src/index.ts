export { createProgram, runCli } from './program';
export { type CliContext, createDefaultCliContext } from './cli-context';
export { EXIT_CODES, exitCodeFor, type ExitCode } from './errors/exit-codes';
export { CliError, MissingApiKeyError, OptionsError } from './errors/cli-error';
export {
  OPERATION_COMMANDS,
  parseEnrichOptions,
  resolveOperation,
  type EnrichSettings,
  type OperationCommand,
} from './options/enrich-options';
export { runEnrichment, type EnrichResult } from './runner/enrich-runner';
export { createModel } from './runner/model-factory';
