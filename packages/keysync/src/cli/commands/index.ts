/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

export { registerRunCommand, executeRun, resolveExecutionMode, summarizeRun } from './run.js';
export { registerRegistryCommands } from './registry.js';
export { registerRunsCommands } from './runs.js';
export { registerRecoverCommand } from './recover.js';
export {
  registerSandboxCommands,
  executeSandboxAdd,
  executeSandboxInit,
  executeSandboxLoad,
  executeSandboxModify,
  executeSandboxRemove,
  executeSandboxReset,
  executeSandboxSave,
  executeSandboxSnapshots,
  executeSandboxStatus,
} from './sandbox.js';
