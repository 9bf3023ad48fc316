/**
 * Sandbox Commands
 *
 * Edit the configured system CSV files to stage reconciliation scenarios.
 *
 * Usage:
 *   keysync sandbox init [--keys <n>]
 *   keysync sandbox status [--json]
 *   keysync sandbox add-key --key <k>... [--key-file <path>] [--systems <s>...]
 *   keysync sandbox remove-key [--key <k>...] [--key-file <path>] [--pattern <p>] [--systems <s>...]
 *   keysync sandbox modify-key --rename <old=new>... [--systems <s>...]
 *   keysync sandbox reset [--empty]
 *   keysync sandbox save-state --name <name> [--note <text>]
 *   keysync sandbox load-state <snapshot>
 *   keysync sandbox snapshots
 *
 * @module cli/commands/sandbox
 */

import type { Command } from 'commander';
import { SandboxError } from '../../core/errors.js';
import {
  createSandboxManager,
  ensureKeys,
  loadKeysFromFile,
  type KeyRename,
  type SandboxStateManager,
  type SandboxStatusReport,
} from '../../services/sandbox-state.js';
import {
  EXIT_CODES,
  loadCliConfig,
  parsePositiveInt,
  reportFailure,
  type CommonOptions,
  type ExitCode,
} from '../lib/context.js';
import { formatJson, printOutput, printSuccess } from '../lib/output.js';

export interface SandboxInitOptions extends CommonOptions {
  readonly keys?: string;
}

export interface SandboxStatusOptions extends CommonOptions {
  readonly json?: boolean;
}

export interface SandboxKeyOptions extends CommonOptions {
  readonly key?: readonly string[];
  readonly keyFile?: string;
  readonly systems?: readonly string[];
}

export interface SandboxRemoveOptions extends SandboxKeyOptions {
  readonly pattern?: string;
}

export interface SandboxModifyOptions extends CommonOptions {
  readonly rename?: readonly string[];
  readonly systems?: readonly string[];
}

export interface SandboxResetOptions extends CommonOptions {
  readonly empty?: boolean;
}

export interface SandboxSaveOptions extends CommonOptions {
  readonly name: string;
  readonly note?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Register all sandbox subcommands
 */
export function registerSandboxCommands(program: Command): void {
  const sandbox = program.command('sandbox').description('Edit system files to stage scenarios');

  const withCommon = (command: Command): Command =>
    command
      .option('--config <path>', 'Path to config file')
      .option('-v, --verbose', 'Enable debug logging');

  const exitWith = (exitCode: ExitCode): void => {
    if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
  };

  withCommon(
    sandbox
      .command('init')
      .description('Create a synchronized baseline across all systems')
      .option('--keys <n>', 'Number of keys (default: sandbox.default_key_count)')
  ).action(async (options: SandboxInitOptions) => exitWith(await executeSandboxInit(options)));

  withCommon(
    sandbox.command('status').description('Show per-system key counts').option('--json', 'Output as JSON')
  ).action(async (options: SandboxStatusOptions) => exitWith(await executeSandboxStatus(options)));

  withCommon(
    sandbox
      .command('add-key')
      .description('Add keys to systems')
      .option('--key <key>', 'Key to add (repeatable)', collect, [])
      .option('--key-file <path>', 'File of keys: one per line, or CSV with a key column')
      .option('--systems <system>', 'Target system (repeatable, default: all)', collect, [])
  ).action(async (options: SandboxKeyOptions) => exitWith(await executeSandboxAdd(options)));

  withCommon(
    sandbox
      .command('remove-key')
      .description('Remove keys from systems')
      .option('--key <key>', 'Key to remove (repeatable)', collect, [])
      .option('--key-file <path>', 'File of keys: one per line, or CSV with a key column')
      .option('--pattern <text>', 'Remove every key containing this text (case-insensitive)')
      .option('--systems <system>', 'Target system (repeatable, default: all)', collect, [])
  ).action(async (options: SandboxRemoveOptions) => exitWith(await executeSandboxRemove(options)));

  withCommon(
    sandbox
      .command('modify-key')
      .description('Rename keys in systems')
      .option('--rename <old=new>', 'Rename OLD to NEW (repeatable)', collect, [])
      .option('--systems <system>', 'Target system (repeatable, default: all)', collect, [])
  ).action(async (options: SandboxModifyOptions) => exitWith(await executeSandboxModify(options)));

  withCommon(
    sandbox
      .command('reset')
      .description('Reset to the default baseline')
      .option('--empty', 'Empty every system instead')
  ).action(async (options: SandboxResetOptions) => exitWith(await executeSandboxReset(options)));

  withCommon(
    sandbox
      .command('save-state')
      .description('Save the current files as a snapshot')
      .requiredOption('--name <name>', 'Snapshot name')
      .option('--note <text>', 'Note stored in the snapshot metadata')
  ).action(async (options: SandboxSaveOptions) => exitWith(await executeSandboxSave(options)));

  withCommon(
    sandbox.command('load-state <snapshot>').description('Restore the files from a snapshot directory')
  ).action(async (snapshot: string, options: CommonOptions) =>
    exitWith(await executeSandboxLoad(snapshot, options))
  );

  withCommon(sandbox.command('snapshots').description('List saved snapshots, newest first')).action(
    async (options: CommonOptions) => exitWith(await executeSandboxSnapshots(options))
  );
}

// ============================================================================
// Actions
// ============================================================================

async function openManager(options: CommonOptions): Promise<{
  manager: SandboxStateManager;
  defaultKeyCount: number;
}> {
  const config = await loadCliConfig(options);
  return {
    manager: await createSandboxManager(config),
    defaultKeyCount: config.sandbox.defaultKeyCount,
  };
}

/**
 * Keys from --key-file first, then --key, without repeats
 */
async function resolveKeys(options: SandboxKeyOptions): Promise<string[]> {
  const keys: string[] = [];
  if (options.keyFile !== undefined) {
    keys.push(...(await loadKeysFromFile(options.keyFile)));
  }
  keys.push(...(options.key ?? []));
  if (keys.length === 0) {
    throw new SandboxError('At least one key must be supplied');
  }
  return ensureKeys(keys);
}

function targetSystems(options: { readonly systems?: readonly string[] }): readonly string[] | undefined {
  return options.systems !== undefined && options.systems.length > 0 ? options.systems : undefined;
}

export function parseRename(value: string): KeyRename {
  const separator = value.indexOf('=');
  if (separator <= 0 || separator === value.length - 1) {
    throw new SandboxError(`Rename must look like OLD=NEW, got '${value}'`);
  }
  return [value.slice(0, separator), value.slice(separator + 1)];
}

export function formatStatusReport(report: SandboxStatusReport): string {
  const lines = ['Sandbox summary:'];
  for (const [system, stats] of Object.entries(report.systems)) {
    lines.push(
      `  ${system}: total=${stats.total} unique=${stats.unique} missing=${stats.missingFromUnion}`
    );
  }
  lines.push(
    '',
    `Total unique keys: ${report.totalUniqueKeys}`,
    `Keys common to all systems: ${report.keysCommonToAll}`,
    `Snapshots available: ${report.snapshotCount}`
  );
  return lines.join('\n');
}

async function printStatus(manager: SandboxStateManager): Promise<void> {
  printOutput(formatStatusReport(await manager.buildStatusReport()));
}

export async function executeSandboxInit(options: SandboxInitOptions): Promise<ExitCode> {
  try {
    const { manager, defaultKeyCount } = await openManager(options);
    const keyCount = options.keys === undefined ? defaultKeyCount : parsePositiveInt(options.keys, 'keys');
    await manager.initialize(keyCount);
    printSuccess(`Initialized ${keyCount} synchronized keys across ${manager.allowedSystems.length} systems`);
    await printStatus(manager);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}

export async function executeSandboxStatus(options: SandboxStatusOptions): Promise<ExitCode> {
  try {
    const { manager } = await openManager(options);
    const report = await manager.buildStatusReport();
    printOutput(options.json ? formatJson(report) : formatStatusReport(report));
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}

export async function executeSandboxAdd(options: SandboxKeyOptions): Promise<ExitCode> {
  try {
    const { manager } = await openManager(options);
    const keys = await resolveKeys(options);
    const result = await manager.addKeys(keys, targetSystems(options) ?? manager.allowedSystems);
    printSuccess(`Added ${result.added} key entries`);
    for (const [system, added] of Object.entries(result.bySystem)) {
      if (added.length > 0) printOutput(`  ${system}: ${added.join(', ')}`);
    }
    await printStatus(manager);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}

export async function executeSandboxRemove(options: SandboxRemoveOptions): Promise<ExitCode> {
  try {
    const hasKeys = (options.key?.length ?? 0) > 0 || options.keyFile !== undefined;
    if (!hasKeys && !options.pattern) {
      throw new SandboxError('Specify --key/--key-file and/or --pattern to remove keys');
    }
    const { manager } = await openManager(options);
    const removed = await manager.removeKeys({
      keys: hasKeys ? await resolveKeys(options) : [],
      systems: targetSystems(options),
      pattern: options.pattern,
    });
    printSuccess('Removal summary');
    for (const [system, keys] of Object.entries(removed)) {
      if (keys.length > 0) printOutput(`  ${system}: ${keys.join(', ')}`);
    }
    await printStatus(manager);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}

export async function executeSandboxModify(options: SandboxModifyOptions): Promise<ExitCode> {
  try {
    const renames = (options.rename ?? []).map(parseRename);
    if (renames.length === 0) {
      throw new SandboxError('Provide at least one --rename OLD=NEW');
    }
    const { manager } = await openManager(options);
    const changes = await manager.modifyKeys(renames, targetSystems(options));
    printSuccess('Modified keys');
    for (const [system, applied] of Object.entries(changes)) {
      for (const [oldKey, newKey] of applied) {
        printOutput(`  ${system}: ${oldKey} -> ${newKey}`);
      }
    }
    await printStatus(manager);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}

export async function executeSandboxReset(options: SandboxResetOptions): Promise<ExitCode> {
  try {
    const { manager, defaultKeyCount } = await openManager(options);
    if (options.empty) {
      await manager.clear();
      printSuccess('Reset sandbox to empty state');
    } else {
      await manager.initialize(defaultKeyCount);
      printSuccess(`Reset sandbox with ${defaultKeyCount} synchronized keys`);
    }
    await printStatus(manager);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}

export async function executeSandboxSave(options: SandboxSaveOptions): Promise<ExitCode> {
  try {
    const { manager } = await openManager(options);
    const path = await manager.saveSnapshot(
      options.name,
      options.note !== undefined ? { note: options.note } : {}
    );
    printSuccess(`Snapshot saved at ${path}`);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}

export async function executeSandboxLoad(snapshot: string, options: CommonOptions): Promise<ExitCode> {
  try {
    const { manager } = await openManager(options);
    await manager.loadSnapshot(snapshot);
    printSuccess(`Loaded snapshot from ${snapshot}`);
    await printStatus(manager);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}

export async function executeSandboxSnapshots(options: CommonOptions): Promise<ExitCode> {
  try {
    const { manager } = await openManager(options);
    const snapshots = await manager.listSnapshots();
    if (snapshots.length === 0) {
      printOutput('No snapshots found.');
      return EXIT_CODES.SUCCESS;
    }
    for (const snapshot of snapshots) {
      const description = snapshot.metadata?.description;
      printOutput(description ? `${snapshot.path}  ${description}` : snapshot.path);
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}
