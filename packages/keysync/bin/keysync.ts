#!/usr/bin/env tsx
/**
 * KeySync CLI Entry Point
 *
 * Reconciles keys across systems against an authority, provisions master
 * keys and keeps the run history.
 *
 * @module keysync-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  registerRecoverCommand,
  registerRegistryCommands,
  registerRunCommand,
  registerRunsCommands,
  registerSandboxCommands,
} from '../src/cli/commands/index.js';
import { EXIT_CODES } from '../src/cli/lib/context.js';

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (parsed !== null && typeof parsed === 'object' && 'version' in parsed) {
      return String(parsed.version);
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('keysync')
    .description('KeySync - cross-system key reconciliation and master key provisioning')
    .version(getVersion(), '-V, --version', 'Output the version number');

  registerRunCommand(program);
  registerRegistryCommands(program);
  registerRunsCommands(program);
  registerRecoverCommand(program);
  registerSandboxCommands(program);

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
