#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

import { upCommand } from './commands/up.js';
import { validateCommand } from './commands/validate.js';
import { planCommand } from './commands/plan.js';
import { statusCommand } from './commands/status.js';
import { destroyCommand } from './commands/destroy.js';
import { reprovisionCommand } from './commands/reprovision.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

program
  .name('guestsmith')
  .description('Converge LXC containers and QEMU VMs on a single hypervisor host')
  .version(packageJson.version)
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print hypervisor commands and debug lines before execution');

/**
 * Merge the global flags into command-level options.
 * Supports both positions:
 *   guestsmith --verbose up file    (parent parses --verbose)
 *   guestsmith up file --verbose    (subcommand parses --verbose)
 */
function withGlobalOpts<T extends { json?: boolean; verbose?: boolean }>(opts: T): T {
  const globalOpts = program.opts<{ json?: boolean; verbose?: boolean }>();
  return {
    ...opts,
    json: opts.json === true || globalOpts.json === true,
    verbose: opts.verbose === true || globalOpts.verbose === true,
  };
}

program
  .command('validate <file>')
  .description('Validate configuration documents and the dependency graph')
  .option('--json', 'Output as JSON')
  .action((file: string, opts: { json?: boolean }) => validateCommand(file, withGlobalOpts(opts)));

program
  .command('plan <file> [ids...]')
  .description('Show dependency order and pending stages without executing')
  .option('--json', 'Output as JSON')
  .action((file: string, ids: string[], opts: { json?: boolean }) =>
    planCommand(file, ids, withGlobalOpts(opts))
  );

program
  .command('up <file> [ids...]')
  .description('Converge resources (all configured ones when no ids are given)')
  .option('--dry-run', 'Log every command instead of running it')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print hypervisor commands before execution')
  .action((file: string, ids: string[], opts: { dryRun?: boolean; json?: boolean; verbose?: boolean }) =>
    upCommand(file, ids, withGlobalOpts(opts))
  );

program
  .command('status <file> [ids...]')
  .description('Show recorded lifecycle stage of each resource')
  .option('--json', 'Output as JSON')
  .action((file: string, ids: string[], opts: { json?: boolean }) =>
    statusCommand(file, ids, withGlobalOpts(opts))
  );

program
  .command('destroy <file> <ids...>')
  .description('Remove resources and their records')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print hypervisor commands before execution')
  .action((file: string, ids: string[], opts: { json?: boolean; verbose?: boolean }) =>
    destroyCommand(file, ids, withGlobalOpts(opts))
  );

program
  .command('reprovision <file> <ids...>')
  .description('Destroy resources and converge them again from scratch')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print hypervisor commands before execution')
  .action((file: string, ids: string[], opts: { json?: boolean; verbose?: boolean }) =>
    reprovisionCommand(file, ids, withGlobalOpts(opts))
  );

await program.parseAsync();
