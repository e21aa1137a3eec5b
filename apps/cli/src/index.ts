#!/usr/bin/env node

import { Command } from 'commander';
import { registerMetricsCommand } from './commands/metrics';
import { registerSnapshotCommands } from './commands/snapshots';
import { createDefaultContext } from './context';
import type { CliContext } from './context';

export type { CliContext, TrackerTarget } from './context';

export function createProgram(context: CliContext = createDefaultContext()): Command {
  const program = new Command();

  program
    .name('topograph')
    .description('Materialize running topologies as property graph snapshots')
    .version('0.1.0');

  registerSnapshotCommands(program, context);
  registerMetricsCommand(program, context);

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
