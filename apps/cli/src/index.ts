#!/usr/bin/env tsx

import type { Command } from 'commander';
import { createProgram } from './program.js';

const program = createProgram();

// Default action (no command): show task list
program.action((_opts: unknown, cmd: Command) => {
  cmd.commands.find(c => c.name() === 'list')?.parse(process.argv.slice(0, 2));
});

program.parse();
