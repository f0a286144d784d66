#!/usr/bin/env node
import { Command } from 'commander';
import { importCommand } from './import.js';
import { statusCommand } from './status.js';

const program = new Command();

program
  .name('notezim')
  .description('Import Markdown notes into a Zim notebook, linked from the journal')
  .version('0.1.0');

program.addCommand(importCommand);
program.addCommand(statusCommand);

await program.parseAsync();
