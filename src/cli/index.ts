#!/usr/bin/env node
import { Command } from 'commander';
import { runCommand } from './commands/run.js';

const program = new Command()
  .name('chartcheck')
  .description('Declarative assertion testing for rendered chart templates')
  .version('0.1.0');

program.addCommand(runCommand, { isDefault: true });

await program.parseAsync();
