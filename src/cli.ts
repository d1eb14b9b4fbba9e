#!/usr/bin/env node

// Точка входа CLI.
import { Command } from 'commander';
import { generateCommand } from './commands/generate-cmd.js';
import { searchCommand } from './commands/search-cmd.js';
import { compareCommand } from './commands/compare-cmd.js';
import { fixturesCommand } from './commands/fixtures-cmd.js';
import { menuCommand } from './commands/menu-cmd.js';

const program = new Command()
  .name('search-study')
  .description('Jump and interpolation search performance study over sorted integer datasets')
  .version('0.1.0');

program.addCommand(generateCommand);
program.addCommand(searchCommand);
program.addCommand(compareCommand);
program.addCommand(fixturesCommand);
program.addCommand(menuCommand);

program.parse();
