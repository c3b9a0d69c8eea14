#!/usr/bin/env -S node --import tsx
import 'dotenv/config';
import { Command } from 'commander';
import { buyCommand } from './commands/buy.js';
import { searchCommand } from './commands/search.js';

const program = new Command();

program
  .name('cartpilot')
  .description('Search for products and add them to a store cart from the terminal')
  .version('0.1.0');

program.addCommand(searchCommand);
program.addCommand(buyCommand);

await program.parseAsync(process.argv);
