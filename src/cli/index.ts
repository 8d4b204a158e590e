#!/usr/bin/env node
/**
 * informant-ontology CLI
 *
 * Command-line interface for building type graphs and querying collections.
 */

import { Command } from 'commander';
import { buildCommand } from './commands/build.js';
import { filterCommand } from './commands/filter.js';
import { harvestCommand } from './commands/harvest.js';
import { reduceCommand } from './commands/reduce.js';

const program = new Command();

program
  .name('informant-ontology')
  .description('Typed provenance records: type graphs, reference reduction, and predicate queries')
  .version('0.1.0');

program.addCommand(buildCommand);
program.addCommand(filterCommand);
program.addCommand(reduceCommand);
program.addCommand(harvestCommand);

await program.parseAsync();
