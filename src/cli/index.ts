#!/usr/bin/env node

/**
 * Curia — Command Line Interface
 *
 * Runs negotiation rounds against a roster file and inspects the seeded
 * faction relations.
 *
 * @module cli
 */

import { Command } from 'commander';
import { registerNegotiateCommand } from './commands/negotiate.js';
import { registerRelationsCommand } from './commands/relations.js';

const program = new Command();

program
  .name('curia')
  .description('Curia — backroom negotiation, favors and amendments for a Roman senate simulation')
  .version('0.1.0');

registerNegotiateCommand(program);
registerRelationsCommand(program);

program.parse();
