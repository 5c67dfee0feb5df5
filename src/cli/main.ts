#!/usr/bin/env node

/**
 * verisolve CLI entry point.
 * All logic is delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerAskCommand, registerRunCommand } from './index.js';

const program = new Command();

program
  .name('verisolve')
  .description(
    'Answer math and logic word problems with a plan, execute, verify loop over an LLM.',
  )
  .version('0.1.0');

registerAskCommand(program);
registerRunCommand(program);

await program.parseAsync();
