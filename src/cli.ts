#!/usr/bin/env -S node --import tsx
import { Command } from 'commander';
import { config } from 'dotenv';
import pkg from '../package.json' with { type: 'json' };
import { registerInitCommand } from './commands/init.ts';
import { registerRunCommand } from './commands/run.ts';
import { registerValidateCommand } from './commands/validate.ts';

// Provider keys may live in ./.env; variables already set in the shell win
config();

const program = new Command();

program
  .name('promptcheck')
  .description('Regression tests for LLM prompts: templated cases, assertions, snapshots')
  .version(pkg.version);

registerRunCommand(program);
registerValidateCommand(program);
registerInitCommand(program);

await program.parseAsync(process.argv);
