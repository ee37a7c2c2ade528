#!/usr/bin/env node
/**
 * @provision/cli - Converge a Mac toward its declared configuration
 */

import { Command } from 'commander';
import { PROVISION_VERSION } from '@provision/core';
import { applyCommand, planCommand } from './commands/reconcile.js';
import { listCommand } from './commands/list.js';

const program = new Command();

program
  .name('provision')
  .description('Idempotent machine provisioning: probe, diff, apply, verify')
  .version(PROVISION_VERSION);

program.addCommand(applyCommand, { isDefault: true });
program.addCommand(planCommand);
program.addCommand(listCommand);

await program.parseAsync();
