// infra-drift command tree

import { Command } from 'commander';
import { registerDriftCommand } from './commands/drift.js';

export const VERSION = '0.1.0';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('infra-drift')
    .description('Infrastructure Drift Detection - Compare live EC2 instances with Terraform state or configuration')
    .version(VERSION);

  registerDriftCommand(program);

  return program;
}
