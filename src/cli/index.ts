#!/usr/bin/env node
import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerResolveCommand } from './commands/resolve.js';
import { registerSourcesCommand } from './commands/sources.js';
import { registerDoctorCommand } from './commands/doctor.js';

const program = new Command();

program
  .name('cloudloc')
  .description('Resolve archive data products to on-prem or cloud fetch handles')
  .version('0.1.0');

registerInitCommand(program);
registerResolveCommand(program);
registerSourcesCommand(program);
registerDoctorCommand(program);

program.parseAsync(process.argv).catch((err: Error) => {
  console.error('Error:', err.message);
  process.exit(1);
});
