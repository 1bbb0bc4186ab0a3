#!/usr/bin/env node

import { Command } from 'commander';
import { startCommand } from './commands/start';
import { tokenCommand } from './commands/token';
import { keygenCommand } from './commands/keygen';
import { clientsCommand } from './commands/clients';
import { syncCommand } from './commands/sync';
import { statusCommand } from './commands/status';
import { trafficCommand } from './commands/traffic';

const program = new Command();

program
  .name('awg-manager')
  .description('Peer provisioning and traffic accounting for an AmneziaWG interface')
  .version('1.0.0')
  .option('-u, --url <url>', 'API base URL (default AWG_MANAGER_URL)')
  .option('-t, --token <token>', 'operator token (default AWG_MANAGER_TOKEN)');

startCommand(program);
tokenCommand(program);
keygenCommand(program);
clientsCommand(program);
syncCommand(program);
statusCommand(program);
trafficCommand(program);

program.parse(process.argv);

if (!process.argv.slice(2).length) {
  program.outputHelp();
}
