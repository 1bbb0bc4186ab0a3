import { Command } from 'commander';
import { run } from '../../index';
import { runAction } from './shared';

export function startCommand(program: Command): void {
  program
    .command('start')
    .description('Start the API server, traffic reconciler and monitor')
    .action(() => {
      runAction('start the server', run);
    });
}
