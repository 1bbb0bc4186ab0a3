import { Command } from 'commander';
import { ApiOptions, createApiClient, runAction } from './shared';

export function syncCommand(program: Command): void {
  program
    .command('sync')
    .description('Render the server config from the registry and apply it to the interface')
    .action((_options: unknown, command: Command) => {
      runAction('sync', async () => {
        const outcome = await createApiClient(command.optsWithGlobals<ApiOptions>()).sync();
        console.log(`Synced ${outcome.peerCount} peers (generation ${outcome.generation})`);
      });
    });
}
