import { Command } from 'commander';
import { formatBytes, formatHandshakeAge } from '../../utils/format';
import { ApiOptions, createApiClient, runAction } from './shared';

export function clientsCommand(program: Command): void {
  const clientsCmd = program.command('clients').description('Manage VPN clients');

  clientsCmd
    .command('list')
    .description('List active clients')
    .action((_options: unknown, command: Command) => {
      runAction('list clients', async () => {
        const clients = await createApiClient(command.optsWithGlobals<ApiOptions>()).listClients();
        if (clients.length === 0) {
          console.log('No clients yet');
          return;
        }
        for (const client of clients) {
          console.log(`${client.name.padEnd(32)} ${client.address.padEnd(18)} ${client.publicKey}`);
        }
        console.log(`\nTotal: ${clients.length}`);
      });
    });

  clientsCmd
    .command('add <name>')
    .description('Create a client and print its config and vpn:// key')
    .action((name: string, _options: unknown, command: Command) => {
      runAction('add client', async () => {
        const created = await createApiClient(command.optsWithGlobals<ApiOptions>()).createClient(name);
        console.log(`Client ${created.client.name} created with address ${created.client.address}`);
        if (created.sync.state === 'SyncFailed') {
          console.warn(`Warning: interface sync failed: ${created.sync.error ?? 'unknown error'}`);
        }
        console.log('');
        console.log(created.clientConfig);
        console.log(created.vpnLink);
      });
    });

  clientsCmd
    .command('remove <name>')
    .description('Delete a client and revoke its access')
    .action((name: string, _options: unknown, command: Command) => {
      runAction('remove client', async () => {
        const deleted = await createApiClient(command.optsWithGlobals<ApiOptions>()).deleteClient(name);
        console.log(`Client ${deleted.client.name} deleted`);
        if (deleted.sync.state === 'SyncFailed') {
          console.warn(`Warning: interface sync failed: ${deleted.sync.error ?? 'unknown error'}`);
        }
      });
    });

  clientsCmd
    .command('show <name>')
    .description('Show a client with its live peer state')
    .option('--config', 'print the client config and vpn:// key')
    .action((name: string, options: { config?: boolean }, command: Command) => {
      runAction('show client', async () => {
        const api = createApiClient(command.optsWithGlobals<ApiOptions>());
        const details = await api.getClient(name);
        console.log(`Name:       ${details.client.name}`);
        console.log(`Address:    ${details.client.address}`);
        console.log(`Public key: ${details.client.publicKey}`);
        console.log(`Created:    ${details.client.createdAt}`);
        if (details.peer) {
          console.log(`Handshake:  ${formatHandshakeAge(details.peer.latestHandshake)}`);
          console.log(`Endpoint:   ${details.peer.endpoint ?? '(none)'}`);
          console.log(`Received:   ${formatBytes(details.peer.bytesReceived)}`);
          console.log(`Sent:       ${formatBytes(details.peer.bytesSent)}`);
        } else {
          console.log('Handshake:  never');
        }
        console.log(`Session:    ${details.activeSession ? `online since ${details.activeSession.startAt}` : 'offline'}`);

        if (options.config) {
          const artifacts = await api.getClientConfig(name);
          console.log('');
          console.log(artifacts.clientConfig);
          console.log(artifacts.vpnLink);
        }
      });
    });
}
