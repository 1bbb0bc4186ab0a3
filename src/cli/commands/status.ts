import { Command } from 'commander';
import { ApiOptions, createApiClient, runAction } from './shared';

export function statusCommand(program: Command): void {
  program
    .command('status')
    .description('Show interface, sync and server status')
    .action((_options: unknown, command: Command) => {
      runAction('get status', async () => {
        const status = await createApiClient(command.optsWithGlobals<ApiOptions>()).getServerStatus();
        console.log('awg-manager Status');
        console.log('==================');
        console.log('');
        console.log(`Interface: ${status.interfaceName} (${status.interface.up ? 'up' : 'down'})`);
        if (status.interface.listenPort) {
          console.log(`  Listen port: ${status.interface.listenPort}`);
        }
        if (status.interface.publicKey) {
          console.log(`  Public key:  ${status.interface.publicKey}`);
        }
        console.log('');

        const last = status.sync.lastOutcome;
        console.log(`Sync: ${status.sync.state ?? 'never run'}`);
        console.log(`  Peers in config: ${status.configuredPeers ?? 'not written yet'}`);
        if (last) {
          console.log(`  Last: ${last.state} at ${last.finishedAt}, ${last.peerCount} peers (${last.reason})`);
          if (last.error) {
            console.log(`  Error: ${last.error}`);
          }
        }
        console.log('');

        if (status.metrics) {
          console.log('Server:');
          console.log(`  CPU:    ${status.metrics.cpuPercent.toFixed(1)}%`);
          console.log(`  Memory: ${status.metrics.memPercent.toFixed(1)}%`);
          console.log(`  Disk:   ${status.metrics.diskPercent.toFixed(1)}%`);
          console.log(`  Load:   ${status.metrics.loadAverage.toFixed(2)}`);
          console.log(`  Uptime: ${status.uptime ?? 'unknown'}`);
        }
      });
    });
}
