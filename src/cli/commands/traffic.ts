import { Command } from 'commander';
import { formatBytes } from '../../utils/format';
import { ApiOptions, createApiClient, runAction } from './shared';

export function trafficCommand(program: Command): void {
  program
    .command('traffic')
    .description('Show total traffic per client')
    .action((_options: unknown, command: Command) => {
      runAction('get traffic', async () => {
        const totals = await createApiClient(command.optsWithGlobals<ApiOptions>()).getTrafficTotals();
        if (totals.clients.length === 0) {
          console.log('No traffic data yet');
          return;
        }
        console.log(`${'Client'.padEnd(32)} ${'Received'.padStart(12)} ${'Sent'.padStart(12)}`);
        for (const row of totals.clients) {
          console.log(
            `${row.name.padEnd(32)} ${formatBytes(row.totalReceived).padStart(12)} ${formatBytes(row.totalSent).padStart(12)}`
          );
        }
        console.log(
          `${'Total'.padEnd(32)} ${formatBytes(totals.totalReceived).padStart(12)} ${formatBytes(totals.totalSent).padStart(12)}`
        );
      });
    });
}
