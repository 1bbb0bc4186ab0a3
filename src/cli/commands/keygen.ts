import { Command } from 'commander';
import { config } from '../../config/config';
import { ChildProcessRunner } from '../../services/wireguard/CommandRunner';
import { KeyPairGenerator } from '../../services/wireguard/KeyPairGenerator';
import { runAction } from './shared';

export function keygenCommand(program: Command): void {
  program
    .command('keygen')
    .description('Generate a key pair with the awg tool')
    .action(() => {
      runAction('generate a key pair', async () => {
        const runner = new ChildProcessRunner(config.vpn.commandTimeoutMs);
        const keyPair = await new KeyPairGenerator(runner, config.vpn.binary).generateKeyPair();
        console.log(`PrivateKey = ${keyPair.privateKey}`);
        console.log(`PublicKey = ${keyPair.publicKey}`);
      });
    });
}
