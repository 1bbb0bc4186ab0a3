import { logger, shortKey } from '../../utils/logger';
import { KeyGenerationError } from '../../utils/errors';
import { CommandRunner } from './CommandRunner';

export interface KeyPair {
  privateKey: string;
  publicKey: string;
}

export class KeyPairGenerator {
  constructor(
    private runner: CommandRunner,
    private binary = 'awg'
  ) {}

  async generateKeyPair(): Promise<KeyPair> {
    const genkey = await this.runner.run(this.binary, ['genkey']);
    if (genkey.exitCode !== 0 || !genkey.stdout) {
      logger.error('Failed to generate private key', { stderr: genkey.stderr, exitCode: genkey.exitCode });
      throw new KeyGenerationError(`Failed to generate private key: ${genkey.stderr || 'no output'}`);
    }
    const privateKey = genkey.stdout;

    const pubkey = await this.runner.run(this.binary, ['pubkey'], { input: privateKey });
    if (pubkey.exitCode !== 0 || !pubkey.stdout) {
      logger.error('Failed to derive public key', { stderr: pubkey.stderr, exitCode: pubkey.exitCode });
      throw new KeyGenerationError(`Failed to derive public key: ${pubkey.stderr || 'no output'}`);
    }

    logger.debug('Key pair generated', { publicKey: shortKey(pubkey.stdout) });
    return { privateKey, publicKey: pubkey.stdout };
  }
}
