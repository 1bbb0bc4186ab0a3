import fs from 'fs/promises';
import { logger, shortKey } from '../../utils/logger';
import { InterfaceCommandError, describeError } from '../../utils/errors';
import { Result, ok, err, CommandFailed } from '../../utils/result';
import { PeerStat } from '../../database/models';
import { CommandRunner, CommandResult } from './CommandRunner';

export interface InterfaceControllerOptions {
  interfaceName: string;
  binary: string;
  quickBinary: string;
  /** Where the stripped config is written before `syncconf`. */
  scratchPath: string;
}

export interface InterfaceInfo {
  publicKey: string;
  listenPort: number;
}

/**
 * Parses `awg show <iface> dump`. Line 1 describes the interface; every later
 * line is one peer:
 * public_key, preshared_key, endpoint, allowed_ips, latest_handshake, rx, tx, keepalive
 */
export function parseDump(output: string): PeerStat[] {
  const peers: PeerStat[] = [];
  const lines = output.split('\n');

  for (const line of lines.slice(1)) {
    if (!line.trim()) {
      continue;
    }
    const parts = line.split('\t');
    if (parts.length < 7) {
      logger.debug('Skipping malformed dump line', { fields: parts.length });
      continue;
    }

    const latestHandshake = parseInt(parts[4], 10);
    const bytesReceived = parseInt(parts[5], 10);
    const bytesSent = parseInt(parts[6], 10);
    if (Number.isNaN(bytesReceived) || Number.isNaN(bytesSent)) {
      logger.debug('Skipping dump line with non-numeric counters', { publicKey: shortKey(parts[0]) });
      continue;
    }

    peers.push({
      publicKey: parts[0],
      endpoint: parts[2] !== '(none)' ? parts[2] : null,
      allowedIps: parts[3],
      latestHandshake: Number.isNaN(latestHandshake) ? 0 : latestHandshake,
      bytesReceived,
      bytesSent,
    });
  }

  return peers;
}

export class InterfaceController {
  constructor(
    private runner: CommandRunner,
    private options: InterfaceControllerOptions
  ) {}

  get interfaceName(): string {
    return this.options.interfaceName;
  }

  /** Adds a peer to the running interface only; the config file is left as is. */
  async hotAddPeer(publicKey: string, allowedIps: string): Promise<Result<void, CommandFailed>> {
    const args = ['set', this.options.interfaceName, 'peer', publicKey, 'allowed-ips', allowedIps];
    const result = await this.runner.run(this.options.binary, args);
    if (result.exitCode !== 0) {
      logger.error('Failed to add peer', { publicKey: shortKey(publicKey), stderr: result.stderr });
      return err(this.failure(this.options.binary, args, result));
    }
    logger.info('Added peer', { publicKey: shortKey(publicKey), allowedIps });
    return ok(undefined);
  }

  async hotRemovePeer(publicKey: string): Promise<Result<void, CommandFailed>> {
    const args = ['set', this.options.interfaceName, 'peer', publicKey, 'remove'];
    const result = await this.runner.run(this.options.binary, args);
    if (result.exitCode !== 0) {
      logger.error('Failed to remove peer', { publicKey: shortKey(publicKey), stderr: result.stderr });
      return err(this.failure(this.options.binary, args, result));
    }
    logger.info('Removed peer', { publicKey: shortKey(publicKey) });
    return ok(undefined);
  }

  async dumpPeers(): Promise<PeerStat[]> {
    const output = await this.dump();
    return parseDump(output);
  }

  async showInterface(): Promise<InterfaceInfo | null> {
    const output = await this.dump();
    const parts = output.split('\n')[0]?.split('\t') ?? [];
    if (parts.length < 3) {
      return null;
    }
    return { publicKey: parts[1], listenPort: parseInt(parts[2], 10) || 0 };
  }

  async isInterfaceUp(): Promise<boolean> {
    const result = await this.runner.run(this.options.binary, ['show', this.options.interfaceName]);
    return result.exitCode === 0;
  }

  /**
   * Converges the live interface to the peer set in `configPath` in one
   * `syncconf`, leaving unchanged peers connected.
   */
  async applyConfigFile(configPath: string): Promise<Result<void, CommandFailed>> {
    const stripArgs = ['strip', configPath];
    const stripped = await this.runner.run(this.options.quickBinary, stripArgs);
    if (stripped.exitCode !== 0) {
      logger.error('Failed to strip config', { configPath, stderr: stripped.stderr });
      return err(this.failure(this.options.quickBinary, stripArgs, stripped));
    }

    try {
      await fs.writeFile(this.options.scratchPath, `${stripped.stdout}\n`, { mode: 0o600 });
    } catch (error) {
      const message = describeError(error);
      logger.error('Failed to write stripped config', { scratchPath: this.options.scratchPath, error: message });
      return err({ kind: 'CommandFailed', command: `write ${this.options.scratchPath}`, exitCode: -1, stderr: message });
    }

    const syncArgs = ['syncconf', this.options.interfaceName, this.options.scratchPath];
    const synced = await this.runner.run(this.options.binary, syncArgs);
    if (synced.exitCode !== 0) {
      logger.error('Failed to sync config', { stderr: synced.stderr });
      return err(this.failure(this.options.binary, syncArgs, synced));
    }

    return ok(undefined);
  }

  private async dump(): Promise<string> {
    const args = ['show', this.options.interfaceName, 'dump'];
    const result = await this.runner.run(this.options.binary, args);
    if (result.exitCode !== 0) {
      throw new InterfaceCommandError(
        `${this.options.binary} ${args.join(' ')} failed: ${result.stderr}`,
        result.exitCode,
        result.stderr
      );
    }
    return result.stdout;
  }

  private failure(command: string, args: string[], result: CommandResult): CommandFailed {
    return {
      kind: 'CommandFailed',
      command: `${command} ${args.join(' ')}`,
      exitCode: result.exitCode,
      stderr: result.stderr,
    };
  }
}
