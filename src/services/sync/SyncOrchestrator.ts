import fs from 'fs/promises';
import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { ObfuscationParameters } from '../../config/config';
import { logger } from '../../utils/logger';
import { describeError } from '../../utils/errors';
import { ClientRegistry } from '../registry/ClientRegistry';
import { InterfaceController } from '../wireguard/InterfaceController';
import { parseConfig, renderServerConfig } from '../wireguard/ConfigRenderer';

export type SyncState = 'Stale' | 'Rendering' | 'Applying' | 'Synced' | 'SyncFailed';

export interface SyncOutcome {
  generation: string;
  reason: string;
  state: 'Synced' | 'SyncFailed';
  peerCount: number;
  startedAt: Date;
  finishedAt: Date;
  error?: string;
}

export interface SyncStatus {
  state: SyncState | null;
  generation: string | null;
  /** Syncs requested and not yet finished, the running one included. */
  pending: number;
  lastOutcome: SyncOutcome | null;
}

export interface StateChange {
  generation: string;
  from: SyncState | null;
  to: SyncState;
}

export interface ServerInterfaceSettings {
  privateKey: string;
  /** e.g. `10.8.0.1/24` */
  address: string;
  listenPort: number;
  postUp: string;
  postDown: string;
  obfuscation: ObfuscationParameters;
  /** Canonical config file, overwritten on every sync. */
  configPath: string;
}

/**
 * Makes the live interface match the registry: render every active client into
 * the config file, then `syncconf` it. One render+apply runs at a time; a
 * request made during a run queues behind it and reads the registry afresh.
 * A failed sync is reported, never rolled back or retried.
 *
 * Events: `stateChange` (StateChange), `outcome` (SyncOutcome).
 */
export class SyncOrchestrator extends EventEmitter {
  private tail: Promise<SyncOutcome | void> = Promise.resolve();
  private state: SyncState | null = null;
  private generation: string | null = null;
  private pending = 0;
  private lastOutcome: SyncOutcome | null = null;

  constructor(
    private registry: ClientRegistry,
    private controller: InterfaceController,
    private settings: ServerInterfaceSettings
  ) {
    super();
  }

  fullSync(reason: string): Promise<SyncOutcome> {
    this.pending++;
    const run = this.tail.then(() => this.runSync(reason));
    this.tail = run;
    return run;
  }

  /** Unconditional pass at startup so the interface matches the stored peers. */
  initialSync(): Promise<SyncOutcome> {
    return this.fullSync('startup');
  }

  getStatus(): SyncStatus {
    return {
      state: this.state,
      generation: this.generation,
      pending: this.pending,
      lastOutcome: this.lastOutcome,
    };
  }

  /** `[Peer]` sections in the config file on disk; null before the first render. */
  async readConfiguredPeerCount(): Promise<number | null> {
    let text: string;
    try {
      text = await fs.readFile(this.settings.configPath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
    return parseConfig(text).filter((section) => section.name === 'Peer').length;
  }

  /** Resolves once every queued sync has finished. */
  async drain(): Promise<void> {
    await this.tail;
  }

  private async runSync(reason: string): Promise<SyncOutcome> {
    const generation = uuidv4();
    const startedAt = new Date();
    let peerCount = 0;

    this.generation = generation;
    this.transition(generation, 'Stale');

    let failure: string | undefined;
    try {
      this.transition(generation, 'Rendering');
      const clients = await this.registry.getAllClients(true);
      peerCount = clients.length;

      const text = renderServerConfig({
        privateKey: this.settings.privateKey,
        address: this.settings.address,
        listenPort: this.settings.listenPort,
        postUp: this.settings.postUp,
        postDown: this.settings.postDown,
        obfuscation: this.settings.obfuscation,
        peers: clients.map((client) => ({ publicKey: client.publicKey, address: client.address })),
      });
      await fs.writeFile(this.settings.configPath, text, { mode: 0o600 });
      await fs.chmod(this.settings.configPath, 0o600);

      this.transition(generation, 'Applying');
      const applied = await this.controller.applyConfigFile(this.settings.configPath);
      if (!applied.ok) {
        failure = `${applied.error.command}: ${applied.error.stderr}`;
      }
    } catch (error) {
      failure = describeError(error);
    }

    return this.finish(generation, reason, peerCount, startedAt, failure);
  }

  private finish(
    generation: string,
    reason: string,
    peerCount: number,
    startedAt: Date,
    error?: string
  ): SyncOutcome {
    const state = error === undefined ? 'Synced' : 'SyncFailed';
    const outcome: SyncOutcome = {
      generation,
      reason,
      state,
      peerCount,
      startedAt,
      finishedAt: new Date(),
      ...(error !== undefined ? { error } : {}),
    };
    this.lastOutcome = outcome;
    this.pending--;
    this.transition(generation, state);

    if (state === 'Synced') {
      logger.info('Interface synced', { generation, reason, peerCount });
    } else {
      logger.error('Interface sync failed', { generation, reason, peerCount, error });
    }
    this.notify('outcome', outcome);
    return outcome;
  }

  private transition(generation: string, to: SyncState): void {
    const change: StateChange = { generation, from: this.state, to };
    this.state = to;
    logger.debug('Sync state changed', { ...change });
    this.notify('stateChange', change);
  }

  /** Listener failures are logged; they never change the outcome of a sync. */
  private notify(event: 'outcome' | 'stateChange', payload: SyncOutcome | StateChange): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      logger.error('Sync listener failed', { event, generation: payload.generation, error: describeError(error) });
    }
  }
}
