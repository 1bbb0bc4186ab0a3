import { EventEmitter } from 'events';
import { PeerStat } from '../../database/models';
import { logger, shortKey } from '../../utils/logger';
import { describeError } from '../../utils/errors';
import { ClientRegistry } from '../registry/ClientRegistry';
import { InterfaceController } from '../wireguard/InterfaceController';
import { ONLINE_WINDOW_SECONDS, decideSessionTransition, isPeerOnline } from './sessionInference';

export interface TrafficReconcilerOptions {
  intervalSeconds: number;
  onlineWindowSeconds?: number;
}

export interface TickSummary {
  skipped?: 'InterfaceDown' | 'NoPeers';
  peers: number;
  matched: number;
  online: number;
  sessionsStarted: number;
  sessionsEnded: number;
  bytesReceived: number;
  bytesSent: number;
  errors: number;
}

function emptySummary(): TickSummary {
  return {
    peers: 0,
    matched: 0,
    online: 0,
    sessionsStarted: 0,
    sessionsEnded: 0,
    bytesReceived: 0,
    bytesSent: 0,
    errors: 0,
  };
}

/**
 * Samples peer counters on a fixed interval, attributes traffic deltas to
 * clients and opens or closes their sessions from handshake freshness.
 *
 * Emits `tick` with a TickSummary after each completed tick and `tickFailed`
 * with the error message when a tick as a whole fails.
 */
export class TrafficReconciler extends EventEmitter {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private readonly onlineWindowSeconds: number;

  constructor(
    private registry: ClientRegistry,
    private controller: InterfaceController,
    private options: TrafficReconcilerOptions
  ) {
    super();
    this.onlineWindowSeconds = options.onlineWindowSeconds ?? ONLINE_WINDOW_SECONDS;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    logger.info('Traffic reconciler started', { intervalSeconds: this.options.intervalSeconds });
    this.schedule();
  }

  /** Cancels the schedule and waits for the tick in progress, if any. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    logger.info('Traffic reconciler stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  async runTick(now: Date = new Date()): Promise<TickSummary> {
    const summary = emptySummary();

    if (!(await this.controller.isInterfaceUp())) {
      logger.debug('Interface is down, skipping traffic tick', { interfaceName: this.controller.interfaceName });
      return { ...summary, skipped: 'InterfaceDown' };
    }

    const peers = await this.controller.dumpPeers();
    if (peers.length === 0) {
      logger.debug('No peers reported, skipping traffic tick');
      return { ...summary, skipped: 'NoPeers' };
    }

    summary.peers = peers.length;
    const nowSeconds = Math.floor(now.getTime() / 1000);

    for (const peer of peers) {
      try {
        await this.reconcilePeer(peer, now, nowSeconds, summary);
      } catch (error) {
        summary.errors++;
        logger.error('Failed to reconcile peer', { publicKey: shortKey(peer.publicKey), error: describeError(error) });
      }
    }

    logger.debug('Traffic tick complete', { ...summary });
    return summary;
  }

  private async reconcilePeer(peer: PeerStat, now: Date, nowSeconds: number, summary: TickSummary): Promise<void> {
    const client = await this.registry.getClientByPublicKey(peer.publicKey);
    if (!client) {
      return;
    }
    summary.matched++;

    const delta = await this.registry.recordCounterSample(client.id, peer.bytesReceived, peer.bytesSent);
    summary.bytesReceived += delta.deltaReceived;
    summary.bytesSent += delta.deltaSent;

    const online = isPeerOnline(peer.latestHandshake, nowSeconds, this.onlineWindowSeconds);
    if (online) {
      summary.online++;
    }

    const session = await this.registry.getActiveSession(client.id);
    const transition = decideSessionTransition(online, session !== null, peer.latestHandshake, now);

    if (transition.kind === 'start') {
      await this.registry.startSession(client.id, transition.at);
      summary.sessionsStarted++;
      logger.info('Session started', { client: client.name, startAt: transition.at.toISOString() });
    } else if (transition.kind === 'end') {
      await this.registry.endSession(client.id, transition.at);
      summary.sessionsEnded++;
      logger.info('Session ended', { client: client.name, endAt: transition.at.toISOString() });
    }
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tickSafely().finally(() => {
        this.inFlight = null;
        if (this.running) {
          this.schedule();
        }
      });
    }, this.options.intervalSeconds * 1000);
  }

  private async tickSafely(): Promise<void> {
    try {
      const summary = await this.runTick();
      this.emit('tick', summary);
    } catch (error) {
      const message = describeError(error);
      logger.error('Traffic tick failed', { error: message });
      this.emit('tickFailed', message);
    }
  }
}
