import { EventEmitter } from 'events';
import * as si from 'systeminformation';
import { logger } from '../../utils/logger';
import { describeError } from '../../utils/errors';
import { CounterSample, computeCounterDelta } from '../registry/counterDelta';

export interface SystemSample {
  cpuPercent: number;
  cpuCount: number;
  memTotal: number;
  memUsed: number;
  diskTotal: number;
  diskUsed: number;
  /** Cumulative bytes over every non-loopback interface. */
  netRx: number;
  netTx: number;
  loadAverage: number;
  uptimeSeconds: number;
}

export interface SystemProbe {
  sample(): Promise<SystemSample>;
}

export class SystemInformationProbe implements SystemProbe {
  async sample(): Promise<SystemSample> {
    const [load, cpu, mem, disks, network, time] = await Promise.all([
      si.currentLoad(),
      si.cpu(),
      si.mem(),
      si.fsSize(),
      si.networkStats('*'),
      Promise.resolve(si.time()),
    ]);

    const root = disks.find((disk) => disk.mount === '/') ?? disks[0];
    let netRx = 0;
    let netTx = 0;
    for (const iface of network) {
      if (iface.iface === 'lo') {
        continue;
      }
      netRx += iface.rx_bytes || 0;
      netTx += iface.tx_bytes || 0;
    }

    return {
      cpuPercent: load.currentLoad || 0,
      cpuCount: cpu.cores || 1,
      memTotal: mem.total,
      memUsed: mem.total - (mem.available || 0),
      diskTotal: root?.size ?? 0,
      diskUsed: root?.used ?? 0,
      netRx,
      netTx,
      loadAverage: load.avgLoad || 0,
      uptimeSeconds: Number(time.uptime) || 0,
    };
  }
}

export interface ServerMetrics {
  timestamp: Date;
  cpuPercent: number;
  cpuCount: number;
  memTotal: number;
  memUsed: number;
  memPercent: number;
  diskTotal: number;
  diskUsed: number;
  diskPercent: number;
  /** Bytes since the previous sample; 0 on the first one. */
  netBytesReceived: number;
  netBytesSent: number;
  loadAverage: number;
  uptimeSeconds: number;
}

export type AlertType = 'cpu' | 'memory' | 'disk';

export interface ServerAlert {
  type: AlertType;
  value: number;
  threshold: number;
}

export interface ServerMonitorOptions {
  intervalSeconds: number;
  cpuThreshold: number;
  memThreshold: number;
  diskThreshold: number;
  alertCooldownSeconds: number;
}

function percent(used: number, total: number): number {
  return total > 0 ? Math.round((used / total) * 1000) / 10 : 0;
}

export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${days}d ${hours}h ${minutes}m`;
}

/**
 * Periodic host resource snapshot with threshold alerts. Each alert type
 * fires at most once per cooldown.
 *
 * Emits `metrics` (ServerMetrics) and `alert` (ServerAlert).
 */
export class ServerMonitor extends EventEmitter {
  private lastNet: CounterSample | null = null;
  private lastAlertAt: Record<AlertType, number> = { cpu: 0, memory: 0, disk: 0 };
  private latest: ServerMetrics | null = null;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;

  constructor(
    private probe: SystemProbe,
    private options: ServerMonitorOptions
  ) {
    super();
  }

  async collect(now: Date = new Date()): Promise<ServerMetrics> {
    const sample = await this.probe.sample();
    const current = { bytesReceived: sample.netRx, bytesSent: sample.netTx };
    const net = computeCounterDelta(this.lastNet, current);
    this.lastNet = current;

    const metrics: ServerMetrics = {
      timestamp: now,
      cpuPercent: sample.cpuPercent,
      cpuCount: sample.cpuCount,
      memTotal: sample.memTotal,
      memUsed: sample.memUsed,
      memPercent: percent(sample.memUsed, sample.memTotal),
      diskTotal: sample.diskTotal,
      diskUsed: sample.diskUsed,
      diskPercent: percent(sample.diskUsed, sample.diskTotal),
      netBytesReceived: net.deltaReceived,
      netBytesSent: net.deltaSent,
      loadAverage: sample.loadAverage,
      uptimeSeconds: sample.uptimeSeconds,
    };
    this.latest = metrics;
    return metrics;
  }

  checkAlerts(metrics: ServerMetrics, nowMs: number = Date.now()): ServerAlert[] {
    const candidates: ServerAlert[] = [
      { type: 'cpu', value: metrics.cpuPercent, threshold: this.options.cpuThreshold },
      { type: 'memory', value: metrics.memPercent, threshold: this.options.memThreshold },
      { type: 'disk', value: metrics.diskPercent, threshold: this.options.diskThreshold },
    ];
    const cooldownMs = this.options.alertCooldownSeconds * 1000;

    const alerts: ServerAlert[] = [];
    for (const candidate of candidates) {
      if (candidate.value < candidate.threshold) {
        continue;
      }
      if (nowMs - this.lastAlertAt[candidate.type] < cooldownMs) {
        continue;
      }
      this.lastAlertAt[candidate.type] = nowMs;
      alerts.push(candidate);
    }
    return alerts;
  }

  getLatest(): ServerMetrics | null {
    return this.latest;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.inFlight = this.poll().finally(() => {
      this.inFlight = null;
      this.schedule();
    });
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private schedule(): void {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.poll().finally(() => {
        this.inFlight = null;
        this.schedule();
      });
    }, this.options.intervalSeconds * 1000);
  }

  private async poll(): Promise<void> {
    try {
      const metrics = await this.collect();
      this.emit('metrics', metrics);
      for (const alert of this.checkAlerts(metrics)) {
        logger.warn('Server resource alert', { ...alert });
        this.emit('alert', alert);
      }
    } catch (error) {
      logger.error('Failed to collect server metrics', { error: describeError(error) });
    }
  }
}
