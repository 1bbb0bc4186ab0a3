import { Registry, Counter, Gauge, Histogram, collectDefaultMetrics } from 'prom-client';
import { ClientRegistry } from '../registry/ClientRegistry';
import { SyncOrchestrator, SyncOutcome } from '../sync/SyncOrchestrator';
import { TickSummary, TrafficReconciler } from '../traffic/TrafficReconciler';
import { ServerAlert, ServerMetrics, ServerMonitor } from '../monitor/ServerMonitor';
import { logger } from '../../utils/logger';

export interface MetricsSources {
  orchestrator: SyncOrchestrator;
  reconciler: TrafficReconciler;
  monitor?: ServerMonitor;
}

export class PrometheusExporter {
  private registry: Registry;
  private activeClientsGauge: Gauge;
  private onlinePeersGauge: Gauge;
  private serverCpuGauge: Gauge;
  private serverMemoryGauge: Gauge;
  private serverDiskGauge: Gauge;
  private syncCounter: Counter;
  private syncDuration: Histogram;
  private tickCounter: Counter;
  private peerErrorsCounter: Counter;
  private trafficBytesCounter: Counter;
  private alertsCounter: Counter;
  private apiRequestsCounter: Counter;
  private apiErrorsCounter: Counter;

  constructor(options: { collectDefaults?: boolean } = {}) {
    this.registry = new Registry();
    this.registry.setDefaultLabels({ app: 'awg-manager' });
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry, prefix: 'awg_manager_' });
    }

    this.activeClientsGauge = new Gauge({
      name: 'awg_manager_active_clients',
      help: 'Number of active clients in the registry',
      registers: [this.registry],
    });

    this.onlinePeersGauge = new Gauge({
      name: 'awg_manager_online_peers',
      help: 'Peers with a handshake inside the online window at the last tick',
      registers: [this.registry],
    });

    this.serverCpuGauge = new Gauge({
      name: 'awg_manager_server_cpu_usage_percent',
      help: 'Host CPU usage percentage',
      registers: [this.registry],
    });

    this.serverMemoryGauge = new Gauge({
      name: 'awg_manager_server_memory_usage_percent',
      help: 'Host memory usage percentage',
      registers: [this.registry],
    });

    this.serverDiskGauge = new Gauge({
      name: 'awg_manager_server_disk_usage_percent',
      help: 'Root filesystem usage percentage',
      registers: [this.registry],
    });

    this.syncCounter = new Counter({
      name: 'awg_manager_syncs_total',
      help: 'Interface syncs by outcome',
      labelNames: ['state'],
      registers: [this.registry],
    });

    this.syncDuration = new Histogram({
      name: 'awg_manager_sync_duration_ms',
      help: 'Render and apply duration in milliseconds',
      buckets: [10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
      registers: [this.registry],
    });

    this.tickCounter = new Counter({
      name: 'awg_manager_reconciler_ticks_total',
      help: 'Traffic reconciler ticks by result',
      labelNames: ['result'],
      registers: [this.registry],
    });

    this.peerErrorsCounter = new Counter({
      name: 'awg_manager_reconciler_peer_errors_total',
      help: 'Peers that failed to reconcile',
      registers: [this.registry],
    });

    this.trafficBytesCounter = new Counter({
      name: 'awg_manager_traffic_bytes_total',
      help: 'Traffic attributed to clients',
      labelNames: ['direction'],
      registers: [this.registry],
    });

    this.alertsCounter = new Counter({
      name: 'awg_manager_server_alerts_total',
      help: 'Server resource alerts raised',
      labelNames: ['type'],
      registers: [this.registry],
    });

    this.apiRequestsCounter = new Counter({
      name: 'awg_manager_api_requests_total',
      help: 'Total number of API requests',
      labelNames: ['method', 'endpoint', 'status'],
      registers: [this.registry],
    });

    this.apiErrorsCounter = new Counter({
      name: 'awg_manager_api_errors_total',
      help: 'Total number of API errors',
      labelNames: ['method', 'endpoint', 'error_type'],
      registers: [this.registry],
    });
  }

  /** Subscribes the counters to the background services' events. */
  attach(sources: MetricsSources): void {
    sources.orchestrator.on('outcome', (outcome: SyncOutcome) => this.recordSync(outcome));
    sources.reconciler.on('tick', (summary: TickSummary) => this.recordTick(summary));
    sources.reconciler.on('tickFailed', () => this.tickCounter.inc({ result: 'failed' }));
    sources.monitor?.on('metrics', (metrics: ServerMetrics) => this.recordServerMetrics(metrics));
    sources.monitor?.on('alert', (alert: ServerAlert) => this.alertsCounter.inc({ type: alert.type }));
  }

  async updateMetrics(registry: ClientRegistry): Promise<void> {
    try {
      const clients = await registry.getAllClients(true);
      this.activeClientsGauge.set(clients.length);
    } catch (error) {
      logger.error('Failed to update Prometheus metrics', { error });
    }
  }

  recordSync(outcome: SyncOutcome): void {
    this.syncCounter.inc({ state: outcome.state });
    this.syncDuration.observe(outcome.finishedAt.getTime() - outcome.startedAt.getTime());
  }

  recordTick(summary: TickSummary): void {
    this.tickCounter.inc({ result: summary.skipped ?? 'completed' });
    if (summary.skipped) {
      return;
    }
    this.onlinePeersGauge.set(summary.online);
    this.peerErrorsCounter.inc(summary.errors);
    this.trafficBytesCounter.inc({ direction: 'received' }, summary.bytesReceived);
    this.trafficBytesCounter.inc({ direction: 'sent' }, summary.bytesSent);
  }

  recordServerMetrics(metrics: ServerMetrics): void {
    this.serverCpuGauge.set(metrics.cpuPercent);
    this.serverMemoryGauge.set(metrics.memPercent);
    this.serverDiskGauge.set(metrics.diskPercent);
  }

  recordApiRequest(method: string, endpoint: string, status: number): void {
    this.apiRequestsCounter.inc({ method, endpoint, status: status.toString() });
  }

  recordApiError(method: string, endpoint: string, errorType: string): void {
    this.apiErrorsCounter.inc({ method, endpoint, error_type: errorType });
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }
}
