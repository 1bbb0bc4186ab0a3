import { ClientRegistry } from '../services/registry/ClientRegistry';
import { ProvisioningService } from '../services/provisioning/ProvisioningService';
import { SyncOrchestrator } from '../services/sync/SyncOrchestrator';
import { InterfaceController } from '../services/wireguard/InterfaceController';
import { ServerMonitor } from '../services/monitor/ServerMonitor';
import { PrometheusExporter } from '../services/metrics/PrometheusExporter';
import { OperatorGuard } from '../services/access/OperatorGuard';

export interface HealthCheck {
  name: string;
  /** A failing critical check makes the service unhealthy and not ready. */
  critical: boolean;
  check(): Promise<void>;
}

/** Everything a route needs, built once at startup and handed to each router. */
export interface ServiceContext {
  registry: ClientRegistry;
  provisioning: ProvisioningService;
  orchestrator: SyncOrchestrator;
  controller: InterfaceController;
  monitor: ServerMonitor | null;
  metrics: PrometheusExporter;
  guard: OperatorGuard;
  healthChecks: HealthCheck[];
  auth: {
    jwtSecret: string;
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
}
