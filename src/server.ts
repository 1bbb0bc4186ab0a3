import { Config } from './config/config';
import { logger } from './utils/logger';
import { ConfigurationError } from './utils/errors';
import { PostgreSQLDatabase } from './database/postgres';
import { RedisCache } from './database/redis';
import { runMigrations } from './database/migrations/run-migrations';
import { ApiGateway } from './api/gateway';
import { HealthCheck, ServiceContext } from './api/context';
import { ChildProcessRunner } from './services/wireguard/CommandRunner';
import { KeyPairGenerator } from './services/wireguard/KeyPairGenerator';
import { InterfaceController } from './services/wireguard/InterfaceController';
import { PostgresClientRegistry } from './services/registry/PostgresClientRegistry';
import { SyncOrchestrator } from './services/sync/SyncOrchestrator';
import { TrafficReconciler } from './services/traffic/TrafficReconciler';
import { ProvisioningService } from './services/provisioning/ProvisioningService';
import { CommandRateLimiter } from './services/access/CommandRateLimiter';
import { OperatorGuard } from './services/access/OperatorGuard';
import { ServerMonitor, SystemInformationProbe } from './services/monitor/ServerMonitor';
import { PrometheusExporter } from './services/metrics/PrometheusExporter';

export interface RunningServer {
  context: ServiceContext;
  shutdown(signal: string): Promise<void>;
}

/**
 * Connects the stores, wires every service explicitly, converges the
 * interface once and starts the background loops and the HTTP gateway.
 */
export async function startServer(config: Config): Promise<RunningServer> {
  logger.info('Starting awg-manager...');
  logger.info(`Environment: ${config.server.nodeEnv}`);
  for (const warning of config.warnings) {
    logger.warn(warning);
  }
  if (!config.vpn.serverPrivateKey || !config.vpn.serverPublicKey) {
    throw new ConfigurationError('SERVER_PRIVATE_KEY and SERVER_PUBLIC_KEY must be set');
  }

  const db = new PostgreSQLDatabase(config.database);
  await db.connect();
  await runMigrations(db);

  let cache: RedisCache | null = null;
  if (config.redis.enabled) {
    cache = new RedisCache(config.redis);
    await cache.connect();
  }

  const runner = new ChildProcessRunner(config.vpn.commandTimeoutMs);
  const controller = new InterfaceController(runner, {
    interfaceName: config.vpn.interfaceName,
    binary: config.vpn.binary,
    quickBinary: config.vpn.quickBinary,
    scratchPath: config.vpn.scratchPath,
  });
  const registry = new PostgresClientRegistry(db, cache, {
    subnet: config.vpn.subnet,
    cacheTtl: config.redis.cacheTtl,
  });
  const orchestrator = new SyncOrchestrator(registry, controller, {
    privateKey: config.vpn.serverPrivateKey,
    address: `${config.vpn.subnet}.1/24`,
    listenPort: config.vpn.port,
    postUp: config.vpn.postUp,
    postDown: config.vpn.postDown,
    obfuscation: config.obfuscation,
    configPath: config.vpn.configPath,
  });
  const provisioning = new ProvisioningService(
    registry,
    new KeyPairGenerator(runner, config.vpn.binary),
    orchestrator,
    controller,
    {
      serverPublicKey: config.vpn.serverPublicKey,
      host: config.vpn.host,
      port: config.vpn.port,
      dns: config.vpn.dns,
      description: config.vpn.description,
      obfuscation: config.obfuscation,
    }
  );
  const reconciler = new TrafficReconciler(registry, controller, {
    intervalSeconds: config.traffic.interval,
    onlineWindowSeconds: config.traffic.onlineWindow,
  });
  const monitor = new ServerMonitor(new SystemInformationProbe(), {
    intervalSeconds: config.monitor.interval,
    cpuThreshold: config.monitor.cpuThreshold,
    memThreshold: config.monitor.memThreshold,
    diskThreshold: config.monitor.diskThreshold,
    alertCooldownSeconds: config.monitor.alertCooldown,
  });
  const metrics = new PrometheusExporter({ collectDefaults: true });
  metrics.attach({ orchestrator, reconciler, monitor });

  const guard = new OperatorGuard(
    config.auth.adminIds,
    new CommandRateLimiter({ minIntervalMs: config.auth.commandRateLimitMs })
  );

  const healthChecks: HealthCheck[] = [
    {
      name: 'database',
      critical: true,
      check: async () => {
        await db.query('SELECT 1');
      },
    },
    {
      name: 'interface',
      critical: false,
      check: async () => {
        if (!(await controller.isInterfaceUp())) {
          throw new Error(`${config.vpn.interfaceName} is down`);
        }
      },
    },
  ];
  if (cache) {
    const redis = cache;
    healthChecks.push({ name: 'redis', critical: false, check: () => redis.ping() });
  }

  const context: ServiceContext = {
    registry,
    provisioning,
    orchestrator,
    controller,
    monitor,
    metrics,
    guard,
    healthChecks,
    auth: { jwtSecret: config.auth.jwtSecret },
    rateLimit: config.rateLimit,
  };

  const initial = await orchestrator.initialSync();
  if (initial.state === 'SyncFailed') {
    logger.warn('Initial sync failed, continuing with the interface as it is', { error: initial.error });
  }

  reconciler.start();
  monitor.start();

  const gateway = new ApiGateway(context, { host: config.server.host, port: config.server.port });
  await gateway.start();
  logger.info('awg-manager started successfully');

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, shutting down gracefully`);
    await gateway.stop();
    await reconciler.stop();
    await monitor.stop();
    await orchestrator.drain();
    runner.shutdown();
    if (cache) {
      await cache.disconnect();
    }
    await db.disconnect();
    logger.info('Shutdown complete');
  };

  return { context, shutdown };
}
