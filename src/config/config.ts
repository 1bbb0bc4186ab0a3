import dotenv from 'dotenv';
import { defaultConfig, DEFAULT_OBFUSCATION, OBFUSCATION_KEYS } from './defaults';

dotenv.config();

export type ObfuscationKey = (typeof OBFUSCATION_KEYS)[number];

/**
 * AmneziaWG junk/header parameters. Shared read-only by the server and the
 * client renderers; both sides of a handshake must carry the same values.
 */
export type ObfuscationParameters = Readonly<Record<ObfuscationKey, number>>;

export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
  };
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
  };
  redis: {
    enabled: boolean;
    host: string;
    port: number;
    password?: string;
    cacheTtl: number;
  };
  vpn: {
    interfaceName: string;
    binary: string;
    quickBinary: string;
    configPath: string;
    scratchPath: string;
    serverPrivateKey: string;
    serverPublicKey: string;
    host: string;
    port: number;
    dns: string;
    subnet: string;
    postUp: string;
    postDown: string;
    description: string;
    commandTimeoutMs: number;
  };
  obfuscation: ObfuscationParameters;
  traffic: {
    interval: number;
    onlineWindow: number;
  };
  monitor: {
    interval: number;
    cpuThreshold: number;
    memThreshold: number;
    diskThreshold: number;
    alertCooldown: number;
  };
  auth: {
    adminIds: string[];
    jwtSecret: string;
    jwtExpiresIn: string;
    commandRateLimitMs: number;
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  cli: {
    url: string;
    token?: string;
  };
  logging: {
    level: string;
    dir: string;
  };
  /** Problems found while reading the environment, logged once at startup. */
  warnings: string[];
}

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function parseObfuscation(env: Env, warnings: string[] = []): ObfuscationParameters {
  const params: Record<ObfuscationKey, number> = { ...DEFAULT_OBFUSCATION };
  for (const key of OBFUSCATION_KEYS) {
    const raw = env[`AWG_${key}`];
    if (raw === undefined) {
      continue;
    }
    if (/^-?\d+$/.test(raw.trim())) {
      params[key] = parseInt(raw, 10);
    } else {
      warnings.push(`Invalid value for AWG_${key}: ${raw}, using default ${DEFAULT_OBFUSCATION[key]}`);
    }
  }
  return Object.freeze(params);
}

export function parseAdminIds(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}

export function getConfig(env: Env = process.env): Config {
  const warnings: string[] = [];

  const config: Config = {
    server: {
      port: parseNumber(env.PORT, defaultConfig.server.port),
      host: env.HOST || defaultConfig.server.host,
      nodeEnv: env.NODE_ENV || defaultConfig.server.nodeEnv,
    },
    database: {
      host: env.POSTGRES_HOST || defaultConfig.database.host,
      port: parseNumber(env.POSTGRES_PORT, defaultConfig.database.port),
      database: env.POSTGRES_DB || defaultConfig.database.database,
      user: env.POSTGRES_USER || defaultConfig.database.user,
      password: env.POSTGRES_PASSWORD || '',
    },
    redis: {
      enabled: env.REDIS_ENABLED !== 'false',
      host: env.REDIS_HOST || defaultConfig.redis.host,
      port: parseNumber(env.REDIS_PORT, defaultConfig.redis.port),
      password: env.REDIS_PASSWORD || undefined,
      cacheTtl: parseNumber(env.CLIENT_CACHE_TTL, defaultConfig.redis.cacheTtl),
    },
    vpn: {
      interfaceName: env.AWG_INTERFACE || defaultConfig.vpn.interfaceName,
      binary: env.AWG_BINARY || defaultConfig.vpn.binary,
      quickBinary: env.AWG_QUICK_BINARY || defaultConfig.vpn.quickBinary,
      configPath: env.AWG_CONFIG_PATH || defaultConfig.vpn.configPath,
      scratchPath: env.AWG_SCRATCH_PATH || defaultConfig.vpn.scratchPath,
      serverPrivateKey: env.SERVER_PRIVATE_KEY || '',
      serverPublicKey: env.SERVER_PUBLIC_KEY || '',
      host: env.VPN_HOST || defaultConfig.vpn.host,
      port: parseNumber(env.VPN_PORT, defaultConfig.vpn.port),
      dns: env.VPN_DNS || defaultConfig.vpn.dns,
      subnet: env.VPN_SUBNET || defaultConfig.vpn.subnet,
      postUp: env.VPN_POST_UP ?? defaultConfig.vpn.postUp,
      postDown: env.VPN_POST_DOWN ?? defaultConfig.vpn.postDown,
      description: env.VPN_DESCRIPTION || defaultConfig.vpn.description,
      commandTimeoutMs: parseNumber(env.COMMAND_TIMEOUT_MS, defaultConfig.vpn.commandTimeoutMs),
    },
    obfuscation: parseObfuscation(env, warnings),
    traffic: {
      interval: parseNumber(env.STATS_INTERVAL, defaultConfig.traffic.interval),
      onlineWindow: parseNumber(env.ONLINE_WINDOW, defaultConfig.traffic.onlineWindow),
    },
    monitor: {
      interval: parseNumber(env.MONITOR_INTERVAL, defaultConfig.monitor.interval),
      cpuThreshold: parseNumber(env.CPU_THRESHOLD, defaultConfig.monitor.cpuThreshold),
      memThreshold: parseNumber(env.MEM_THRESHOLD, defaultConfig.monitor.memThreshold),
      diskThreshold: parseNumber(env.DISK_THRESHOLD, defaultConfig.monitor.diskThreshold),
      alertCooldown: parseNumber(env.ALERT_COOLDOWN, defaultConfig.monitor.alertCooldown),
    },
    auth: {
      adminIds: parseAdminIds(env.ADMIN_IDS),
      jwtSecret: env.JWT_SECRET || defaultConfig.auth.jwtSecret,
      jwtExpiresIn: env.JWT_EXPIRES_IN || defaultConfig.auth.jwtExpiresIn,
      commandRateLimitMs: parseNumber(env.COMMAND_RATE_LIMIT_MS, defaultConfig.auth.commandRateLimitMs),
    },
    rateLimit: {
      windowMs: parseNumber(env.RATE_LIMIT_WINDOW_MS, defaultConfig.rateLimit.windowMs),
      maxRequests: parseNumber(env.RATE_LIMIT_MAX_REQUESTS, defaultConfig.rateLimit.maxRequests),
    },
    cli: {
      url: env.AWG_MANAGER_URL || defaultConfig.cli.url,
      token: env.AWG_MANAGER_TOKEN || undefined,
    },
    logging: {
      level: env.LOG_LEVEL || defaultConfig.logging.level,
      dir: env.LOG_DIR || defaultConfig.logging.dir,
    },
    warnings,
  };

  if (config.auth.adminIds.length === 0) {
    warnings.push('ADMIN_IDS not set, the API will refuse every operator');
  }
  if (config.auth.jwtSecret === defaultConfig.auth.jwtSecret && config.server.nodeEnv === 'production') {
    warnings.push('JWT_SECRET is the default value');
  }

  return config;
}

export const config = getConfig();
