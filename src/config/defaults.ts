import os from 'os';
import path from 'path';

export const OBFUSCATION_KEYS = ['Jc', 'Jmin', 'Jmax', 'S1', 'S2', 'H1', 'H2', 'H3', 'H4'] as const;

export const DEFAULT_OBFUSCATION = {
  Jc: 2,
  Jmin: 10,
  Jmax: 50,
  S1: 107,
  S2: 28,
  H1: 1359490391,
  H2: 1285506284,
  H3: 1393261750,
  H4: 432419882,
} satisfies Record<(typeof OBFUSCATION_KEYS)[number], number>;

export const defaultConfig = {
  server: {
    port: 3000,
    host: '0.0.0.0',
    nodeEnv: 'production',
  },
  database: {
    host: 'localhost',
    port: 5432,
    database: 'awg_manager',
    user: 'postgres',
  },
  redis: {
    host: 'localhost',
    port: 6379,
    cacheTtl: 60,
  },
  vpn: {
    interfaceName: 'awg0',
    binary: 'awg',
    quickBinary: 'awg-quick',
    configPath: '/etc/amneziawg/awg0.conf',
    scratchPath: path.join(os.tmpdir(), 'awg_stripped.conf'),
    host: 'vpn.example.com',
    port: 51820,
    dns: '1.1.1.1',
    subnet: '10.8.0',
    postUp: 'iptables -A FORWARD -i %i -j ACCEPT; iptables -t nat -A POSTROUTING -o eth0 -j MASQUERADE',
    postDown: 'iptables -D FORWARD -i %i -j ACCEPT; iptables -t nat -D POSTROUTING -o eth0 -j MASQUERADE',
    description: 'AmneziaWG Server',
    commandTimeoutMs: 10000,
  },
  traffic: {
    interval: 60,
    onlineWindow: 300,
  },
  monitor: {
    interval: 60,
    cpuThreshold: 80,
    memThreshold: 90,
    diskThreshold: 90,
    alertCooldown: 300,
  },
  auth: {
    jwtSecret: 'change-this-secret',
    jwtExpiresIn: '30d',
    commandRateLimitMs: 1000,
  },
  rateLimit: {
    windowMs: 900000,
    maxRequests: 300,
  },
  cli: {
    url: 'http://localhost:3000',
  },
  logging: {
    level: 'info',
    dir: './logs',
  },
};
