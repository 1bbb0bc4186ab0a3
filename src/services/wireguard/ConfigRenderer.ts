import { ObfuscationParameters } from '../../config/config';
import { OBFUSCATION_KEYS } from '../../config/defaults';

export interface PeerEntry {
  publicKey: string;
  /** AllowedIPs for the peer, normally the client's /32. */
  address: string;
}

export interface ServerConfigInput {
  privateKey: string;
  /** Server address with the subnet prefix, e.g. `10.8.0.1/24`. */
  address: string;
  listenPort: number;
  postUp?: string;
  postDown?: string;
  obfuscation: ObfuscationParameters;
  peers: PeerEntry[];
}

export interface ClientConfigInput {
  privateKey: string;
  address: string;
  dns: string;
  serverPublicKey: string;
  /** `host:port` */
  endpoint: string;
  obfuscation: ObfuscationParameters;
}

export const CLIENT_ALLOWED_IPS = '0.0.0.0/0, ::/0';
export const PERSISTENT_KEEPALIVE = 25;

export function renderObfuscationLines(params: ObfuscationParameters): string[] {
  return OBFUSCATION_KEYS.map((key) => `${key} = ${params[key]}`);
}

/**
 * Renders the whole server file. Peers absent from `peers` lose access on the
 * next sync, so callers pass every active client.
 */
export function renderServerConfig(input: ServerConfigInput): string {
  const lines = [
    '[Interface]',
    `PrivateKey = ${input.privateKey}`,
    `Address = ${input.address}`,
    `ListenPort = ${input.listenPort}`,
  ];
  if (input.postUp) {
    lines.push(`PostUp = ${input.postUp}`);
  }
  if (input.postDown) {
    lines.push(`PostDown = ${input.postDown}`);
  }
  lines.push(...renderObfuscationLines(input.obfuscation));

  let text = `${lines.join('\n')}\n`;
  for (const peer of input.peers) {
    text += `\n[Peer]\nPublicKey = ${peer.publicKey}\nAllowedIPs = ${peer.address}\n`;
  }
  return text;
}

export function renderClientConfig(input: ClientConfigInput): string {
  const lines = [
    '[Interface]',
    `PrivateKey = ${input.privateKey}`,
    `Address = ${input.address}`,
    `DNS = ${input.dns}`,
    ...renderObfuscationLines(input.obfuscation),
    '',
    '[Peer]',
    `PublicKey = ${input.serverPublicKey}`,
    `Endpoint = ${input.endpoint}`,
    `AllowedIPs = ${CLIENT_ALLOWED_IPS}`,
    `PersistentKeepalive = ${PERSISTENT_KEEPALIVE}`,
  ];
  return `${lines.join('\n')}\n`;
}

export interface ConfigSection {
  name: string;
  values: Record<string, string>;
}

/** Reads an INI-like interface config into its sections, in file order. */
export function parseConfig(text: string): ConfigSection[] {
  const sections: ConfigSection[] = [];
  let current: ConfigSection | null = null;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }
    const header = /^\[(.+)\]$/.exec(line);
    if (header) {
      current = { name: header[1], values: {} };
      sections.push(current);
      continue;
    }
    const eq = line.indexOf('=');
    if (eq === -1 || !current) {
      continue;
    }
    current.values[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
  }

  return sections;
}
