import zlib from 'zlib';
import { ObfuscationParameters } from '../../config/config';
import { ValidationError, describeError } from '../../utils/errors';
import { renderClientConfig } from './ConfigRenderer';

const LINK_PREFIX = 'vpn://';
const MAGIC = Buffer.from([0x07, 0xc0, 0x01, 0x00]);
const HEADER_LENGTH = 12;
const CONTAINER = 'amnezia-awg';

export interface AmneziaConfigInput {
  clientPrivateKey: string;
  /** Client address with prefix, e.g. `10.8.0.2/32`. */
  clientAddress: string;
  serverPublicKey: string;
  host: string;
  port: number;
  dns: string;
  description: string;
  obfuscation: ObfuscationParameters;
}

type ObfuscationStrings = Record<'H1' | 'H2' | 'H3' | 'H4' | 'Jc' | 'Jmax' | 'Jmin' | 'S1' | 'S2', string>;

function obfuscationStrings(params: ObfuscationParameters): ObfuscationStrings {
  return {
    H1: String(params.H1),
    H2: String(params.H2),
    H3: String(params.H3),
    H4: String(params.H4),
    Jc: String(params.Jc),
    Jmax: String(params.Jmax),
    Jmin: String(params.Jmin),
    S1: String(params.S1),
    S2: String(params.S2),
  };
}

/**
 * Builds the AmneziaVPN import document. The inner `last_config` is itself a
 * JSON string, which is what the app expects.
 */
export function buildAmneziaConfig(input: AmneziaConfigInput): string {
  const awg = obfuscationStrings(input.obfuscation);
  const clientConfig = renderClientConfig({
    privateKey: input.clientPrivateKey,
    address: input.clientAddress,
    dns: input.dns,
    serverPublicKey: input.serverPublicKey,
    endpoint: `${input.host}:${input.port}`,
    obfuscation: input.obfuscation,
  });

  const lastConfig = JSON.stringify({
    ...awg,
    allowed_ips: ['0.0.0.0/0', '::/0'],
    client_ip: input.clientAddress.split('/')[0],
    client_priv_key: input.clientPrivateKey,
    config: clientConfig,
    hostName: input.host,
    mtu: '1280',
    persistent_keep_alive: '25',
    port: input.port,
    server_pub_key: input.serverPublicKey,
    transport_proto: 'udp',
  });

  return JSON.stringify({
    containers: [
      {
        awg: {
          ...awg,
          last_config: lastConfig,
          port: String(input.port),
          transport_proto: 'udp',
        },
        container: CONTAINER,
      },
    ],
    defaultContainer: CONTAINER,
    description: input.description,
    dns1: input.dns,
    dns2: '',
    hostName: input.host,
  });
}

/** `vpn://` + base64url(magic | BE32 remaining | BE32 uncompressed | zlib(json)) */
export function encodeAmneziaLink(json: string): string {
  const raw = Buffer.from(json, 'utf-8');
  const compressed = zlib.deflateSync(raw);

  const header = Buffer.alloc(HEADER_LENGTH);
  MAGIC.copy(header, 0);
  header.writeUInt32BE(4 + compressed.length, 4);
  header.writeUInt32BE(raw.length, 8);

  return LINK_PREFIX + Buffer.concat([header, compressed]).toString('base64url');
}

export function decodeAmneziaLink(link: string): string {
  const payload = link.startsWith(LINK_PREFIX) ? link.slice(LINK_PREFIX.length) : link;
  if (!/^[A-Za-z0-9_-]+$/.test(payload)) {
    throw new ValidationError('Link is not base64url encoded');
  }

  const data = Buffer.from(payload, 'base64url');
  if (data.length <= HEADER_LENGTH || !data.subarray(0, 4).equals(MAGIC)) {
    throw new ValidationError('Link has no AmneziaVPN header');
  }

  const remaining = data.readUInt32BE(4);
  const uncompressedLength = data.readUInt32BE(8);
  if (remaining !== data.length - 8) {
    throw new ValidationError(`Link length mismatch: header says ${remaining}, got ${data.length - 8}`);
  }

  let inflated: Buffer;
  try {
    inflated = zlib.inflateSync(data.subarray(HEADER_LENGTH));
  } catch (error) {
    throw new ValidationError(`Link payload does not inflate: ${describeError(error)}`);
  }
  if (inflated.length !== uncompressedLength) {
    throw new ValidationError(`Link payload is ${inflated.length} bytes, header says ${uncompressedLength}`);
  }

  return inflated.toString('utf-8');
}
