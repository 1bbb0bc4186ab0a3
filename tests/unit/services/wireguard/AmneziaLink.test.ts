import zlib from 'zlib';
import {
  buildAmneziaConfig,
  decodeAmneziaLink,
  encodeAmneziaLink,
} from '../../../../src/services/wireguard/AmneziaLink';
import { renderClientConfig } from '../../../../src/services/wireguard/ConfigRenderer';
import { DEFAULT_OBFUSCATION } from '../../../../src/config/defaults';
import { ValidationError } from '../../../../src/utils/errors';

const input = {
  clientPrivateKey: 'client-private',
  clientAddress: '10.8.0.2/32',
  serverPublicKey: 'server-public',
  host: 'vpn.example.com',
  port: 51820,
  dns: '1.1.1.1',
  description: 'Test Server',
  obfuscation: DEFAULT_OBFUSCATION,
};

describe('AmneziaLink', () => {
  describe('buildAmneziaConfig', () => {
    it('should build the container document with string parameters', () => {
      const doc = JSON.parse(buildAmneziaConfig(input));

      expect(doc.defaultContainer).toBe('amnezia-awg');
      expect(doc.description).toBe('Test Server');
      expect(doc.dns1).toBe('1.1.1.1');
      expect(doc.dns2).toBe('');
      expect(doc.hostName).toBe('vpn.example.com');
      expect(doc.containers).toHaveLength(1);
      expect(doc.containers[0].container).toBe('amnezia-awg');

      const awg = doc.containers[0].awg;
      expect(awg.H1).toBe('1359490391');
      expect(awg.Jc).toBe('2');
      expect(awg.S2).toBe('28');
      expect(awg.port).toBe('51820');
      expect(awg.transport_proto).toBe('udp');
    });

    it('should nest last_config as a JSON string with the client details', () => {
      const doc = JSON.parse(buildAmneziaConfig(input));
      const lastConfig = JSON.parse(doc.containers[0].awg.last_config);

      expect(lastConfig.client_ip).toBe('10.8.0.2');
      expect(lastConfig.client_priv_key).toBe('client-private');
      expect(lastConfig.server_pub_key).toBe('server-public');
      expect(lastConfig.port).toBe(51820);
      expect(lastConfig.mtu).toBe('1280');
      expect(lastConfig.persistent_keep_alive).toBe('25');
      expect(lastConfig.allowed_ips).toEqual(['0.0.0.0/0', '::/0']);
      expect(lastConfig.Jmax).toBe('50');
      expect(lastConfig.config).toBe(
        renderClientConfig({
          privateKey: 'client-private',
          address: '10.8.0.2/32',
          dns: '1.1.1.1',
          serverPublicKey: 'server-public',
          endpoint: 'vpn.example.com:51820',
          obfuscation: DEFAULT_OBFUSCATION,
        })
      );
    });

    it('should keep the key order the app expects', () => {
      const doc = JSON.parse(buildAmneziaConfig(input));
      expect(Object.keys(doc)).toEqual(['containers', 'defaultContainer', 'description', 'dns1', 'dns2', 'hostName']);
      expect(Object.keys(doc.containers[0].awg)).toEqual([
        'H1', 'H2', 'H3', 'H4', 'Jc', 'Jmax', 'Jmin', 'S1', 'S2', 'last_config', 'port', 'transport_proto',
      ]);
    });
  });

  describe('encodeAmneziaLink', () => {
    it('should frame the compressed JSON behind the magic and both lengths', () => {
      const json = buildAmneziaConfig(input);
      const link = encodeAmneziaLink(json);

      expect(link.startsWith('vpn://')).toBe(true);
      expect(link).not.toContain('=');

      const data = Buffer.from(link.slice('vpn://'.length), 'base64url');
      expect([...data.subarray(0, 4)]).toEqual([0x07, 0xc0, 0x01, 0x00]);
      expect(data.readUInt32BE(4)).toBe(data.length - 8);
      expect(data.readUInt32BE(8)).toBe(Buffer.byteLength(json, 'utf-8'));
      expect(zlib.inflateSync(data.subarray(12)).toString('utf-8')).toBe(json);
    });

    it('should round trip to the identical JSON text', () => {
      const json = buildAmneziaConfig(input);
      expect(decodeAmneziaLink(encodeAmneziaLink(json))).toBe(json);
    });
  });

  describe('decodeAmneziaLink', () => {
    it('should accept a payload without the prefix', () => {
      const link = encodeAmneziaLink('{"a":1}');
      expect(decodeAmneziaLink(link.slice('vpn://'.length))).toBe('{"a":1}');
    });

    it('should reject a payload without the magic', () => {
      const bogus = Buffer.concat([Buffer.from([1, 2, 3, 4, 0, 0, 0, 5, 0, 0, 0, 1]), Buffer.from('x')]);
      expect(() => decodeAmneziaLink(`vpn://${bogus.toString('base64url')}`)).toThrow(ValidationError);
    });

    it('should reject a truncated payload', () => {
      const link = encodeAmneziaLink('{"a":1}');
      expect(() => decodeAmneziaLink(link.slice(0, link.length - 4))).toThrow(ValidationError);
    });

    it('should reject text that is not base64url', () => {
      expect(() => decodeAmneziaLink('vpn://not base64!')).toThrow('Link is not base64url encoded');
    });
  });
});
