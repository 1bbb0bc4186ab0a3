import { getConfig, parseAdminIds, parseObfuscation } from '../../../src/config/config';
import { DEFAULT_OBFUSCATION } from '../../../src/config/defaults';

describe('config', () => {
  describe('getConfig', () => {
    it('should fall back to defaults for an empty environment', () => {
      const config = getConfig({});

      expect(config.server.port).toBe(3000);
      expect(config.vpn).toMatchObject({ interfaceName: 'awg0', subnet: '10.8.0', port: 51820, dns: '1.1.1.1' });
      expect(config.traffic).toEqual({ interval: 60, onlineWindow: 300 });
      expect(config.redis.enabled).toBe(true);
      expect(config.obfuscation).toEqual(DEFAULT_OBFUSCATION);
    });

    it('should read values from the environment', () => {
      const config = getConfig({
        PORT: '8080',
        AWG_INTERFACE: 'awg1',
        VPN_HOST: 'vpn.test',
        VPN_PORT: '443',
        STATS_INTERVAL: '15',
        REDIS_ENABLED: 'false',
        ADMIN_IDS: '42',
        JWT_SECRET: 'test-secret',
      });

      expect(config.server.port).toBe(8080);
      expect(config.vpn).toMatchObject({ interfaceName: 'awg1', host: 'vpn.test', port: 443 });
      expect(config.traffic.interval).toBe(15);
      expect(config.redis.enabled).toBe(false);
      expect(config.auth.adminIds).toEqual(['42']);
      expect(config.warnings).toEqual([]);
    });

    it('should ignore numbers that do not parse', () => {
      expect(getConfig({ PORT: 'eighty' }).server.port).toBe(3000);
    });

    it('should allow empty post-up and post-down rules', () => {
      const config = getConfig({ VPN_POST_UP: '', VPN_POST_DOWN: '' });
      expect([config.vpn.postUp, config.vpn.postDown]).toEqual(['', '']);
    });

    it('should warn when no operators are allow-listed', () => {
      expect(getConfig({}).warnings).toContain('ADMIN_IDS not set, the API will refuse every operator');
    });

    it('should warn about the default secret in production only', () => {
      expect(getConfig({ ADMIN_IDS: '1' }).warnings).toEqual(['JWT_SECRET is the default value']);
      expect(getConfig({ ADMIN_IDS: '1', NODE_ENV: 'development' }).warnings).toEqual([]);
      expect(getConfig({ ADMIN_IDS: '1', JWT_SECRET: 'test-secret' }).warnings).toEqual([]);
    });
  });

  describe('parseObfuscation', () => {
    it('should override individual parameters', () => {
      const params = parseObfuscation({ AWG_Jc: '5', AWG_H1: '12345' });
      expect(params).toEqual({ ...DEFAULT_OBFUSCATION, Jc: 5, H1: 12345 });
    });

    it('should keep the default and warn on a non-integer value', () => {
      const warnings: string[] = [];

      const params = parseObfuscation({ AWG_S1: 'abc', AWG_Jmax: '7.5' }, warnings);

      expect(params.S1).toBe(107);
      expect(params.Jmax).toBe(50);
      expect(warnings).toEqual([
        'Invalid value for AWG_Jmax: 7.5, using default 50',
        'Invalid value for AWG_S1: abc, using default 107',
      ]);
    });

    it('should return a frozen object', () => {
      expect(Object.isFrozen(parseObfuscation({}))).toBe(true);
    });
  });

  describe('parseAdminIds', () => {
    it('should split, trim and drop empty entries', () => {
      expect(parseAdminIds(' 1, 2 ,,3 ')).toEqual(['1', '2', '3']);
    });

    it('should return an empty list when unset', () => {
      expect(parseAdminIds(undefined)).toEqual([]);
      expect(parseAdminIds('')).toEqual([]);
    });
  });
});
