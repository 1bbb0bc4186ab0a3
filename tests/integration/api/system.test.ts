import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../../src/api/gateway';
import { TestContext, createTestContext } from '../../helpers/testContext';

const PEER_KEY = 'x'.repeat(43) + '=';

describe('System API', () => {
  let harness: TestContext;
  let app: Express;
  let auth: string;

  beforeEach(() => {
    harness = createTestContext();
    app = createApp(harness.context);
    auth = `Bearer ${harness.token()}`;
  });

  afterEach(() => {
    harness.cleanup();
  });

  describe('health', () => {
    it('should be degraded when only a non-critical check fails', async () => {
      harness.cleanup();
      harness = createTestContext({
        healthChecks: [
          { name: 'database', critical: true, check: async () => undefined },
          { name: 'interface', critical: false, check: () => Promise.reject(new Error('awg0 is down')) },
        ],
      });

      const response = await request(createApp(harness.context)).get('/health').expect(200);

      expect(response.body.status).toBe('degraded');
      expect(response.body.services.interface).toEqual({ status: 'unhealthy' });
      expect(response.body.services.database.status).toBe('healthy');
    });

    it('should be unhealthy and not ready when a critical check fails', async () => {
      harness.cleanup();
      harness = createTestContext({
        healthChecks: [{ name: 'database', critical: true, check: () => Promise.reject(new Error('refused')) }],
      });
      const failing = createApp(harness.context);

      const health = await request(failing).get('/health').expect(503);
      const ready = await request(failing).get('/health/ready').expect(503);

      expect(health.body.status).toBe('unhealthy');
      expect(ready.body).toEqual({ status: 'not ready' });
    });

    it('should be ready with no checks', async () => {
      const response = await request(app).get('/health/ready').expect(200);
      expect(response.body).toEqual({ status: 'ready' });
    });
  });

  it('should expose Prometheus metrics with the active client count', async () => {
    await request(app).post('/api/v1/clients').set('Authorization', auth).send({ name: 'alice' });

    const response = await request(app).get('/metrics').expect(200);

    expect(response.headers['content-type']).toMatch(/^text\/plain/);
    expect(response.text).toContain('awg_manager_active_clients{app="awg-manager"} 1');
  });

  describe('sync', () => {
    it('should report status and run a manual sync', async () => {
      const before = await request(app).get('/api/v1/sync').set('Authorization', auth).expect(200);
      expect(before.body).toEqual({ state: null, generation: null, pending: 0, lastOutcome: null });

      const response = await request(app).post('/api/v1/sync').set('Authorization', auth).expect(200);

      expect(response.body).toMatchObject({ state: 'Synced', reason: 'manual', peerCount: 0 });
      const after = await request(app).get('/api/v1/sync').set('Authorization', auth).expect(200);
      expect(after.body.lastOutcome.generation).toBe(response.body.generation);
    });

    it('should answer 502 with the outcome when the apply fails', async () => {
      harness.runner.setHandler((call) =>
        call.args[0] === 'syncconf' ? { exitCode: 1, stderr: 'No such device' } : harness.defaultHandler(call)
      );

      const response = await request(app).post('/api/v1/sync').set('Authorization', auth).expect(502);

      expect(response.body.state).toBe('SyncFailed');
      expect(response.body.error).toMatch(/^awg syncconf awg0 .*: No such device$/);
    });
  });

  it('should describe the server and interface', async () => {
    harness.runner.setHandler((call) =>
      call.args.includes('dump') ? { stdout: 'server-private\tserver-public\t51820\toff' } : harness.defaultHandler(call)
    );

    await harness.monitor.collect();
    await harness.context.provisioning.createClient('alice');

    const response = await request(app).get('/api/v1/server').set('Authorization', auth).expect(200);

    expect(response.body.interfaceName).toBe('awg0');
    expect(response.body.interface).toEqual({ up: true, publicKey: 'server-public', listenPort: 51820 });
    expect(response.body.metrics).toMatchObject({ cpuPercent: 10, memPercent: 50, diskPercent: 25 });
    expect(response.body.uptime).toBe('0d 1h 1m');
    expect(response.body.configuredPeers).toBe(1);
  });

  it('should not sample the host on request before the first poll', async () => {
    const collect = jest.spyOn(harness.monitor, 'collect');

    const response = await request(app).get('/api/v1/server').set('Authorization', auth).expect(200);

    expect(response.body.metrics).toBeNull();
    expect(response.body.uptime).toBeNull();
    expect(response.body.configuredPeers).toBeNull();
    expect(collect).not.toHaveBeenCalled();
  });

  it('should report the interface as down', async () => {
    harness.runner.setHandler((call) => (call.args[0] === 'show' ? { exitCode: 1 } : harness.defaultHandler(call)));

    const response = await request(app).get('/api/v1/server').set('Authorization', auth).expect(200);

    expect(response.body.interface).toEqual({ up: false });
  });

  describe('interface peers', () => {
    it('should hot add and remove a peer', async () => {
      await request(app)
        .post('/api/v1/interface/peers')
        .set('Authorization', auth)
        .send({ publicKey: PEER_KEY, allowedIps: '10.8.0.50/32' })
        .expect(201);
      await request(app).delete(`/api/v1/interface/peers/${PEER_KEY}`).set('Authorization', auth).expect(204);

      expect(harness.runner.commandLines()).toEqual([
        `awg set awg0 peer ${PEER_KEY} allowed-ips 10.8.0.50/32`,
        `awg set awg0 peer ${PEER_KEY} remove`,
      ]);
    });

    it('should validate the key and address list', async () => {
      const response = await request(app)
        .post('/api/v1/interface/peers')
        .set('Authorization', auth)
        .send({ publicKey: 'short', allowedIps: 'everything' })
        .expect(400);

      expect(response.body.error.message).toBe(
        'publicKey: must be a base64 public key, allowedIps: must be a CIDR list'
      );
      expect(harness.runner.calls).toHaveLength(0);
    });

    it('should surface a failed command as 502', async () => {
      harness.runner.setHandler(() => ({ exitCode: 1, stderr: 'Operation not permitted' }));

      const response = await request(app)
        .post('/api/v1/interface/peers')
        .set('Authorization', auth)
        .send({ publicKey: PEER_KEY, allowedIps: '10.8.0.50/32' })
        .expect(502);

      expect(response.body.error).toEqual({
        code: 'INTERFACE_COMMAND_ERROR',
        message: `awg set awg0 peer ${PEER_KEY} allowed-ips 10.8.0.50/32 failed: Operation not permitted`,
      });
    });
  });

  describe('stats', () => {
    beforeEach(async () => {
      await request(app).post('/api/v1/clients').set('Authorization', auth).send({ name: 'alice' });
      await harness.registry.recordCounterSample(1, 0, 0);
      await harness.registry.recordCounterSample(1, 1000, 4000);
      harness.registry.history[0].recordedAt = new Date(Date.now() - 60_000);
    });

    it('should total traffic per client', async () => {
      const response = await request(app).get('/api/v1/stats/totals').set('Authorization', auth).expect(200);

      expect(response.body).toEqual({
        clients: [{ clientId: 1, name: 'alice', totalReceived: 1000, totalSent: 4000 }],
        totalReceived: 1000,
        totalSent: 4000,
      });
    });

    it('should default the series to the last 24 hours in hourly buckets', async () => {
      const response = await request(app).get('/api/v1/stats/series?client=alice').set('Authorization', auth).expect(200);

      expect(response.body.bucket).toBe('hour');
      expect(Date.parse(response.body.to) - Date.parse(response.body.from)).toBe(24 * 60 * 60 * 1000);
      expect(response.body.points).toHaveLength(1);
      expect(response.body.points[0]).toMatchObject({ bytesReceived: 1000, bytesSent: 4000 });
    });

    it('should reject an unknown range', async () => {
      await request(app).get('/api/v1/stats/series?range=1y').set('Authorization', auth).expect(400);
    });

    it('should return 24 hourly and 7 weekday slots', async () => {
      const hourly = await request(app).get('/api/v1/stats/profile/hourly').set('Authorization', auth).expect(200);
      const weekly = await request(app).get('/api/v1/stats/profile/weekly?client=alice').set('Authorization', auth).expect(200);

      expect(hourly.body.profile).toHaveLength(24);
      expect(weekly.body.profile).toHaveLength(7);
    });

    it('should list sessions and 404 for an unknown client', async () => {
      await harness.registry.startSession(1, new Date('2024-05-01T10:00:00.000Z'));

      const response = await request(app).get('/api/v1/stats/sessions/alice?limit=5').set('Authorization', auth).expect(200);
      expect(response.body.sessions).toEqual([
        { id: 1, clientId: 1, startAt: '2024-05-01T10:00:00.000Z', endAt: null, isActive: true },
      ]);

      await request(app).get('/api/v1/stats/sessions/ghost').set('Authorization', auth).expect(404);
    });
  });

  it('should answer unknown routes with 404', async () => {
    const response = await request(app).get('/api/v1/nothing').set('Authorization', auth).expect(404);
    expect(response.body).toEqual({ error: { code: 'NOT_FOUND', message: 'Not found' } });
  });
});
