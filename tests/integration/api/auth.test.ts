import request from 'supertest';
import jwt from 'jsonwebtoken';
import { createApp } from '../../../src/api/gateway';
import { TEST_SECRET, TestContext, createTestContext } from '../../helpers/testContext';

describe('API access control', () => {
  let harness: TestContext;

  afterEach(() => {
    harness.cleanup();
  });

  it('should refuse a request without a bearer token', async () => {
    harness = createTestContext();

    const response = await request(createApp(harness.context)).get('/api/v1/clients').expect(401);

    expect(response.body.error).toEqual({ code: 'UNAUTHORIZED', message: 'Missing or invalid authorization header' });
  });

  it('should refuse a token signed with another secret', async () => {
    harness = createTestContext();
    const forged = jwt.sign({ operatorId: '1001' }, 'other-secret');

    const response = await request(createApp(harness.context))
      .get('/api/v1/clients')
      .set('Authorization', `Bearer ${forged}`)
      .expect(401);

    expect(response.body.error.message).toBe('Invalid token');
  });

  it('should refuse a token without an operator', async () => {
    harness = createTestContext();
    const token = jwt.sign({ sub: 'someone' }, TEST_SECRET);

    const response = await request(createApp(harness.context))
      .get('/api/v1/clients')
      .set('Authorization', `Bearer ${token}`)
      .expect(401);

    expect(response.body.error.message).toBe('Token carries no operator');
  });

  it('should refuse an operator outside the allow-list', async () => {
    harness = createTestContext();

    const response = await request(createApp(harness.context))
      .get('/api/v1/clients')
      .set('Authorization', `Bearer ${harness.token('2002')}`)
      .expect(403);

    expect(response.body.error).toEqual({ code: 'FORBIDDEN', message: 'Operator is not allowed' });
  });

  it('should rate limit mutating commands per operator', async () => {
    harness = createTestContext({ commandIntervalMs: 60_000 });
    const app = createApp(harness.context);
    const auth = `Bearer ${harness.token()}`;

    await request(app).post('/api/v1/clients').set('Authorization', auth).send({ name: 'alice' }).expect(201);
    const response = await request(app).post('/api/v1/clients').set('Authorization', auth).send({ name: 'bob' }).expect(429);

    expect(response.body.error).toEqual({ code: 'RATE_LIMITED', message: 'Too many commands, slow down' });
    expect(Number(response.headers['retry-after'])).toBeGreaterThan(0);
    expect(await harness.registry.clientExists('bob')).toBe(false);
  });

  it('should not rate limit reads', async () => {
    harness = createTestContext({ commandIntervalMs: 60_000 });
    const app = createApp(harness.context);
    const auth = `Bearer ${harness.token()}`;

    await request(app).get('/api/v1/clients').set('Authorization', auth).expect(200);
    await request(app).get('/api/v1/clients').set('Authorization', auth).expect(200);
  });

  it('should cap requests per client address', async () => {
    harness = createTestContext({ maxRequests: 2 });
    const app = createApp(harness.context);
    const auth = `Bearer ${harness.token()}`;

    await request(app).get('/api/v1/clients').set('Authorization', auth).expect(200);
    await request(app).get('/api/v1/clients').set('Authorization', auth).expect(200);
    const response = await request(app).get('/api/v1/clients').set('Authorization', auth).expect(429);

    expect(response.body.error.code).toBe('RATE_LIMITED');
  });

  it('should leave health and metrics open', async () => {
    harness = createTestContext();
    const app = createApp(harness.context);

    await request(app).get('/health/live').expect(200);
    await request(app).get('/metrics').expect(200);
  });
});
