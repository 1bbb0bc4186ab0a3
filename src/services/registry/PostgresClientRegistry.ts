import { Database, QueryRunner } from '../../database/postgres';
import { Cache } from '../../database/redis';
import {
  Client,
  ClientTrafficTotal,
  CounterDelta,
  NewClient,
  ProfilePoint,
  Session,
  TrafficPoint,
  TrafficSeriesQuery,
} from '../../database/models';
import { logger, shortKey } from '../../utils/logger';
import { AddressPoolExhaustedError, StorageError, describeError } from '../../utils/errors';
import { AlreadyExists, NotFound, Result, err, ok } from '../../utils/result';
import { ClientRegistry } from './ClientRegistry';
import { allocateHostOctet, lastOctet } from './addressAllocator';
import { computeCounterDelta } from './counterDelta';

interface ClientRow {
  id: number;
  name: string;
  public_key: string;
  private_key: string;
  address: string;
  created_at: Date;
  is_active: boolean;
}

/** BIGINT and NUMERIC columns arrive from pg as strings. */
type Numeric = string | number;

interface CounterRow {
  last_bytes_received: Numeric;
  last_bytes_sent: Numeric;
}

interface SessionRow {
  id: Numeric;
  client_id: number;
  start_at: Date;
  end_at: Date | null;
  is_active: boolean;
}

interface TotalRow {
  client_id: number;
  name: string;
  total_received: Numeric;
  total_sent: Numeric;
}

interface SeriesRow {
  bucket_start: Date;
  bytes_received: Numeric;
  bytes_sent: Numeric;
}

interface ProfileRow {
  slot: Numeric;
  bytes_received: Numeric;
  bytes_sent: Numeric;
}

/** Shape stored in the cache; dates travel as ISO strings. */
interface CachedClient extends Omit<Client, 'createdAt'> {
  createdAt: string;
}

const UNIQUE_VIOLATION = '23505';

const CONSTRAINT_FIELDS: Record<string, AlreadyExists['field']> = {
  clients_active_name_key: 'name',
  clients_active_address_key: 'address',
  clients_public_key_key: 'public_key',
};

function uniqueViolationConstraint(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error) || error.code !== UNIQUE_VIOLATION) {
    return null;
  }
  return 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : '';
}

export interface PostgresClientRegistryOptions {
  /** First three octets of the /24, e.g. `10.8.0`. */
  subnet: string;
  cacheTtl: number;
}

export class PostgresClientRegistry implements ClientRegistry {
  constructor(
    private db: Database,
    private cache: Cache | null,
    private options: PostgresClientRegistryOptions
  ) {}

  async addClient(input: NewClient): Promise<Result<Client, AlreadyExists>> {
    try {
      const rows = await this.db.query<ClientRow>(
        `INSERT INTO clients (name, public_key, private_key, address)
         VALUES ($1, $2, $3, $4)
         RETURNING *`,
        [input.name, input.publicKey, input.privateKey, input.address]
      );
      const client = this.mapRowToClient(rows[0]);
      logger.info('Client registered', { name: client.name, address: client.address });
      return ok(client);
    } catch (error) {
      const constraint = uniqueViolationConstraint(error);
      if (constraint === null) {
        logger.error('Failed to add client', { error, name: input.name });
        throw new StorageError(`Failed to add client '${input.name}': ${describeError(error)}`, error);
      }
      const field = CONSTRAINT_FIELDS[constraint] ?? 'name';
      const value = field === 'public_key' ? input.publicKey : field === 'address' ? input.address : input.name;
      logger.warn('Client already exists', { field, value: field === 'public_key' ? shortKey(value) : value });
      return err({ kind: 'AlreadyExists', field, value });
    }
  }

  async getAllClients(activeOnly = true): Promise<Client[]> {
    const rows = await this.db.query<ClientRow>(
      activeOnly ? 'SELECT * FROM clients WHERE is_active ORDER BY id' : 'SELECT * FROM clients ORDER BY id'
    );
    return rows.map((row) => this.mapRowToClient(row));
  }

  async getClientByName(name: string): Promise<Client | null> {
    const rows = await this.db.query<ClientRow>('SELECT * FROM clients WHERE name = $1 AND is_active', [name]);
    return rows.length > 0 ? this.mapRowToClient(rows[0]) : null;
  }

  async getClientByPublicKey(publicKey: string): Promise<Client | null> {
    const cacheKey = this.cacheKey(publicKey);
    const cached = await this.readCache(cacheKey);
    if (cached) {
      return { ...cached, createdAt: new Date(cached.createdAt) };
    }

    const rows = await this.db.query<ClientRow>('SELECT * FROM clients WHERE public_key = $1 AND is_active', [
      publicKey,
    ]);
    if (rows.length === 0) {
      return null;
    }

    const client = this.mapRowToClient(rows[0]);
    await this.writeCache(cacheKey, { ...client, createdAt: client.createdAt.toISOString() });
    return client;
  }

  async clientExists(name: string): Promise<boolean> {
    const rows = await this.db.query('SELECT 1 FROM clients WHERE name = $1 AND is_active', [name]);
    return rows.length > 0;
  }

  /** Soft delete: the row, its history and sessions stay; the active session is closed. */
  async deleteClient(name: string): Promise<Result<Client, NotFound>> {
    const client = await this.db.transaction(async (tx) => {
      const rows = await tx.query<ClientRow>(
        `UPDATE clients SET is_active = FALSE, deleted_at = NOW()
         WHERE name = $1 AND is_active
         RETURNING *`,
        [name]
      );
      if (rows.length === 0) {
        return null;
      }
      const deleted = this.mapRowToClient(rows[0]);
      await tx.query(
        `UPDATE sessions SET end_at = NOW(), is_active = FALSE
         WHERE client_id = $1 AND is_active`,
        [deleted.id]
      );
      return deleted;
    });

    if (!client) {
      return err({ kind: 'NotFound', name });
    }

    await this.invalidateCache(this.cacheKey(client.publicKey));
    logger.info('Client deleted', { name, address: client.address });
    return ok(client);
  }

  async getNextAvailableIp(): Promise<string> {
    const rows = await this.db.query<{ address: string }>('SELECT address FROM clients WHERE is_active');
    const taken: number[] = [];
    for (const row of rows) {
      const octet = lastOctet(row.address);
      if (octet !== null) {
        taken.push(octet);
      }
    }
    const octet = allocateHostOctet(taken);
    if (octet === null) {
      throw new AddressPoolExhaustedError(this.options.subnet);
    }
    return `${this.options.subnet}.${octet}/32`;
  }

  /**
   * Attributes traffic since the last sample and moves the baseline. The
   * baseline row is locked for the transaction so samples for one client
   * apply in order.
   */
  async recordCounterSample(clientId: number, bytesReceived: number, bytesSent: number): Promise<CounterDelta> {
    try {
      return await this.applyCounterSample(clientId, bytesReceived, bytesSent);
    } catch (error) {
      throw new StorageError(`Failed to record traffic for client ${clientId}: ${describeError(error)}`, error);
    }
  }

  private async applyCounterSample(clientId: number, bytesReceived: number, bytesSent: number): Promise<CounterDelta> {
    return this.db.transaction(async (tx) => {
      const rows = await tx.query<CounterRow>(
        'SELECT last_bytes_received, last_bytes_sent FROM traffic_counters WHERE client_id = $1 FOR UPDATE',
        [clientId]
      );
      const baseline =
        rows.length > 0
          ? { bytesReceived: Number(rows[0].last_bytes_received), bytesSent: Number(rows[0].last_bytes_sent) }
          : null;

      const delta = computeCounterDelta(baseline, { bytesReceived, bytesSent });

      await this.saveBaseline(tx, clientId, bytesReceived, bytesSent);
      if (delta.deltaReceived > 0 || delta.deltaSent > 0) {
        await tx.query(
          'INSERT INTO traffic_history (client_id, bytes_received, bytes_sent) VALUES ($1, $2, $3)',
          [clientId, delta.deltaReceived, delta.deltaSent]
        );
      }

      if (!baseline) {
        logger.debug('Seeded traffic baseline', { clientId, bytesReceived, bytesSent });
      }
      return delta;
    });
  }

  async getActiveSession(clientId: number): Promise<Session | null> {
    const rows = await this.db.query<SessionRow>(
      'SELECT * FROM sessions WHERE client_id = $1 AND is_active LIMIT 1',
      [clientId]
    );
    return rows.length > 0 ? this.mapRowToSession(rows[0]) : null;
  }

  async startSession(clientId: number, startAt: Date): Promise<Session> {
    const rows = await this.db.query<SessionRow>(
      `INSERT INTO sessions (client_id, start_at, is_active)
       VALUES ($1, $2, TRUE)
       ON CONFLICT (client_id) WHERE is_active DO NOTHING
       RETURNING *`,
      [clientId, startAt]
    );
    if (rows.length > 0) {
      return this.mapRowToSession(rows[0]);
    }

    const existing = await this.getActiveSession(clientId);
    if (!existing) {
      throw new Error(`Session for client ${clientId} neither started nor found`);
    }
    return existing;
  }

  async endSession(clientId: number, endAt: Date): Promise<boolean> {
    const rows = await this.db.query<{ id: Numeric }>(
      `UPDATE sessions SET end_at = $2, is_active = FALSE
       WHERE client_id = $1 AND is_active
       RETURNING id`,
      [clientId, endAt]
    );
    return rows.length > 0;
  }

  async getSessions(clientId: number, limit = 10): Promise<Session[]> {
    const rows = await this.db.query<SessionRow>(
      'SELECT * FROM sessions WHERE client_id = $1 ORDER BY start_at DESC LIMIT $2',
      [clientId, limit]
    );
    return rows.map((row) => this.mapRowToSession(row));
  }

  async getTotalTrafficByClient(): Promise<ClientTrafficTotal[]> {
    const rows = await this.db.query<TotalRow>(
      `SELECT
         c.id AS client_id,
         c.name,
         COALESCE(SUM(h.bytes_received), 0) AS total_received,
         COALESCE(SUM(h.bytes_sent), 0) AS total_sent
       FROM clients c
       LEFT JOIN traffic_history h ON h.client_id = c.id
       WHERE c.is_active
       GROUP BY c.id, c.name
       ORDER BY COALESCE(SUM(h.bytes_received), 0) + COALESCE(SUM(h.bytes_sent), 0) DESC`
    );
    return rows.map((row) => ({
      clientId: row.client_id,
      name: row.name,
      totalReceived: Number(row.total_received),
      totalSent: Number(row.total_sent),
    }));
  }

  async getTrafficSeries(query: TrafficSeriesQuery): Promise<TrafficPoint[]> {
    const params: unknown[] = [query.bucket, query.from, query.to];
    let clientFilter = '';
    if (query.clientId !== undefined) {
      params.push(query.clientId);
      clientFilter = 'AND h.client_id = $4';
    }

    const rows = await this.db.query<SeriesRow>(
      `SELECT
         date_trunc($1, h.recorded_at) AS bucket_start,
         SUM(h.bytes_received) AS bytes_received,
         SUM(h.bytes_sent) AS bytes_sent
       FROM traffic_history h
       JOIN clients c ON c.id = h.client_id AND c.is_active
       WHERE h.recorded_at >= $2 AND h.recorded_at < $3 ${clientFilter}
       GROUP BY bucket_start
       ORDER BY bucket_start`,
      params
    );
    return rows.map((row) => ({
      bucketStart: row.bucket_start,
      bytesReceived: Number(row.bytes_received),
      bytesSent: Number(row.bytes_sent),
    }));
  }

  async getHourlyProfile(clientId?: number): Promise<ProfilePoint[]> {
    return this.profile('EXTRACT(HOUR FROM h.recorded_at)', 24, clientId);
  }

  /** Slot 0 is Monday. */
  async getWeekdayProfile(clientId?: number): Promise<ProfilePoint[]> {
    return this.profile('EXTRACT(ISODOW FROM h.recorded_at) - 1', 7, clientId);
  }

  private async profile(slotExpression: string, slots: number, clientId?: number): Promise<ProfilePoint[]> {
    const params: unknown[] = [];
    let clientFilter = '';
    if (clientId !== undefined) {
      params.push(clientId);
      clientFilter = 'WHERE h.client_id = $1';
    }

    const rows = await this.db.query<ProfileRow>(
      `SELECT
         ${slotExpression} AS slot,
         SUM(h.bytes_received) AS bytes_received,
         SUM(h.bytes_sent) AS bytes_sent
       FROM traffic_history h
       JOIN clients c ON c.id = h.client_id AND c.is_active
       ${clientFilter}
       GROUP BY slot
       ORDER BY slot`,
      params
    );

    const points: ProfilePoint[] = Array.from({ length: slots }, (_, slot) => ({
      slot,
      bytesReceived: 0,
      bytesSent: 0,
    }));
    for (const row of rows) {
      const slot = Number(row.slot);
      if (slot >= 0 && slot < slots) {
        points[slot] = { slot, bytesReceived: Number(row.bytes_received), bytesSent: Number(row.bytes_sent) };
      }
    }
    return points;
  }

  private async saveBaseline(tx: QueryRunner, clientId: number, bytesReceived: number, bytesSent: number) {
    await tx.query(
      `INSERT INTO traffic_counters (client_id, last_bytes_received, last_bytes_sent, updated_at)
       VALUES ($1, $2, $3, NOW())
       ON CONFLICT (client_id) DO UPDATE SET
         last_bytes_received = EXCLUDED.last_bytes_received,
         last_bytes_sent = EXCLUDED.last_bytes_sent,
         updated_at = NOW()`,
      [clientId, bytesReceived, bytesSent]
    );
  }

  private cacheKey(publicKey: string): string {
    return `client:pubkey:${publicKey}`;
  }

  // Cache trouble never fails a lookup; the database is the source of truth.
  private async readCache(key: string): Promise<CachedClient | null> {
    if (!this.cache) {
      return null;
    }
    try {
      return await this.cache.get<CachedClient>(key);
    } catch (error) {
      logger.warn('Client cache read failed', { key, error: describeError(error) });
      return null;
    }
  }

  private async writeCache(key: string, value: CachedClient): Promise<void> {
    if (!this.cache) {
      return;
    }
    try {
      await this.cache.set(key, value, this.options.cacheTtl);
    } catch (error) {
      logger.warn('Client cache write failed', { key, error: describeError(error) });
    }
  }

  private async invalidateCache(key: string): Promise<void> {
    if (!this.cache) {
      return;
    }
    try {
      await this.cache.del(key);
    } catch (error) {
      logger.warn('Client cache invalidation failed', { key, error: describeError(error) });
    }
  }

  private mapRowToClient(row: ClientRow): Client {
    return {
      id: row.id,
      name: row.name,
      publicKey: row.public_key,
      privateKey: row.private_key,
      address: row.address,
      createdAt: row.created_at,
      isActive: row.is_active,
    };
  }

  private mapRowToSession(row: SessionRow): Session {
    return {
      id: Number(row.id),
      clientId: row.client_id,
      startAt: row.start_at,
      endAt: row.end_at,
      isActive: row.is_active,
    };
  }
}
