import {
  Client,
  ClientTrafficTotal,
  CounterDelta,
  NewClient,
  ProfilePoint,
  Session,
  TrafficPoint,
  TrafficSeriesQuery,
} from '../../src/database/models';
import { AddressPoolExhaustedError } from '../../src/utils/errors';
import { AlreadyExists, NotFound, Result, err, ok } from '../../src/utils/result';
import { ClientRegistry } from '../../src/services/registry/ClientRegistry';
import { allocateHostOctet, lastOctet } from '../../src/services/registry/addressAllocator';
import { CounterSample, computeCounterDelta } from '../../src/services/registry/counterDelta';

interface HistoryRow {
  clientId: number;
  bytesReceived: number;
  bytesSent: number;
  recordedAt: Date;
}

/** Registry with the same uniqueness and soft-delete rules as the Postgres one. */
export class InMemoryClientRegistry implements ClientRegistry {
  clients: Client[] = [];
  counters = new Map<number, CounterSample>();
  history: HistoryRow[] = [];
  sessions: Session[] = [];
  private nextClientId = 1;
  private nextSessionId = 1;

  constructor(private subnet = '10.8.0') {}

  async addClient(input: NewClient): Promise<Result<Client, AlreadyExists>> {
    const active = this.clients.filter((client) => client.isActive);
    if (active.some((client) => client.name === input.name)) {
      return err({ kind: 'AlreadyExists', field: 'name', value: input.name });
    }
    if (this.clients.some((client) => client.publicKey === input.publicKey)) {
      return err({ kind: 'AlreadyExists', field: 'public_key', value: input.publicKey });
    }
    if (active.some((client) => client.address === input.address)) {
      return err({ kind: 'AlreadyExists', field: 'address', value: input.address });
    }
    const client: Client = { id: this.nextClientId++, ...input, createdAt: new Date(), isActive: true };
    this.clients.push(client);
    return ok(client);
  }

  async getAllClients(activeOnly = true): Promise<Client[]> {
    return this.clients.filter((client) => !activeOnly || client.isActive);
  }

  async getClientByName(name: string): Promise<Client | null> {
    return this.clients.find((client) => client.isActive && client.name === name) ?? null;
  }

  async getClientByPublicKey(publicKey: string): Promise<Client | null> {
    return this.clients.find((client) => client.isActive && client.publicKey === publicKey) ?? null;
  }

  async clientExists(name: string): Promise<boolean> {
    return (await this.getClientByName(name)) !== null;
  }

  async deleteClient(name: string): Promise<Result<Client, NotFound>> {
    const client = await this.getClientByName(name);
    if (!client) {
      return err({ kind: 'NotFound', name });
    }
    client.isActive = false;
    await this.endSession(client.id, new Date());
    return ok(client);
  }

  async getNextAvailableIp(): Promise<string> {
    const taken: number[] = [];
    for (const client of this.clients) {
      const octet = lastOctet(client.address);
      if (client.isActive && octet !== null) {
        taken.push(octet);
      }
    }
    const octet = allocateHostOctet(taken);
    if (octet === null) {
      throw new AddressPoolExhaustedError(this.subnet);
    }
    return `${this.subnet}.${octet}/32`;
  }

  async recordCounterSample(clientId: number, bytesReceived: number, bytesSent: number): Promise<CounterDelta> {
    const delta = computeCounterDelta(this.counters.get(clientId) ?? null, { bytesReceived, bytesSent });
    this.counters.set(clientId, { bytesReceived, bytesSent });
    if (delta.deltaReceived > 0 || delta.deltaSent > 0) {
      this.history.push({
        clientId,
        bytesReceived: delta.deltaReceived,
        bytesSent: delta.deltaSent,
        recordedAt: new Date(),
      });
    }
    return delta;
  }

  async getActiveSession(clientId: number): Promise<Session | null> {
    return this.sessions.find((session) => session.clientId === clientId && session.isActive) ?? null;
  }

  async startSession(clientId: number, startAt: Date): Promise<Session> {
    const existing = await this.getActiveSession(clientId);
    if (existing) {
      return existing;
    }
    const session: Session = { id: this.nextSessionId++, clientId, startAt, endAt: null, isActive: true };
    this.sessions.push(session);
    return session;
  }

  async endSession(clientId: number, endAt: Date): Promise<boolean> {
    const session = await this.getActiveSession(clientId);
    if (!session) {
      return false;
    }
    session.endAt = endAt;
    session.isActive = false;
    return true;
  }

  async getSessions(clientId: number, limit = 10): Promise<Session[]> {
    return this.sessions
      .filter((session) => session.clientId === clientId)
      .sort((a, b) => b.startAt.getTime() - a.startAt.getTime())
      .slice(0, limit);
  }

  async getTotalTrafficByClient(): Promise<ClientTrafficTotal[]> {
    return this.clients
      .filter((client) => client.isActive)
      .map((client) => {
        const rows = this.history.filter((row) => row.clientId === client.id);
        return {
          clientId: client.id,
          name: client.name,
          totalReceived: rows.reduce((sum, row) => sum + row.bytesReceived, 0),
          totalSent: rows.reduce((sum, row) => sum + row.bytesSent, 0),
        };
      })
      .sort((a, b) => b.totalReceived + b.totalSent - (a.totalReceived + a.totalSent));
  }

  async getTrafficSeries(query: TrafficSeriesQuery): Promise<TrafficPoint[]> {
    const rows = this.history.filter(
      (row) =>
        row.recordedAt >= query.from &&
        row.recordedAt < query.to &&
        (query.clientId === undefined || row.clientId === query.clientId)
    );
    return rows.map((row) => ({ bucketStart: row.recordedAt, bytesReceived: row.bytesReceived, bytesSent: row.bytesSent }));
  }

  async getHourlyProfile(clientId?: number): Promise<ProfilePoint[]> {
    return this.profile(24, (date) => date.getHours(), clientId);
  }

  async getWeekdayProfile(clientId?: number): Promise<ProfilePoint[]> {
    return this.profile(7, (date) => (date.getDay() + 6) % 7, clientId);
  }

  private profile(slots: number, slotOf: (date: Date) => number, clientId?: number): ProfilePoint[] {
    const points = Array.from({ length: slots }, (_, slot) => ({ slot, bytesReceived: 0, bytesSent: 0 }));
    for (const row of this.history) {
      if (clientId !== undefined && row.clientId !== clientId) {
        continue;
      }
      const point = points[slotOf(row.recordedAt)];
      point.bytesReceived += row.bytesReceived;
      point.bytesSent += row.bytesSent;
    }
    return points;
  }
}
