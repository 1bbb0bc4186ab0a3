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
import { AlreadyExists, NotFound, Result } from '../../utils/result';

/**
 * Persistent store of clients, counters, history and sessions. Every lookup
 * sees active clients only; deleted clients keep their history.
 */
export interface ClientRegistry {
  addClient(input: NewClient): Promise<Result<Client, AlreadyExists>>;
  getAllClients(activeOnly?: boolean): Promise<Client[]>;
  getClientByName(name: string): Promise<Client | null>;
  getClientByPublicKey(publicKey: string): Promise<Client | null>;
  clientExists(name: string): Promise<boolean>;
  deleteClient(name: string): Promise<Result<Client, NotFound>>;
  /** Next free `<subnet>.N/32`; throws AddressPoolExhaustedError when none is left. */
  getNextAvailableIp(): Promise<string>;

  recordCounterSample(clientId: number, bytesReceived: number, bytesSent: number): Promise<CounterDelta>;

  getActiveSession(clientId: number): Promise<Session | null>;
  startSession(clientId: number, startAt: Date): Promise<Session>;
  /** Closes the active session, if any. Returns whether one was closed. */
  endSession(clientId: number, endAt: Date): Promise<boolean>;
  getSessions(clientId: number, limit?: number): Promise<Session[]>;

  getTotalTrafficByClient(): Promise<ClientTrafficTotal[]>;
  getTrafficSeries(query: TrafficSeriesQuery): Promise<TrafficPoint[]>;
  getHourlyProfile(clientId?: number): Promise<ProfilePoint[]>;
  getWeekdayProfile(clientId?: number): Promise<ProfilePoint[]>;
}
