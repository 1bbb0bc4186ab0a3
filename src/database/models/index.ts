export interface Client {
  id: number;
  name: string;
  publicKey: string;
  privateKey: string;
  /** Host address with prefix, e.g. `10.8.0.2/32`. */
  address: string;
  createdAt: Date;
  isActive: boolean;
}

export interface NewClient {
  name: string;
  publicKey: string;
  privateKey: string;
  address: string;
}

export interface TrafficCounterState {
  clientId: number;
  lastBytesReceived: number;
  lastBytesSent: number;
  updatedAt: Date;
}

export interface CounterDelta {
  deltaReceived: number;
  deltaSent: number;
}

export interface TrafficRecord {
  id: number;
  clientId: number;
  bytesReceived: number;
  bytesSent: number;
  recordedAt: Date;
}

export interface Session {
  id: number;
  clientId: number;
  startAt: Date;
  endAt: Date | null;
  isActive: boolean;
}

export interface ClientTrafficTotal {
  clientId: number;
  name: string;
  totalReceived: number;
  totalSent: number;
}

export type SeriesBucket = 'hour' | 'day';

export interface TrafficSeriesQuery {
  clientId?: number;
  from: Date;
  to: Date;
  bucket: SeriesBucket;
}

export interface TrafficPoint {
  bucketStart: Date;
  bytesReceived: number;
  bytesSent: number;
}

export interface ProfilePoint {
  /** Hour of day (0-23) or ISO weekday index (0 = Monday .. 6 = Sunday). */
  slot: number;
  bytesReceived: number;
  bytesSent: number;
}

/** One peer line of `awg show <iface> dump`. */
export interface PeerStat {
  publicKey: string;
  endpoint: string | null;
  allowedIps: string;
  /** Unix seconds; 0 means no handshake yet. */
  latestHandshake: number;
  bytesReceived: number;
  bytesSent: number;
}
