import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { AppError, SyncFailure } from '../utils/errors';
import { PeerStat } from '../database/models';

/** JSON shapes as the API sends them; dates arrive as ISO strings. */
export interface ClientView {
  id: number;
  name: string;
  publicKey: string;
  address: string;
  createdAt: string;
  isActive: boolean;
}

export interface SessionView {
  id: number;
  clientId: number;
  startAt: string;
  endAt: string | null;
  isActive: boolean;
}

export interface SyncOutcomeView {
  generation: string;
  reason: string;
  state: 'Synced' | 'SyncFailed';
  peerCount: number;
  startedAt: string;
  finishedAt: string;
  error?: string;
}

export interface SyncStatusView {
  state: string | null;
  generation: string | null;
  pending: number;
  lastOutcome: SyncOutcomeView | null;
}

export interface CreatedClientView {
  client: ClientView;
  clientConfig: string;
  vpnLink: string;
  sync: SyncOutcomeView;
}

export interface ClientDetailsView {
  client: ClientView;
  peer: PeerStat | null;
  activeSession: SessionView | null;
}

export interface TrafficTotalsView {
  clients: Array<{ clientId: number; name: string; totalReceived: number; totalSent: number }>;
  totalReceived: number;
  totalSent: number;
}

export interface ServerStatusView {
  interfaceName: string;
  interface: { up: boolean; publicKey?: string; listenPort?: number };
  metrics: {
    cpuPercent: number;
    memPercent: number;
    diskPercent: number;
    loadAverage: number;
  } | null;
  uptime: string | null;
  sync: SyncStatusView;
  configuredPeers: number | null;
}

const apiErrorSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});

export function toCliError(error: unknown): Error {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const parsed = apiErrorSchema.safeParse(error.response?.data);
    if (parsed.success) {
      return new AppError(parsed.data.error.message, parsed.data.error.code, status ?? 500);
    }
    return new AppError(`Request failed: ${error.message}`, 'API_UNREACHABLE', status ?? 503);
  }
  return error instanceof Error ? error : new Error(String(error));
}

/** Thin client over the operator API, used by the CLI commands. */
export class ApiClient {
  private axiosInstance: AxiosInstance;

  constructor(baseURL: string, token?: string) {
    this.axiosInstance = axios.create({
      baseURL,
      timeout: 30000,
      headers: {
        'Content-Type': 'application/json',
        ...(token ? { Authorization: `Bearer ${token}` } : {}),
      },
    });

    this.axiosInstance.interceptors.response.use(
      (response) => response,
      (error: unknown) => Promise.reject(toCliError(error))
    );
  }

  async listClients(): Promise<ClientView[]> {
    const response = await this.axiosInstance.get<{ clients: ClientView[] }>('/api/v1/clients');
    return response.data.clients;
  }

  async createClient(name: string): Promise<CreatedClientView> {
    const response = await this.axiosInstance.post<CreatedClientView>('/api/v1/clients', { name });
    return response.data;
  }

  async deleteClient(name: string): Promise<{ client: ClientView; sync: SyncOutcomeView }> {
    const response = await this.axiosInstance.delete<{ client: ClientView; sync: SyncOutcomeView }>(
      `/api/v1/clients/${encodeURIComponent(name)}`
    );
    return response.data;
  }

  async getClient(name: string): Promise<ClientDetailsView> {
    const response = await this.axiosInstance.get<ClientDetailsView>(`/api/v1/clients/${encodeURIComponent(name)}`);
    return response.data;
  }

  async getClientConfig(name: string): Promise<{ clientConfig: string; vpnLink: string }> {
    const response = await this.axiosInstance.get<{ clientConfig: string; vpnLink: string }>(
      `/api/v1/clients/${encodeURIComponent(name)}/config`
    );
    return response.data;
  }

  /** Resolves with a synced outcome; a failed one is raised as a SyncFailure. */
  async sync(): Promise<SyncOutcomeView> {
    // A failed sync comes back as 502 with the outcome as the body.
    const response = await this.axiosInstance.post<SyncOutcomeView>('/api/v1/sync', undefined, {
      validateStatus: (status) => status === 200 || status === 502,
    });
    const outcome = response.data;
    if (outcome.state === 'SyncFailed') {
      throw new SyncFailure(`Generation ${outcome.generation} failed: ${outcome.error ?? 'unknown error'}`);
    }
    return outcome;
  }

  async getServerStatus(): Promise<ServerStatusView> {
    const response = await this.axiosInstance.get<ServerStatusView>('/api/v1/server');
    return response.data;
  }

  async getTrafficTotals(): Promise<TrafficTotalsView> {
    const response = await this.axiosInstance.get<TrafficTotalsView>('/api/v1/stats/totals');
    return response.data;
  }

  async getSessions(name: string, limit = 10): Promise<SessionView[]> {
    const response = await this.axiosInstance.get<{ sessions: SessionView[] }>(
      `/api/v1/stats/sessions/${encodeURIComponent(name)}`,
      { params: { limit } }
    );
    return response.data.sessions;
  }
}
