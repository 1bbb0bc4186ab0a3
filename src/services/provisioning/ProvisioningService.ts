import { ObfuscationParameters } from '../../config/config';
import { Client, PeerStat, Session } from '../../database/models';
import { logger } from '../../utils/logger';
import { ConflictError, NotFoundError, ValidationError, describeError } from '../../utils/errors';
import { ClientRegistry } from '../registry/ClientRegistry';
import { SyncOrchestrator, SyncOutcome } from '../sync/SyncOrchestrator';
import { InterfaceController } from '../wireguard/InterfaceController';
import { KeyPairGenerator } from '../wireguard/KeyPairGenerator';
import { renderClientConfig } from '../wireguard/ConfigRenderer';
import { buildAmneziaConfig, encodeAmneziaLink } from '../wireguard/AmneziaLink';

export const CLIENT_NAME_PATTERN = /^[A-Za-z0-9_-]{1,32}$/;
export const MAX_CLIENT_NAME_LENGTH = 32;

export function validateClientName(name: string): void {
  if (!name) {
    throw new ValidationError('Client name cannot be empty');
  }
  if (name.length > MAX_CLIENT_NAME_LENGTH) {
    throw new ValidationError(`Client name too long (max ${MAX_CLIENT_NAME_LENGTH} characters)`);
  }
  if (!CLIENT_NAME_PATTERN.test(name)) {
    throw new ValidationError('Client name can only contain letters, numbers, underscores and hyphens');
  }
}

export interface EndpointSettings {
  serverPublicKey: string;
  host: string;
  port: number;
  dns: string;
  description: string;
  obfuscation: ObfuscationParameters;
}

export interface ClientArtifacts {
  clientConfig: string;
  vpnLink: string;
}

export interface CreatedClient extends ClientArtifacts {
  client: Client;
  sync: SyncOutcome;
}

export interface DeletedClient {
  client: Client;
  sync: SyncOutcome;
}

export interface ClientDetails {
  client: Client;
  /** Null when the interface has never seen the peer or could not be queried. */
  peer: PeerStat | null;
  activeSession: Session | null;
}

/**
 * Operator-facing client lifecycle. Registry mutations are committed before
 * the sync runs; a failed sync is reported in the result and not undone.
 */
export class ProvisioningService {
  constructor(
    private registry: ClientRegistry,
    private keys: KeyPairGenerator,
    private orchestrator: SyncOrchestrator,
    private controller: InterfaceController,
    private endpoint: EndpointSettings
  ) {}

  async createClient(name: string): Promise<CreatedClient> {
    validateClientName(name);

    if (await this.registry.clientExists(name)) {
      throw new ConflictError(`Client '${name}' already exists`);
    }

    const keyPair = await this.keys.generateKeyPair();
    const address = await this.registry.getNextAvailableIp();

    const added = await this.registry.addClient({
      name,
      publicKey: keyPair.publicKey,
      privateKey: keyPair.privateKey,
      address,
    });
    if (!added.ok) {
      throw new ConflictError(`Client with ${added.error.field} '${added.error.value}' already exists`);
    }

    const client = added.value;
    const sync = await this.orchestrator.fullSync(`add ${name}`);
    if (sync.state === 'SyncFailed') {
      logger.warn('Client registered but interface sync failed', { name, error: sync.error });
    }

    return { client, sync, ...this.renderArtifacts(client) };
  }

  async deleteClient(name: string): Promise<DeletedClient> {
    const deleted = await this.registry.deleteClient(name);
    if (!deleted.ok) {
      throw new NotFoundError(`Client '${deleted.error.name}' not found`);
    }

    const sync = await this.orchestrator.fullSync(`delete ${name}`);
    if (sync.state === 'SyncFailed') {
      logger.warn('Client deleted but interface sync failed', { name, error: sync.error });
    }
    return { client: deleted.value, sync };
  }

  async getClientArtifacts(name: string): Promise<ClientArtifacts & { client: Client }> {
    const client = await this.requireClient(name);
    return { client, ...this.renderArtifacts(client) };
  }

  async describeClient(name: string): Promise<ClientDetails> {
    const client = await this.requireClient(name);

    let peer: PeerStat | null = null;
    try {
      const peers = await this.controller.dumpPeers();
      peer = peers.find((stat) => stat.publicKey === client.publicKey) ?? null;
    } catch (error) {
      logger.warn('Could not read peer stats', { name, error: describeError(error) });
    }

    const activeSession = await this.registry.getActiveSession(client.id);
    return { client, peer, activeSession };
  }

  renderArtifacts(client: Client): ClientArtifacts {
    const clientConfig = renderClientConfig({
      privateKey: client.privateKey,
      address: client.address,
      dns: this.endpoint.dns,
      serverPublicKey: this.endpoint.serverPublicKey,
      endpoint: `${this.endpoint.host}:${this.endpoint.port}`,
      obfuscation: this.endpoint.obfuscation,
    });
    const vpnLink = encodeAmneziaLink(
      buildAmneziaConfig({
        clientPrivateKey: client.privateKey,
        clientAddress: client.address,
        serverPublicKey: this.endpoint.serverPublicKey,
        host: this.endpoint.host,
        port: this.endpoint.port,
        dns: this.endpoint.dns,
        description: this.endpoint.description,
        obfuscation: this.endpoint.obfuscation,
      })
    );
    return { clientConfig, vpnLink };
  }

  private async requireClient(name: string): Promise<Client> {
    const client = await this.registry.getClientByName(name);
    if (!client) {
      throw new NotFoundError(`Client '${name}' not found`);
    }
    return client;
  }
}
