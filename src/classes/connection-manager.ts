import { Config, NodeSSH } from 'node-ssh';
import { utils, type AuthenticationType } from 'ssh2';
import { v4 as uuidv4 } from 'uuid';
import {
  ConnectionManagerOptions,
  ConnectionOpener,
} from '../interfaces';
import { ConnectionError, describeCause } from '../lib/errors';
import { readFile } from '../lib/filesystem';
import {
  createHostVerifier,
  HostFingerprint,
  HostKeyPolicy,
} from '../lib/host-key';
import { KeyedLock } from '../lib/keyed-lock';
import { Server, ServerGroup } from './server';

export const DEFAULT_READY_TIMEOUT_MS = 10_000;

export interface Connection {
  readonly id: string;
  readonly server: Server;
  readonly ssh: NodeSSH;
  readonly openedAt: Date;
}

/**
 * Keeps at most one authenticated SSH connection per server name.
 *
 * Closing a connection does not forget it: the next command on that server
 * fails on the dead handle instead of silently reconnecting.
 */
export class ConnectionManager implements ConnectionOpener {
  private connections = new Map<string, Connection>();
  private lock = new KeyedLock();
  private hostKeyPolicy: HostKeyPolicy;
  private readyTimeout: number;

  constructor(options: ConnectionManagerOptions) {
    this.hostKeyPolicy = options.hostKeyPolicy;
    this.readyTimeout = options.readyTimeout ?? DEFAULT_READY_TIMEOUT_MS;
  }

  /**
   * Get the connection of a server, dialing it the first time the name is seen
   *
   * Throws ConnectionError when the key cannot be loaded or the dial fails.
   */
  async open(server: Server): Promise<Connection> {
    return this.withServerLock(server.name, async () => {
      const existing = this.connections.get(server.name);
      if (existing) return existing;

      const ssh = await this.dial(server);
      const connection: Connection = {
        id: uuidv4(),
        server,
        ssh,
        openedAt: new Date(),
      };
      this.connections.set(server.name, connection);
      return connection;
    });
  }

  /**
   * Open every server not connected yet, logging and skipping failures
   */
  async openAll(servers: Iterable<Server> | ServerGroup): Promise<Connection[]> {
    const list = servers instanceof ServerGroup ? servers.servers : servers;
    const opened: Connection[] = [];

    for (const server of list) {
      const existing = this.connections.get(server.name);
      if (existing) {
        if (!opened.includes(existing)) opened.push(existing);
        continue;
      }

      try {
        opened.push(await this.open(server));
        server.lastError = undefined;
      } catch (error) {
        server.lastError = error instanceof Error ? error : new Error(String(error));
        console.error(`Skipping ${server.name}: ${describeCause(error)}`);
      }
    }

    return opened;
  }

  /**
   * Terminate the transport, keeping the registry entry
   */
  async close(connection: Connection): Promise<void> {
    connection.ssh.dispose();
  }

  async disposeAll(): Promise<void> {
    for (const connection of this.connections.values()) {
      await this.close(connection);
    }
  }

  get(name: string): Connection | undefined {
    return this.connections.get(name);
  }

  list(): Connection[] {
    return [...this.connections.values()];
  }

  /**
   * Run a task while no other task holds the same server name
   */
  withServerLock<T>(name: string, task: () => Promise<T>): Promise<T> {
    return this.lock.run(name, task);
  }

  private async dial(server: Server): Promise<NodeSSH> {
    const target = server.getFullAddress();

    if (!server.hasCredentials()) {
      throw new ConnectionError(
        server.name,
        target,
        new Error('either a password or a private key path is required')
      );
    }

    const hostKey: { mismatch?: HostFingerprint } = {};
    const config: Config = {
      host: server.address,
      port: server.port,
      username: server.user,
      readyTimeout: this.readyTimeout,
      hostVerifier: createHostVerifier(this.hostKeyPolicy, (received) => {
        hostKey.mismatch = received;
      }),
    };

    const methods: AuthenticationType[] = [];
    if (server.password) {
      config.password = server.password;
      methods.push('password');
    }
    if (server.privateKeyPath) {
      config.privateKey = await this.loadPrivateKey(server);
      if (server.passphrase) config.passphrase = server.passphrase;
      methods.push('publickey');
    }
    config.authHandler = methods;

    const ssh = new NodeSSH();
    try {
      await ssh.connect(config);
    } catch (error) {
      ssh.dispose();
      throw new ConnectionError(
        server.name,
        target,
        hostKey.mismatch
          ? new Error(`host key mismatch, received ${hostKey.mismatch.display}`)
          : error
      );
    }

    return ssh;
  }

  private async loadPrivateKey(server: Server): Promise<string> {
    const target = server.getFullAddress();
    const keyPath = server.privateKeyPath ?? '';

    let keyMaterial: Buffer;
    try {
      keyMaterial = await readFile(keyPath);
    } catch (error) {
      throw new ConnectionError(server.name, target, error);
    }

    const parsed = utils.parseKey(keyMaterial, server.passphrase);
    if (parsed instanceof Error) {
      throw new ConnectionError(
        server.name,
        target,
        new Error(`cannot parse private key ${keyPath}: ${parsed.message}`)
      );
    }

    return keyMaterial.toString('utf8');
  }
}
