import {
  CommandResult,
  HostConnection,
  ServerGroupOptions,
  ServerOptions,
} from '../interfaces';

export const DEFAULT_SSH_PORT = 22;

export class Server {
  public readonly name: string;
  public readonly address: string;
  public readonly port: number;
  public readonly user: string;
  public readonly password?: string;
  public readonly privateKeyPath?: string;
  public readonly passphrase?: string;

  public sudoPassword: string;
  public args: Record<string, unknown>;
  public lastError?: Error;

  private readonly _history: Readonly<CommandResult>[] = [];

  constructor(options: ServerOptions) {
    this.name = options.name ?? options.address;
    this.address = options.address;
    this.port = options.port ?? DEFAULT_SSH_PORT;
    this.user = options.user;
    this.password = options.password || undefined;
    this.privateKeyPath = options.privateKeyPath || undefined;
    this.passphrase = options.passphrase || undefined;
    this.sudoPassword = options.sudoPassword ?? '';
    this.args = { ...options.args };
  }

  /**
   * Build the server addressed by a remote file's connection block. The host is both identity and address.
   */
  static fromHostConnection(connection: HostConnection): Server {
    return new Server({
      name: connection.host,
      address: connection.host,
      port: DEFAULT_SSH_PORT,
      user: connection.user,
      password: connection.password,
      privateKeyPath: connection.privateKey,
    });
  }

  /** The dial target, `address:port` */
  getFullAddress(): string {
    return `${this.address}:${this.port}`;
  }

  hasCredentials(): boolean {
    return Boolean(this.password || this.privateKeyPath);
  }

  /** Every command run on this server, oldest first */
  get history(): readonly Readonly<CommandResult>[] {
    return this._history;
  }

  recordCommand(result: Readonly<CommandResult>): void {
    this._history.push(result);
  }
}

export class ServerGroup {
  public readonly name: string;
  public readonly servers: Server[];
  public readonly args: Record<string, unknown>;

  constructor(options: ServerGroupOptions) {
    this.name = options.name;
    this.args = { ...options.args };
    // group values are defaults, a server's own args win
    this.servers = options.servers.map(
      (server) => new Server({ ...server, args: { ...this.args, ...server.args } })
    );
  }
}
