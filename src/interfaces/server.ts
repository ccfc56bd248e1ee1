export interface ServerOptions {
  /**
   * @description The logical identity of the server, used to key its connection. Defaults to the address.
   */
  name?: string;
  /**
   * @description The hostname or IP address to dial.
   */
  address: string;
  /**
   * @description The SSH port, 22 when omitted.
   */
  port?: number;
  /**
   * @description The user to authenticate as.
   */
  user: string;
  /**
   * @description The password for password authentication.
   */
  password?: string;
  /**
   * @description The path of a private key file for public key authentication.
   */
  privateKeyPath?: string;
  /**
   * @description The passphrase of an encrypted private key.
   */
  passphrase?: string;
  /**
   * @description The password fed to privilege escalation prompts.
   */
  sudoPassword?: string;
  /**
   * @description Free-form values carried along with the server.
   */
  args?: Record<string, unknown>;
}

export interface ServerGroupOptions {
  /**
   * @description The name of the group.
   */
  name: string;
  /**
   * @description The servers in the group.
   */
  servers: ServerOptions[];
  /**
   * @description Values shared by every server of the group.
   */
  args?: Record<string, unknown>;
}

/**
 * @description The connection block of a remote file declaration.
 */
export interface HostConnection {
  host: string;
  user: string;
  password?: string;
  privateKey?: string;
}
