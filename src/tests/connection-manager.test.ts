import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import sinon from 'sinon';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { generateKeyPairSync } from 'crypto';
import { Config, NodeSSH } from 'node-ssh';
import { ConnectionManager } from '../classes/connection-manager';
import { Server, ServerGroup } from '../classes/server';
import { ConnectionError } from '../lib/errors';

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

describe('ConnectionManager', () => {
  let sandbox: sinon.SinonSandbox;
  let connect: sinon.SinonStub<[Config], Promise<NodeSSH>>;
  let dispose: sinon.SinonStub;
  let manager: ConnectionManager;
  let tmpDir: string;

  const webServer = () =>
    new Server({
      name: 'web-1',
      address: '10.0.0.5',
      user: 'deploy',
      password: 'test-secret',
    });

  beforeEach(() => {
    sandbox = sinon.createSandbox();
    connect = sandbox.stub(NodeSSH.prototype, 'connect').callsFake(
      async function (this: NodeSSH) {
        return this;
      }
    );
    dispose = sandbox.stub(NodeSSH.prototype, 'dispose');
    sandbox.stub(console, 'error');
    manager = new ConnectionManager({ hostKeyPolicy: { kind: 'accept-any' } });
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rhx-keys-'));
  });

  afterEach(() => {
    sandbox.restore();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should dial once and hand back the same connection afterwards', async () => {
    const server = webServer();

    const [first, second] = await Promise.all([
      manager.open(server),
      manager.open(server),
    ]);
    const third = await manager.open(server);

    expect(connect.calledOnce).to.equal(true);
    expect(second).to.equal(first);
    expect(third).to.equal(first);
    expect(first.id).to.match(/^[0-9a-f-]{36}$/);
    expect(manager.get('web-1')).to.equal(first);
  });

  it('should dial with the server identity and password authentication', async () => {
    await manager.open(webServer());

    const config = connect.firstCall.args[0];
    expect(config.host).to.equal('10.0.0.5');
    expect(config.port).to.equal(22);
    expect(config.username).to.equal('deploy');
    expect(config.password).to.equal('test-secret');
    expect(config.privateKey).to.equal(undefined);
    expect(config.readyTimeout).to.equal(10000);
    expect(config.authHandler).to.deep.equal(['password']);
    expect(config.hostVerifier).to.be.a('function');
  });

  it('should pass a custom ready timeout through', async () => {
    manager = new ConnectionManager({
      hostKeyPolicy: { kind: 'accept-any' },
      readyTimeout: 2500,
    });

    await manager.open(webServer());

    expect(connect.firstCall.args[0].readyTimeout).to.equal(2500);
  });

  it('should refuse a server without credentials before dialing', async () => {
    const server = new Server({ name: 'bare', address: '10.0.0.9', user: 'deploy' });

    const error = await rejection(manager.open(server));

    expect(error).to.be.instanceOf(ConnectionError);
    expect(error).to.have.property(
      'message',
      'unable to connect to bare (10.0.0.9:22): either a password or a private key path is required'
    );
    expect(connect.called).to.equal(false);
    expect(manager.get('bare')).to.equal(undefined);
  });

  it('should wrap dial failures and keep nothing in the registry', async () => {
    connect.rejects(new Error('connect ECONNREFUSED 10.0.0.5:22'));

    const error = await rejection(manager.open(webServer()));

    expect(error).to.be.instanceOf(ConnectionError);
    expect(error).to.have.property(
      'message',
      'unable to connect to web-1 (10.0.0.5:22): connect ECONNREFUSED 10.0.0.5:22'
    );
    expect(error).to.have.property('code', 'CONNECTION_FAILED');
    expect(dispose.calledOnce).to.equal(true);
    expect(manager.list()).to.have.length(0);
  });

  it('should fail when the private key file is missing', async () => {
    const keyPath = path.join(tmpDir, 'missing_rsa');
    const server = new Server({
      name: 'web-1',
      address: '10.0.0.5',
      user: 'deploy',
      privateKeyPath: keyPath,
    });

    const error = await rejection(manager.open(server));

    expect(error).to.be.instanceOf(ConnectionError);
    expect(error).to.have.property(
      'message',
      `unable to connect to web-1 (10.0.0.5:22): File ${keyPath} not found`
    );
    expect(connect.called).to.equal(false);
  });

  it('should fail when the private key cannot be parsed', async () => {
    const keyPath = path.join(tmpDir, 'broken_rsa');
    fs.writeFileSync(keyPath, 'not a private key');
    const server = new Server({
      name: 'web-1',
      address: '10.0.0.5',
      user: 'deploy',
      privateKeyPath: keyPath,
    });

    const error = await rejection(manager.open(server));

    expect(error).to.be.instanceOf(ConnectionError);
    expect(error)
      .to.have.property('message')
      .that.contains(`cannot parse private key ${keyPath}`);
    expect(connect.called).to.equal(false);
  });

  it('should authenticate with a readable private key', async () => {
    const { privateKey } = generateKeyPairSync('rsa', {
      modulusLength: 2048,
      privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
      publicKeyEncoding: { type: 'pkcs1', format: 'pem' },
    });
    const keyPath = path.join(tmpDir, 'id_rsa');
    fs.writeFileSync(keyPath, privateKey);

    await manager.open(
      new Server({
        name: 'web-1',
        address: '10.0.0.5',
        user: 'deploy',
        privateKeyPath: keyPath,
      })
    );

    const config = connect.firstCall.args[0];
    expect(config.privateKey).to.equal(privateKey);
    expect(config.password).to.equal(undefined);
    expect(config.authHandler).to.deep.equal(['publickey']);
  });

  it('should open a group best-effort and remember each failure', async () => {
    connect.callsFake(async function (this: NodeSSH, config: Config) {
      if (config.host === '10.0.0.6') {
        throw new Error('connect ETIMEDOUT');
      }
      return this;
    });
    const group = new ServerGroup({
      name: 'web',
      servers: [
        { name: 'web-1', address: '10.0.0.5', user: 'deploy', password: 'test-secret' },
        { name: 'web-2', address: '10.0.0.6', user: 'deploy', password: 'test-secret' },
        { name: 'web-3', address: '10.0.0.7', user: 'deploy', password: 'test-secret' },
      ],
    });

    const opened = await manager.openAll(group);

    expect(opened.map((c) => c.server.name)).to.deep.equal(['web-1', 'web-3']);
    expect(group.servers[1].lastError).to.be.instanceOf(ConnectionError);
    expect(group.servers[0].lastError).to.equal(undefined);
    expect(manager.list()).to.have.length(2);
  });

  it('should not dial servers that are already connected', async () => {
    const server = webServer();
    const existing = await manager.open(server);

    const opened = await manager.openAll([server, server]);

    expect(opened).to.deep.equal([existing]);
    expect(connect.calledOnce).to.equal(true);
  });

  it('should keep the registry entry after closing', async () => {
    const connection = await manager.open(webServer());

    await manager.close(connection);

    expect(dispose.calledOnce).to.equal(true);
    expect(manager.get('web-1')).to.equal(connection);
    expect(await manager.open(webServer())).to.equal(connection);
    expect(connect.calledOnce).to.equal(true);
  });

  it('should dispose every connection', async () => {
    await manager.openAll([
      webServer(),
      new Server({ name: 'web-2', address: '10.0.0.6', user: 'deploy', password: 'test-secret' }),
    ]);

    await manager.disposeAll();

    expect(dispose.callCount).to.equal(2);
  });
});
