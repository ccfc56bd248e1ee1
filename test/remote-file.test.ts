import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import sinon from 'sinon';
import { NodeSSH } from 'node-ssh';
import { ConnectionManager } from '../src/classes/connection-manager';
import { RemoteExecutor } from '../src/classes/remote-executor';
import { RemoteFileResolver } from '../src/classes/remote-file';
import { Server } from '../src/classes/server';
import { CommandError, OutputFormatError } from '../src/lib/errors';

describe('Remote file over SSH', () => {
  let sandbox: sinon.SinonSandbox;
  let connect: sinon.SinonStub;
  let execCommand: sinon.SinonStub;
  let manager: ConnectionManager;
  let resolver: RemoteFileResolver;

  beforeEach(() => {
    sandbox = sinon.createSandbox();
    connect = sandbox
      .stub(NodeSSH.prototype, 'connect')
      .callsFake(async function (this: NodeSSH) {
        return this;
      });
    sandbox.stub(NodeSSH.prototype, 'dispose');
    execCommand = sandbox.stub(NodeSSH.prototype, 'execCommand');

    manager = new ConnectionManager({ hostKeyPolicy: { kind: 'accept-any' } });
    resolver = new RemoteFileResolver(manager, new RemoteExecutor(manager));
  });

  afterEach(async () => {
    await manager.disposeAll();
    sandbox.restore();
  });

  it('should connect on demand and read a plain file', async () => {
    execCommand.resolves({
      stdout: '\r\n1042\r\nhello\r\n',
      stderr: '',
      code: 0,
      signal: null,
    });
    const server = Server.fromHostConnection({
      host: '10.0.0.5',
      user: 'deploy',
      password: 'test-secret',
    });

    const state = await resolver.resolve(server, { path: '/etc/motd' });

    expect(connect.calledOnce).to.equal(true);
    expect(execCommand.firstCall.args[0]).to.equal(
      "stat -c '%i' /etc/motd; cat /etc/motd"
    );
    expect(state).to.deep.equal({
      id: '10.0.0.5-1042',
      content: 'hello',
      sensitiveContent: '',
    });
  });

  it('should read a privileged file and drop the sudo exchange', async () => {
    execCommand.resolves({
      stdout:
        'test-secret\r\n[sudo] password for deploy: \r\n\r\n1042\r\nroot:x\r\n',
      stderr: '',
      code: 0,
      signal: null,
    });
    const server = new Server({
      name: 'web-1',
      address: '10.0.0.5',
      user: 'deploy',
      password: 'test-secret',
      sudoPassword: 'test-secret',
    });

    const state = await resolver.resolve(server, {
      path: '/etc/shadow',
      privileged: true,
      sensitive: true,
    });

    expect(execCommand.firstCall.args[0]).to.equal(
      "sudo stat -c '%i' /etc/shadow; sudo cat /etc/shadow"
    );
    expect(execCommand.firstCall.args[1].stdin).to.equal('test-secret\n');
    expect(state).to.deep.equal({
      id: '10.0.0.5-1042',
      content: '',
      sensitiveContent: 'root:x',
    });
  });

  it('should not leak sensitive content when the sudo echo shifts the output', async () => {
    execCommand.resolves({
      stdout: 'sudo-secret\r\n1042\r\nAPI_TOKEN=test-token\r\n',
      stderr: '',
      code: 0,
      signal: null,
    });
    const server = new Server({
      name: 'web-1',
      address: '10.0.0.5',
      user: 'deploy',
      password: 'test-secret',
      sudoPassword: 'sudo-secret',
    });

    let caught: unknown;
    try {
      await resolver.resolve(server, { path: '/srv/app/.env', sensitive: true });
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(OutputFormatError);
    expect(caught)
      .to.have.property('message')
      .that.does.not.contain('test-token');
  });

  it('should reuse the connection across reads of the same server', async () => {
    execCommand.resolves({
      stdout: '\n7\nbody\n',
      stderr: '',
      code: 0,
      signal: null,
    });
    const server = new Server({
      name: 'web-1',
      address: '10.0.0.5',
      user: 'deploy',
      password: 'test-secret',
    });

    await resolver.resolve(server, { path: '/etc/hostname' });
    await resolver.resolve(server, { path: '/etc/hostname' });

    expect(connect.calledOnce).to.equal(true);
    expect(server.history).to.have.length(2);
  });

  it('should surface a missing file as a command failure', async () => {
    execCommand.resolves({
      stdout: '\r\n',
      stderr: "cat: /etc/none: No such file or directory",
      code: 1,
      signal: null,
    });
    const server = new Server({
      name: 'web-1',
      address: '10.0.0.5',
      user: 'deploy',
      password: 'test-secret',
    });

    let caught: unknown;
    try {
      await resolver.resolve(server, { path: '/etc/none' });
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(CommandError);
    expect(caught).to.have.property('exitCode', 1);
  });
});
