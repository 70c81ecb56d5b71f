/**
 * Tests for the TCP transport and reachability probe, against an in-process
 * server on the loopback interface.
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as net from 'net';
import { TcpTransport, probe } from '../transport';
import { TransactionState } from '../protocol';
import { MailHookError, MailHookErrorKind } from '../errors';

interface TestServer {
  server: net.Server;
  port: number;
  sockets: Set<net.Socket>;
}

const servers: TestServer[] = [];

function startServer(onLine: (line: string, socket: net.Socket) => void): Promise<TestServer> {
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    socket.write('220 test.local ESMTP\r\n');

    let buffer = '';
    socket.on('data', (data) => {
      buffer += data.toString('utf-8');
      let end = buffer.indexOf('\r\n');
      while (end !== -1) {
        onLine(buffer.slice(0, end), socket);
        buffer = buffer.slice(end + 2);
        end = buffer.indexOf('\r\n');
      }
    });
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      const started = { server, port, sockets };
      servers.push(started);
      resolve(started);
    });
  });
}

function stopServer(testServer: TestServer): Promise<void> {
  for (const socket of testServer.sockets) {
    socket.destroy();
  }
  return new Promise((resolve) => testServer.server.close(() => resolve()));
}

async function unusedPort(): Promise<number> {
  const testServer = await startServer(() => undefined);
  servers.splice(servers.indexOf(testServer), 1);
  await stopServer(testServer);
  return testServer.port;
}

afterEach(async () => {
  await Promise.all(servers.splice(0).map(stopServer));
});

describe('TcpTransport', () => {
  it('should read the greeting on connect', async () => {
    const { port } = await startServer(() => undefined);
    const transport = new TcpTransport({ host: '127.0.0.1', port, clientId: 'localhost' });

    const greeting = await transport.connect();

    expect(greeting.code).toBe(220);
    expect(greeting.message).toEqual(['test.local ESMTP']);
    expect(transport.getSession().getState()).toBe(TransactionState.Greeting);
    expect(transport.isConnected()).toBe(true);

    await transport.close();
    expect(transport.isConnected()).toBe(false);
  });

  it('should exchange commands and multi-line replies', async () => {
    const { port } = await startServer((line, socket) => {
      if (line.startsWith('EHLO')) {
        socket.write('250-test.local\r\n250 8BITMIME\r\n');
      }
    });
    const transport = new TcpTransport({ host: '127.0.0.1', port, clientId: 'localhost' });
    await transport.connect();

    const response = await transport.sendCommand('EHLO localhost');

    expect(response.code).toBe(250);
    expect(response.message).toEqual(['test.local', '8BITMIME']);
    await transport.close();
  });

  it('should time out waiting for a reply when configured', async () => {
    const { port } = await startServer(() => undefined);
    const transport = new TcpTransport({
      host: '127.0.0.1',
      port,
      clientId: 'localhost',
      commandTimeout: 50,
    });
    await transport.connect();

    await expect(transport.sendCommand('NOOP')).rejects.toMatchObject({
      kind: MailHookErrorKind.Timeout,
    });
    await transport.close();
  });

  it('should fail pending reads when the server hangs up', async () => {
    const { port } = await startServer((line, socket) => {
      if (line === 'QUIT') {
        socket.destroy();
      }
    });
    const transport = new TcpTransport({ host: '127.0.0.1', port, clientId: 'localhost' });
    await transport.connect();

    await expect(transport.sendCommand('QUIT')).rejects.toMatchObject({
      kind: MailHookErrorKind.Connection,
    });
    await transport.close();
  });

  it('should report a refused connection', async () => {
    const port = await unusedPort();
    const transport = new TcpTransport({ host: '127.0.0.1', port, clientId: 'localhost' });

    await expect(transport.connect()).rejects.toMatchObject({
      kind: MailHookErrorKind.Connection,
    });
  });

  it('should refuse writes before connecting', async () => {
    const transport = new TcpTransport({ host: '127.0.0.1', port: 25, clientId: 'localhost' });
    await expect(transport.write('DATA\r\n')).rejects.toThrow(MailHookError);
  });
});

describe('probe', () => {
  it('should resolve when something listens', async () => {
    const { port } = await startServer(() => undefined);
    await expect(probe('127.0.0.1', port, 1000)).resolves.toBeUndefined();
  });

  it('should report an unreachable port as a connection error', async () => {
    const port = await unusedPort();
    await expect(probe('127.0.0.1', port, 1000)).rejects.toMatchObject({
      kind: MailHookErrorKind.Connection,
    });
  });
});
