import { describe, it, mock } from 'node:test';
import * as assert from 'node:assert/strict';
import * as dgram from 'dgram';
import { once } from 'events';
import * as fs from 'fs';
import * as net from 'net';
import * as os from 'os';
import * as path from 'path';
import { Bundle } from '../bundle';
import { OscError, type OscErrorCode } from '../errors';
import { Message } from '../message';
import { TimeTag } from '../time-tag';
import { Address } from '../transport/address';
import { encodeFrame } from '../transport/frame-codec';
import { Server } from '../transport/server';

interface Reported {
  code: OscErrorCode;
  message: string;
  source: string;
}

function isCode(code: OscErrorCode): (err: unknown) => boolean {
  return (err: unknown) => err instanceof OscError && err.code === code;
}

function collectErrors(server: Server): Reported[] {
  const errors: Reported[] = [];
  server.setErrorHandler((code, message, source) => { errors.push({ code, message, source }); });
  return errors;
}

function nextError(server: Server): Promise<Reported> {
  return new Promise((resolve) => {
    server.setErrorHandler((code, message, source) => resolve({ code, message, source }));
  });
}

function socketPath(name: string): string {
  return path.join(os.tmpdir(), `osc-${name}-${process.pid}.sock`);
}

// --- Address ---

describe('Address', () => {
  it('should reject invalid ports and empty hosts', () => {
    assert.throws(() => new Address('127.0.0.1', 70000), isCode('AddressError'));
    assert.throws(() => new Address('127.0.0.1', 1.5), isCode('AddressError'));
    assert.throws(() => new Address('', 9000), isCode('AddressError'));
  });

  it('should build from URLs', () => {
    assert.equal(Address.fromUrl('osc.tcp://127.0.0.1:7000/').protocol, 'tcp');
    assert.equal(Address.fromUrl('osc.unix:///tmp/x.sock/').url(), 'osc.unix:///tmp/x.sock/');
    assert.equal(new Address('::1', 9000).url(), 'osc.udp://[::1]:9000/');
  });

  it('should only apply TTL to UDP and no-delay to TCP', () => {
    const udp = new Address('127.0.0.1', 9000, 'udp');
    const tcp = new Address('127.0.0.1', 9000, 'tcp');
    const unix = Address.unix('/tmp/x.sock');

    assert.equal(udp.setTTL(300), true);
    assert.equal(udp.getTTL(), 255);
    assert.equal(udp.setTTL(0), true);
    assert.equal(udp.getTTL(), 1);
    assert.equal(udp.setNoDelay(true), false);

    assert.equal(tcp.setTTL(4), false);
    assert.equal(tcp.getTTL(), undefined);
    assert.equal(tcp.setNoDelay(false), true);

    assert.equal(unix.setTTL(4), false);
    assert.equal(unix.setNoDelay(true), false);
  });

  it('should validate timeouts and size limits', () => {
    const addr = new Address('127.0.0.1', 9000, 'tcp');
    addr.setTimeout(1500);
    assert.equal(addr.getTimeout(), 1500);
    assert.throws(() => addr.setTimeout(-1), isCode('InvalidArgument'));
    assert.throws(() => addr.setMaxMessageSize(0), isCode('InvalidArgument'));
  });

  it('should default the size limit by protocol', () => {
    assert.equal(new Address('127.0.0.1', 9000, 'udp').getMaxMessageSize(), 65507);
    assert.equal(new Address('127.0.0.1', 9000, 'tcp').getMaxMessageSize(), 65536);
  });

  it('should clone with the same endpoint and settings', () => {
    const addr = new Address('127.0.0.1', 9000, 'udp', { ttl: 4, maxMessageSize: 100 });
    const copy = addr.clone();
    assert.notEqual(copy, addr);
    assert.equal(copy.url(), 'osc.udp://127.0.0.1:9000/');
    assert.equal(copy.getTTL(), 4);
    assert.equal(copy.getMaxMessageSize(), 100);
    assert.equal(copy.isConnected(), false);
  });

  it('should apply TTL as the multicast hop limit', async () => {
    const setMulticastTTL = mock.method(dgram.Socket.prototype, 'setMulticastTTL');
    const setTTL = mock.method(dgram.Socket.prototype, 'setTTL');
    const addr = new Address('127.0.0.1', 9, 'udp', { ttl: 5 });
    try {
      await addr.open();
      assert.equal(setMulticastTTL.mock.callCount(), 1);
      assert.deepEqual(setMulticastTTL.mock.calls[0].arguments, [5]);

      addr.setTTL(7);
      assert.equal(setMulticastTTL.mock.callCount(), 2);
      assert.deepEqual(setMulticastTTL.mock.calls[1].arguments, [7]);
      assert.equal(setTTL.mock.callCount(), 0);
    } finally {
      await addr.close();
      setMulticastTTL.mock.restore();
      setTTL.mock.restore();
    }
  });

  // --- Size limits ---

  describe('MessageTooLarge', () => {
    const addr = new Address('127.0.0.1', 9, 'udp', { maxMessageSize: 32 });

    it('should reject an oversized message before sending', async () => {
      await assert.rejects(addr.send(new Message('/big').addString('x'.repeat(64))), (err: unknown) => {
        assert.ok(err instanceof OscError);
        assert.equal(err.code, 'MessageTooLarge');
        assert.equal(err.message, 'Message /big of 80 bytes exceeds max message size 32');
        return true;
      });
      assert.equal(addr.isConnected(), false);
    });

    it('should name the bundle element that is too large', async () => {
      const bundle = new Bundle()
        .addMessage(new Message('/small'))
        .addMessage(new Message('/big').addString('x'.repeat(64)));
      await assert.rejects(addr.send(bundle), (err: unknown) => {
        assert.ok(err instanceof OscError);
        assert.equal(err.message, 'Bundle element 1 (/big) exceeds max message size 32');
        assert.equal(err.context.element, 1);
        return true;
      });
    });

    it('should report a bundle that is only too large as a whole', async () => {
      const bundle = new Bundle()
        .addMessage(new Message('/a').addInt32(1))
        .addMessage(new Message('/a').addInt32(2))
        .addMessage(new Message('/a').addInt32(3));
      await assert.rejects(addr.send(bundle), (err: unknown) => {
        assert.ok(err instanceof OscError);
        assert.equal(err.message, 'Bundle of 64 bytes exceeds max message size 32');
        return true;
      });
    });
  });
});

// --- Server ---

describe('Server', () => {
  it('should validate its endpoint', () => {
    assert.throws(() => new Server(70000), isCode('AddressError'));
    assert.throws(() => new Server('', 'unix'), isCode('AddressError'));
  });

  it('should report the requested endpoint before starting', () => {
    const server = new Server(9000);
    assert.equal(server.port(), 9000);
    assert.equal(server.url(), 'osc.udp://127.0.0.1:9000/');
    assert.equal(new Server(9000, 'udp', { host: '::' }).url(), 'osc.udp://[::1]:9000/');
    assert.equal(server.isListening(), false);
  });

  it('should build from URLs', () => {
    assert.equal(Server.fromUrl('osc.udp://127.0.0.1:0/').url(), 'osc.udp://127.0.0.1:0/');
    assert.equal(Server.fromUrl('osc.tcp://0.0.0.0:9100/').url(), 'osc.tcp://127.0.0.1:9100/');
    const unix = Server.fromUrl('osc.unix:///tmp/osc-from-url.sock/');
    assert.equal(unix.protocol, 'unix');
    assert.equal(unix.url(), 'osc.unix:///tmp/osc-from-url.sock/');
    assert.throws(() => Server.fromUrl('http://127.0.0.1:9000/'), isCode('AddressError'));
  });

  it('should only accept multicast groups over UDP', () => {
    assert.throws(() => Server.multicast('10.0.0.1', 9000), isCode('AddressError'));
    assert.throws(() => Server.multicast('example.com', 9000), isCode('AddressError'));
    assert.throws(() => new Server(9000, 'tcp', { multicastGroup: '239.255.0.1' }), isCode('AddressError'));
    assert.equal(Server.multicast('239.255.0.1', 9000).url(), 'osc.udp://239.255.0.1:9000/');
    assert.equal(Server.multicast('ff02::1', 9000).url(), 'osc.udp://[ff02::1]:9000/');
  });

  it('should not wait when it is not listening', async () => {
    const server = new Server(0);
    assert.equal(await server.receive(), false);
  });

  describe('udp', () => {
    it('should receive and dispatch a message', async () => {
      const server = new Server(0, 'udp', { host: '127.0.0.1' });
      let listening = false;
      server.on('listening', () => { listening = true; });
      await server.start();
      const target = new Address('127.0.0.1', server.port(), 'udp');
      try {
        assert.equal(listening, true);
        assert.notEqual(server.port(), 0);
        assert.equal(server.url(), `osc.udp://127.0.0.1:${server.port()}/`);

        const seen: Array<[number, string]> = [];
        server.addMethod('/ping', 'i', (msg, source) => { seen.push([msg.getArgument(0).asInt32(), source]); });

        await target.send(new Message('/ping').addInt32(5));
        assert.equal(await server.receive(2000), true);

        assert.equal(seen.length, 1);
        assert.equal(seen[0][0], 5);
        assert.ok(seen[0][1].startsWith('127.0.0.1:'));
        assert.equal(target.isConnected(), true);
        assert.equal(target.getStats().packetsSent, 1);
        assert.equal(server.getStats().packetsReceived, 1);
        assert.equal(server.hasPendingMessages(), false);
      } finally {
        await target.close();
        await server.close();
      }
    });

    it('should be reachable at its own URL when bound to every interface', async () => {
      const server = new Server(0);
      await server.start();
      const target = Address.fromUrl(server.url());
      try {
        assert.equal(server.url(), `osc.udp://127.0.0.1:${server.port()}/`);
        await target.send(new Message('/wildcard'));
        assert.equal(await server.receive(2000), true);
      } finally {
        await target.close();
        await server.close();
      }
    });

    it('should join its multicast group and still receive unicast', async () => {
      const addMembership = mock.method(dgram.Socket.prototype, 'addMembership', (_group: string, _iface?: string) => undefined);
      const server = Server.multicast('239.255.0.1', 0);
      try {
        await server.start();
        assert.equal(addMembership.mock.callCount(), 1);
        assert.equal(addMembership.mock.calls[0].arguments[0], '239.255.0.1');
        assert.equal(server.url(), `osc.udp://239.255.0.1:${server.port()}/`);

        const target = new Address('127.0.0.1', server.port(), 'udp');
        try {
          await target.send(new Message('/group'));
          assert.equal(await server.receive(2000), true);
        } finally {
          await target.close();
        }
      } finally {
        await server.close();
        addMembership.mock.restore();
      }
    });

    it('should fail to start when the group cannot be joined', async () => {
      const addMembership = mock.method(dgram.Socket.prototype, 'addMembership', () => {
        throw new Error('addMembership EADDRNOTAVAIL');
      });
      const server = Server.multicast('239.255.0.2', 0);
      try {
        await assert.rejects(
          server.start(),
          (err: unknown) =>
            err instanceof OscError &&
            err.code === 'SocketError' &&
            err.message === 'Cannot join multicast group 239.255.0.2: addMembership EADDRNOTAVAIL',
        );
        assert.equal(server.isListening(), false);
      } finally {
        addMembership.mock.restore();
      }
    });

    it('should report an undecodable datagram and keep running', async () => {
      const server = new Server(0, 'udp', { host: '127.0.0.1' });
      await server.start();
      const errors = collectErrors(server);
      const target = new Address('127.0.0.1', server.port(), 'udp');
      try {
        await target.send(Buffer.from('garbage!'));
        assert.equal(await server.receive(2000), false);
        assert.equal(errors.length, 1);
        assert.equal(errors[0].code, 'AddressError');
        assert.ok(errors[0].source.startsWith('127.0.0.1:'));

        await target.send(new Message('/ok'));
        assert.equal(await server.receive(2000), true);
        assert.equal(server.getStats().errors, 1);
      } finally {
        await target.close();
        await server.close();
      }
    });

    it('should drop datagrams above the size limit', async () => {
      const server = new Server(0, 'udp', { host: '127.0.0.1', maxMessageSize: 16 });
      await server.start();
      const reported = nextError(server);
      const target = new Address('127.0.0.1', server.port(), 'udp');
      try {
        await target.send(Buffer.alloc(24));
        const error = await reported;
        assert.equal(error.code, 'MessageTooLarge');
        assert.equal(error.message, 'Dropped 24-byte datagram, max 16');
        assert.equal(server.hasPendingMessages(), false);
      } finally {
        await target.close();
        await server.close();
      }
    });

    it('should time out and be interruptible', async () => {
      const server = new Server(0, 'udp', { host: '127.0.0.1' });
      await server.start();
      try {
        assert.equal(await server.receive(20), false);

        const pending = server.receive();
        server.interrupt();
        assert.equal(await pending, false);
      } finally {
        await server.close();
      }
    });

    it('should wake pending receivers on close', async () => {
      const server = new Server(0, 'udp', { host: '127.0.0.1' });
      await server.start();
      const pending = server.receive();
      await server.close();
      assert.equal(await pending, false);
      assert.equal(server.isListening(), false);
    });
  });

  describe('tcp', () => {
    it('should receive framed messages in order over one connection', async () => {
      const server = new Server(0, 'tcp', { host: '127.0.0.1' });
      await server.start();
      const target = new Address('127.0.0.1', server.port(), 'tcp');
      try {
        const seen: number[] = [];
        server.addMethod('/n', 'i', (msg) => { seen.push(msg.getArgument(0).asInt32()); });

        for (const n of [1, 2, 3]) {
          await target.send(new Message('/n').addInt32(n));
        }
        for (let i = 0; i < 3; i++) {
          assert.equal(await server.receive(2000), true);
        }
        assert.deepEqual(seen, [1, 2, 3]);
        assert.equal(server.connectionCount, 1);
        assert.equal(target.isConnected(), true);
      } finally {
        await target.close();
        await server.close();
      }
    });

    it('should dispatch bundles with their hooks', async () => {
      const server = new Server(0, 'tcp', { host: '127.0.0.1' });
      await server.start();
      const target = new Address('127.0.0.1', server.port(), 'tcp');
      try {
        const events: string[] = [];
        server.setBundleHandlers(
          (b) => { events.push(`start ${b.size}`); },
          () => { events.push('end'); },
        );
        server.addMethod('/mix/*', null, (msg) => { events.push(msg.getPath()); });

        const bundle = new Bundle(new TimeTag(3_900_000_000, 0))
          .addMessage(new Message('/mix/a').addFloat(0.25))
          .addMessage(new Message('/mix/b').addString('on'));
        await target.send(bundle);
        assert.equal(await server.receive(2000), true);
        assert.deepEqual(events, ['start 2', '/mix/a', '/mix/b', 'end']);
      } finally {
        await target.close();
        await server.close();
      }
    });

    it('should report a peer that hangs up mid-frame', async () => {
      const server = new Server(0, 'tcp', { host: '127.0.0.1' });
      await server.start();
      const reported = nextError(server);
      const client = net.createConnection({ host: '127.0.0.1', port: server.port() });
      client.on('error', () => undefined);
      try {
        await once(client, 'connect');
        client.end(encodeFrame(new Message('/cut').serialize()).subarray(0, 7));

        const error = await reported;
        assert.equal(error.code, 'NetworkError');
        assert.equal(error.message, 'Connection closed mid-frame with 7 bytes pending');
      } finally {
        client.destroy();
        await server.close();
      }
    });

    it('should close a connection that announces an oversized frame', async () => {
      const server = new Server(0, 'tcp', { host: '127.0.0.1' });
      await server.start();
      const reported = nextError(server);
      const client = net.createConnection({ host: '127.0.0.1', port: server.port() });
      client.on('error', () => undefined);
      try {
        await once(client, 'connect');
        const closed = new Promise<void>((resolve) => client.once('close', () => resolve()));
        client.write(Buffer.from([0x00, 0x0f, 0x42, 0x40]));

        const error = await reported;
        assert.equal(error.code, 'MalformedPacket');
        assert.ok(error.message.endsWith('; closing connection'));
        await closed;
      } finally {
        client.destroy();
        await server.close();
      }
    });

    it('should fail to send when nothing is listening', async () => {
      const server = new Server(0, 'tcp', { host: '127.0.0.1' });
      await server.start();
      const port = server.port();
      await server.close();

      const target = new Address('127.0.0.1', port, 'tcp');
      try {
        await assert.rejects(target.send(new Message('/x')), isCode('NetworkError'));
        assert.equal(target.getStats().errors > 0, true);
      } finally {
        await target.close();
      }
    });
  });

  describe('unix', () => {
    it('should receive over a socket file and remove it on close', async () => {
      const file = socketPath('roundtrip');
      const server = new Server(file, 'unix');
      await server.start();
      const target = Address.unix(file);
      try {
        assert.equal(server.url(), `osc.unix://${file}/`);
        assert.equal(fs.existsSync(file), true);

        const seen: string[] = [];
        server.addMethod('/path', 's', (msg, source) => { seen.push(`${msg.getArgument(0).asString()} ${source}`); });

        await target.send(new Message('/path').addString('hello'));
        assert.equal(await server.receive(2000), true);
        assert.deepEqual(seen, [`hello unix:${file}`]);
      } finally {
        await target.close();
        await server.close();
      }
      assert.equal(fs.existsSync(file), false);
    });

    it('should refuse to replace a file that is not a socket', async () => {
      const file = socketPath('regular');
      fs.writeFileSync(file, 'not a socket');
      try {
        const server = new Server(file, 'unix');
        await assert.rejects(server.start(), isCode('SocketError'));
        assert.equal(fs.readFileSync(file, 'utf8'), 'not a socket');
      } finally {
        fs.unlinkSync(file);
      }
    });
  });
});
