import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { SyncBridge } from '../src/bridge/bridge.js';
import { AsyncTCPProxy, SyncTCPProxy, attachProxy } from '../src/bridge/proxy.js';
import { TCP } from '../src/controller.js';
import { BridgeDeadError, ConfigurationError, TimeoutError } from '../src/error.js';
import { socketForUrl } from '../src/url.js';
import { settle, waitForEvent } from './helpers.js';
import {
  DATA_REPLY,
  EchoServer,
  HOST,
  IDN_REPLY,
  IDN_REQUEST,
  UNKNOWN_REPLY,
  WRONG_REQUEST,
} from './mocks/echoServer.js';
import { EchoServerThread } from './mocks/echoServerThread.js';

describe('SyncBridge', () => {
  describe('configuration', () => {
    it('should reject invalid controller options before starting', () => {
      const bridge = new SyncBridge();

      expect(() => bridge.proxy({ host: '', port: 5025 })).toThrow(ConfigurationError);
      expect(() => bridge.proxy('udp://localhost:5025')).toThrow(ConfigurationError);
      expect(bridge.running).toBe(false);
    });

    it('should reject invalid bridge options', () => {
      expect(() => new SyncBridge({ bridgeTimeout: 0 })).toThrow(ConfigurationError);
    });

    it('should stop cleanly when never started', async () => {
      await new SyncBridge().stop();
    });
  });

  describe('async proxies', () => {
    let server: EchoServer;
    let bridge: SyncBridge;
    let proxy: AsyncTCPProxy;

    beforeEach(async () => {
      server = new EchoServer();
      await server.listen();
      bridge = new SyncBridge();
      proxy = bridge.proxy({ host: HOST, port: server.port }, { mode: 'async' });
    });

    afterEach(async () => {
      await bridge.stop();
      await server.close();
    });

    it('should produce the same replies as a direct controller', async () => {
      const direct = new TCP({ host: HOST, port: server.port });
      const requests = [IDN_REQUEST, WRONG_REQUEST, IDN_REQUEST];

      const viaBridge: string[] = [];
      const viaDirect: string[] = [];
      for (const request of requests) {
        viaBridge.push((await proxy.writeThenReadLine(request)).toString());
        viaDirect.push((await direct.writeThenReadLine(request)).toString());
      }
      await direct.close();

      expect(viaBridge).toEqual([IDN_REPLY, UNKNOWN_REPLY, IDN_REPLY]);
      expect(viaBridge).toEqual(viaDirect);
    });

    it('should forward connection state', async () => {
      expect(proxy).toBeInstanceOf(AsyncTCPProxy);
      expect(await proxy.connected()).toBe(false);

      await proxy.open();

      expect(await proxy.connected()).toBe(true);
      expect(await proxy.connectionCounter).toBe(1);
      expect(await proxy.inWaiting()).toBe(0);
      expect(proxy.toString()).toBe(`AsyncTCPProxy(${HOST}:${server.port})`);
    });

    it('should accept a URL', async () => {
      const byUrl = bridge.proxy(`tcp://${HOST}:${server.port}`, { mode: 'async' });

      expect((await byUrl.writeThenReadLine(IDN_REQUEST)).toString()).toBe(IDN_REPLY);
    });

    it('should re-emit controller events', async () => {
      const connected = waitForEvent(proxy, 'connected', 5000);

      await proxy.open();

      await connected;
    });

    it('should rebuild errors with their class and message', async () => {
      const error = await settle(proxy.writeThenReadLine('*slow?\n', { timeout: 90 }));

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({
        message: `writeThenReadLine call timeout on '${HOST}:${server.port}' after 90ms`,
      });
      expect(await proxy.connected()).toBe(true);
      expect((await proxy.readLine({ timeout: 1000 })).toString()).toBe(IDN_REPLY);
    });

    it('should frame blocks', async () => {
      const lines = await proxy.writeThenReadLines('data?\n', 1);
      await proxy.write('data?\n');
      const header = await proxy.readUntil(';', { strip: true });
      const block = await proxy.readExactly(10);
      const rest = await proxy.readLine();

      expect(lines.map(String)).toEqual([DATA_REPLY]);
      expect(header.toString()).toBe('#10');
      expect(block.toString()).toBe('0123456789');
      expect(rest.toString()).toBe('\n');
    });

    it('should iterate lines held on the bridge thread', async () => {
      await proxy.writeLines([IDN_REQUEST, WRONG_REQUEST]);

      const lines: string[] = [];
      for await (const line of proxy) {
        lines.push(line.toString());
        if (lines.length === 2) {
          break;
        }
      }

      expect(lines).toEqual([IDN_REPLY, UNKNOWN_REPLY]);
      expect((await proxy.writeThenReadLine(IDN_REQUEST)).toString()).toBe(IDN_REPLY);
    });

    it('should share one controller between proxies', async () => {
      await proxy.open();

      const other = attachProxy(bridge.share(proxy), { mode: 'async' });

      expect(other.id).toBe(proxy.id);
      expect(await other.connectionCounter).toBe(1);
      expect((await other.writeThenReadLine(IDN_REQUEST)).toString()).toBe(IDN_REPLY);
      expect(server.connections).toBe(1);
    });

    it('should refuse to share a proxy of another bridge', () => {
      const other = new SyncBridge();

      expect(() => other.share(proxy)).toThrow(ConfigurationError);
    });

    it('should fail calls after detach', async () => {
      proxy.detach();

      expect(proxy.alive).toBe(false);
      await expect(proxy.connected()).rejects.toBeInstanceOf(BridgeDeadError);
    });

    it('should fail every call once stopped', async () => {
      await proxy.open();

      await bridge.stop();

      expect(bridge.running).toBe(false);
      expect(proxy.alive).toBe(false);
      await expect(proxy.readLine()).rejects.toBeInstanceOf(BridgeDeadError);
    });

    it('should start a new thread after a stop', async () => {
      await proxy.open();
      await bridge.stop();

      const next = bridge.proxy({ host: HOST, port: server.port }, { mode: 'async' });

      expect((await next.writeThenReadLine(IDN_REQUEST)).toString()).toBe(IDN_REPLY);
      expect(bridge.running).toBe(true);
    });
  });

  describe('sync proxies', () => {
    let peer: EchoServerThread;
    let bridge: SyncBridge;
    let proxy: SyncTCPProxy;

    beforeAll(async () => {
      peer = await EchoServerThread.start();
    });

    afterAll(async () => {
      await peer.close();
    });

    beforeEach(() => {
      bridge = new SyncBridge({ bridgeTimeout: 50 });
      proxy = bridge.proxy({ host: HOST, port: peer.port });
    });

    afterEach(async () => {
      await bridge.stop();
    });

    it('should return resolved values', () => {
      expect(proxy).toBeInstanceOf(SyncTCPProxy);

      const reply = proxy.writeThenReadLine(IDN_REQUEST);

      expect(Buffer.isBuffer(reply)).toBe(true);
      expect(reply.toString()).toBe(IDN_REPLY);
      expect(proxy.connected()).toBe(true);
      expect(proxy.connectionCounter).toBe(1);
    });

    it('should keep replies in order over many calls', () => {
      for (let i = 0; i < 20; i++) {
        const request = i % 2 === 0 ? IDN_REQUEST : WRONG_REQUEST;
        const expected = i % 2 === 0 ? IDN_REPLY : UNKNOWN_REPLY;

        expect(proxy.writeThenReadLine(request).toString()).toBe(expected);
      }
      expect(proxy.connectionCounter).toBe(1);
    });

    it('should reconnect after the peer drops the connection', async () => {
      expect(proxy.writeThenReadLine(IDN_REQUEST).toString()).toBe(IDN_REPLY);

      await peer.dropConnections();
      // The bridge thread notices the drop on its own event loop
      const deadline = Date.now() + 1000;
      while (proxy.connected() && Date.now() < deadline) {
        await new Promise((resolve) => setTimeout(resolve, 10));
      }

      expect(proxy.writeThenReadLine(IDN_REQUEST).toString()).toBe(IDN_REPLY);
      expect(proxy.connectionCounter).toBe(2);
    });

    it('should throw rebuilt errors', () => {
      expect(() => proxy.writeThenReadLine('*slow?\n', { timeout: 90 })).toThrow(TimeoutError);
      expect(proxy.connected()).toBe(true);
      expect(proxy.readLine({ timeout: 1000 }).toString()).toBe(IDN_REPLY);
    });

    it('should read several lines', () => {
      const replies = proxy.writeLinesThenReadLines([IDN_REQUEST, WRONG_REQUEST]);

      expect(replies.map(String)).toEqual([IDN_REPLY, UNKNOWN_REPLY]);
    });

    it('should iterate lines', () => {
      proxy.writeLines([WRONG_REQUEST, IDN_REQUEST]);

      const lines: string[] = [];
      for (const line of proxy) {
        lines.push(line.toString());
        if (lines.length === 2) {
          break;
        }
      }

      expect(lines).toEqual([UNKNOWN_REPLY, IDN_REPLY]);
    });

    it('should be created from a URL', () => {
      const byUrl = socketForUrl(`tcp://${HOST}:${peer.port}`, { concurrency: 'sync', bridge });

      expect(byUrl).toBeInstanceOf(SyncTCPProxy);
      expect(byUrl.writeThenReadLine(IDN_REQUEST).toString()).toBe(IDN_REPLY);
    });

    it('should throw BridgeDeadError once stopped', async () => {
      proxy.open();

      await bridge.stop();

      expect(() => proxy.readLine()).toThrow(BridgeDeadError);
    });
  });
});
