import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ReadEngine } from '../src/engine.js';
import { ConnectError, ConnectionClosedError, ConnectionLostError } from '../src/error.js';
import { delay, settle, waitForCondition } from './helpers.js';
import { BYE_REPLY, EchoServer, HOST, IDN_REPLY } from './mocks/echoServer.js';

const EOL = Buffer.from('\n');

describe('ReadEngine', () => {
  let server: EchoServer;
  let engine: ReadEngine;

  beforeEach(async () => {
    server = new EchoServer();
    await server.listen();
  });

  afterEach(async () => {
    await engine.close();
    await server.close();
  });

  describe('open', () => {
    it('should connect and start receiving', async () => {
      engine = new ReadEngine({ host: HOST, port: server.port });
      expect(engine.connected).toBe(false);

      await engine.open();

      expect(engine.connected).toBe(true);
      expect(engine.address).toBe(`${HOST}:${server.port}`);
    });

    it('should not open twice', async () => {
      engine = new ReadEngine({ host: HOST, port: server.port });
      await engine.open();

      await expect(engine.open()).rejects.toBeInstanceOf(ConnectError);
    });

    it('should fail with ConnectError when nothing listens', async () => {
      const closed = new EchoServer();
      const port = await closed.listen();
      await closed.close();

      engine = new ReadEngine({ host: HOST, port });
      const error = await settle(engine.open());

      expect(error).toBeInstanceOf(ConnectError);
      expect(error).toMatchObject({ code: 'CONNECT_FAILED', timedOut: false });
    });
  });

  describe('reads', () => {
    beforeEach(async () => {
      engine = new ReadEngine({ host: HOST, port: server.port });
      await engine.open();
      await waitForCondition(() => server.connections === 1);
    });

    it('should read a reply line', async () => {
      await engine.write(Buffer.from('*idn?\n'));

      const line = await engine.readLine(EOL);

      expect(line.toString()).toBe(IDN_REPLY);
    });

    it('should read consecutive lines', async () => {
      await engine.write(Buffer.from('*idn?\nwhat\n'));

      const lines = await engine.readLines(2, EOL);

      expect(lines.map(String)).toEqual([IDN_REPLY, 'ERROR: unknown command\n']);
    });

    it('should frame blocks with readUntil and readExactly', async () => {
      await engine.write(Buffer.from('data?\n'));

      const header = await engine.readUntil(Buffer.from(';'), true);
      const block = await engine.readExactly(10);
      const rest = await engine.readLine(EOL);

      expect(header.toString()).toBe('#10');
      expect(block.toString()).toBe('0123456789');
      expect(rest.toString()).toBe('\n');
    });

    it('should find a separator split across chunks', async () => {
      const pending = engine.readUntil(Buffer.from('\r\n'));
      server.push('first\r');
      await waitForCondition(() => engine.inWaiting === 6);
      server.push('\nsecond');

      const chunk = await pending;

      expect(chunk.toString()).toBe('first\r\n');
      await waitForCondition(() => engine.inWaiting === 6);
      expect(engine.readAvailable().toString()).toBe('second');
    });

    it('should return at most n bytes from read(n)', async () => {
      server.push('abcdef');
      await waitForCondition(() => engine.inWaiting === 6);

      expect((await engine.read(4)).toString()).toBe('abcd');
      expect((await engine.read(4)).toString()).toBe('ef');
      expect(await engine.read(0)).toHaveLength(0);
    });

    it('should read everything until EOF with read()', async () => {
      await engine.write(Buffer.from('*idn?\nbye\n'));

      const all = await engine.read();

      expect(all.toString()).toBe(IDN_REPLY + BYE_REPLY);
      expect(engine.connected).toBe(false);
    });

    it('should drain and discard buffered bytes', async () => {
      server.push('stale\n');
      await waitForCondition(() => engine.inWaiting === 6);

      engine.reset();

      expect(engine.inWaiting).toBe(0);
      expect(engine.readAvailable()).toHaveLength(0);
    });

    it('should read a line longer than the receive limit', async () => {
      await engine.close();
      engine = new ReadEngine({ host: HOST, port: server.port }, { limit: 8 });
      await engine.open();
      await waitForCondition(() => server.connections === 2 && server.openConnections === 1);

      const payload = `${'x'.repeat(100)}\n`;
      server.push(payload);

      const line = await engine.readLine(EOL);

      expect(line.toString()).toBe(payload);
    });

    describe('with the receive side paused', () => {
      beforeEach(async () => {
        await engine.close();
        engine = new ReadEngine({ host: HOST, port: server.port }, { limit: 4 });
        await engine.open();
        await waitForCondition(() => server.connections === 2 && server.openConnections === 1);

        server.push('abcdefgh');
        await waitForCondition(() => engine.inWaiting >= 4);
        server.finish('ij\n');
        await delay(50);
      });

      it('should return a line completed by the bytes sent before EOF', async () => {
        const line = await engine.readLine(EOL);

        expect(line.toString()).toBe('abcdefghij\n');
        const error = await settle(engine.readLine(EOL));
        expect(error).toBeInstanceOf(ConnectionClosedError);
        expect(error).toMatchObject({ reason: 'eof' });
      });

      it('should return a block completed by the bytes sent before EOF', async () => {
        const block = await engine.readExactly(11);

        expect(block.toString()).toBe('abcdefghij\n');
        await waitForCondition(() => engine.terminalCondition !== null);
        expect(engine.terminalCondition).toEqual({ kind: 'eof' });
      });
    });

    it('should reject with the abort reason and stay connected', async () => {
      const abort = new AbortController();
      const pending = settle(engine.readLine(EOL, abort.signal));

      abort.abort(new Error('gave up'));

      expect(await pending).toMatchObject({ message: 'gave up' });
      expect(engine.connected).toBe(true);
    });
  });

  describe('termination', () => {
    it('should report EOF once and fail later reads', async () => {
      const onTerminal = vi.fn();
      engine = new ReadEngine({ host: HOST, port: server.port }, { onTerminal });
      await engine.open();

      await engine.write(Buffer.from('bye\n'));
      expect((await engine.readLine(EOL)).toString()).toBe(BYE_REPLY);

      const error = await settle(engine.readLine(EOL));
      await engine.settled();

      expect(error).toBeInstanceOf(ConnectionClosedError);
      expect(error).toMatchObject({ reason: 'eof' });
      expect(onTerminal).toHaveBeenCalledTimes(1);
      expect(onTerminal).toHaveBeenCalledWith({ kind: 'eof' });
      expect(engine.terminalCondition).toEqual({ kind: 'eof' });
      expect(engine.connected).toBe(false);
    });

    it('should report an I/O error once and fail the waiting read', async () => {
      const onTerminal = vi.fn();
      engine = new ReadEngine({ host: HOST, port: server.port }, { onTerminal });
      await engine.open();
      await waitForCondition(() => server.openConnections === 1);

      const pending = settle(engine.readLine(EOL));
      server.resetConnections();

      const error = await pending;
      await engine.settled();

      expect(error).toBeInstanceOf(ConnectionLostError);
      expect(error).toMatchObject({
        code: 'CONNECTION_LOST',
        cause: expect.objectContaining({ code: 'ECONNRESET' }),
      });
      expect(onTerminal).toHaveBeenCalledTimes(1);
      expect(onTerminal).toHaveBeenCalledWith({
        kind: 'error',
        cause: expect.objectContaining({ code: 'ECONNRESET' }),
      });
      expect(engine.connected).toBe(false);
    });

    it('should wake a waiting reader on local close', async () => {
      const onTerminal = vi.fn();
      engine = new ReadEngine({ host: HOST, port: server.port }, { onTerminal });
      await engine.open();

      const pending = settle(engine.readLine(EOL));
      await engine.close();

      const error = await pending;
      expect(error).toBeInstanceOf(ConnectionClosedError);
      expect(error).toMatchObject({ reason: 'local' });
      expect(onTerminal).not.toHaveBeenCalled();
    });

    it('should refuse writes after close', async () => {
      engine = new ReadEngine({ host: HOST, port: server.port });
      await engine.open();
      await engine.close();

      await expect(engine.write(Buffer.from('*idn?\n'))).rejects.toBeInstanceOf(
        ConnectionClosedError
      );
    });
  });
});
