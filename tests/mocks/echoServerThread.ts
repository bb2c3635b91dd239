import { once } from 'node:events';
import { Worker } from 'node:worker_threads';
import { BYE_REPLY, DATA_REPLY, HOST, IDN_REPLY, UNKNOWN_REPLY } from './echoServer.js';

// Same protocol as EchoServer, for tests that block the main thread
const SOURCE = `
const net = require('node:net');
const { parentPort, workerData } = require('node:worker_threads');
const { replies, slowDelay, host } = workerData;

const sockets = new Set();
const timers = new Set();

const server = net.createServer((socket) => {
  sockets.add(socket);
  socket.on('close', () => sockets.delete(socket));
  socket.on('error', () => socket.destroy());

  let pending = '';
  socket.on('data', (chunk) => {
    pending += chunk.toString('latin1');
    let index = pending.indexOf('\\n');
    while (index !== -1) {
      const line = pending.slice(0, index).toLowerCase();
      pending = pending.slice(index + 1);
      index = pending.indexOf('\\n');

      if (line === '*slow?') {
        const timer = setTimeout(() => {
          timers.delete(timer);
          if (!socket.destroyed) socket.write(replies.idn);
        }, slowDelay);
        timers.add(timer);
      } else if (line === 'bye') {
        socket.end(replies.bye);
      } else if (line === '*idn?') {
        socket.write(replies.idn);
      } else if (line === 'data?') {
        socket.write(replies.data);
      } else {
        socket.write(replies.unknown);
      }
    }
  });
});

parentPort.on('message', (message) => {
  if (message === 'drop') {
    for (const socket of sockets) socket.destroy();
    parentPort.postMessage('dropped');
  } else if (message === 'close') {
    for (const timer of timers) clearTimeout(timer);
    for (const socket of sockets) socket.destroy();
    server.close(() => process.exit(0));
  }
});

server.listen(0, host, () => parentPort.postMessage(server.address().port));
`;

/**
 * Loopback request/reply peer running on its own thread, so it keeps
 * answering while the main thread sits in a blocking bridge call
 */
export class EchoServerThread {
  private constructor(
    private readonly worker: Worker,
    readonly port: number
  ) {}

  static async start(slowDelay = 200): Promise<EchoServerThread> {
    const worker = new Worker(SOURCE, {
      eval: true,
      workerData: {
        host: HOST,
        slowDelay,
        replies: { idn: IDN_REPLY, data: DATA_REPLY, bye: BYE_REPLY, unknown: UNKNOWN_REPLY },
      },
    });
    const [port]: unknown[] = await once(worker, 'message');
    if (typeof port !== 'number') {
      throw new Error('peer thread did not report its port');
    }
    return new EchoServerThread(worker, port);
  }

  /**
   * Abruptly close every client connection; the server keeps listening
   */
  async dropConnections(): Promise<void> {
    const dropped = once(this.worker, 'message');
    this.worker.postMessage('drop');
    await dropped;
  }

  async close(): Promise<void> {
    const exited = once(this.worker, 'exit');
    this.worker.postMessage('close');
    await exited;
  }
}
