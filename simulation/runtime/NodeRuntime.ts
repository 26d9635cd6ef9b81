import { createServer, type Server, type Socket } from 'node:net';
import type { NodeAddress, WireMessage } from '../types/pipeline.js';
import type { TransportConfig } from '../types/config.js';
import { readMessage, writeMessage } from '../transport/connection.js';
import type { Logger } from '../utils/log.js';
import { describeError } from '../utils/random.js';

export type MessageHandler = (message: WireMessage) => Promise<WireMessage | null>;

function delay(ms: number): { promise: Promise<void>; cancel: () => void } {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const promise = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

/**
 * Accept loop for one node: each inbound connection carries a single framed message,
 * gets at most one reply, and is closed. Handler failures only cost that connection.
 */
export class NodeRuntime {
  private server: Server | null = null;

  private accepting = false;

  private readonly sockets = new Set<Socket>();

  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    readonly nodeId: string,
    private readonly handler: MessageHandler,
    private readonly transport: TransportConfig,
    private readonly log: Logger,
  ) {}

  listen(address: NodeAddress): Promise<NodeAddress> {
    if (this.server) {
      return Promise.reject(new Error(`${this.nodeId} is already listening`));
    }

    const server = createServer((socket) => this.handleConnection(socket));
    this.server = server;

    return new Promise<NodeAddress>((resolve, reject) => {
      const onListenError = (err: Error): void => {
        this.server = null;
        reject(err);
      };
      server.once('error', onListenError);
      server.listen(address.port, address.host, () => {
        server.off('error', onListenError);
        server.on('error', (err) => this.log.error(`server error: ${err.message}`));
        this.accepting = true;
        const bound = server.address();
        resolve({ host: address.host, port: bound !== null && typeof bound === 'object' ? bound.port : address.port });
      });
    });
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  async stop(gracePeriodMs: number): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.accepting = false;
    this.server = null;

    const closed = new Promise<void>((resolve) => server.close(() => resolve()));

    if (this.inFlight.size > 0) {
      const grace = delay(gracePeriodMs);
      await Promise.race([Promise.allSettled([...this.inFlight]), grace.promise]);
      grace.cancel();
    }

    for (const socket of this.sockets) {
      socket.destroy();
    }
    await closed;
  }

  private handleConnection(socket: Socket): void {
    if (!this.accepting) {
      socket.destroy();
      return;
    }

    this.sockets.add(socket);
    socket.on('error', (err) => this.log.debug(`connection error: ${err.message}`));
    socket.once('close', () => this.sockets.delete(socket));

    const task = this.serve(socket);
    this.inFlight.add(task);
    void task.then(() => this.inFlight.delete(task));
  }

  private async serve(socket: Socket): Promise<void> {
    try {
      const message = await readMessage(socket, {
        timeoutMs: this.transport.idleTimeoutMs,
        maxFrameBytes: this.transport.maxFrameBytes,
      });
      const reply = await this.handler(message);
      if (reply) {
        await writeMessage(socket, reply);
      }
      socket.end();
    } catch (err) {
      this.log.warn(`dropping connection: ${describeError(err)}`);
      socket.destroy();
    }
  }
}
