import { createConnection, type Socket } from 'node:net';
import type { AckMessage, NodeAddress, WireMessage } from '../types/pipeline.js';
import type { TransportConfig } from '../types/config.js';
import { CapacityExceededError, TransportError, UnavailablePeerError } from '../types/errors.js';
import { FrameDecoder, decodePayload, encodeFrame } from './framing.js';

export interface ReadOptions {
  timeoutMs: number;
  maxFrameBytes: number;
}

export function writeMessage(socket: Socket, message: WireMessage): Promise<void> {
  if (socket.destroyed || !socket.writable) {
    return Promise.reject(new TransportError('Cannot write to a closed connection'));
  }

  const frame = encodeFrame(message);
  return new Promise<void>((resolve, reject) => {
    socket.write(frame, (err) => {
      if (err) {
        reject(new TransportError('Write interrupted', { cause: err }));
        return;
      }
      resolve();
    });
  });
}

export function readMessage(socket: Socket, options: ReadOptions): Promise<WireMessage> {
  return new Promise<WireMessage>((resolve, reject) => {
    const decoder = new FrameDecoder(options.maxFrameBytes);
    let settled = false;

    const finish = (outcome: { message: WireMessage } | { error: TransportError }): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.off('data', onData);
      socket.off('end', onEnd);
      socket.off('close', onEnd);
      socket.off('error', onError);
      if ('message' in outcome) {
        resolve(outcome.message);
      } else {
        reject(outcome.error);
      }
    };

    const onData = (chunk: Buffer): void => {
      try {
        const [payload] = decoder.push(chunk);
        if (payload) {
          finish({ message: decodePayload(payload) });
        }
      } catch (err) {
        finish({ error: err instanceof TransportError ? err : new TransportError('Malformed frame', { cause: err }) });
      }
    };

    const onEnd = (): void => {
      const detail = decoder.pendingBytes > 0 ? `truncated frame (${decoder.pendingBytes} bytes buffered)` : 'no frame';
      finish({ error: new TransportError(`Connection closed with ${detail}`) });
    };

    const onError = (err: Error): void => {
      finish({ error: new TransportError('Connection reset', { cause: err }) });
    };

    const timer = setTimeout(() => {
      finish({ error: new TransportError(`No complete frame within ${options.timeoutMs}ms`) });
    }, options.timeoutMs);

    socket.on('data', onData);
    socket.on('end', onEnd);
    socket.on('close', onEnd);
    socket.on('error', onError);
  });
}

function connect(peerId: string, address: NodeAddress, timeoutMs: number): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = createConnection({ host: address.host, port: address.port });
    const timer = setTimeout(() => {
      socket.destroy();
      reject(new UnavailablePeerError(peerId, 'unreachable'));
    }, timeoutMs);

    socket.once('connect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      resolve(socket);
    });
    const onError = (err: Error): void => {
      clearTimeout(timer);
      socket.destroy();
      reject(new UnavailablePeerError(peerId, 'unreachable', { cause: err }));
    };
    socket.once('error', onError);
  });
}

/**
 * Delivers one message over a short-lived connection and waits for the peer's ACK.
 * A rejecting ACK surfaces as CapacityExceededError or UnavailablePeerError; nothing is retried here.
 */
export async function sendMessage(
  peerId: string,
  address: NodeAddress,
  message: WireMessage,
  transport: TransportConfig,
): Promise<AckMessage> {
  const socket = await connect(peerId, address, transport.ackTimeoutMs);
  // Late resets after the ACK has been read are not interesting to the caller.
  socket.on('error', () => undefined);

  try {
    await writeMessage(socket, message);

    let reply: WireMessage;
    try {
      reply = await readMessage(socket, { timeoutMs: transport.ackTimeoutMs, maxFrameBytes: transport.maxFrameBytes });
    } catch (err) {
      throw new UnavailablePeerError(peerId, 'no_ack', { cause: err });
    }

    if (reply.kind !== 'ACK') {
      throw new TransportError(`Expected ACK from ${peerId}, received ${reply.kind}`);
    }
    if (!reply.accepted) {
      if (reply.reason === 'capacity') {
        throw new CapacityExceededError(peerId, undefined, 'rejected by peer');
      }
      throw new UnavailablePeerError(peerId, 'rejected');
    }
    return reply;
  } finally {
    socket.destroy();
  }
}
