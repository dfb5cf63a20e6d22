/**
 * transports/websocket.ts
 *
 * MuxTransport over the `ws` client. The socket delivers each message as its
 * list of fragments, which are replayed to the client one frame at a time.
 */

import WebSocket, { RawData } from 'ws';
import { scopedLogger } from '../core/logger';
import { MuxTransport, TransportFactory, TransportFrame, TransportHandlers } from '../protocol/transport';

const log = scopedLogger('transports/websocket');

function toFragments(data: RawData): Buffer[] {
  if (Array.isArray(data)) return data;
  if (Buffer.isBuffer(data)) return [data];
  return [Buffer.from(data)];
}

export function toFrames(data: RawData, isBinary: boolean): TransportFrame[] {
  const fragments = toFragments(data);
  return fragments.map((fragment, i): TransportFrame => ({
    kind: i > 0 ? 'continuation' : isBinary ? 'binary' : 'text',
    data: fragment,
    final: i === fragments.length - 1
  }));
}

/**
 * Factory handed to MuxClient. `maxMessageBytes` is also enforced by the
 * socket itself through maxPayload.
 */
export function createWebSocketTransport(maxMessageBytes: number): TransportFactory {
  return (url: string, handlers: TransportHandlers): MuxTransport => {
    const socket = new WebSocket(url, { maxPayload: maxMessageBytes });
    socket.binaryType = 'fragments';

    socket.on('open', () => handlers.onOpen());
    socket.on('message', (data: RawData, isBinary: boolean) => {
      for (const frame of toFrames(data, isBinary)) handlers.onFrame(frame);
    });
    socket.on('close', (code: number, reason: Buffer) => handlers.onClose(code, reason.toString()));
    socket.on('error', (error: Error) => handlers.onError(error));

    return {
      send(text: string): void {
        if (socket.readyState !== WebSocket.OPEN) {
          log.debug({ readyState: socket.readyState }, 'Socket not open, dropping send');
          return;
        }
        socket.send(text);
      },
      close(): void {
        if (socket.readyState === WebSocket.CLOSED) return;
        if (socket.readyState === WebSocket.CONNECTING) {
          socket.terminate();
          return;
        }
        socket.close(1000, 'client closing');
      },
      pause: () => socket.pause(),
      resume: () => socket.resume()
    };
  };
}
