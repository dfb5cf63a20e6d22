/**
 * protocol/transport.ts
 *
 * What the client needs from a message transport. The WebSocket adapter in
 * transports/websocket.ts implements it; tests drive a fake.
 */

export type FrameKind = 'text' | 'binary' | 'continuation';

export interface TransportFrame {
  kind: FrameKind;
  data: Buffer;
  /** Last fragment of the logical message. */
  final: boolean;
}

export interface TransportHandlers {
  onOpen(): void;
  onFrame(frame: TransportFrame): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

export interface MuxTransport {
  send(text: string): void;
  close(): void;
  /** Stop delivering frames until resume(). */
  pause(): void;
  resume(): void;
}

/** Opens a transport to `url`. Throws when none can be created. */
export type TransportFactory = (url: string, handlers: TransportHandlers) => MuxTransport;
