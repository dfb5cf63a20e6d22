/**
 * protocol/client.ts
 *
 * MuxClient: the connection to the input-multiplexing server.
 *
 * Lifecycle:   initialized → connecting → open → disconnected (→ connecting on reconnect)
 * Inbound:     frames → FrameAssembler → decodeMessage → handler by exact type → observers
 * Outbound:    login on open, pong on ping, logout on close, roster/capture requests
 *
 * Knows nothing about ownership or windows; that lives in the controller.
 */

import { ClientIdentity, ConnectionState, MuxObserver, UserInfo } from '../core/types';
import {
  BridgeBaseError,
  LoginRejectedError,
  MalformedMessageError,
  MissingFieldError,
  ProtocolViolationError,
  TransportUnavailableError
} from '../core/errors';
import { scopedLogger } from '../core/logger';
import { FrameAssembler } from './frame_assembler';
import { MuxTransport, TransportFactory, TransportFrame } from './transport';
import {
  MessageType,
  REQUEST_SUFFIX,
  WireMessage,
  captureReleaseRequest,
  captureRequest,
  decodeMessage,
  intField,
  isRecord,
  loginRequest,
  logoutRequest,
  pongRequest,
  stringField,
  userListRequest,
  validateButton,
  validateKeyboard,
  validatePointer,
  validateWheel
} from './messages';

const log = scopedLogger('protocol/client');

const PREVIEW_CHARS = 100;

export interface MuxClientOptions {
  serverUrl: string;
  maxMessageBytes: number;
  clientIdentity: ClientIdentity;
  transportFactory: TransportFactory;
}

type MessageHandler = (message: WireMessage) => void;

export class MuxClient {
  private state: ConnectionState = 'initialized';
  private transport: MuxTransport | null = null;
  private session = 0;
  private readonly assembler: FrameAssembler;
  private readonly observers = new Set<MuxObserver>();
  private readonly handlers: Map<string, MessageHandler>;

  constructor(private readonly options: MuxClientOptions) {
    this.assembler = new FrameAssembler(options.maxMessageBytes);
    this.handlers = new Map<string, MessageHandler>([
      [MessageType.Motion,         m => this.handleMotion(m)],
      [MessageType.Button,         m => this.handleButton(m)],
      [MessageType.Wheel,          m => this.handleWheel(m)],
      [MessageType.KeyboardKey,    m => this.handleKeyboardKey(m)],
      [MessageType.UserList,       m => this.handleUserList(m)],
      [MessageType.UserCreate,     m => this.handleUserCreate(m)],
      [MessageType.UserDispose,    m => this.handleUserDispose(m)],
      [MessageType.UserChanged,    m => this.handleUserChanged(m)],
      [MessageType.Ping,           () => this.send(pongRequest())],
      [MessageType.ServerShutdown, m => this.handleServerShutdown(m)],
      [MessageType.TimeoutWarning, m => this.handleTimeoutWarning(m)],
      [MessageType.TimeoutStopped, m => this.handleTimeoutStopped(m)]
    ]);
  }

  addObserver(observer: MuxObserver): void {
    this.observers.add(observer);
  }

  removeObserver(observer: MuxObserver): void {
    this.observers.delete(observer);
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'open';
  }

  // -------------------------------------------------------------------------
  // Connection lifecycle
  // -------------------------------------------------------------------------

  /**
   * Starts connecting. Returns false when no transport could be opened; the
   * client is then disconnected and may be retried.
   */
  connect(): boolean {
    if (this.state === 'connecting' || this.state === 'open') {
      log.debug({ state: this.state }, 'Already connecting/connected');
      return true;
    }

    this.state = 'connecting';
    const session = ++this.session;
    const current = (): boolean => session === this.session;

    try {
      this.transport = this.options.transportFactory(this.options.serverUrl, {
        onOpen: () => { if (current()) this.handleOpen(); },
        onFrame: frame => { if (current()) this.handleFrame(frame); },
        onClose: (code, reason) => {
          if (!current()) return;
          log.info({ code, reason }, 'Transport closed');
          this.close();
        },
        onError: error => {
          if (!current()) return;
          log.error({ error: error.message }, 'Transport error');
          this.close();
        }
      });
    } catch (e) {
      const err = new TransportUnavailableError(this.options.serverUrl, (e as Error).message);
      log.error({ code: err.code, url: this.options.serverUrl }, err.message);
      this.session++;
      this.transport = null;
      this.state = 'disconnected';
      return false;
    }

    log.info({ url: this.options.serverUrl }, 'Connecting');
    return true;
  }

  disconnect(): void {
    this.close();
  }

  /**
   * Idempotent teardown shared by every close path. Sends a best-effort
   * logout when the session was open.
   */
  private close(): void {
    if (this.state === 'disconnected' || this.state === 'initialized') return;

    const wasOpen = this.state === 'open';
    if (wasOpen) {
      this.send(logoutRequest(this.options.clientIdentity, 'shutdown'));
    }

    this.state = 'disconnected';
    this.session++;
    const transport = this.transport;
    this.transport = null;
    this.assembler.reset();

    try {
      transport?.close();
    } catch (e) {
      log.warn({ error: (e as Error).message }, 'Transport close failed');
    }

    log.info({ wasOpen }, 'Disconnected');
    if (wasOpen) {
      this.notify(o => o.onConnectionStateChanged(false));
    }
  }

  private handleOpen(): void {
    if (this.state !== 'connecting') return;
    this.state = 'open';
    log.info('Connection open, logging in');
    this.send(loginRequest(this.options.clientIdentity));
    this.notify(o => o.onConnectionStateChanged(true));
  }

  // -------------------------------------------------------------------------
  // Outbound
  // -------------------------------------------------------------------------

  /** Serializes and sends. Ignored (false) unless the connection is open. */
  send(message: WireMessage): boolean {
    if (this.state !== 'open' || !this.transport) {
      log.debug({ type: message.type, state: this.state }, 'Not connected, message not sent');
      return false;
    }
    this.transport.send(JSON.stringify(message));
    return true;
  }

  requestUserList(): boolean {
    return this.send(userListRequest());
  }

  requestCapture(hwid: number): boolean {
    log.debug({ hwid }, 'Capture request');
    return this.send(captureRequest(hwid));
  }

  releaseCapture(hwid: number): boolean {
    log.debug({ hwid }, 'Capture release');
    return this.send(captureReleaseRequest(hwid));
  }

  // -------------------------------------------------------------------------
  // Inbound
  // -------------------------------------------------------------------------

  private handleFrame(frame: TransportFrame): void {
    const transport = this.transport;
    if (!transport) return;

    transport.pause();
    let text: string | null;
    try {
      text = this.assembler.push(frame);
    } catch (e) {
      if (!(e instanceof ProtocolViolationError)) throw e;
      log.error({ code: e.code, ...e.details }, e.message);
      this.close();
      return;
    }
    transport.resume();

    if (text !== null) this.processMessage(text);
  }

  /** Decodes and dispatches one complete logical message. */
  processMessage(text: string): void {
    try {
      this.dispatch(text);
    } catch (e) {
      if (e instanceof MalformedMessageError || e instanceof MissingFieldError) {
        log.warn({ code: e.code, ...e.details }, 'Message dropped');
        return;
      }
      if (e instanceof LoginRejectedError) {
        log.error({ code: e.code }, e.message);
        this.close();
        return;
      }
      if (e instanceof BridgeBaseError) {
        log.error({ code: e.code, ...e.details }, e.message);
        return;
      }
      throw e;
    }
  }

  private dispatch(text: string): void {
    const message = decodeMessage(text);
    if (!message) throw new MalformedMessageError(text.slice(0, PREVIEW_CHARS));

    // Echo of one of our own requests
    if (message.type.endsWith(REQUEST_SUFFIX) && typeof message.ok === 'boolean') {
      if (!message.ok) {
        log.warn({ type: message.type }, 'Server rejected request');
        if (message.type === MessageType.Login) throw new LoginRejectedError();
      }
      return;
    }

    const handler = this.handlers.get(message.type);
    if (!handler) {
      log.debug({ type: message.type }, 'Unhandled message type');
      return;
    }
    handler(message);
  }

  // --- pointer ---

  private handleMotion(message: WireMessage): void {
    if (!validatePointer(message)) {
      throw new MissingFieldError(message.type, validatePointer.errors ?? []);
    }
    const { hwid, x, y } = message;
    this.notify(o => o.onMouseMotion(hwid, x, y));
  }

  private handleButton(message: WireMessage): void {
    if (!validateButton(message)) {
      throw new MissingFieldError(message.type, validateButton.errors ?? []);
    }
    const { hwid, x, y, button } = message;
    log.debug({ hwid, button, x, y }, 'Button');
    this.notify(o => o.onMouseButton(hwid, x, y, button));
  }

  private handleWheel(message: WireMessage): void {
    if (!validateWheel(message)) {
      throw new MissingFieldError(message.type, validateWheel.errors ?? []);
    }
    const { hwid, x, y, delta } = message;
    const horizontal = message.horizontal ?? false;
    this.notify(o => o.onMouseWheel(hwid, x, y, delta, horizontal));
  }

  private handleKeyboardKey(message: WireMessage): void {
    if (!validateKeyboard(message)) {
      throw new MissingFieldError(message.type, validateKeyboard.errors ?? []);
    }
    const { hwid, vkey, scan, flags } = message;
    const kind = message.message;
    log.debug({ hwid, vkey, message: kind }, 'Key');
    this.notify(o => o.onKeyboardKey({ hwid, vkey, message: kind, scan, flags }));
  }

  // --- roster ---

  private handleUserList(message: WireMessage): void {
    const users = message.users;
    if (!Array.isArray(users)) {
      throw new MissingFieldError(message.type, ['users']);
    }

    const list: UserInfo[] = [];
    for (const entry of users) {
      if (!isRecord(entry)) continue;

      const info: UserInfo = {
        userId: intField(entry, 'id') ?? 0,
        name: stringField(entry, 'name') ?? '',
        hwidMouse: 0,
        hwidKeyboard: 0
      };

      const devices = Array.isArray(entry.devices) ? entry.devices : [];
      for (const device of devices) {
        if (!isRecord(device)) continue;
        const hwid = intField(device, 'hwid');
        const type = stringField(device, 'type');
        if (hwid === undefined || type === undefined) continue;
        if (type === 'pointer') info.hwidMouse = hwid;
        else if (type === 'keyboard') info.hwidKeyboard = hwid;
      }

      list.push(info);
    }

    log.debug({ users: list.length }, 'User list');
    this.notify(o => o.onUserList(list));
  }

  private handleUserCreate(message: WireMessage): void {
    const user: UserInfo = {
      userId: intField(message, 'userId') ?? 0,
      name: stringField(message, 'name') ?? '',
      hwidMouse: intField(message, 'hwid_ms') ?? 0,
      hwidKeyboard: intField(message, 'hwid_kb') ?? 0
    };
    log.debug({ ...user }, 'User created');
    this.notify(o => o.onUserCreated(user));
  }

  private handleUserDispose(message: WireMessage): void {
    const hwidMouse = intField(message, 'hwid_ms') ?? -1;
    const hwidKeyboard = intField(message, 'hwid_kb') ?? -1;
    log.debug({ hwidMouse, hwidKeyboard }, 'User disposed');
    this.notify(o => o.onUserDisposed(hwidMouse, hwidKeyboard));
  }

  private handleUserChanged(message: WireMessage): void {
    const action = stringField(message, 'action');
    switch (action) {
      case undefined:
        return;
      case 'create':
        this.handleUserCreate(message);
        return;
      case 'dispose':
        this.handleUserDispose(message);
        return;
      case 'map':
        // keyboard (re)mapped: the roster is stale, no local mutation
        this.requestUserList();
        return;
      default:
        log.debug({ action }, 'Unhandled user change');
    }
  }

  // --- server lifecycle ---

  private handleServerShutdown(message: WireMessage): void {
    log.info({ reason: stringField(message, 'reason') ?? 'unknown' }, 'Server shutdown');
    this.close();
  }

  private handleTimeoutWarning(message: WireMessage): void {
    const minutes = intField(message, 'minutes') ?? 0;
    log.warn({ minutes }, 'Session timeout warning');
    this.notify(o => o.onTimeoutWarning(minutes));
  }

  private handleTimeoutStopped(message: WireMessage): void {
    const reason = stringField(message, 'reason') ?? 'timeout';
    log.warn({ reason }, 'Session stopped');
    this.notify(o => o.onTimeoutStopped(reason));
    this.close();
  }

  private notify(fn: (observer: MuxObserver) => void): void {
    for (const observer of [...this.observers]) fn(observer);
  }
}
