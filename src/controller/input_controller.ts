/**
 * controller/input_controller.ts
 *
 * InputController: ownership arbitration and event injection.
 *
 * Consumes MuxClient observer callbacks, decides which device owns the host,
 * and forwards that device's pointer, wheel and keyboard input to the right
 * injection target. All state is touched only from the coordinating queue;
 * observer callbacks arriving from elsewhere are re-posted onto it.
 */

import {
  ButtonBits,
  ConnectionState,
  EventModifier,
  HeldButton,
  InjectionTarget,
  KeyboardKeyNotification,
  MouseButton,
  MuxObserver,
  NO_OWNER,
  OwnershipState,
  PendingMotion,
  Point,
  SessionConfig,
  SyntheticEvent,
  SyntheticMouseEvent,
  UserInfo,
  rectContains
} from '../core/types';
import { SerialTaskQueue } from '../core/serial_queue';
import { scopedLogger } from '../core/logger';
import { MuxClient } from '../protocol/client';
import { TransportFactory } from '../protocol/transport';
import { KeyMapper, modifiersFrom, windowsKeyMapper } from './keys';
import { PipelineWatchdog } from './pipeline_watchdog';
import { Roster } from './roster';
import { buildKeyEvent, buildMouseEvent, buildWheelEvent, place } from './synthesis';
import { RegisteredTarget, TargetHandle, TargetRegistry } from './target_registry';

const log = scopedLogger('controller/input_controller');

// ---------------------------------------------------------------------------
// Listener channels
// ---------------------------------------------------------------------------

export interface ControllerEvents {
  ownershipChanged: (hwid: number, name: string) => void;
  connectionChanged: (connected: boolean) => void;
  captureChanged: (captured: boolean) => void;
  timeoutWarning: (minutes: number) => void;
  timeoutStopped: (reason: string) => void;
}

export type ControllerEventKind = keyof ControllerEvents;

export interface KeyboardFilterEvent {
  vkey: number;
  code?: string;
  key?: string;
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  down: boolean;
  repeat: boolean;
}

/** Returns true to consume the key (no injection). */
export type KeyboardFilter = (event: KeyboardFilterEvent) => boolean;

export type ControllerSettings = Pick<
  SessionConfig,
  | 'serverUrl'
  | 'maxMessageBytes'
  | 'clientIdentity'
  | 'motionIntervalMs'
  | 'rosterRefreshIntervalMs'
  | 'stuckPipelineMs'
  | 'wheelDeltaScale'
  | 'ownershipClaimPolicy'
>;

export interface InputControllerDeps {
  queue: SerialTaskQueue;
  transportFactory: TransportFactory;
  keyMapper?: KeyMapper;
  now?: () => number;
}

/** Wire button bits in the order they are applied. */
const BUTTON_TRANSITIONS: Array<{ bit: number; type: 'mouseDown' | 'mouseUp'; button: MouseButton; held: number }> = [
  { bit: ButtonBits.LeftDown,   type: 'mouseDown', button: 'left',   held: HeldButton.Left },
  { bit: ButtonBits.LeftUp,     type: 'mouseUp',   button: 'left',   held: HeldButton.Left },
  { bit: ButtonBits.RightDown,  type: 'mouseDown', button: 'right',  held: HeldButton.Right },
  { bit: ButtonBits.RightUp,    type: 'mouseUp',   button: 'right',  held: HeldButton.Right },
  { bit: ButtonBits.MiddleDown, type: 'mouseDown', button: 'middle', held: HeldButton.Middle },
  { bit: ButtonBits.MiddleUp,   type: 'mouseUp',   button: 'middle', held: HeldButton.Middle }
];

export class InputController implements MuxObserver {
  private client: MuxClient | null = null;
  private readonly queue: SerialTaskQueue;
  private readonly keyMapper: KeyMapper;
  private readonly now: () => number;

  private readonly registry = new TargetRegistry();
  private readonly roster = new Roster();
  private readonly watchdog: PipelineWatchdog;
  private readonly positions = new Map<number, Point>();
  private readonly pressedKeys = new Set<number>();

  private ownerHwid = NO_OWNER;
  private captured = false;
  private buttonMask = 0;
  private nativeInputBlocked = false;
  private pendingMotion: PendingMotion = { x: 0, y: 0, hasPending: false };
  private lastMotionInjectAt = Number.NEGATIVE_INFINITY;
  private lastRosterRequestAt = Number.NEGATIVE_INFINITY;

  private listeners: Partial<ControllerEvents> = {};
  private keyboardFilter: KeyboardFilter | null = null;

  constructor(private readonly settings: ControllerSettings, private readonly deps: InputControllerDeps) {
    this.queue = deps.queue;
    this.keyMapper = deps.keyMapper ?? windowsKeyMapper;
    this.now = deps.now ?? Date.now;
    this.watchdog = new PipelineWatchdog(settings.stuckPipelineMs, this.now);
  }

  // -------------------------------------------------------------------------
  // Connection
  // -------------------------------------------------------------------------

  /**
   * Connects (creating the client on first use) or disconnects.
   * Returns false when enabling could not open a transport.
   */
  setEnabled(on: boolean): boolean {
    if (!on) {
      this.client?.disconnect();
      return true;
    }

    if (!this.client) {
      this.client = new MuxClient({
        serverUrl: this.settings.serverUrl,
        maxMessageBytes: this.settings.maxMessageBytes,
        clientIdentity: this.settings.clientIdentity,
        transportFactory: this.deps.transportFactory
      });
      this.client.addObserver(this);
    }
    return this.client.connect();
  }

  isEnabled(): boolean {
    return this.client?.isConnected() ?? false;
  }

  getConnectionState(): ConnectionState {
    return this.client?.getState() ?? 'initialized';
  }

  // -------------------------------------------------------------------------
  // Targets and native input
  // -------------------------------------------------------------------------

  setNativeInputBlocked(blocked: boolean): void {
    this.nativeInputBlocked = blocked;
    for (const { target } of this.registry.entries()) target.setNativeInputBlocked(blocked);
    log.info({ blocked, targets: this.registry.size }, 'Native input blocking changed');
  }

  isNativeInputBlocked(): boolean {
    return this.nativeInputBlocked;
  }

  registerTarget(target: InjectionTarget): TargetHandle {
    const handle = this.registry.add(target);
    target.setNativeInputBlocked(this.nativeInputBlocked);
    log.debug({ target: handle.toString(), targets: this.registry.size }, 'Target registered');
    return handle;
  }

  unregisterTarget(handle: TargetHandle): boolean {
    this.watchdog.forget(handle);
    const removed = this.registry.remove(handle);
    log.debug({ target: handle.toString(), removed }, 'Target unregistered');
    return removed;
  }

  getTargetCount(): number {
    return this.registry.size;
  }

  // -------------------------------------------------------------------------
  // Capture and ownership
  // -------------------------------------------------------------------------

  captureOwner(): boolean {
    if (this.ownerHwid === NO_OWNER || this.captured || !this.client) return false;
    this.client.requestCapture(this.ownerHwid);
    this.captured = true;
    log.info({ owner: this.ownerHwid }, 'Owner captured');
    this.listeners.captureChanged?.(true);
    return true;
  }

  releaseCapture(): boolean {
    if (!this.captured) return false;

    if (this.ownerHwid === NO_OWNER) {
      log.warn('Captured without owner, clearing');
      this.captured = false;
      this.listeners.captureChanged?.(false);
      return false;
    }

    this.client?.releaseCapture(this.ownerHwid);
    this.captured = false;
    log.info({ owner: this.ownerHwid }, 'Capture released');
    this.listeners.captureChanged?.(false);
    return true;
  }

  releaseOwnership(): void {
    if (this.captured) this.releaseCapture();
    log.info({ owner: this.ownerHwid }, 'Ownership released');
    this.ownerHwid = NO_OWNER;
    this.buttonMask = 0;
    this.pressedKeys.clear();
    this.pendingMotion.hasPending = false;
    this.notifyOwnership();
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  getOwnerHwid(): number {
    return this.ownerHwid;
  }

  getOwnerName(): string {
    return this.ownerHwid === NO_OWNER ? '' : this.roster.nameOf(this.ownerHwid);
  }

  isCaptured(): boolean {
    return this.captured;
  }

  getOwnershipState(): OwnershipState {
    return {
      ownerHwid: this.ownerHwid,
      captured: this.captured,
      buttonMask: this.buttonMask,
      pressedKeys: [...this.pressedKeys]
    };
  }

  getRoster(): UserInfo[] {
    return this.roster.list();
  }

  getDevicePosition(hwid: number): Point | undefined {
    return this.positions.get(hwid);
  }

  // -------------------------------------------------------------------------
  // Listeners
  // -------------------------------------------------------------------------

  /** One listener per kind; a new subscription replaces the previous one. */
  subscribe<K extends ControllerEventKind>(kind: K, listener: ControllerEvents[K]): () => void {
    this.listeners[kind] = listener;
    return () => {
      if (this.listeners[kind] === listener) delete this.listeners[kind];
    };
  }

  setKeyboardFilter(filter: KeyboardFilter | null): void {
    this.keyboardFilter = filter;
  }

  /** Detaches from the client, disconnects and drops every listener. */
  shutdown(): void {
    this.listeners = {};
    this.keyboardFilter = null;
    if (this.client) {
      this.client.removeObserver(this);
      this.client.disconnect();
    }
  }

  // -------------------------------------------------------------------------
  // MuxObserver
  // -------------------------------------------------------------------------

  onMouseMotion(hwid: number, x: number, y: number): void {
    if (this.repost(() => this.onMouseMotion(hwid, x, y))) return;

    this.positions.set(hwid, { x, y });
    if (hwid !== this.ownerHwid) return;

    const now = this.now();
    if (now - this.lastMotionInjectAt < this.settings.motionIntervalMs) {
      this.pendingMotion = { x, y, hasPending: true };
      return;
    }

    this.lastMotionInjectAt = now;
    this.pendingMotion.hasPending = false;
    this.injectPointer('mouseMove', 'none', x, y);
  }

  onMouseButton(hwid: number, x: number, y: number, data: number): void {
    if (this.repost(() => this.onMouseButton(hwid, x, y, data))) return;

    // the owner's last throttled position goes out before its button
    if (this.pendingMotion.hasPending && hwid === this.ownerHwid) {
      this.pendingMotion.hasPending = false;
      this.lastMotionInjectAt = this.now();
      this.injectPointer('mouseMove', 'none', this.pendingMotion.x, this.pendingMotion.y);
    }

    this.positions.set(hwid, { x, y });
    log.debug({ hwid, data, x, y, owner: this.ownerHwid, name: this.roster.nameOf(hwid) }, 'Button');

    if (this.ownerHwid === NO_OWNER && (data & ButtonBits.LeftDown)) {
      if (!this.tryClaim(hwid, x, y)) return;
    }

    if (this.ownerHwid === NO_OWNER || hwid !== this.ownerHwid) return;

    for (const transition of BUTTON_TRANSITIONS) {
      if (!(data & transition.bit)) continue;
      if (transition.type === 'mouseDown') this.buttonMask |= transition.held;
      else this.buttonMask &= ~transition.held;
      this.injectPointer(transition.type, transition.button, x, y);
    }
  }

  onMouseWheel(hwid: number, x: number, y: number, delta: number, horizontal: boolean): void {
    if (this.repost(() => this.onMouseWheel(hwid, x, y, delta, horizontal))) return;

    this.positions.set(hwid, { x, y });
    if (this.ownerHwid === NO_OWNER || hwid !== this.ownerHwid) return;

    const entry = this.pickPointerTarget(x, y);
    if (!entry) {
      log.debug('Wheel dropped, no target');
      return;
    }

    const { target } = entry;
    const event = buildWheelEvent(
      delta,
      horizontal,
      this.settings.wheelDeltaScale,
      this.buttonMask,
      place(x, y, target.getBounds(), target.getScaleFactor()),
      this.now()
    );
    this.deliver(entry, event);
  }

  onKeyboardKey(event: KeyboardKeyNotification): void {
    if (this.repost(() => this.onKeyboardKey(event))) return;

    const { hwid, vkey, message } = event;
    const mouseHwid = this.roster.mouseForKeyboard(hwid);
    if (mouseHwid === undefined) {
      this.refreshRosterForUnknownKeyboard(hwid);
      return;
    }

    if (this.ownerHwid === NO_OWNER) {
      log.debug({ keyboard: hwid, vkey }, 'Key dropped, no owner');
      return;
    }
    if (mouseHwid !== this.ownerHwid) {
      log.debug({ keyboard: hwid, mouse: mouseHwid, owner: this.ownerHwid }, 'Key dropped, not the owner');
      return;
    }

    const direction = this.keyMapper.directionOf(message);
    if (!direction) {
      log.debug({ message }, 'Key ignored, unknown message kind');
      return;
    }

    const down = direction === 'down';
    let repeat = false;
    if (down) {
      repeat = this.pressedKeys.has(vkey);
      this.pressedKeys.add(vkey);
    } else {
      this.pressedKeys.delete(vkey);
    }

    const modifiers = modifiersFrom(this.pressedKeys, this.keyMapper);
    const code = this.keyMapper.codeOf(vkey);
    const key = this.keyMapper.keyOf(vkey, modifiers);

    if (this.keyboardFilter?.({
      vkey,
      code,
      key,
      shift: (modifiers & EventModifier.Shift) !== 0,
      ctrl: (modifiers & EventModifier.Control) !== 0,
      alt: (modifiers & EventModifier.Alt) !== 0,
      down,
      repeat
    })) {
      log.debug({ vkey, code }, 'Key consumed by filter');
      return;
    }

    const entry = this.registry.first();
    if (!entry) {
      log.debug('Key dropped, no target');
      return;
    }

    if (!entry.target.hasFocus()) entry.target.focus();
    entry.target.forward(buildKeyEvent(down, vkey, modifiers, code, key, this.now()));
  }

  onConnectionStateChanged(connected: boolean): void {
    if (this.repost(() => this.onConnectionStateChanged(connected))) return;

    log.info({ connected, targets: this.registry.size }, 'Connection state changed');
    this.listeners.connectionChanged?.(connected);
    this.resetSession();
    if (connected) this.client?.requestUserList();
  }

  onUserList(users: UserInfo[]): void {
    if (this.repost(() => this.onUserList(users))) return;

    this.roster.replace(users);
    log.debug({ users: users.length }, 'Roster replaced');
    // the owner may have a name now
    if (this.ownerHwid !== NO_OWNER) this.notifyOwnership();
  }

  onUserCreated(user: UserInfo): void {
    if (this.repost(() => this.onUserCreated(user))) return;

    this.roster.upsert(user);
    if (user.hwidMouse === this.ownerHwid) this.notifyOwnership();
  }

  onUserDisposed(hwidMouse: number, hwidKeyboard: number): void {
    if (this.repost(() => this.onUserDisposed(hwidMouse, hwidKeyboard))) return;

    if (this.ownerHwid !== NO_OWNER && hwidMouse === this.ownerHwid) {
      log.info({ owner: this.ownerHwid }, 'Owner disposed');
      this.ownerHwid = NO_OWNER;
      this.buttonMask = 0;
      this.pressedKeys.clear();
      this.pendingMotion.hasPending = false;
      if (this.captured) {
        this.captured = false;
        this.listeners.captureChanged?.(false);
      }
      this.notifyOwnership();
    }

    this.positions.delete(hwidMouse);
    this.positions.delete(hwidKeyboard);
    this.roster.remove(hwidMouse, hwidKeyboard);
  }

  onTimeoutWarning(minutes: number): void {
    if (this.repost(() => this.onTimeoutWarning(minutes))) return;
    this.listeners.timeoutWarning?.(minutes);
  }

  onTimeoutStopped(reason: string): void {
    if (this.repost(() => this.onTimeoutStopped(reason))) return;
    this.listeners.timeoutStopped?.(reason);
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** Re-posts `task` when not already running on the queue. */
  private repost(task: () => void): boolean {
    if (this.queue.isCurrent()) return false;
    this.queue.post(task);
    return true;
  }

  private notifyOwnership(): void {
    this.listeners.ownershipChanged?.(this.ownerHwid, this.getOwnerName());
  }

  private resetSession(): void {
    this.ownerHwid = NO_OWNER;
    this.buttonMask = 0;
    this.captured = false;
    this.roster.clear();
    this.positions.clear();
    this.pressedKeys.clear();
    this.pendingMotion = { x: 0, y: 0, hasPending: false };
    this.watchdog.clear();

    this.listeners.captureChanged?.(false);
    this.notifyOwnership();
  }

  /** Left-down from an unowned host. Returns false when the click is discarded. */
  private tryClaim(hwid: number, x: number, y: number): boolean {
    if (this.registry.size === 0) {
      log.debug({ hwid }, 'Click ignored, no targets to claim for');
      return false;
    }

    if (this.hitTest(x, y)) {
      log.info({ hwid }, 'Ownership claimed');
    } else if (this.settings.ownershipClaimPolicy === 'optimistic') {
      log.info({ hwid, x, y }, 'Ownership claimed outside every target');
    } else {
      log.debug({ hwid, x, y }, 'Click outside every target, discarded');
      return false;
    }

    this.ownerHwid = hwid;
    this.notifyOwnership();
    return true;
  }

  /** Visible target whose bounds contain the physical screen point. */
  private hitTest(x: number, y: number): RegisteredTarget | null {
    const visible = this.registry.entries().filter(entry => entry.target.isVisible());
    if (visible.length === 0) return null;

    const scale = visible[0].target.getScaleFactor() || 1;
    const dipX = Math.trunc(x / scale);
    const dipY = Math.trunc(y / scale);
    return visible.find(entry => rectContains(entry.target.getBounds(), dipX, dipY)) ?? null;
  }

  private pickPointerTarget(x: number, y: number): RegisteredTarget | null {
    return this.hitTest(x, y) ?? this.registry.firstVisible() ?? this.registry.first();
  }

  private injectPointer(type: SyntheticMouseEvent['type'], button: MouseButton, x: number, y: number): void {
    const entry = this.pickPointerTarget(x, y);
    if (!entry) {
      log.debug({ type }, 'Pointer event dropped, no target');
      return;
    }

    const { target } = entry;
    if (!target.hasFocus()) target.focus();
    if (type !== 'mouseMove') target.focusContent();

    const event = buildMouseEvent(
      type,
      button,
      this.buttonMask,
      place(x, y, target.getBounds(), target.getScaleFactor()),
      this.now()
    );
    this.deliver(entry, event);
  }

  private deliver({ handle, target }: RegisteredTarget, event: SyntheticEvent): void {
    this.watchdog.check(handle, target);
    if (target.isIgnoringEvents?.(event)) {
      log.warn({ target: handle.toString(), type: event.type }, 'Target is ignoring input, event will be dropped');
    }
    target.forward(event);
  }

  private refreshRosterForUnknownKeyboard(hwid: number): void {
    const now = this.now();
    if (now - this.lastRosterRequestAt <= this.settings.rosterRefreshIntervalMs) {
      log.debug({ keyboard: hwid }, 'Unknown keyboard, refresh already requested');
      return;
    }
    this.lastRosterRequestAt = now;
    log.debug({ keyboard: hwid }, 'Unknown keyboard, requesting roster');
    this.client?.requestUserList();
  }
}
