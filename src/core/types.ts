/**
 * core/types.ts
 *
 * Single source of truth for every shared type in the project.
 * The protocol client, the controller and the adapters all import from here.
 */

// ---------------------------------------------------------------------------
// Session configuration
// ---------------------------------------------------------------------------

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type ReleaseHotkeyId =
  | 'shift+escape'
  | 'ctrl+shift+escape'
  | 'alt+shift+escape'
  | 'shift+f12'
  | 'alt+shift+f12';

/**
 * What happens when a left-down from an unowned device misses every visible
 * target while targets exist. "optimistic" claims anyway and delivers to the
 * first target; "hitTestOnly" discards the click.
 */
export type OwnershipClaimPolicy = 'optimistic' | 'hitTestOnly';

/** Identity reported to the multiplexing server in login/logout requests. */
export interface ClientIdentity {
  appName: string;
  appVersion: string;
  appBuildDate: string;
  sdkVersion: string;
  sdkBuildDate: string;
}

export interface SessionConfig {
  serverUrl: string;                       // WebSocket endpoint of the mux server
  autoConnect: boolean;                    // connect during init()
  nativeInputBlocked: boolean;             // initial blocking flag for targets
  releaseHotkey: ReleaseHotkeyId;
  controlPort: number;                     // HTTP control API
  logLevel?: LogLevel;
  debugCategories?: string[];              // modules lifted to debug ("*" = all)
  maxMessageBytes: number;                 // per logical message
  motionIntervalMs: number;                // throttle window for owner motion
  rosterRefreshIntervalMs: number;         // min spacing of unknown-keyboard refreshes
  stuckPipelineMs: number;                 // dwell before a pending pipeline is reset
  wheelDeltaScale: number;                 // pixels per raw wheel unit
  ownershipClaimPolicy: OwnershipClaimPolicy;
  clientIdentity: ClientIdentity;
}

// ---------------------------------------------------------------------------
// Devices, users and ownership
// ---------------------------------------------------------------------------

/** hwid value meaning "no device". */
export const NO_OWNER = -1;

export interface UserInfo {
  userId: number;
  name: string;
  hwidMouse: number;
  hwidKeyboard: number;                    // 0 when no keyboard is mapped
}

export interface OwnershipState {
  ownerHwid: number;                       // NO_OWNER when unowned
  captured: boolean;
  buttonMask: number;                      // HeldButton bits
  pressedKeys: number[];
}

export type ConnectionState = 'initialized' | 'connecting' | 'open' | 'disconnected';

export interface Point {
  x: number;
  y: number;
}

export interface PendingMotion extends Point {
  hasPending: boolean;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function rectContains(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.width &&
         y >= rect.y && y < rect.y + rect.height;
}

// ---------------------------------------------------------------------------
// Wire-level button bitmask (pointer.button.notify.M2A "button" field)
// ---------------------------------------------------------------------------

export const ButtonBits = {
  LeftDown:   0x01,
  LeftUp:     0x02,
  RightDown:  0x04,
  RightUp:    0x08,
  MiddleDown: 0x10,
  MiddleUp:   0x20
} as const;

// ---------------------------------------------------------------------------
// Observer contract between the protocol client and its consumers
// ---------------------------------------------------------------------------

export interface KeyboardKeyNotification {
  hwid: number;
  vkey: number;
  message: number;                         // platform message kind (down/up)
  scan: number;
  flags: number;
}

export interface MuxObserver {
  onMouseMotion(hwid: number, x: number, y: number): void;
  onMouseButton(hwid: number, x: number, y: number, data: number): void;
  /** delta > 0 is up/forward. */
  onMouseWheel(hwid: number, x: number, y: number, delta: number, horizontal: boolean): void;
  onConnectionStateChanged(connected: boolean): void;
  onUserList(users: UserInfo[]): void;
  onUserCreated(user: UserInfo): void;
  onUserDisposed(hwidMouse: number, hwidKeyboard: number): void;
  onKeyboardKey(event: KeyboardKeyNotification): void;
  onTimeoutWarning(minutes: number): void;
  onTimeoutStopped(reason: string): void;
}

// ---------------------------------------------------------------------------
// Synthesized host events
// ---------------------------------------------------------------------------

/** Held-button bits carried on synthesized events. */
export const HeldButton = {
  Left:   0x01,
  Middle: 0x02,
  Right:  0x04
} as const;

/** Modifier bits carried on synthesized events. */
export const EventModifier = {
  Shift:    0x01,
  Control:  0x02,
  Alt:      0x04,
  Injected: 0x100                          // marks the event as synthetic
} as const;

export type MouseButton = 'left' | 'right' | 'middle' | 'none';

export interface SyntheticMouseEvent {
  type: 'mouseDown' | 'mouseUp' | 'mouseMove';
  button: MouseButton;
  clickCount: number;
  heldButtons: number;
  modifiers: number;
  widget: Point;                           // relative to the target's bounds
  screen: Point;                           // DIP screen coordinates
  timestamp: number;
}

export interface SyntheticWheelEvent {
  type: 'wheel';
  deltaX: number;
  deltaY: number;
  ticksX: number;
  ticksY: number;
  phase: 'began';
  units: 'precisePixel';
  heldButtons: number;
  modifiers: number;
  widget: Point;
  screen: Point;
  timestamp: number;
}

export interface SyntheticKeyEvent {
  type: 'rawKeyDown' | 'keyUp';
  keyCode: number;                         // host key code as received
  code?: string;                           // DOM code
  key?: string;                            // DOM key
  modifiers: number;
  timestamp: number;
}

export type SyntheticEvent = SyntheticMouseEvent | SyntheticWheelEvent | SyntheticKeyEvent;

// ---------------------------------------------------------------------------
// Host injection target
// ---------------------------------------------------------------------------

/**
 * One window/view of the host application. The controller never owns these;
 * it keeps them in a registry keyed by TargetHandle.
 */
export interface InjectionTarget {
  /** Bounds in DIP screen coordinates. */
  getBounds(): Rect;
  isVisible(): boolean;
  getScaleFactor(): number;
  hasFocus(): boolean;
  /** Window-level focus. */
  focus(): void;
  /** Content-level focus, requested before button events. */
  focusContent(): void;
  setNativeInputBlocked(blocked: boolean): void;
  /** True while forwarded events await acknowledgment. */
  hasPendingEvents(): boolean;
  /** Forcefully drops the unacknowledged backlog. */
  resetPipeline(): void;
  /** Diagnostic only: whether the host would drop this event. */
  isIgnoringEvents?(event: SyntheticEvent): boolean;
  forward(event: SyntheticEvent): void;
}
