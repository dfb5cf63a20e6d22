/**
 * protocol/messages.ts
 *
 * Wire vocabulary of the multiplexing server: message type names, outbound
 * request builders and the field validators used by the client's handlers.
 *
 * Direction suffixes: ".M2A" = server → application, ".A2M" = application → server.
 */

import Ajv from 'ajv';
import { ClientIdentity } from '../core/types';

export const REQUEST_SUFFIX = '.A2M';

export const MessageType = {
  Motion:          'pointer.motion.notify.M2A',
  Button:          'pointer.button.notify.M2A',
  Wheel:           'pointer.wheel.notify.M2A',
  UserList:        'user.list.notify.M2A',
  UserCreate:      'user.create.notify.M2A',
  UserDispose:     'user.dispose.notify.M2A',
  UserChanged:     'user.changed.notify.M2A',
  KeyboardKey:     'keyboard.key.notify.M2A',
  Ping:            'server.ping.notify.M2A',
  ServerShutdown:  'server.shutdown.notify.M2A',
  TimeoutWarning:  'server.timeout.warning.notify.M2A',
  TimeoutStopped:  'server.timeout.stopped.notify.M2A',

  Login:           'client.login.request.A2M',
  Logout:          'client.logout.request.A2M',
  UserListRequest: 'user.list.request.A2M',
  Capture:         'pointer.capture.request.A2M',
  CaptureRelease:  'pointer.capture.release.request.A2M',
  Pong:            'client.pong.request.A2M'
} as const;

/** Any decoded message: a JSON object carrying a string `type`. */
export interface WireMessage {
  type: string;
  [field: string]: unknown;
}

// ---------------------------------------------------------------------------
// Outbound
// ---------------------------------------------------------------------------

export function loginRequest(identity: ClientIdentity): WireMessage {
  return {
    type: MessageType.Login,
    appName: identity.appName,
    appVersion: identity.appVersion,
    appBuildDate: identity.appBuildDate,
    sdkVersion: identity.sdkVersion,
    sdkBuildDate: identity.sdkBuildDate
  };
}

export function logoutRequest(identity: ClientIdentity, reason = 'shutdown'): WireMessage {
  return {
    type: MessageType.Logout,
    appName: identity.appName,
    appVersion: identity.appVersion,
    sdkVersion: identity.sdkVersion,
    reason
  };
}

export const userListRequest = (): WireMessage => ({ type: MessageType.UserListRequest });
export const captureRequest = (hwid: number): WireMessage => ({ type: MessageType.Capture, hwid });
export const captureReleaseRequest = (hwid: number): WireMessage => ({ type: MessageType.CaptureRelease, hwid });
export const pongRequest = (): WireMessage => ({ type: MessageType.Pong });

// ---------------------------------------------------------------------------
// Inbound field validators
// ---------------------------------------------------------------------------

const ajv = new Ajv({ allErrors: true });

export interface PointerFields {
  hwid: number;
  x: number;
  y: number;
}

export interface ButtonFields extends PointerFields {
  button: number;
}

export interface WheelFields extends PointerFields {
  delta: number;
  horizontal?: boolean;
}

export interface KeyboardFields {
  hwid: number;
  vkey: number;
  message: number;
  scan: number;
  flags: number;
}

const pointerProperties = {
  hwid: { type: 'integer' },
  x:    { type: 'number' },
  y:    { type: 'number' }
};

export const validatePointer = ajv.compile<PointerFields>({
  type: 'object',
  required: ['hwid', 'x', 'y'],
  properties: pointerProperties
});

export const validateButton = ajv.compile<ButtonFields>({
  type: 'object',
  required: ['hwid', 'x', 'y', 'button'],
  properties: { ...pointerProperties, button: { type: 'integer' } }
});

export const validateWheel = ajv.compile<WheelFields>({
  type: 'object',
  required: ['hwid', 'x', 'y', 'delta'],
  properties: {
    ...pointerProperties,
    delta:      { type: 'integer' },
    horizontal: { type: 'boolean' }
  }
});

export const validateKeyboard = ajv.compile<KeyboardFields>({
  type: 'object',
  required: ['hwid', 'vkey', 'message', 'scan', 'flags'],
  properties: {
    hwid:    { type: 'integer' },
    vkey:    { type: 'integer' },
    message: { type: 'integer' },
    scan:    { type: 'integer' },
    flags:   { type: 'integer' }
  }
});

// ---------------------------------------------------------------------------
// Loose field readers (optional fields with defaults)
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function intField(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

export function stringField(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

/** Decodes one logical message. Returns null when it is not an object with a string type. */
export function decodeMessage(text: string): WireMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;
  const type = parsed.type;
  if (typeof type !== 'string') return null;
  return { ...parsed, type };
}
