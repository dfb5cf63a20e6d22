/**
 * transports/schemas.ts
 *
 * Request body schemas for the control API and the remote-target routes.
 */

import Ajv, { ValidateFunction } from 'ajv';
import { ReleaseHotkeyId } from '../core/types';
import { ValidationError } from '../core/errors';
import { RELEASE_HOTKEYS } from '../controller/release_hotkey';

const ajv = new Ajv({ allErrors: true });

export interface ConnectionBody { enabled: boolean }
export interface NativeInputBody { blocked: boolean }
export interface HotkeyBody { id: ReleaseHotkeyId }
export interface AckBody { count: number }

export interface RectBody {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface TargetBody {
  bounds: RectBody;
  visible?: boolean;
  scaleFactor?: number;
  focused?: boolean;
}

export type TargetPatchBody = Partial<TargetBody>;

const rectSchema = {
  type: 'object',
  required: ['x', 'y', 'width', 'height'],
  additionalProperties: false,
  properties: {
    x:      { type: 'number' },
    y:      { type: 'number' },
    width:  { type: 'number', minimum: 0 },
    height: { type: 'number', minimum: 0 }
  }
};

const targetProperties = {
  bounds:      rectSchema,
  visible:     { type: 'boolean' },
  scaleFactor: { type: 'number', exclusiveMinimum: 0 },
  focused:     { type: 'boolean' }
};

export const validateConnection = ajv.compile<ConnectionBody>({
  type: 'object',
  required: ['enabled'],
  properties: { enabled: { type: 'boolean' } }
});

export const validateNativeInput = ajv.compile<NativeInputBody>({
  type: 'object',
  required: ['blocked'],
  properties: { blocked: { type: 'boolean' } }
});

export const validateHotkey = ajv.compile<HotkeyBody>({
  type: 'object',
  required: ['id'],
  properties: { id: { type: 'string', enum: RELEASE_HOTKEYS.map(h => h.id) } }
});

export const validateAck = ajv.compile<AckBody>({
  type: 'object',
  required: ['count'],
  properties: { count: { type: 'integer', minimum: 1 } }
});

export const validateTarget = ajv.compile<TargetBody>({
  type: 'object',
  required: ['bounds'],
  additionalProperties: false,
  properties: targetProperties
});

export const validateTargetPatch = ajv.compile<TargetPatchBody>({
  type: 'object',
  additionalProperties: false,
  properties: targetProperties
});

/** Returns the typed body or throws ValidationError. */
export function parseBody<T>(validate: ValidateFunction<T>, route: string, body: unknown): T {
  if (!validate(body)) {
    throw new ValidationError(route, validate.errors ?? []);
  }
  return body;
}
