/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every throw site uses one of these.
 * The `code` property is what the control API reports and what the
 * protocol client matches on when deciding between "drop" and "close".
 */

export class BridgeBaseError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

// ---------------------------------------------------------------------------
// Protocol errors
// ---------------------------------------------------------------------------

/** Frame of the wrong kind or a message over the size bound. Fatal for the session. */
export class ProtocolViolationError extends BridgeBaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PROTOCOL_VIOLATION', details);
  }
}

/** Payload is not a JSON object with a string `type`. The message is dropped. */
export class MalformedMessageError extends BridgeBaseError {
  constructor(preview: string) {
    super('Malformed message', 'MALFORMED_MESSAGE', { preview });
  }
}

/** A well-typed message lacks a field its handler needs. The message is dropped. */
export class MissingFieldError extends BridgeBaseError {
  constructor(messageType: string, violations: unknown[]) {
    super(
      `Missing or invalid fields in "${messageType}"`,
      'MISSING_FIELD',
      { messageType, violations }
    );
  }
}

/** The server answered our login with ok:false. */
export class LoginRejectedError extends BridgeBaseError {
  constructor() {
    super('Login rejected by server', 'LOGIN_REJECTED');
  }
}

/** No transport could be opened at connect time. */
export class TransportUnavailableError extends BridgeBaseError {
  constructor(url: string, cause: string) {
    super(`Transport unavailable for "${url}": ${cause}`, 'TRANSPORT_UNAVAILABLE', { url });
  }
}

// ---------------------------------------------------------------------------
// Configuration / control errors
// ---------------------------------------------------------------------------

export class ConfigError extends BridgeBaseError {
  constructor(source: string, violations: unknown[]) {
    super(`Invalid configuration in ${source}`, 'INVALID_CONFIG', { source, violations });
  }
}

/** A control API request body failed its schema. */
export class ValidationError extends BridgeBaseError {
  constructor(route: string, violations: unknown[]) {
    super(`Validation failed for "${route}"`, 'VALIDATION_ERROR', { route, violations });
  }
}

/** An owner-only operation was requested while nobody owns the host. */
export class NoOwnerError extends BridgeBaseError {
  constructor(operation: string) {
    super(`No owner for "${operation}"`, 'NO_OWNER', { operation });
  }
}

export class UnknownTargetError extends BridgeBaseError {
  constructor(targetId: string) {
    super(`Unknown target: "${targetId}"`, 'UNKNOWN_TARGET', { targetId });
  }
}
