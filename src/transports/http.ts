/**
 * transports/http.ts
 *
 * Control API. Synchronous request/response for commands and status; two
 * SSE streams for notifications and log lines. Remote-target routes from
 * transports/sse.ts are mounted on the same app.
 *
 * Routes:
 *   GET    /health
 *   GET    /status
 *   POST   /connection         { enabled }
 *   POST   /native-input       { blocked }
 *   POST   /capture
 *   DELETE /capture
 *   POST   /ownership/release
 *   PUT    /hotkey             { id }
 *   GET    /hotkeys
 *   GET    /events             → SSE: ownership, connection, capture, timeoutWarning, timeoutStopped
 *   GET    /logs               → SSE: log lines (when a LogBroadcaster is wired)
 */

import express, { NextFunction, Request, Response } from 'express';
import { BridgeBaseError, NoOwnerError } from '../core/errors';
import { scopedLogger, LogSink } from '../core/logger';
import { BridgeContext } from '../core/context';
import { NO_OWNER } from '../core/types';
import { RELEASE_HOTKEYS } from '../controller/release_hotkey';
import { createTargetRouter, openEventStream, pushEvent } from './sse';
import {
  parseBody,
  validateConnection,
  validateHotkey,
  validateNativeInput
} from './schemas';

const log = scopedLogger('transports/http');

const ERROR_STATUS: Record<string, number> = {
  VALIDATION_ERROR: 400,
  NO_OWNER: 409,
  UNKNOWN_TARGET: 404
};

// ---------------------------------------------------------------------------
// Log streaming
// ---------------------------------------------------------------------------

/** pino destination that fans every line out to the attached SSE clients. */
export class LogBroadcaster implements LogSink {
  private readonly clients = new Set<Response>();

  write(line: string): void {
    for (const res of this.clients) pushEvent(res, 'log', line.trimEnd());
  }

  attach(res: Response): void {
    this.clients.add(res);
  }

  detach(res: Response): void {
    this.clients.delete(res);
  }

  get size(): number {
    return this.clients.size;
  }
}

/** Open notification streams; fed by the controller's listener channels. */
class EventHub {
  private readonly clients = new Set<Response>();

  attach(res: Response): void {
    this.clients.add(res);
  }

  detach(res: Response): void {
    this.clients.delete(res);
  }

  broadcast(event: string, data: unknown): void {
    for (const res of this.clients) pushEvent(res, event, data);
  }
}

function statusOf(context: BridgeContext): Record<string, unknown> {
  const { controller } = context;
  const ownerHwid = controller.getOwnerHwid();
  return {
    connection: controller.getConnectionState(),
    enabled: controller.isEnabled(),
    owner: ownerHwid === NO_OWNER ? null : { hwid: ownerHwid, name: controller.getOwnerName() },
    captured: controller.isCaptured(),
    nativeInputBlocked: controller.isNativeInputBlocked(),
    releaseHotkey: context.hotkey.current.id,
    targets: controller.getTargetCount(),
    roster: controller.getRoster()
  };
}

export function createHttpTransport(context: BridgeContext, logs?: LogBroadcaster): express.Application {
  const app = express();
  app.use(express.json());

  const { controller } = context;
  const hub = new EventHub();

  controller.subscribe('ownershipChanged', (hwid, name) => hub.broadcast('ownership', { hwid, name }));
  controller.subscribe('connectionChanged', connected => hub.broadcast('connection', { connected }));
  controller.subscribe('captureChanged', captured => hub.broadcast('capture', { captured }));
  controller.subscribe('timeoutWarning', minutes => hub.broadcast('timeoutWarning', { minutes }));
  controller.subscribe('timeoutStopped', reason => hub.broadcast('timeoutStopped', { reason }));

  // -----------------------------------------------------------------------
  // Status
  // -----------------------------------------------------------------------
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', connection: controller.getConnectionState() });
  });

  app.get('/status', (_req: Request, res: Response) => {
    res.json(statusOf(context));
  });

  // -----------------------------------------------------------------------
  // Commands
  // -----------------------------------------------------------------------
  app.post('/connection', (req: Request, res: Response) => {
    const { enabled } = parseBody(validateConnection, 'POST /connection', req.body);
    const started = controller.setEnabled(enabled);
    log.info({ enabled, started }, 'Connection toggled');
    res.json({ enabled, started, connection: controller.getConnectionState() });
  });

  app.post('/native-input', (req: Request, res: Response) => {
    const { blocked } = parseBody(validateNativeInput, 'POST /native-input', req.body);
    controller.setNativeInputBlocked(blocked);
    res.json({ blocked });
  });

  app.post('/capture', (_req: Request, res: Response) => {
    if (controller.getOwnerHwid() === NO_OWNER) throw new NoOwnerError('capture');
    const changed = controller.captureOwner();
    res.json({ captured: controller.isCaptured(), changed });
  });

  app.delete('/capture', (_req: Request, res: Response) => {
    const released = controller.releaseCapture();
    res.json({ captured: controller.isCaptured(), changed: released });
  });

  app.post('/ownership/release', (_req: Request, res: Response) => {
    controller.releaseOwnership();
    res.json({ owner: null, captured: controller.isCaptured() });
  });

  app.put('/hotkey', (req: Request, res: Response) => {
    const { id } = parseBody(validateHotkey, 'PUT /hotkey', req.body);
    context.setReleaseHotkey(id);
    res.json({ releaseHotkey: context.hotkey.current.id });
  });

  app.get('/hotkeys', (_req: Request, res: Response) => {
    res.json({
      current: context.hotkey.current.id,
      hotkeys: RELEASE_HOTKEYS.map(({ id, label }) => ({ id, label }))
    });
  });

  // -----------------------------------------------------------------------
  // Streams
  // -----------------------------------------------------------------------
  app.get('/events', (req: Request, res: Response) => {
    openEventStream(res);
    pushEvent(res, 'status', statusOf(context));
    hub.attach(res);
    req.on('close', () => hub.detach(res));
  });

  app.get('/logs', (req: Request, res: Response) => {
    if (!logs) {
      res.status(404).json({ error: { code: 'NOT_AVAILABLE', message: 'Log streaming is not enabled' } });
      return;
    }
    openEventStream(res);
    logs.attach(res);
    req.on('close', () => logs.detach(res));
  });

  app.use(createTargetRouter(context));

  // -----------------------------------------------------------------------
  // Error boundary
  // -----------------------------------------------------------------------
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof BridgeBaseError) {
      log.warn({ code: err.code, path: req.path }, err.message);
      res.status(ERROR_STATUS[err.code] ?? 400).json({
        error: { code: err.code, message: err.message, details: err.details }
      });
      return;
    }

    // body-parser failures carry their own 4xx status
    const status: unknown = Reflect.get(err, 'status');
    if (typeof status === 'number' && status >= 400 && status < 500) {
      res.status(status).json({ error: { code: 'BAD_REQUEST', message: err.message } });
      return;
    }

    log.error({ error: err.message, stack: err.stack, path: req.path }, 'Unhandled error in request handler');
    if (!res.headersSent) {
      res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: err.message } });
    }
  });

  return app;
}
