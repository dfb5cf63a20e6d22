/**
 * transports/sse.ts
 *
 * Remote injection targets. An out-of-process host registers each of its
 * windows here and opens one Server-Sent Events stream per window; the
 * controller's synthesized events are pushed down that stream.
 *
 * Routes:
 *   POST   /targets              → register a window, returns its id
 *   PATCH  /targets/:id          → update bounds / visibility / scale / focus
 *   DELETE /targets/:id          → unregister
 *   GET    /targets/:id/events   → SSE stream of input and control events
 *   POST   /targets/:id/ack      → acknowledge delivered input events
 */

import express, { Request, Response, Router } from 'express';
import { InjectionTarget, Rect, SyntheticEvent } from '../core/types';
import { UnknownTargetError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { BridgeContext } from '../core/context';
import { TargetHandle } from '../controller/target_registry';
import {
  TargetBody,
  TargetPatchBody,
  parseBody,
  validateAck,
  validateTarget,
  validateTargetPatch
} from './schemas';

const log = scopedLogger('transports/sse');

/** SSE framing: "event: …\ndata: …\n\n". */
export function pushEvent(res: Response, event: string, data: unknown): void {
  res.write(`event: ${event}\n`);
  res.write(`data: ${JSON.stringify(data)}\n\n`);
}

export function openEventStream(res: Response): void {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no'); // nginx passthrough
  res.flushHeaders();
}

function generateTargetId(): string {
  return `target_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

// ---------------------------------------------------------------------------
// RemoteTarget
// ---------------------------------------------------------------------------

/**
 * InjectionTarget backed by an SSE stream. Input events stay "pending" until
 * the host acknowledges them.
 */
export class RemoteTarget implements InjectionTarget {
  private stream: Response | null = null;
  private bounds: Rect;
  private visible: boolean;
  private scaleFactor: number;
  private focused: boolean;
  private unacked = 0;
  private blocked = false;

  constructor(readonly id: string, init: TargetBody) {
    this.bounds = { ...init.bounds };
    this.visible = init.visible ?? true;
    this.scaleFactor = init.scaleFactor ?? 1;
    this.focused = init.focused ?? false;
  }

  update(patch: TargetPatchBody): void {
    if (patch.bounds) this.bounds = { ...patch.bounds };
    if (patch.visible !== undefined) this.visible = patch.visible;
    if (patch.scaleFactor !== undefined) this.scaleFactor = patch.scaleFactor;
    if (patch.focused !== undefined) this.focused = patch.focused;
  }

  /** Attaches the host's event stream, replacing any previous one. */
  attach(stream: Response): void {
    if (this.stream && this.stream !== stream) this.stream.end();
    this.stream = stream;
    this.unacked = 0;
    pushEvent(stream, 'connect', { id: this.id, nativeInputBlocked: this.blocked });
  }

  detach(stream: Response): void {
    if (this.stream === stream) this.stream = null;
  }

  close(): void {
    this.stream?.end();
    this.stream = null;
  }

  /** Returns the number still pending. */
  acknowledge(count: number): number {
    this.unacked = Math.max(0, this.unacked - count);
    return this.unacked;
  }

  get pending(): number {
    return this.unacked;
  }

  get connected(): boolean {
    return this.stream !== null;
  }

  // --- InjectionTarget ---

  getBounds(): Rect {
    return this.bounds;
  }

  isVisible(): boolean {
    return this.visible;
  }

  getScaleFactor(): number {
    return this.scaleFactor;
  }

  hasFocus(): boolean {
    return this.focused;
  }

  focus(): void {
    this.focused = true;
    this.push('focus', {});
  }

  focusContent(): void {
    this.push('focusContent', {});
  }

  setNativeInputBlocked(blocked: boolean): void {
    this.blocked = blocked;
    this.push('nativeInput', { blocked });
  }

  hasPendingEvents(): boolean {
    return this.unacked > 0;
  }

  resetPipeline(): void {
    this.unacked = 0;
    this.push('reset', {});
  }

  isIgnoringEvents(): boolean {
    return this.stream === null;
  }

  forward(event: SyntheticEvent): void {
    if (this.push('input', event)) this.unacked++;
  }

  private push(event: string, data: unknown): boolean {
    if (!this.stream) {
      log.debug({ target: this.id, event }, 'No stream attached, event dropped');
      return false;
    }
    pushEvent(this.stream, event, data);
    return true;
  }
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

interface TargetEntry {
  target: RemoteTarget;
  handle: TargetHandle;
}

export function createTargetRouter(context: BridgeContext): Router {
  const router = express.Router();
  const targets = new Map<string, TargetEntry>();

  const lookup = (req: Request): TargetEntry => {
    const entry = targets.get(req.params.id);
    if (!entry) throw new UnknownTargetError(req.params.id);
    return entry;
  };

  router.post('/targets', (req: Request, res: Response) => {
    const body = parseBody(validateTarget, 'POST /targets', req.body);
    const target = new RemoteTarget(generateTargetId(), body);
    const handle = context.controller.registerTarget(target);
    targets.set(target.id, { target, handle });
    log.info({ target: target.id, handle: handle.toString() }, 'Remote target registered');
    res.status(201).json({ id: target.id });
  });

  router.patch('/targets/:id', (req: Request, res: Response) => {
    const { target } = lookup(req);
    target.update(parseBody(validateTargetPatch, 'PATCH /targets/:id', req.body));
    res.json({
      id: target.id,
      bounds: target.getBounds(),
      visible: target.isVisible(),
      scaleFactor: target.getScaleFactor(),
      focused: target.hasFocus()
    });
  });

  router.delete('/targets/:id', (req: Request, res: Response) => {
    const { target, handle } = lookup(req);
    context.controller.unregisterTarget(handle);
    target.close();
    targets.delete(target.id);
    log.info({ target: target.id }, 'Remote target unregistered');
    res.status(204).end();
  });

  router.get('/targets/:id/events', (req: Request, res: Response) => {
    const { target } = lookup(req);
    openEventStream(res);
    target.attach(res);
    log.info({ target: target.id }, 'Remote target stream attached');

    req.on('close', () => {
      target.detach(res);
      log.info({ target: target.id }, 'Remote target stream detached');
    });
  });

  router.post('/targets/:id/ack', (req: Request, res: Response) => {
    const { target } = lookup(req);
    const { count } = parseBody(validateAck, 'POST /targets/:id/ack', req.body);
    res.json({ pending: target.acknowledge(count) });
  });

  router.get('/targets', (_req: Request, res: Response) => {
    res.json({
      targets: [...targets.values()].map(({ target }) => ({
        id: target.id,
        connected: target.connected,
        pending: target.pending,
        visible: target.isVisible()
      }))
    });
  });

  return router;
}
