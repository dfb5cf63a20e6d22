/**
 * core/context.ts
 *
 * BridgeContext, the explicit object holding everything one running bridge
 * needs: config, coordinating queue, controller and release hotkey.
 *
 *   const context = BridgeContext.create(config);
 *   context.init();
 *   ...
 *   context.teardown();
 */

import { ReleaseHotkeyId, SessionConfig } from './types';
import { SerialTaskQueue } from './serial_queue';
import { scopedLogger } from './logger';
import { InputController } from '../controller/input_controller';
import { ReleaseHotkeyBinding } from '../controller/release_hotkey';
import { KeyMapper } from '../controller/keys';
import { TransportFactory } from '../protocol/transport';
import { createWebSocketTransport } from '../transports/websocket';

const log = scopedLogger('core/context');

export interface BridgeContextOptions {
  transportFactory?: TransportFactory;
  keyMapper?: KeyMapper;
  now?: () => number;
}

type Lifecycle = 'created' | 'initialized' | 'tornDown';

export class BridgeContext {
  private lifecycle: Lifecycle = 'created';

  private constructor(
    readonly config: SessionConfig,
    readonly queue: SerialTaskQueue,
    readonly controller: InputController,
    readonly hotkey: ReleaseHotkeyBinding
  ) {}

  static create(config: SessionConfig, options: BridgeContextOptions = {}): BridgeContext {
    const queue = new SerialTaskQueue();
    const controller = new InputController(config, {
      queue,
      transportFactory: options.transportFactory ?? createWebSocketTransport(config.maxMessageBytes),
      keyMapper: options.keyMapper,
      now: options.now
    });
    const hotkey = new ReleaseHotkeyBinding(controller, config.releaseHotkey);
    return new BridgeContext(config, queue, controller, hotkey);
  }

  /** Applies the configured native blocking, hotkey and auto-connect. */
  init(): void {
    if (this.lifecycle !== 'created') return;
    this.lifecycle = 'initialized';

    this.controller.setNativeInputBlocked(this.config.nativeInputBlocked);
    this.hotkey.select(this.config.releaseHotkey);
    this.hotkey.install();

    if (this.config.autoConnect) {
      const started = this.controller.setEnabled(true);
      log.info({ url: this.config.serverUrl, started }, 'Auto-connect');
    }
    log.info({ hotkey: this.hotkey.current.id }, 'Bridge context initialised');
  }

  setReleaseHotkey(id: ReleaseHotkeyId): void {
    this.hotkey.select(id);
  }

  get initialized(): boolean {
    return this.lifecycle === 'initialized';
  }

  /** Disconnects, drops listeners and closes the queue. Idempotent. */
  teardown(): void {
    if (this.lifecycle === 'tornDown') return;
    this.lifecycle = 'tornDown';

    this.hotkey.uninstall();
    this.controller.shutdown();
    this.queue.close();
    log.info('Bridge context torn down');
  }
}
