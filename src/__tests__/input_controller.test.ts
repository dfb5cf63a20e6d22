import { MessageType } from '../protocol/messages';
import { FakeTarget } from './helpers/fakes';
import {
  ALICE,
  BOB,
  WM_KEYDOWN,
  WM_KEYUP,
  button,
  createHarness,
  createOwnedHarness,
  key,
  motion,
  userList,
  wheel
} from './helpers/harness';

const countRosterRequests = (types: string[]) => types.filter(t => t === 'user.list.request.A2M').length;

describe('InputController (connection effects)', () => {
  it('should reset state and request the roster on connect', () => {
    const h = createHarness();
    h.controller.setEnabled(true);
    h.transport().open();
    h.queue.flush();

    expect(h.events).toEqual(['connection:true', 'capture:false', 'ownership:-1:']);
    expect(h.transport().sentTypes()).toEqual(['client.login.request.A2M', 'user.list.request.A2M']);
    expect(h.controller.isEnabled()).toBe(true);
    expect(h.controller.getConnectionState()).toBe('open');
  });

  it('should report initialized before the first enable', () => {
    const h = createHarness();
    expect(h.controller.getConnectionState()).toBe('initialized');
    expect(h.controller.isEnabled()).toBe(false);
  });

  it('should be idempotent when enabled twice', () => {
    const h = createHarness();
    h.connect();
    h.controller.setEnabled(true);
    expect(h.factory.transports).toHaveLength(1);
  });

  it('should apply observer callbacks only once they run on the queue', () => {
    const h = createHarness();
    const target = new FakeTarget({ x: 0, y: 0, width: 100, height: 100 });
    h.controller.registerTarget(target);

    h.controller.onMouseButton(0x10, 10, 10, 0x01);
    expect(h.controller.getOwnerHwid()).toBe(-1);

    h.queue.flush();
    expect(h.controller.getOwnerHwid()).toBe(0x10);
    expect(target.eventTypes()).toEqual(['mouseDown']);
  });

  // Scenario F
  it('should notify capture false and then ownership -1 on disconnect while captured', () => {
    const h = createOwnedHarness();
    expect(h.controller.captureOwner()).toBe(true);
    h.events.length = 0;

    h.controller.setEnabled(false);
    h.queue.flush();

    expect(h.events).toEqual(['connection:false', 'capture:false', 'ownership:-1:']);
    expect(h.controller.isCaptured()).toBe(false);
    expect(h.controller.getOwnerHwid()).toBe(-1);
    expect(h.controller.getRoster()).toEqual([]);
    expect(h.controller.isEnabled()).toBe(false);
  });

  it('should forward timeout notifications and reset after the session stops', () => {
    const h = createOwnedHarness();
    h.receive({ type: MessageType.TimeoutWarning, minutes: 5 });
    h.receive({ type: MessageType.TimeoutStopped, reason: 'idle' });

    expect(h.events).toEqual([
      'timeoutWarning:5',
      'timeoutStopped:idle',
      'connection:false',
      'capture:false',
      'ownership:-1:'
    ]);
  });
});

describe('InputController (ownership claim)', () => {
  // Scenario B
  it('should give ownership to the first left-down inside a visible target', () => {
    const h = createHarness();
    h.connect();
    h.receive(userList(ALICE, BOB));
    const target = new FakeTarget({ x: 0, y: 0, width: 800, height: 600 });
    h.controller.registerTarget(target);

    h.receive(button(0x10, 100, 100, 0x01));

    expect(h.controller.getOwnerHwid()).toBe(0x10);
    expect(h.controller.getOwnerName()).toBe('alice');
    expect(h.events).toEqual(['ownership:16:alice']);
    expect(target.events).toEqual([{
      type: 'mouseDown',
      button: 'left',
      clickCount: 1,
      heldButtons: 0x01,
      modifiers: 0x100,
      widget: { x: 100, y: 100 },
      screen: { x: 100, y: 100 },
      timestamp: 1000
    }]);
    expect(target.calls).toEqual(['blocked:false', 'focus', 'focusContent']);
  });

  it('should discard a click when no targets are registered', () => {
    const h = createHarness();
    h.connect();
    h.receive(button(0x10, 100, 100, 0x01));
    expect(h.controller.getOwnerHwid()).toBe(-1);
    expect(h.events).toEqual([]);
  });

  it('should only claim on left-down', () => {
    const h = createHarness();
    h.connect();
    const target = new FakeTarget({ x: 0, y: 0, width: 800, height: 600 });
    h.controller.registerTarget(target);

    h.receive(button(0x10, 100, 100, 0x04));
    expect(h.controller.getOwnerHwid()).toBe(-1);
    expect(target.events).toEqual([]);
  });

  it('should claim optimistically when the click misses every target', () => {
    const h = createHarness();
    h.connect();
    const target = new FakeTarget({ x: 0, y: 0, width: 100, height: 100 });
    h.controller.registerTarget(target);

    h.receive(button(0x10, 500, 500, 0x01));

    expect(h.controller.getOwnerHwid()).toBe(0x10);
    expect(target.events).toHaveLength(1);
    expect(target.events[0]).toMatchObject({ type: 'mouseDown', widget: { x: 500, y: 500 } });
  });

  it('should discard a missed click under the hit-test-only policy', () => {
    const h = createHarness({ ownershipClaimPolicy: 'hitTestOnly' });
    h.connect();
    const target = new FakeTarget({ x: 0, y: 0, width: 100, height: 100 });
    h.controller.registerTarget(target);

    h.receive(button(0x10, 500, 500, 0x01));

    expect(h.controller.getOwnerHwid()).toBe(-1);
    expect(target.events).toEqual([]);
  });

  it('should hit-test in DIP using the first visible target scale', () => {
    const h = createHarness();
    h.connect();
    const left = new FakeTarget({ x: 0, y: 0, width: 400, height: 300 }, true, 2);
    const right = new FakeTarget({ x: 400, y: 0, width: 400, height: 300 }, true, 2);
    h.controller.registerTarget(left);
    h.controller.registerTarget(right);

    h.receive(button(0x10, 1000, 100, 0x01));

    expect(left.events).toEqual([]);
    expect(right.events).toHaveLength(1);
    expect(right.events[0]).toMatchObject({ screen: { x: 500, y: 50 }, widget: { x: 100, y: 50 } });
  });

  it('should never let another device take ownership', () => {
    const h = createOwnedHarness();
    h.receive(button(0x11, 100, 100, 0x01));

    expect(h.controller.getOwnerHwid()).toBe(0x10);
    expect(h.events).toEqual([]);
    expect(h.target.events).toEqual([]);
  });

  it('should re-announce the owner once the roster names it', () => {
    const h = createHarness();
    h.connect();
    h.controller.registerTarget(new FakeTarget({ x: 0, y: 0, width: 800, height: 600 }));

    h.receive(button(0x10, 100, 100, 0x01));
    h.receive(userList(ALICE));

    expect(h.events).toEqual(['ownership:16:', 'ownership:16:alice']);
  });

  // Scenario D
  it('should clear ownership and keys when the owner is disposed', () => {
    const h = createOwnedHarness();
    h.receive(key(0x20, 0x41, WM_KEYDOWN));
    expect(h.controller.getOwnershipState().pressedKeys).toEqual([0x41]);

    h.receive({ type: MessageType.UserDispose, hwid_ms: 0x10, hwid_kb: 0x20 });

    expect(h.controller.getOwnershipState()).toEqual({
      ownerHwid: -1,
      captured: false,
      buttonMask: 0,
      pressedKeys: []
    });
    expect(h.events).toEqual(['ownership:-1:']);
    expect(h.controller.getRoster().map(u => u.name)).toEqual(['bob']);
  });

  it('should drop capture before ownership when a captured owner is disposed', () => {
    const h = createOwnedHarness();
    h.controller.captureOwner();
    h.events.length = 0;

    h.receive({ type: MessageType.UserDispose, hwid_ms: 0x10, hwid_kb: 0x20 });

    expect(h.events).toEqual(['capture:false', 'ownership:-1:']);
    expect(h.controller.isCaptured()).toBe(false);
    expect(h.transport().sentTypes().slice(-1)).toEqual(['pointer.capture.request.A2M']);
  });

  it('should leave ownership alone when another user is disposed', () => {
    const h = createOwnedHarness();
    h.receive({ type: MessageType.UserDispose, hwid_ms: 0x11, hwid_kb: 0x21 });
    expect(h.controller.getOwnerHwid()).toBe(0x10);
    expect(h.events).toEqual([]);
  });

  it('should release capture before clearing the owner on explicit release', () => {
    const h = createOwnedHarness();
    h.controller.captureOwner();
    h.events.length = 0;

    h.controller.releaseOwnership();

    expect(h.events).toEqual(['capture:false', 'ownership:-1:']);
    expect(h.transport().sentTypes().slice(-1)).toEqual(['pointer.capture.release.request.A2M']);
  });

  it('should not carry held keys over to the next owner after a release', () => {
    const h = createOwnedHarness();
    h.receive(key(0x20, 0xa0, WM_KEYDOWN));

    h.controller.releaseOwnership();
    expect(h.controller.getOwnershipState().pressedKeys).toEqual([]);

    h.receive(button(0x11, 100, 100, 0x01));
    expect(h.controller.getOwnerHwid()).toBe(0x11);
    h.receive(key(0x21, 0x41, WM_KEYDOWN));

    expect(h.target.events[h.target.events.length - 1]).toEqual({
      type: 'rawKeyDown',
      keyCode: 0x41,
      code: 'KeyA',
      key: 'a',
      modifiers: 0x100,
      timestamp: 1000
    });
  });
});

describe('InputController (pointer injection)', () => {
  it('should inject every asserted button bit in order and track held buttons', () => {
    const h = createOwnedHarness();
    h.receive(button(0x10, 50, 60, 0x04));
    expect(h.controller.getOwnershipState().buttonMask).toBe(0x04);

    h.clock.now = 2000;
    h.receive(motion(0x10, 70, 80));
    h.receive(button(0x10, 70, 80, 0x08 | 0x01));

    expect(h.target.eventTypes()).toEqual(['mouseDown', 'mouseMove', 'mouseDown', 'mouseUp']);
    expect(h.target.events[1]).toMatchObject({ button: 'none', clickCount: 0, heldButtons: 0x04 });
    expect(h.target.events[2]).toMatchObject({ button: 'left', heldButtons: 0x01 });
    expect(h.target.events[3]).toMatchObject({ button: 'right', heldButtons: 0x04 });
    expect(h.controller.getOwnershipState().buttonMask).toBe(0x01);
  });

  // Scenario C
  it('should inject at most one owner motion per throttle window', () => {
    const h = createOwnedHarness();
    [10, 11, 12, 13, 14].forEach((x, i) => {
      h.clock.now = 2000 + i * 5;
      h.receive(motion(0x10, x, 0));
    });

    expect(h.target.events.map(e => (e.type === 'mouseMove' ? e.widget.x : -1))).toEqual([10, 14]);
  });

  it('should flush the last throttled sample before the next button', () => {
    const h = createOwnedHarness();
    h.clock.now = 2000;
    h.receive(motion(0x10, 10, 0));
    h.clock.now = 2005;
    h.receive(motion(0x10, 11, 0));
    h.clock.now = 2010;
    h.receive(motion(0x10, 12, 0));
    h.clock.now = 2011;
    h.receive(button(0x10, 12, 0, 0x01));

    expect(h.target.eventTypes()).toEqual(['mouseMove', 'mouseMove', 'mouseDown']);
    expect(h.target.events[1]).toMatchObject({ widget: { x: 12, y: 0 } });
  });

  it('should restart the throttle window when a pending sample is flushed', () => {
    const h = createOwnedHarness();
    h.clock.now = 2000;
    h.receive(motion(0x10, 10, 0));
    h.clock.now = 2005;
    h.receive(motion(0x10, 11, 0));
    h.clock.now = 2010;
    h.receive(button(0x10, 11, 0, 0x01));
    h.clock.now = 2020;
    h.receive(motion(0x10, 12, 0));
    expect(h.target.eventTypes()).toEqual(['mouseMove', 'mouseMove', 'mouseDown']);

    h.clock.now = 2026;
    h.receive(motion(0x10, 13, 0));
    expect(h.target.eventTypes()).toEqual(['mouseMove', 'mouseMove', 'mouseDown', 'mouseMove']);
    expect(h.target.events[3]).toMatchObject({ widget: { x: 13, y: 0 } });
  });

  it('should only record positions for non-owner motion', () => {
    const h = createOwnedHarness();
    h.receive(motion(0x11, 300, 200));
    expect(h.target.events).toEqual([]);
    expect(h.controller.getDevicePosition(0x11)).toEqual({ x: 300, y: 200 });
  });

  it('should fall back to the first visible target when nothing is under the point', () => {
    const h = createOwnedHarness();
    const second = new FakeTarget({ x: 1000, y: 0, width: 100, height: 100 });
    h.controller.registerTarget(second);
    h.target.visible = false;

    h.clock.now = 2000;
    h.receive(motion(0x10, 5, 5));

    expect(h.target.events).toEqual([]);
    expect(second.events).toHaveLength(1);
    expect(second.events[0]).toMatchObject({ widget: { x: -995, y: 5 } });
  });

  it('should fall back to the first registered target when none is visible', () => {
    const h = createOwnedHarness();
    h.target.visible = false;
    h.clock.now = 2000;
    h.receive(motion(0x10, 5, 5));
    expect(h.target.eventTypes()).toEqual(['mouseMove']);
  });
});

describe('InputController (wheel)', () => {
  it('should scale raw units to pixels with one tick in the scroll direction', () => {
    const h = createOwnedHarness();
    h.receive(wheel(0x10, 100, 100, -120));
    h.receive(wheel(0x10, 100, 100, 240, true));

    const [vertical, horizontal] = h.target.events;
    expect(vertical.type).toBe('wheel');
    expect(horizontal.type).toBe('wheel');
    if (vertical.type !== 'wheel' || horizontal.type !== 'wheel') return;

    expect(vertical.deltaY).toBeCloseTo(-40);
    expect(vertical.deltaX).toBe(0);
    expect(vertical.ticksY).toBe(-1);
    expect(vertical.ticksX).toBe(0);
    expect(horizontal.deltaX).toBeCloseTo(80);
    expect(horizontal.ticksX).toBe(1);
    expect(horizontal.ticksY).toBe(0);
    expect(horizontal).toMatchObject({ phase: 'began', units: 'precisePixel', modifiers: 0x100 });
  });

  it('should honour a configured wheel scale', () => {
    const h = createOwnedHarness({ wheelDeltaScale: 1 });
    h.receive(wheel(0x10, 100, 100, 120));
    expect(h.target.events[0]).toMatchObject({ deltaY: 120, ticksY: 1 });
  });

  it('should ignore wheel from a non-owner', () => {
    const h = createOwnedHarness();
    h.receive(wheel(0x11, 100, 100, 120));
    expect(h.target.events).toEqual([]);
  });
});

describe('InputController (keyboard)', () => {
  // Scenario A
  it('should drop a mapped keyboard before anyone owns the host', () => {
    const h = createHarness();
    h.connect();
    h.receive(userList({ id: 1, name: 'alice', devices: [{ hwid: 0x10, type: 'pointer' }, { hwid: 0x20, type: 'keyboard' }] }));
    const target = new FakeTarget({ x: 0, y: 0, width: 800, height: 600 });
    h.controller.registerTarget(target);

    h.receive(key(0x20, 0x41, WM_KEYDOWN));

    expect(target.events).toEqual([]);
    expect(h.controller.getOwnerHwid()).toBe(-1);
    expect(countRosterRequests(h.transport().sentTypes())).toBe(1);
  });

  it('should inject the owner keyboard into the first target', () => {
    const h = createOwnedHarness();
    h.clock.now = 3000;
    h.receive(key(0x20, 0x41, WM_KEYDOWN));
    h.receive(key(0x20, 0x41, WM_KEYUP));

    expect(h.target.events).toEqual([
      { type: 'rawKeyDown', keyCode: 0x41, code: 'KeyA', key: 'a', modifiers: 0x100, timestamp: 3000 },
      { type: 'keyUp', keyCode: 0x41, code: 'KeyA', key: 'a', modifiers: 0x100, timestamp: 3000 }
    ]);
  });

  it('should carry live modifiers from the pressed set', () => {
    const h = createOwnedHarness();
    h.receive(key(0x20, 0xa0, WM_KEYDOWN));
    h.receive(key(0x20, 0x41, WM_KEYDOWN));

    expect(h.target.events[1]).toMatchObject({ key: 'A', modifiers: 0x101 });
  });

  it('should drop keys from a keyboard that is not the owner', () => {
    const h = createOwnedHarness();
    h.receive(key(0x21, 0x41, WM_KEYDOWN));
    expect(h.target.events).toEqual([]);
  });

  it('should ignore message kinds that are neither down nor up', () => {
    const h = createOwnedHarness();
    h.receive(key(0x20, 0x41, 0x102));
    expect(h.target.events).toEqual([]);
    expect(h.controller.getOwnershipState().pressedKeys).toEqual([]);
  });

  it('should mark repeated downs and let the filter consume keys', () => {
    const h = createOwnedHarness();
    const seen: Array<{ code?: string; repeat: boolean; down: boolean }> = [];
    h.controller.setKeyboardFilter(event => {
      seen.push({ code: event.code, repeat: event.repeat, down: event.down });
      return event.code === 'KeyQ';
    });

    h.receive(key(0x20, 0x41, WM_KEYDOWN));
    h.receive(key(0x20, 0x41, WM_KEYDOWN));
    h.receive(key(0x20, 0x51, WM_KEYDOWN));

    expect(seen).toEqual([
      { code: 'KeyA', repeat: false, down: true },
      { code: 'KeyA', repeat: true, down: true },
      { code: 'KeyQ', repeat: false, down: true }
    ]);
    expect(h.target.eventTypes()).toEqual(['rawKeyDown', 'rawKeyDown']);
  });

  // Scenario E
  it('should rate-limit roster refreshes for an unknown keyboard', () => {
    const h = createHarness();
    h.connect();
    expect(countRosterRequests(h.transport().sentTypes())).toBe(1);

    h.clock.now = 5000;
    h.receive(key(0x30, 0x41, WM_KEYDOWN));
    expect(countRosterRequests(h.transport().sentTypes())).toBe(2);

    h.clock.now = 5500;
    h.receive(key(0x30, 0x41, WM_KEYDOWN));
    expect(countRosterRequests(h.transport().sentTypes())).toBe(2);

    h.clock.now = 7100;
    h.receive(key(0x30, 0x41, WM_KEYDOWN));
    expect(countRosterRequests(h.transport().sentTypes())).toBe(3);
  });
});

describe('InputController (capture)', () => {
  it('should refuse capture without an owner', () => {
    const h = createHarness();
    h.connect();
    expect(h.controller.captureOwner()).toBe(false);
    expect(h.events).toEqual([]);
  });

  it('should capture and release the owner once each', () => {
    const h = createOwnedHarness();

    expect(h.controller.captureOwner()).toBe(true);
    expect(h.controller.captureOwner()).toBe(false);
    expect(h.transport().messages().slice(-1)).toEqual([{ type: 'pointer.capture.request.A2M', hwid: 0x10 }]);

    expect(h.controller.releaseCapture()).toBe(true);
    expect(h.controller.releaseCapture()).toBe(false);
    expect(h.transport().messages().slice(-1)).toEqual([{ type: 'pointer.capture.release.request.A2M', hwid: 0x10 }]);

    expect(h.events).toEqual(['capture:true', 'capture:false']);
  });
});

describe('InputController (targets)', () => {
  it('should push native input blocking to current and future targets', () => {
    const h = createHarness();
    const first = new FakeTarget({ x: 0, y: 0, width: 10, height: 10 });
    h.controller.registerTarget(first);
    h.controller.setNativeInputBlocked(true);
    const second = new FakeTarget({ x: 0, y: 0, width: 10, height: 10 });
    h.controller.registerTarget(second);

    expect(first.calls).toEqual(['blocked:false', 'blocked:true']);
    expect(second.calls).toEqual(['blocked:true']);
    expect(h.controller.isNativeInputBlocked()).toBe(true);
  });

  it('should stop delivering to an unregistered target', () => {
    const h = createOwnedHarness();
    const handle = h.controller.registerTarget(new FakeTarget({ x: 0, y: 0, width: 10, height: 10 }));
    expect(h.controller.getTargetCount()).toBe(2);
    expect(h.controller.unregisterTarget(handle)).toBe(true);
    expect(h.controller.unregisterTarget(handle)).toBe(false);
    expect(h.controller.getTargetCount()).toBe(1);
  });

  it('should reset a target pipeline that stays pending past the threshold', () => {
    const h = createOwnedHarness();
    h.target.pending = true;

    h.clock.now = 2000;
    h.receive(motion(0x10, 1, 1));
    h.clock.now = 2100;
    h.receive(motion(0x10, 2, 2));
    expect(h.target.calls).not.toContain('reset');

    h.clock.now = 2301;
    h.receive(motion(0x10, 3, 3));

    expect(h.target.calls.filter(c => c === 'reset')).toHaveLength(1);
    expect(h.target.eventTypes()).toEqual(['mouseMove', 'mouseMove', 'mouseMove']);
  });

  it('should reset a stuck pipeline on the wheel path too', () => {
    const h = createOwnedHarness();
    h.target.pending = true;

    h.clock.now = 2000;
    h.receive(wheel(0x10, 100, 100, 120));
    h.clock.now = 2300;
    h.receive(wheel(0x10, 100, 100, 120));
    expect(h.target.calls).not.toContain('reset');

    h.clock.now = 2301;
    h.receive(wheel(0x10, 100, 100, 120));

    expect(h.target.calls.filter(c => c === 'reset')).toHaveLength(1);
    expect(h.target.eventTypes()).toEqual(['wheel', 'wheel', 'wheel']);
  });

  it('should restart tracking once a target drains', () => {
    const h = createOwnedHarness();

    h.target.pending = true;
    h.clock.now = 2000;
    h.receive(motion(0x10, 1, 1));
    h.target.pending = false;
    h.clock.now = 2100;
    h.receive(motion(0x10, 2, 2));
    h.target.pending = true;
    h.clock.now = 2200;
    h.receive(motion(0x10, 3, 3));
    h.clock.now = 2450;
    h.receive(motion(0x10, 4, 4));

    expect(h.target.calls).not.toContain('reset');
  });
});

describe('InputController (listener channels)', () => {
  it('should keep one listener per kind and honour unsubscribe', () => {
    const h = createOwnedHarness();
    const first = jest.fn();
    const second = jest.fn();

    h.controller.subscribe('captureChanged', first);
    const unsubscribe = h.controller.subscribe('captureChanged', second);
    h.controller.captureOwner();

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledWith(true);

    unsubscribe();
    h.controller.releaseCapture();
    expect(second).toHaveBeenCalledTimes(1);
  });
});
