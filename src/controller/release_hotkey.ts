/**
 * controller/release_hotkey.ts
 *
 * The chord that lets the owner drop capture from their own keyboard.
 * Installed as the controller's keyboard filter.
 */

import { ReleaseHotkeyId } from '../core/types';
import { scopedLogger } from '../core/logger';
import { InputController, KeyboardFilterEvent } from './input_controller';

const log = scopedLogger('controller/release_hotkey');

export interface ReleaseHotkey {
  id: ReleaseHotkeyId;
  label: string;
  code: string;                            // DOM code of the main key
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
}

export const RELEASE_HOTKEYS: readonly ReleaseHotkey[] = [
  { id: 'shift+escape',      label: 'Shift+Escape',      code: 'Escape', shift: true, ctrl: false, alt: false },
  { id: 'ctrl+shift+escape', label: 'Ctrl+Shift+Escape', code: 'Escape', shift: true, ctrl: true,  alt: false },
  { id: 'alt+shift+escape',  label: 'Alt+Shift+Escape',  code: 'Escape', shift: true, ctrl: false, alt: true },
  { id: 'shift+f12',         label: 'Shift+F12',         code: 'F12',    shift: true, ctrl: false, alt: false },
  { id: 'alt+shift+f12',     label: 'Alt+Shift+F12',     code: 'F12',    shift: true, ctrl: false, alt: true }
];

export const DEFAULT_RELEASE_HOTKEY: ReleaseHotkeyId = 'shift+escape';

export function findReleaseHotkey(id: string): ReleaseHotkey | undefined {
  return RELEASE_HOTKEYS.find(hotkey => hotkey.id === id);
}

export function matchesHotkey(hotkey: ReleaseHotkey, event: KeyboardFilterEvent): boolean {
  return event.code === hotkey.code &&
         event.shift === hotkey.shift &&
         event.ctrl === hotkey.ctrl &&
         event.alt === hotkey.alt;
}

export class ReleaseHotkeyBinding {
  private hotkey: ReleaseHotkey;

  constructor(private readonly controller: InputController, id: ReleaseHotkeyId = DEFAULT_RELEASE_HOTKEY) {
    this.hotkey = findReleaseHotkey(id) ?? RELEASE_HOTKEYS[0];
  }

  install(): void {
    this.controller.setKeyboardFilter(event => this.handle(event));
  }

  uninstall(): void {
    this.controller.setKeyboardFilter(null);
  }

  select(id: ReleaseHotkeyId): void {
    const hotkey = findReleaseHotkey(id);
    if (!hotkey) return;
    this.hotkey = hotkey;
    log.info({ hotkey: id }, 'Release hotkey selected');
  }

  get current(): ReleaseHotkey {
    return this.hotkey;
  }

  /** Keyboard filter: consumes the chord when it releases capture. */
  handle(event: KeyboardFilterEvent): boolean {
    if (!event.down || !this.controller.isCaptured()) return false;
    if (!matchesHotkey(this.hotkey, event)) return false;

    log.info({ hotkey: this.hotkey.id }, 'Release hotkey pressed');
    this.controller.releaseCapture();
    return true;
  }
}
