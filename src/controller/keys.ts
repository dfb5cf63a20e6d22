/**
 * controller/keys.ts
 *
 * Host key mapping. The server reports platform virtual-key codes and message
 * kinds; a KeyMapper turns them into key direction, DOM code/key and modifier
 * roles. windowsKeyMapper is the default because the server runs on Windows.
 */

import { EventModifier } from '../core/types';
import windowsKeyTable from './data/windows_keys.json';

export type KeyDirection = 'down' | 'up';
export type ModifierRole = 'shift' | 'control' | 'alt';

export interface KeyMapper {
  /** null for message kinds that are neither down nor up. */
  directionOf(message: number): KeyDirection | null;
  /** DOM `code` for the key, when known. */
  codeOf(vkey: number): string | undefined;
  /** DOM `key` for the key under the given modifiers, when known. */
  keyOf(vkey: number, modifiers: number): string | undefined;
  modifierRoleOf(vkey: number): ModifierRole | null;
}

// ---------------------------------------------------------------------------
// Windows
// ---------------------------------------------------------------------------

const WM_KEYDOWN    = 0x100;
const WM_KEYUP      = 0x101;
const WM_SYSKEYDOWN = 0x104;
const WM_SYSKEYUP   = 0x105;

const VK_0 = 0x30;
const VK_9 = 0x39;
const VK_A = 0x41;
const VK_Z = 0x5a;
const VK_F1 = 0x70;
const VK_F24 = 0x87;

const MODIFIER_ROLES = new Map<number, ModifierRole>([
  [0x10, 'shift'],   [0xa0, 'shift'],   [0xa1, 'shift'],
  [0x11, 'control'], [0xa2, 'control'], [0xa3, 'control'],
  [0x12, 'alt'],     [0xa4, 'alt'],     [0xa5, 'alt']
]);

const WINDOWS_KEYS = new Map<number, { code: string; key: string }>(
  windowsKeyTable.map(entry => [entry.vkey, { code: entry.code, key: entry.key }])
);

export const windowsKeyMapper: KeyMapper = {
  directionOf(message) {
    if (message === WM_KEYDOWN || message === WM_SYSKEYDOWN) return 'down';
    if (message === WM_KEYUP || message === WM_SYSKEYUP) return 'up';
    return null;
  },

  codeOf(vkey) {
    if (vkey >= VK_A && vkey <= VK_Z) return `Key${String.fromCharCode(vkey)}`;
    if (vkey >= VK_0 && vkey <= VK_9) return `Digit${String.fromCharCode(vkey)}`;
    if (vkey >= VK_F1 && vkey <= VK_F24) return `F${vkey - VK_F1 + 1}`;
    return WINDOWS_KEYS.get(vkey)?.code;
  },

  keyOf(vkey, modifiers) {
    if (vkey >= VK_A && vkey <= VK_Z) {
      const letter = String.fromCharCode(vkey);
      return modifiers & EventModifier.Shift ? letter : letter.toLowerCase();
    }
    if (vkey >= VK_0 && vkey <= VK_9) return String.fromCharCode(vkey);
    if (vkey >= VK_F1 && vkey <= VK_F24) return `F${vkey - VK_F1 + 1}`;
    return WINDOWS_KEYS.get(vkey)?.key;
  },

  modifierRoleOf(vkey) {
    return MODIFIER_ROLES.get(vkey) ?? null;
  }
};

/** Modifier bits implied by the set of currently pressed keys. */
export function modifiersFrom(pressed: Iterable<number>, mapper: KeyMapper): number {
  let modifiers = 0;
  for (const vkey of pressed) {
    switch (mapper.modifierRoleOf(vkey)) {
      case 'shift':   modifiers |= EventModifier.Shift; break;
      case 'control': modifiers |= EventModifier.Control; break;
      case 'alt':     modifiers |= EventModifier.Alt; break;
      default: break;
    }
  }
  return modifiers;
}
