/**
 * controller/roster.ts
 *
 * Users known to the server, indexed by mouse hwid, plus the
 * keyboard → mouse mapping used to route key events.
 */

import { UserInfo } from '../core/types';

export class Roster {
  private readonly byMouse = new Map<number, UserInfo>();
  private readonly keyboardToMouse = new Map<number, number>();

  /** Rebuilds from a full user list. */
  replace(users: UserInfo[]): void {
    this.clear();
    for (const user of users) this.upsert(user);
  }

  upsert(user: UserInfo): void {
    this.byMouse.set(user.hwidMouse, user);
    if (user.hwidKeyboard !== 0) {
      this.keyboardToMouse.set(user.hwidKeyboard, user.hwidMouse);
    }
  }

  remove(hwidMouse: number, hwidKeyboard: number): void {
    this.byMouse.delete(hwidMouse);
    this.keyboardToMouse.delete(hwidKeyboard);
  }

  clear(): void {
    this.byMouse.clear();
    this.keyboardToMouse.clear();
  }

  nameOf(hwidMouse: number): string {
    return this.byMouse.get(hwidMouse)?.name ?? '';
  }

  mouseForKeyboard(hwidKeyboard: number): number | undefined {
    return this.keyboardToMouse.get(hwidKeyboard);
  }

  /** Keyboard mapped to the given mouse, or undefined. */
  keyboardFor(hwidMouse: number): number | undefined {
    const keyboard = this.byMouse.get(hwidMouse)?.hwidKeyboard;
    return keyboard ? keyboard : undefined;
  }

  list(): UserInfo[] {
    return [...this.byMouse.values()];
  }

  get size(): number {
    return this.byMouse.size;
  }
}
