import { modifiersFrom, windowsKeyMapper } from '../controller/keys';
import { EventModifier } from '../core/types';

describe('windowsKeyMapper', () => {
  it('should read direction from the message kind', () => {
    expect(windowsKeyMapper.directionOf(0x100)).toBe('down');
    expect(windowsKeyMapper.directionOf(0x104)).toBe('down');
    expect(windowsKeyMapper.directionOf(0x101)).toBe('up');
    expect(windowsKeyMapper.directionOf(0x105)).toBe('up');
    expect(windowsKeyMapper.directionOf(0x102)).toBeNull();
  });

  it('should map letters, digits and function keys', () => {
    expect(windowsKeyMapper.codeOf(0x41)).toBe('KeyA');
    expect(windowsKeyMapper.keyOf(0x41, 0)).toBe('a');
    expect(windowsKeyMapper.keyOf(0x41, EventModifier.Shift)).toBe('A');
    expect(windowsKeyMapper.codeOf(0x37)).toBe('Digit7');
    expect(windowsKeyMapper.keyOf(0x37, 0)).toBe('7');
    expect(windowsKeyMapper.codeOf(0x7b)).toBe('F12');
  });

  it('should map named keys from the table', () => {
    expect(windowsKeyMapper.codeOf(0x1b)).toBe('Escape');
    expect(windowsKeyMapper.keyOf(0x0d, 0)).toBe('Enter');
    expect(windowsKeyMapper.keyOf(0x20, 0)).toBe(' ');
    expect(windowsKeyMapper.codeOf(0xa1)).toBe('ShiftRight');
    expect(windowsKeyMapper.codeOf(0xff)).toBeUndefined();
  });

  it('should derive modifiers from the pressed set', () => {
    expect(modifiersFrom([0xa0, 0x41], windowsKeyMapper)).toBe(EventModifier.Shift);
    expect(modifiersFrom([0x11, 0xa5], windowsKeyMapper)).toBe(EventModifier.Control | EventModifier.Alt);
    expect(modifiersFrom([], windowsKeyMapper)).toBe(0);
  });
});
