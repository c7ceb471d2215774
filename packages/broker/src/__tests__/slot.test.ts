import { describe, it, expect } from 'vitest';
import { ContextStack } from '../context-stack.js';
import { ExclusivityCell } from '../exclusivity-cell.js';
import { EmptyRequiredSlotError, SlotOccupiedError } from '../errors.js';
import { Slot } from '../slot.js';

describe('Slot', () => {
  const stack = new ContextStack();

  it('starts empty', () => {
    const slot = new Slot<string[]>('renderer');
    expect(slot.isEmpty).toBe(true);
    expect(slot.current).toBeNull();
  });

  it('dispatches to its occupant and returns the result', () => {
    const slot = new Slot<string[]>('renderer');
    const cell = new ExclusivityCell<string[]>([], stack, 'renderer-impl');
    slot.insert(cell);

    const length = slot.dispatch((lines) => lines.push('frame'));

    expect(length).toBe(1);
    expect(slot.dispatchShared((lines) => lines.join())).toBe('frame');
  });

  it('refuses a second occupant', () => {
    const slot = new Slot<string[]>('renderer');
    slot.insert(new ExclusivityCell<string[]>([], stack));

    expect(() => slot.insert(new ExclusivityCell<string[]>([], stack))).toThrow(
      'unable to register multiple items simultaneously: "renderer"',
    );
    expect(() => slot.insert(new ExclusivityCell<string[]>([], stack))).toThrow(SlotOccupiedError);
  });

  it('throws when dispatching an empty slot', () => {
    const slot = new Slot<string[]>('renderer');
    expect(() => slot.dispatch(() => undefined)).toThrow('no item in required slot "renderer"');
    expect(() => slot.dispatchShared(() => undefined)).toThrow(EmptyRequiredSlotError);
  });

  it('returns the removed occupant and accepts a new one', () => {
    const slot = new Slot<string[]>('renderer');
    const first = new ExclusivityCell<string[]>([], stack);
    slot.insert(first);

    expect(slot.remove()).toBe(first);
    expect(slot.isEmpty).toBe(true);
    expect(() => slot.remove()).toThrow(EmptyRequiredSlotError);

    const second = new ExclusivityCell<string[]>([], stack);
    slot.insert(second);
    expect(slot.current).toBe(second);
  });
});
