import type { Access, ExclusivityCell } from './exclusivity-cell.js';
import { EmptyRequiredSlotError, SlotOccupiedError } from './errors.js';

/**
 * Container for at most one cell.
 *
 * Dispatching an empty slot is a wiring error, never a silent no-op.
 */
export class Slot<T> {
  private occupant: ExclusivityCell<T> | null = null;

  constructor(readonly name: string = 'slot') {}

  get isEmpty(): boolean {
    return this.occupant === null;
  }

  get current(): ExclusivityCell<T> | null {
    return this.occupant;
  }

  /** @throws SlotOccupiedError if a cell is already held */
  insert(cell: ExclusivityCell<T>): void {
    if (this.occupant) {
      throw new SlotOccupiedError(this.name);
    }
    this.occupant = cell;
  }

  /** @throws EmptyRequiredSlotError if the slot is empty */
  remove(): ExclusivityCell<T> {
    const cell = this.require();
    this.occupant = null;
    return cell;
  }

  /** @throws EmptyRequiredSlotError if the slot is empty */
  dispatch<R>(fn: (payload: T, access: Access<T>) => R): R {
    return this.require().dispatch(fn);
  }

  /** @throws EmptyRequiredSlotError if the slot is empty */
  dispatchShared<R>(fn: (payload: Readonly<T>, access: Access<T>) => R): R {
    return this.require().dispatchShared(fn);
  }

  private require(): ExclusivityCell<T> {
    if (!this.occupant) {
      throw new EmptyRequiredSlotError(this.name);
    }
    return this.occupant;
  }
}
