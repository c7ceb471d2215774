/**
 * Ordered container of many cells.
 *
 * Dispatch visits members in list order and goes through each member's own
 * cell, so a handler that sits in several channels is protected per cell,
 * not per channel.
 *
 * @module broker/channel
 */
import type { Access, ExclusivityCell } from './exclusivity-cell.js';

interface Member<T> {
  key: number;
  cell: ExclusivityCell<T>;
}

export class Channel<T> {
  private members: Member<T>[] = [];

  constructor(readonly name: string = 'channel') {}

  get size(): number {
    return this.members.length;
  }

  /** Member cells in dispatch order. The same cell appears once per insertion. */
  cells(): ExclusivityCell<T>[] {
    return this.members.map((m) => m.cell);
  }

  has(cell: ExclusivityCell<T>): boolean {
    return this.members.some((m) => m.cell === cell);
  }

  /**
   * Insert a cell by ordering key.
   *
   * Members stay in ascending key order. Among members with an equal key, a
   * negative key is placed first and a zero or positive key last, so plain
   * `insert(cell)` appends.
   */
  insert(cell: ExclusivityCell<T>, key = 0): void {
    const member: Member<T> = { key, cell };
    if (key < 0) {
      const index = this.members.findIndex((m) => m.key >= key);
      this.members.splice(index === -1 ? this.members.length : index, 0, member);
      return;
    }
    let index = this.members.length;
    while (index > 0 && this.members[index - 1].key > key) index--;
    this.members.splice(index, 0, member);
  }

  /**
   * Remove every insertion of `cell`.
   *
   * @returns How many entries were removed
   */
  remove(cell: ExclusivityCell<T>): number {
    const before = this.members.length;
    this.members = this.members.filter((m) => m.cell !== cell);
    return before - this.members.length;
  }

  /**
   * Call `fn` with exclusive access to every member in order.
   *
   * Iterates over the membership as it was when the dispatch started.
   */
  dispatch(fn: (payload: T, access: Access<T>) => void): void {
    for (const member of [...this.members]) {
      member.cell.dispatch(fn);
    }
  }

  /** Read-only counterpart of {@link dispatch}. */
  dispatchShared(fn: (payload: Readonly<T>, access: Access<T>) => void): void {
    for (const member of [...this.members]) {
      member.cell.dispatchShared(fn);
    }
  }

  /**
   * Visit every member with exclusive access and drop those for which
   * `predicate` returns true. Survivors keep their relative order.
   *
   * @returns The removed cells, in visit order
   */
  removeIf(predicate: (payload: T, access: Access<T>) => boolean): ExclusivityCell<T>[] {
    const removed = new Set<Member<T>>();
    for (const member of [...this.members]) {
      if (member.cell.dispatch(predicate)) {
        removed.add(member);
      }
    }
    this.members = this.members.filter((m) => !removed.has(m));
    return [...removed].map((m) => m.cell);
  }

  /**
   * Stable sort by payload. The comparator gets shared access to both sides,
   * so a cell that is held exclusively cannot be sorted.
   */
  sortBy(compare: (a: Readonly<T>, b: Readonly<T>) => number): void {
    this.members.sort((a, b) =>
      a.cell.dispatchShared((left) => b.cell.dispatchShared((right) => compare(left, right))),
    );
  }
}
