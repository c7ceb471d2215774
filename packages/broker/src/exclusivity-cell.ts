/**
 * Single-owner access primitive wrapping one handler payload.
 *
 * A cell is either free, held exclusively by one dispatch, or shared by one or
 * more read-only dispatches. Every dispatch pushes an entry onto the cell's
 * {@link ContextStack} and hands the callback an {@link Access} capability.
 * Passing that capability back to {@link ExclusivityCell.suspend} releases the
 * hold for the duration of a callback, which is the only way the same cell can
 * be dispatched twice on one call path.
 *
 * @module broker/exclusivity-cell
 */
import { processContextStack, type ContextStack, type StackEntry, type CellRef } from './context-stack.js';
import type { AccessMode, AccessState } from './types.js';
import { AlreadyBorrowedError, NotInContextError, UnexpectedItemError } from './errors.js';

let nextCellId = 1;

/**
 * Capability for the dispatch currently running on a cell.
 *
 * Only the cell creates these. Holding one is what entitles a handler to
 * suspend its own dispatch.
 */
export class Access<T> {
  /** @internal */
  constructor(
    readonly cell: ExclusivityCell<T>,
    readonly mode: AccessMode,
    readonly entry: StackEntry,
  ) {}

  /** Shorthand for `access.cell.suspend(access, fn)`. */
  suspend<R>(fn: () => R): R {
    return this.cell.suspend(this, fn);
  }
}

export class ExclusivityCell<T> implements CellRef {
  readonly id: number;
  readonly label: string;
  private accessState: AccessState = { kind: 'free' };

  /**
   * @param payload - The handler object this cell guards
   * @param stack - Stack shared with every cell that may appear on the same call path,
   *   {@link processContextStack} by default
   * @param label - Name used in error messages, `cell#<id>` by default
   */
  constructor(
    private readonly payload: T,
    private readonly stack: ContextStack = processContextStack,
    label?: string,
  ) {
    this.id = nextCellId++;
    this.label = label ?? `cell#${this.id}`;
  }

  get state(): AccessState {
    return { ...this.accessState };
  }

  get isFree(): boolean {
    return this.accessState.kind === 'free';
  }

  /**
   * Run `fn` with exclusive access to the payload.
   *
   * @throws AlreadyBorrowedError if the cell is held in any way
   */
  dispatch<R>(fn: (payload: T, access: Access<T>) => R): R {
    this.acquire('exclusive');
    const entry = this.stack.push(this, 'exclusive');
    try {
      return fn(this.payload, new Access(this, 'exclusive', entry));
    } finally {
      this.stack.pop(entry);
      this.release('exclusive');
    }
  }

  /**
   * Run `fn` with read-only access to the payload. Shared dispatches nest.
   *
   * @throws AlreadyBorrowedError if the cell is held exclusively
   */
  dispatchShared<R>(fn: (payload: Readonly<T>, access: Access<T>) => R): R {
    this.acquire('shared');
    const entry = this.stack.push(this, 'shared');
    try {
      return fn(this.payload, new Access(this, 'shared', entry));
    } finally {
      this.stack.pop(entry);
      this.release('shared');
    }
  }

  /**
   * Temporarily give up the hold taken by the innermost dispatch on this cell.
   *
   * While `fn` runs the cell is released (exclusive becomes free, shared drops
   * one reader), so a dispatch that reaches this cell again through another
   * channel succeeds. The hold is restored when `fn` returns or throws.
   *
   * @param access - Capability of the dispatch being suspended
   * @throws NotInContextError if no dispatch is active
   * @throws UnexpectedItemError if `access` is not the innermost, unsuspended dispatch of this cell
   */
  suspend<R>(access: Access<T>, fn: () => R): R {
    const top = this.stack.top();
    if (!top) {
      throw new NotInContextError(this.label);
    }
    if (access.cell !== this) {
      throw new UnexpectedItemError(this.label, `capability belongs to ${access.cell.label}`);
    }
    if (top !== access.entry) {
      throw new UnexpectedItemError(
        this.label,
        top.cell === this
          ? 'capability is not from the innermost dispatch'
          : `innermost dispatch is on ${top.cell.label}`,
      );
    }
    if (top.paused) {
      throw new UnexpectedItemError(this.label, 'dispatch is already suspended');
    }

    this.release(access.mode);
    top.paused = true;
    try {
      return fn();
    } finally {
      top.paused = false;
      this.acquire(access.mode);
    }
  }

  private acquire(mode: AccessMode): void {
    const state = this.accessState;
    if (mode === 'exclusive') {
      if (state.kind !== 'free') throw new AlreadyBorrowedError(this.label, mode);
      this.accessState = { kind: 'exclusive' };
      return;
    }
    if (state.kind === 'exclusive') throw new AlreadyBorrowedError(this.label, mode);
    this.accessState = { kind: 'shared', readers: state.kind === 'shared' ? state.readers + 1 : 1 };
  }

  private release(mode: AccessMode): void {
    const state = this.accessState;
    if (mode === 'shared' && state.kind === 'shared' && state.readers > 1) {
      this.accessState = { kind: 'shared', readers: state.readers - 1 };
      return;
    }
    this.accessState = { kind: 'free' };
  }
}
