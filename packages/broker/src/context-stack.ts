/**
 * Stack of active dispatches.
 *
 * One entry per dispatch currently running on a cell that reports to this
 * stack. The top entry is the only one a handler may suspend. Every hub hands
 * {@link processContextStack} to the cells it creates, so a dispatch that
 * crosses from one hub into another still sees the true innermost frame.
 *
 * @module broker/context-stack
 */
import type { AccessMode } from './types.js';

/** Minimal view of a cell, enough to identify it in diagnostics. */
export interface CellRef {
  readonly id: number;
  readonly label: string;
}

/** One active dispatch. `paused` is set while the dispatch is suspended. */
export interface StackEntry {
  readonly cell: CellRef;
  readonly mode: AccessMode;
  paused: boolean;
}

/** Plain description of a stack entry. */
export interface StackFrameInfo {
  cellId: number;
  label: string;
  mode: AccessMode;
  paused: boolean;
}

export class ContextStack {
  private readonly entries: StackEntry[] = [];

  /** Number of active dispatches, paused ones included. */
  get depth(): number {
    return this.entries.length;
  }

  /** The innermost active dispatch, if any. */
  top(): StackEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  push(cell: CellRef, mode: AccessMode): StackEntry {
    const entry: StackEntry = { cell, mode, paused: false };
    this.entries.push(entry);
    return entry;
  }

  /**
   * Pop `entry`, which must be the top of the stack.
   *
   * @throws Error if the stack is not in LIFO order
   */
  pop(entry: StackEntry): void {
    const top = this.top();
    if (top !== entry) {
      throw new Error(
        `ContextStack: expected ${entry.cell.label} on top, found ${top ? top.cell.label : 'nothing'}`,
      );
    }
    this.entries.pop();
  }

  /** Outermost first. */
  frames(): StackFrameInfo[] {
    return this.entries.map((e) => ({
      cellId: e.cell.id,
      label: e.cell.label,
      mode: e.mode,
      paused: e.paused,
    }));
  }
}

/** Stack shared by every hub in the process. Cells use it unless given another. */
export const processContextStack = new ContextStack();
