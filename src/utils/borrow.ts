/***
 * Borrow — Lock and epoch bookkeeping for one open iteration.
 *
 * A Borrow is created with the world's current structural epoch. The
 * first step of an iteration acquires the world lock; finishing,
 * breaking out of a loop, or a throwing callback releases it. While the
 * lock is held every structural change on the world throws before it
 * touches anything.
 *
 * An iterator that is stepped by hand and then dropped keeps the world
 * locked until its return() is called. An iterator created before a
 * structural change and first stepped after it throws on that step.
 *
 ***/

import { ECS_ERROR, ECSError } from "./error";

/** What a Borrow needs from the World. */
export interface BorrowSource {
  readonly _epoch: number;
  _enter_iteration(): void;
  _leave_iteration(): void;
}

export class Borrow {
  private readonly source: BorrowSource;
  private readonly epoch: number;
  private readonly label: string;
  private held = false;

  constructor(source: BorrowSource, label: string) {
    this.source = source;
    this.epoch = source._epoch;
    this.label = label;
  }

  get is_held(): boolean {
    return this.held;
  }

  /** Throw if the world changed structurally since this borrow was created. */
  check(): void {
    if (this.source._epoch === this.epoch) return;
    this.release();
    throw new ECSError(
      ECS_ERROR.STRUCTURAL_MUTATION_WHILE_BORROWED,
      `World was structurally modified while a ${this.label} was iterating`,
      { epoch_at_start: this.epoch, epoch_now: this.source._epoch },
    );
  }

  acquire(): void {
    if (this.held) return;
    this.source._enter_iteration();
    this.held = true;
  }

  release(): void {
    if (!this.held) return;
    this.held = false;
    this.source._leave_iteration();
  }
}
