// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Runs async tasks one at a time, in submission order.
 *
 * The log and its anchor are treated as one resource: every task that writes
 * either of them, or that captures a snapshot of both, goes through the same
 * queue. A failed task rejects its own promise and does not block the tasks
 * queued behind it.
 */
export class CommitQueue {
  #tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.#tail.then(task);
    this.#tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
