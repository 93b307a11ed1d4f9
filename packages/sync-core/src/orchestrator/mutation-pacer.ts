/**
 * Mutation Pacer
 *
 * Inserts a fixed pause between consecutive mutating calls. The first call
 * of a phase goes out immediately; dry runs never sleep.
 */

import { sleep as defaultSleep } from '@dirsync/core';

export class MutationPacer {
  private calls = 0;

  constructor(
    private readonly delayMs: number,
    private readonly dryRun: boolean,
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep
  ) {}

  async run<T>(call: () => Promise<T>): Promise<T> {
    if (this.calls > 0 && !this.dryRun && this.delayMs > 0) {
      await this.sleep(this.delayMs);
    }
    this.calls += 1;
    return call();
  }
}
