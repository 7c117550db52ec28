/**
 * Monotonic sequence numbers shared by every producer of observations
 * (watcher, scans, executor). Later numbers win when observations disagree.
 */
export class Sequencer {
  private value = 0;

  next(): number {
    this.value += 1;
    return this.value;
  }

  /**
   * Move past a number handed out elsewhere
   */
  observe(sequence: number): void {
    if (sequence > this.value) this.value = sequence;
  }

  current(): number {
    return this.value;
  }
}
