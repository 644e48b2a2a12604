/**
 * Hands out strictly increasing versions for messages created on this node.
 *
 * Versions follow the wall clock when it is ahead, so a restarted node keeps
 * issuing versions above everything it issued before the restart.
 */
export class VersionClock {
  private last: number;
  private now: () => number;

  constructor(now: () => number = Date.now, start: number = 0) {
    this.now = now;
    this.last = start;
  }

  public next(): number {
    this.last = Math.max(this.last + 1, this.now());
    return this.last;
  }

  public current(): number {
    return this.last;
  }
}
