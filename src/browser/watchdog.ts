/**
 * Resettable one-shot timer. Activity pushes the deadline forward; when the deadline
 * passes without activity `onFire` runs once. A cancelled watchdog never fires.
 */
export class Watchdog {
  private timer: NodeJS.Timeout | null = null;
  private deadlineAt: number | null = null;
  private state: 'idle' | 'armed' | 'fired' | 'cancelled' = 'idle';

  constructor(
    readonly durationMs: number,
    private readonly onFire: () => void,
    private readonly now: () => number = Date.now,
  ) {}

  get deadline(): number | null {
    return this.deadlineAt;
  }

  get fired(): boolean {
    return this.state === 'fired';
  }

  get cancelled(): boolean {
    return this.state === 'cancelled';
  }

  arm(): void {
    if (this.state !== 'idle') {
      return;
    }
    this.state = 'armed';
    this.schedule();
  }

  reset(): void {
    if (this.state !== 'armed') {
      return;
    }
    this.schedule();
  }

  cancel(): void {
    if (this.state === 'fired' || this.state === 'cancelled') {
      return;
    }
    this.state = 'cancelled';
    this.clearTimer();
  }

  private schedule(): void {
    this.clearTimer();
    this.deadlineAt = this.now() + this.durationMs;
    this.timer = setTimeout(() => this.handleTimer(), this.durationMs);
  }

  private handleTimer(): void {
    this.timer = null;
    // A callback already queued when cancel() ran must not fire.
    if (this.state !== 'armed') {
      return;
    }
    this.state = 'fired';
    this.onFire();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
