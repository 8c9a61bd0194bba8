/**
 * A wait that can be cut short from anywhere. `wait()` settles after `ms`
 * (or only on `notify()` when no delay is given); `notify()` releases every
 * pending waiter and clears their timers.
 */
export class Wakeup {
  private readonly waiters = new Set<() => void>();

  wait(ms?: number): Promise<void> {
    return new Promise<void>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const release = () => {
        if (timer) clearTimeout(timer);
        this.waiters.delete(release);
        resolve();
      };
      this.waiters.add(release);
      if (ms !== undefined) timer = setTimeout(release, ms);
    });
  }

  notify(): void {
    for (const release of [...this.waiters]) release();
  }
}
