export type Release = () => void;

/**
 * Mutual exclusion for async sections. Waiters are served in arrival order.
 */
export class AsyncLock {
  private locked = false;
  private readonly waiters: Array<(release: Release) => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  tryAcquire(): Release | null {
    if (this.locked) {
      return null;
    }
    this.locked = true;
    return this.createRelease();
  }

  acquire(): Promise<Release> {
    const release = this.tryAcquire();
    if (release) {
      return Promise.resolve(release);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
