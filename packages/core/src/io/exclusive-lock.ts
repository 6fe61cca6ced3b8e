import { LockContentionError } from '../exceptions.js';

/**
 * Non-reentrant mutual exclusion for synchronous critical sections.
 * Nothing waits: acquiring a held lock is a re-entry and throws.
 */
export class ExclusiveLock {
  private locked = false;

  get held(): boolean {
    return this.locked;
  }

  run<T>(fn: () => T): T {
    if (this.locked) {
      throw new LockContentionError();
    }
    this.locked = true;
    try {
      return fn();
    } finally {
      this.locked = false;
    }
  }
}
