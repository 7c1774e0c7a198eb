import type { CvProfile, StoredCv } from '../types.js';

/**
 * Holds the one active CV. Reads return a frozen snapshot without waiting;
 * writes run one at a time in the order they were requested, so a slow upload
 * can never overwrite one that started after it.
 */
export class CvStore {
  private current: Readonly<StoredCv> | null = null;
  private tail: Promise<unknown> = Promise.resolve();

  get(): Readonly<StoredCv> | null {
    return this.current;
  }

  /** Runs `build` under the write lock and installs its result. */
  replace(build: () => Promise<StoredCv>): Promise<Readonly<StoredCv>> {
    return this.withLock(async () => {
      const next = freeze(await build());
      this.current = next;
      return next;
    });
  }

  set(cv: StoredCv): Promise<Readonly<StoredCv>> {
    return this.replace(async () => cv);
  }

  /** Resolves to whether a CV was removed. */
  clear(): Promise<boolean> {
    return this.withLock(async () => {
      const removed = this.current !== null;
      this.current = null;
      return removed;
    });
  }

  private withLock<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    // keep the chain alive when a task rejects; the caller still sees the rejection
    this.tail = run.catch(() => undefined);
    return run;
  }
}

function freeze(cv: StoredCv): Readonly<StoredCv> {
  const profile: CvProfile = Object.freeze({
    ...cv.profile,
    extracted_skills: Object.freeze([...cv.profile.extracted_skills]),
    extracted_experience: Object.freeze([...cv.profile.extracted_experience]),
  });
  return Object.freeze({ ...cv, profile });
}
