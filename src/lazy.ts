/**
 * A value computed on first access and cached afterwards.
 *
 * Navigation is synchronous, so the computation runs to completion before any
 * other caller can observe the instance; every caller gets the same result.
 */

type LazyState<T> =
  | { initialized: false; compute: () => T }
  | { initialized: true; value: T };

export class Lazy<T> {
  private state: LazyState<T>;

  constructor(compute: () => T) {
    this.state = { initialized: false, compute };
  }

  get value(): T {
    if (!this.state.initialized) {
      const value = this.state.compute();
      this.state = { initialized: true, value };
      return value;
    }
    return this.state.value;
  }

  get isInitialized(): boolean {
    return this.state.initialized;
  }
}
