/**
 * Value computed on first access and reused afterwards.
 */
export class Lazy<T> {
  private state: { readonly done: false } | { readonly done: true; readonly value: T } = {
    done: false,
  };

  constructor(private readonly compute: () => T) {}

  get value(): T {
    if (this.state.done) return this.state.value;
    const value = this.compute();
    this.state = { done: true, value };
    return value;
  }
}

export const lazy = <T>(compute: () => T): Lazy<T> => new Lazy(compute);
