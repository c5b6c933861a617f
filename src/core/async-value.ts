export type Settled<T> = { readonly known: true; readonly value: T } | { readonly known: false };

/**
 * A value that becomes available once, after the resource that produces it has
 * been registered. During a preview it may settle as unknown: the value only
 * exists after deploy.
 *
 * `dependencies` holds the URNs of the resources the value was derived from,
 * so a provisioning engine can see implicit dependency edges.
 */
export class AsyncValue<T> {
  private readonly settled: Promise<Settled<T>>;
  readonly dependencies: ReadonlySet<string>;

  private constructor(settled: Promise<Settled<T>>, dependencies: Iterable<string>) {
    this.settled = settled;
    this.dependencies = new Set(dependencies);
  }

  static of<T>(value: T, dependencies: Iterable<string> = []): AsyncValue<T> {
    return new AsyncValue<T>(Promise.resolve<Settled<T>>({ known: true, value }), dependencies);
  }

  static unknown<T>(dependencies: Iterable<string> = []): AsyncValue<T> {
    return new AsyncValue<T>(Promise.resolve<Settled<T>>({ known: false }), dependencies);
  }

  static all<T>(values: readonly AsyncValue<T>[]): AsyncValue<readonly T[]> {
    const settled = Promise.all(values.map((v) => v.settle())).then(
      (results): Settled<readonly T[]> => {
        const collected: T[] = [];
        for (const result of results) {
          if (!result.known) {
            return { known: false };
          }
          collected.push(result.value);
        }
        return { known: true, value: collected };
      },
    );
    return new AsyncValue(
      settled,
      values.flatMap((v) => [...v.dependencies]),
    );
  }

  map<U>(fn: (value: T) => U): AsyncValue<U> {
    const settled = this.settled.then(
      (result): Settled<U> => (result.known ? { known: true, value: fn(result.value) } : result),
    );
    return new AsyncValue(settled, this.dependencies);
  }

  withDependencies(dependencies: Iterable<string>): AsyncValue<T> {
    return new AsyncValue(this.settled, [...this.dependencies, ...dependencies]);
  }

  settle(): Promise<Settled<T>> {
    return this.settled;
  }
}

export const isAsyncValue = (value: unknown): value is AsyncValue<unknown> =>
  value instanceof AsyncValue;
