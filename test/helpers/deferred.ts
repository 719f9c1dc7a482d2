export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Let every queued microtask and the current macrotask run */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
