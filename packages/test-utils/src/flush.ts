/**
 * Let pending promise callbacks run. Resolves on the next macrotask, after
 * the microtask queue has drained.
 */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}
