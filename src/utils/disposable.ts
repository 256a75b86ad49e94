/**
 * Resource with explicit teardown
 */
export interface Disposable {
  dispose(): void | Promise<void>;
}

/**
 * Check if a value exposes a dispose() method
 */
export function isDisposable(value: unknown): value is Disposable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}
