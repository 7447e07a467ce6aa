/**
 * Promise-based delay function type.
 * Injected wherever the code waits, so tests can skip the wait.
 */
export type DelayFn = (ms: number) => Promise<void>;
