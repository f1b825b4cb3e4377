/**
 * Cross-process key-value store the admission controller and the queue
 * consumer coordinate through. Every method is a single atomic command on the
 * backing store; nothing here is transactional across keys.
 */
export interface CounterStore {
  incr(key: string): Promise<number>;
  decr(key: string): Promise<number>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string | number): Promise<void>;
  // resolves null when nothing arrives within timeoutSeconds
  blockingPop(queue: string, timeoutSeconds: number): Promise<string | null>;
  push(queue: string, value: string): Promise<number>;
  keys(pattern: string): Promise<string[]>;
}
