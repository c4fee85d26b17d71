/**
 * Anything with a Node-style `close(callback)`, such as the HTTP server
 */
export interface Closable {
  close(callback?: (error?: Error) => void): unknown;
}

export type Cleanup = () => void | Promise<void>;

/**
 * Build the signal handler body: stop accepting connections, wait for open
 * requests, then run the cleanups in order. A second call is a no-op.
 */
export function createShutdown(server: Closable, cleanups: Cleanup[]): () => Promise<void> {
  let pending: Promise<void> | null = null;

  async function run(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    for (const cleanup of cleanups) {
      await cleanup();
    }
  }

  return () => {
    if (!pending) {
      pending = run();
    }
    return pending;
  };
}
