import type { FastifyBaseLogger } from 'fastify';

export interface ClosableServer {
  close(): PromiseLike<unknown>;
  log: FastifyBaseLogger;
}

/**
 * Close the server and resolve to the process exit code: 0 on a clean close, 1 after logging a failure.
 */
export async function shutdown(server: ClosableServer): Promise<number> {
  try {
    await server.close();
    return 0;
  } catch (err) {
    server.log.error(err, 'Failed to shut down cleanly');
    return 1;
  }
}
