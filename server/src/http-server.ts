import { serve, type ServerType } from '@hono/node-server';
import { createLogger } from '@nowplaying-bridge/shared';
import { errorResponse, handleApiRoutes, type ApiDeps } from './routes/api.js';

const log = createLogger('HTTP');

/**
 * Top-level request handler. Anything a route throws becomes a 500.
 * @param req - The incoming request
 * @param deps - Store and feed handles
 * @returns The response to send
 */
export function handleRequest(req: Request, deps: ApiDeps): Response {
  const url = new URL(req.url);
  log.debug(`${req.method} ${url.pathname}`);

  try {
    return handleApiRoutes(req, url, deps);
  } catch (err) {
    log.error(`Error handling ${req.method} ${url.pathname}:`, err);
    return errorResponse('internal_error', 'Internal server error', 500);
  }
}

/**
 * Starts the HTTP listener.
 * @param host - Interface to bind
 * @param port - Port to bind
 * @param deps - Store and feed handles
 * @returns The Node server, for shutdown
 */
export function startHttpServer(host: string, port: number, deps: ApiDeps): ServerType {
  return serve(
    {
      hostname: host,
      port,
      fetch: (req) => handleRequest(req, deps),
    },
    (info) => {
      log.info(`Listening on http://${host}:${info.port}`);
    },
  );
}
