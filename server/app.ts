import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import type { Server } from 'http';
import { registerRoutes, type RouteDependencies } from './routes';
import { log } from './log';

/** Request log lines are cut to this many characters. */
const MAX_LOG_LINE = 80;

/**
 * Build the Express app: JSON parsing, no-cache headers, one log line per
 * request, the analysis routers, and a JSON error handler.
 */
export async function createApp(
  deps: RouteDependencies
): Promise<{ app: Express; server: Server }> {
  const app = express();
  app.use(express.json());

  // Disable caching so clients always see the latest run
  app.use((_req, res, next) => {
    res.set({
      'Cache-Control': 'no-cache, no-store, must-revalidate',
      Pragma: 'no-cache',
      Expires: '0',
    });
    next();
  });

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json;
    res.json = function (bodyJson) {
      capturedJsonResponse = bodyJson;
      return originalResJson.call(res, bodyJson);
    };

    res.on('finish', () => {
      const duration = Date.now() - start;
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }

      if (logLine.length > MAX_LOG_LINE) {
        logLine = logLine.slice(0, MAX_LOG_LINE - 1) + '…';
      }

      log(logLine);
    });

    next();
  });

  const server = await registerRoutes(app, deps);

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found', message: 'Unknown endpoint. See GET / for the list.' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusOf(err) ?? 500;
    const message = status < 500 && err instanceof Error ? err.message : 'Internal Server Error';
    if (status >= 500) {
      console.error('[express] Unhandled error:', err);
    }
    res.status(status).json({ message });
  });

  return { app, server };
}

/** body-parser and http-errors style errors carry `status` / `statusCode`. */
function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status = 'status' in err ? err.status : undefined;
  const statusCode = 'statusCode' in err ? err.statusCode : undefined;
  const value = typeof status === 'number' ? status : statusCode;
  return typeof value === 'number' && value >= 400 && value < 600 ? value : undefined;
}
