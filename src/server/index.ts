import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { streamSSE, type SSEStreamingApi } from 'hono/streaming';
import type { ScanOutcome } from '../types.js';
import { DuplicatesScanner, InvalidRootError, assertValidRoot, errorMessage } from '../scanners/index.js';
import { loadConfig, normalizeConfig, saveConfig, toScannerOptions } from '../utils/index.js';

export interface ServerOptions {
  configPath?: string;
  scanner?: DuplicatesScanner;
}

interface StartRequest {
  root: string;
  minSize?: number;
}

function parseStartRequest(body: unknown): StartRequest | null {
  if (typeof body !== 'object' || body === null) return null;
  const fields: Record<string, unknown> = { ...body };
  const { root, minSize } = fields;
  if (typeof root !== 'string') return null;
  if (minSize === undefined) return { root };
  if (typeof minSize !== 'number' || minSize < 0) return null;
  return { root, minSize };
}

/**
 * HTTP API around a single scanner: one scan at a time, progress over SSE.
 */
export function createApp(serverOptions: ServerOptions = {}): Hono {
  const app = new Hono();
  const scanner = serverOptions.scanner ?? new DuplicatesScanner();
  const clients = new Set<SSEStreamingApi>();
  let lastOutcome: ScanOutcome | null = null;

  function broadcast(event: string, data: unknown): void {
    const message = JSON.stringify(data);
    for (const client of clients) {
      client.writeSSE({ event, data: message }).catch((error: unknown) => {
        console.error('[Server] Dropping event stream:', errorMessage(error));
        clients.delete(client);
      });
    }
  }

  app.get('/api/scan/events', (c) => {
    return streamSSE(c, async (stream) => {
      clients.add(stream);
      stream.onAbort(() => {
        clients.delete(stream);
      });

      await stream.writeSSE({ event: 'state', data: JSON.stringify({ state: scanner.state }) });

      while (!stream.aborted) {
        await stream.sleep(1000);
      }
      clients.delete(stream);
    });
  });

  app.post('/api/scan/start', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Request body must be JSON' }, 400);
    }

    const request = parseStartRequest(body);
    if (!request) {
      return c.json({ error: 'Expected { root: string, minSize?: number }' }, 400);
    }

    let root: string;
    try {
      root = await assertValidRoot(request.root);
    } catch (error) {
      if (error instanceof InvalidRootError) {
        return c.json({ error: error.message, kind: error.kind }, 400);
      }
      throw error;
    }

    const config = await loadConfig(serverOptions.configPath);

    if (scanner.isRunning) {
      return c.json({ error: 'A scan is already running' }, 409);
    }

    lastOutcome = null;
    scanner
      .scan(root, {
        ...toScannerOptions(config),
        ...(request.minSize !== undefined ? { minSize: request.minSize } : {}),
        logger: (message) => console.log(message),
        onStateChange: (state) => broadcast('state', { state }),
        onProgress: (processed, total) => broadcast('progress', { processed, total }),
      })
      .then((outcome) => {
        lastOutcome = outcome;
        broadcast('complete', outcome);
      })
      .catch((error: unknown) => {
        console.error('[Server] Scan failed:', error);
        broadcast('error', { message: errorMessage(error) });
      });

    return c.json({ success: true, message: 'Scan started', root });
  });

  app.post('/api/scan/cancel', (c) => {
    if (!scanner.isRunning) {
      return c.json({ error: 'No scan is running' }, 409);
    }
    scanner.cancel();
    return c.json({ success: true });
  });

  app.get('/api/scan/status', (c) => {
    return c.json({ state: scanner.state, ...scanner.progress });
  });

  app.get('/api/scan/result', (c) => {
    if (scanner.isRunning) {
      return c.json({ state: scanner.state, ...scanner.progress }, 202);
    }
    if (!lastOutcome) {
      return c.json({ error: 'No scan has finished yet' }, 404);
    }
    return c.json(lastOutcome);
  });

  app.get('/api/settings', async (c) => {
    const config = await loadConfig(serverOptions.configPath);
    return c.json(config);
  });

  app.post('/api/settings', async (c) => {
    try {
      const body: unknown = await c.req.json();
      const config = await loadConfig(serverOptions.configPath);
      const merged = typeof body === 'object' && body !== null ? { ...config, ...body } : config;
      const next = normalizeConfig(merged);
      await saveConfig(next, serverOptions.configPath);
      return c.json({ success: true, config: next });
    } catch (error) {
      return c.json({ error: errorMessage(error) }, 500);
    }
  });

  return app;
}

export function startServer(port = 3000, options: ServerOptions = {}): string {
  console.log(`[Server] Starting API server on http://localhost:${port}`);
  serve({
    fetch: createApp(options).fetch,
    port,
  });
  return `http://localhost:${port}`;
}
