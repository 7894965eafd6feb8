import { createServer } from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import { type HttpBindings, type ServerType, serve } from '@hono/node-server';
import { Hono } from 'hono';
import { type SafeWrapAsync, safeWrapAsync } from '../src/utils/wrap.js';

/** What the server saw of one request. */
export type RecordedRequest = {
  method: string;
  path: string;
  query: string;
  headers: Record<string, string>;
  body: string;
};

export type E2EServer = {
  url: string;
  close: () => Promise<Error | null>;
  reset: () => void;
  getRequests: () => RecordedRequest[];
};

export async function startE2EServer(): SafeWrapAsync<Error, E2EServer> {
  const requests: RecordedRequest[] = [];
  const app = new Hono<{ Bindings: HttpBindings }>();

  app.use(async (c, next) => {
    const url = new URL(c.req.url);
    requests.push({
      method: c.req.method,
      path: url.pathname,
      query: url.search.slice(1),
      headers: c.req.header(),
      body: await c.req.text(),
    });
    await next();
  });

  app.get('/users', (c) => c.body('[{"id":1,"name":"Ada"}]', 200, { 'Content-Type': 'application/json' }));

  app.post('/messages', (c) =>
    c.body('{"status":"created"}', 201, { 'Content-Type': 'application/json', status: 'created' }),
  );

  app.delete('/messages/:id', (c) => c.body(null, 204));

  app.get('/redirect', (c) => c.redirect('/users?from=redirect', 302));

  app.get('/cookies', (c) => {
    c.header('Set-Cookie', 'a=1', { append: true });
    c.header('Set-Cookie', 'b=2', { append: true });
    return c.body('ok', 200);
  });

  app.get('/multi', (c) => {
    // Set on the node response, as fetch Headers would fold the lines into one.
    c.env.outgoing.setHeader('X-Multi', ['one', 'two']);
    return c.body('ok', 200);
  });

  app.get('/slow', async (c) => {
    await sleep(1_000);
    return c.body('late', 200);
  });

  const [errServer, serverAndPort] = await safeWrapAsync(
    () =>
      new Promise<[ServerType, number]>((resolve) => {
        const srv = serve({ fetch: app.fetch, port: 0, hostname: '127.0.0.1' }, (serverInfo) => {
          resolve([srv, serverInfo.port]);
        });
      }),
  );

  if (errServer) {
    return [new Error('error starting server', { cause: errServer }), null];
  }

  const [server, port] = serverAndPort;

  return [
    null,
    {
      url: `http://127.0.0.1:${port}`,
      reset: () => {
        requests.length = 0;
      },
      getRequests: () => structuredClone(requests),
      close: () =>
        new Promise<Error | null>((resolve) => {
          server.close((err) => {
            if (err) {
              resolve(new Error('error closing server', { cause: err }));
              return;
            }

            resolve(null);
          });
        }),
    },
  ];
}

/** Finds a local port with nothing listening on it. */
export function reserveClosedPort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const probe = createServer();
    probe.once('error', reject);
    probe.listen(0, '127.0.0.1', () => {
      const address = probe.address();
      if (address === null || typeof address === 'string') {
        probe.close(() => reject(new Error('error reading probe server address')));
        return;
      }

      probe.close(() => resolve(address.port));
    });
  });
}
