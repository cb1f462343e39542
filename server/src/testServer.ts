import { once } from 'node:events';
import { createApp } from './app';

export type TestServer = {
  url: string;
  close: () => Promise<void>;
};

/** Starts the API on an ephemeral port for route tests. */
export async function startTestServer(): Promise<TestServer> {
  const server = createApp().listen(0, '127.0.0.1');
  await once(server, 'listening');

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server did not bind to a port');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

export const postJson = (url: string, body: unknown) =>
  fetch(url, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) });
