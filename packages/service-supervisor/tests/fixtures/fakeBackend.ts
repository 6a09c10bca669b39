import express from 'express';
import type { Server } from 'http';

export type HealthMode = 'ok' | 'error' | 'malformed' | 'incomplete' | 'hang';

/**
 * In-process stand-in for the backend's HTTP surface, bound to an
 * ephemeral loopback port.
 */
export class FakeBackend {
  healthMode: HealthMode = 'ok';
  version = '1.2.3';
  statsStatus = 200;
  statsBody: unknown = { items: { total: 42 } };
  healthRequests = 0;
  statsRequests = 0;
  private server: Server | null = null;

  async start(): Promise<string> {
    const app = express();

    app.get('/health', (_req, res) => {
      this.healthRequests++;
      switch (this.healthMode) {
        case 'ok':
          res.json({ status: 'ok', version: this.version });
          break;
        case 'error':
          res.status(503).json({ status: 'unavailable' });
          break;
        case 'malformed':
          res.type('application/json').send('{"status": ');
          break;
        case 'incomplete':
          res.json({ status: 'ok' });
          break;
        case 'hang':
          // Never answer; the connection is dropped on close
          break;
      }
    });

    app.get('/v2/stats', (_req, res) => {
      this.statsRequests++;
      res.status(this.statsStatus).json(this.statsBody);
    });

    const server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    this.server = server;

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Fake backend is not bound to a TCP port');
    }
    return `http://127.0.0.1:${address.port}`;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
