import type { Server } from 'node:http';
import type { Express } from 'express';
import type { ServerConfig } from '../config.js';

export const testConfig: ServerConfig = {
  port: 0,
  corsOrigin: 'http://localhost:5173',
  maxRunsPerRequest: 200,
  maxPopulation: 50,
  maxDeliveriesPerRun: 100_000,
  prometheus: { enabled: false, mode: 'pushgateway', jobName: 'occ_backoff_sim' }
};

export interface RunningApp {
  baseUrl: string;
  close: () => Promise<void>;
}

export function listen(app: Express): Promise<RunningApp> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, () => {
      const address = server.address();
      if (!address || typeof address === 'string') {
        reject(new Error('Expected a TCP address'));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
          })
      });
    });
  });
}
