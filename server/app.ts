import cors from 'cors';
import express, { type Express } from 'express';
import type { ServerConfig } from './config.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createExperimentsRouter } from './routes/experiments.js';
import { createHealthRouter } from './routes/health.js';
import { createMetricsRouter } from './routes/metrics.js';
import { ExperimentStore } from './services/experimentStore.js';
import { PrometheusReportStore } from './services/prometheusState.js';

export interface AppDeps {
  store?: ExperimentStore;
  prometheusStore?: PrometheusReportStore;
  logRequests?: boolean;
}

export function createApp(config: ServerConfig, deps: AppDeps = {}): Express {
  const app = express();
  const store = deps.store ?? new ExperimentStore();
  const prometheusStore = deps.prometheusStore ?? new PrometheusReportStore();

  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '1mb' }));
  if (deps.logRequests ?? true) {
    app.use(requestLogger);
  }

  app.use(
    '/experiments',
    createExperimentsRouter({
      store,
      maxRunsPerRequest: config.maxRunsPerRequest,
      maxPopulation: config.maxPopulation,
      maxDeliveriesPerRun: config.maxDeliveriesPerRun,
      prometheus: config.prometheus,
      prometheusStore
    })
  );
  app.use('/metrics', createMetricsRouter({ prometheus: config.prometheus, prometheusStore }));
  app.use('/health', createHealthRouter({ prometheus: config.prometheus }));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
