import { Router } from 'express';
import { toCsv } from '../../simulation/experiment/report.js';
import { runSweep, totalRuns } from '../../simulation/experiment/sweep.js';
import { validateExperimentConfig } from '../../simulation/experiment/validate.js';
import type { ExperimentStore } from '../services/experimentStore.js';
import type { PrometheusReportStore } from '../services/prometheusState.js';
import {
  type PrometheusConfig,
  pushExperimentToPushgateway,
  shouldExposeScrape,
  shouldPushToGateway
} from '../services/prometheus.js';
import { HttpError } from '../types.js';

interface ExperimentsDeps {
  store: ExperimentStore;
  maxRunsPerRequest: number;
  maxPopulation: number;
  maxDeliveriesPerRun: number;
  prometheus: PrometheusConfig;
  prometheusStore: PrometheusReportStore;
}

export function createExperimentsRouter(deps: ExperimentsDeps): Router {
  const router = Router();

  router.post('/', async (req, res, next) => {
    try {
      const validation = validateExperimentConfig(req.body ?? {});
      if (!validation.ok) throw new HttpError(400, 'Invalid experiment config', validation.errors);

      const largest = Math.max(...validation.config.populations);
      if (largest > deps.maxPopulation) {
        throw new HttpError(400, `Population ${largest} exceeds the limit of ${deps.maxPopulation} clients`);
      }

      const config = { ...validation.config, maxDeliveries: deps.maxDeliveriesPerRun };
      const runs = totalRuns(config);
      if (runs > deps.maxRunsPerRequest) {
        throw new HttpError(400, `Experiment needs ${runs} runs; the limit is ${deps.maxRunsPerRequest}`);
      }

      const started = performance.now();
      const report = await runSweep(config);
      const stored = deps.store.add(report);
      console.log(
        `[experiments] ${stored.experimentId} runs=${runs} cells=${report.rows.length} ${Math.round(performance.now() - started)}ms`
      );

      if (shouldExposeScrape(deps.prometheus)) {
        deps.prometheusStore.setLatest(stored);
      }

      if (shouldPushToGateway(deps.prometheus) && deps.prometheus.pushgatewayUrl) {
        void pushExperimentToPushgateway(stored, deps.prometheus.pushgatewayUrl, deps.prometheus.jobName).catch(
          (err) => {
            console.error('[experiments] pushgateway error:', err);
          }
        );
      }

      res.status(201).json({ experimentId: stored.experimentId, createdAt: stored.createdAt, rows: report.rows });
    } catch (err) {
      next(err);
    }
  });

  router.get('/', (_req, res) => {
    res.status(200).json({ experiments: deps.store.list() });
  });

  router.get('/:id', (req, res, next) => {
    const stored = deps.store.get(req.params.id);
    if (!stored) {
      next(new HttpError(404, `Experiment not found: ${req.params.id}`));
      return;
    }
    res.status(200).json(stored);
  });

  router.get('/:id/csv', (req, res, next) => {
    const stored = deps.store.get(req.params.id);
    if (!stored) {
      next(new HttpError(404, `Experiment not found: ${req.params.id}`));
      return;
    }
    res.status(200).type('text/csv').send(toCsv(stored.report.rows));
  });

  return router;
}
