import { Router } from 'express';
import { checkPushgateway, type PrometheusConfig, shouldPushToGateway } from '../services/prometheus.js';

interface HealthDeps {
  prometheus: PrometheusConfig;
}

export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();

  router.get('/', async (_req, res, next) => {
    try {
      let pushgateway: 'disabled' | 'connected' | 'error' = 'disabled';
      if (shouldPushToGateway(deps.prometheus) && deps.prometheus.pushgatewayUrl) {
        pushgateway = await checkPushgateway(deps.prometheus.pushgatewayUrl);
      }

      res.status(200).json({
        status: 'ok',
        pushgateway,
        prometheus: {
          enabled: deps.prometheus.enabled,
          mode: deps.prometheus.mode
        },
        timestamp: new Date().toISOString()
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
