import { Router } from 'express';
import type { BaseNode } from '../../simulation/nodes/BaseNode.js';
import { toPrometheusText } from '../services/prometheus.js';

interface MetricsDeps {
  node: BaseNode;
}

export function createMetricsRouter(deps: MetricsDeps): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json(deps.node.snapshot());
  });

  router.get('/prometheus', (_req, res) => {
    res
      .status(200)
      .set('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
      .send(toPrometheusText(deps.node.snapshot()));
  });

  return router;
}
