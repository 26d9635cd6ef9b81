import { Router } from 'express';
import type { BaseNode } from '../../simulation/nodes/BaseNode.js';

interface HealthDeps {
  node: BaseNode;
}

export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const { availability } = deps.node.snapshot();
    res.status(deps.node.isRunning ? 200 : 503).json({
      status: deps.node.isRunning ? 'ok' : 'stopped',
      nodeId: deps.node.id,
      kind: deps.node.kind,
      ...(availability ? { availability } : {}),
      uptimeMs: deps.node.uptimeMs(),
      timestamp: new Date().toISOString()
    });
  });

  return router;
}
