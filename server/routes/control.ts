import { Router } from 'express';
import type { BaseNode } from '../../simulation/nodes/BaseNode.js';
import { FailingServiceNode } from '../../simulation/nodes/FailingServiceNode.js';
import { HttpError, isFailureInjectionPayload } from '../types.js';

interface ControlDeps {
  node: BaseNode;
}

// Fault injection for second-tier nodes; other kinds have no controls.
export function createControlRouter(deps: ControlDeps): Router {
  const router = Router();

  router.post('/failure', (req, res, next) => {
    try {
      const { node } = deps;
      if (!(node instanceof FailingServiceNode)) {
        throw new HttpError(409, `${node.id} (${node.kind}) does not support failure injection`);
      }
      if (!isFailureInjectionPayload(req.body)) throw new HttpError(400, 'Expected { durationMs: positive number }');

      const window = node.forceFailure(req.body.durationMs);
      res.status(200).json({ nodeId: node.id, availability: node.failure.availability(), recoverAt: window.recoverAt });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
