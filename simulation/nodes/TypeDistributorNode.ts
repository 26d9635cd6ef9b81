import type { AckMessage, PipelineRequest } from '../types/pipeline.js';
import { TypeRouter } from '../engine/TypeRouter.js';
import { describeError } from '../utils/random.js';
import { BaseNode, type NodeContext } from './BaseNode.js';

export class TypeDistributorNode extends BaseNode {
  private readonly router: TypeRouter;

  constructor(id: string, context: NodeContext, router: TypeRouter = new TypeRouter()) {
    super(id, 'type_distributor', context);
    this.router = router;
  }

  protected async handleRequest(request: PipelineRequest): Promise<AckMessage> {
    const stamped = this.stamp(request);
    const targets = this.router.dispatchTargets(request.type, this.config.dispatchMode);

    // The designated queue holds the request before any broadcast copy is sent.
    const [designated, ...others] = targets;
    const first = designated === undefined ? [] : await Promise.allSettled([this.forward(designated, stamped)]);
    const results = [...first, ...(await Promise.allSettled(others.map((target) => this.forward(target, stamped))))];
    let delivered = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        delivered += 1;
        return;
      }
      this.log.error(`failed to forward ${request.requestId} to ${targets[index] ?? '?'}: ${describeError(result.reason)}`);
    });

    this.log.info(`${request.type} ${request.requestId} -> ${targets.join(',')} (${delivered}/${targets.length} delivered)`);
    return delivered > 0 ? this.ack(true) : this.ack(false, 'unavailable');
  }
}
