import type { DispatchMode, RequestType } from '../types/pipeline.js';
import { REQUEST_TYPES } from '../types/pipeline.js';
import { QUEUE_TARGETS, TYPE_ROUTES } from '../types/topology.js';

export class TypeRouter {
  private readonly routes: Readonly<Record<RequestType, string>>;

  constructor(routes: Readonly<Record<RequestType, string>> = TYPE_ROUTES) {
    const targets = REQUEST_TYPES.map((type) => routes[type]);
    if (new Set(targets).size !== targets.length) {
      throw new Error(`Type routes must map to distinct targets: ${targets.join(', ')}`);
    }
    this.routes = { ...routes };
  }

  route(type: RequestType): string {
    return this.routes[type];
  }

  targets(): string[] {
    return REQUEST_TYPES.map((type) => this.routes[type]);
  }

  // Broadcast lists the designated target first, then the rest in type order; D delivers in this order.
  dispatchTargets(type: RequestType, mode: DispatchMode): string[] {
    const designated = this.route(type);
    if (mode === 'single') {
      return [designated];
    }
    return [designated, ...this.targets().filter((target) => target !== designated)];
  }
}

export function queueTargetOf(queueId: string): string {
  const target = QUEUE_TARGETS[queueId];
  if (!target) {
    throw new Error(`No processing peer mapped for queue ${queueId}`);
  }
  return target;
}

// The peers whose responses a client must collect for a request of this type.
export function expectedPeersFor(type: RequestType, mode: DispatchMode, router: TypeRouter = new TypeRouter()): string[] {
  return router.dispatchTargets(type, mode).map(queueTargetOf);
}
