import type { NodeKind, RequestType } from './pipeline.js';

export interface NodeDefinition {
  id: string;
  kind: NodeKind;
}

export const ENTRY_NODE_ID = 'Q1';

export const TYPE_DISTRIBUTOR_ID = 'D';

export const CLIENT_IDS = ['K1', 'K2'] as const;

export const FIRST_TIER_IDS = ['P11', 'P12', 'P13'] as const;

export const FORWARDING_QUEUE_IDS = ['Q21', 'Q22', 'Q23'] as const;

export const SECOND_TIER_IDS = ['P21', 'P22', 'P23'] as const;

export const REQUEST_PRIORITIES: Readonly<Record<RequestType, number>> = {
  z1: 1,
  z2: 2,
  z3: 3,
};

export const TYPE_ROUTES: Readonly<Record<RequestType, string>> = {
  z1: 'Q21',
  z2: 'Q22',
  z3: 'Q23',
};

export const QUEUE_TARGETS: Readonly<Record<string, string>> = {
  Q21: 'P21',
  Q22: 'P22',
  Q23: 'P23',
};

// Start order: terminal tier first so every downstream address exists before traffic arrives.
export const PIPELINE_NODES: readonly NodeDefinition[] = [
  ...SECOND_TIER_IDS.map((id): NodeDefinition => ({ id, kind: 'failing_service' })),
  ...FORWARDING_QUEUE_IDS.map((id): NodeDefinition => ({ id, kind: 'forwarding_queue' })),
  { id: TYPE_DISTRIBUTOR_ID, kind: 'type_distributor' },
  ...FIRST_TIER_IDS.map((id): NodeDefinition => ({ id, kind: 'priority_service' })),
  { id: ENTRY_NODE_ID, kind: 'cyclic_queue' },
  ...CLIENT_IDS.map((id): NodeDefinition => ({ id, kind: 'client' })),
];

export function findNodeDefinition(nodeId: string): NodeDefinition | undefined {
  return PIPELINE_NODES.find((node) => node.id === nodeId);
}

export function priorityOf(type: RequestType): number {
  return REQUEST_PRIORITIES[type];
}
