export type RequestType = 'z1' | 'z2' | 'z3';

export const REQUEST_TYPES: readonly RequestType[] = ['z1', 'z2', 'z3'];

export type NodeKind =
  | 'client'
  | 'cyclic_queue'
  | 'priority_service'
  | 'type_distributor'
  | 'forwarding_queue'
  | 'failing_service';

export type DispatchMode = 'single' | 'broadcast';

export type MessageKind = 'REQUEST' | 'RESPONSE' | 'ACK' | 'HEARTBEAT';

export type RejectReason = 'capacity' | 'unavailable' | 'unsupported' | 'invalid';

export type Availability = 'AVAILABLE' | 'FAILED';

export interface NodeAddress {
  host: string;
  port: number;
}

export interface PipelineRequest {
  requestId: string;
  type: RequestType;
  clientId: string;
  priority: number;
  createdAt: number;
  hops: string[];
}

export interface PipelineResponse {
  requestId: string;
  type: RequestType;
  clientId: string;
  processedBy: string;
  hops: string[];
  timestamp: number;
  success: boolean;
}

export interface RequestMessage {
  kind: 'REQUEST';
  request: PipelineRequest;
}

export interface ResponseMessage {
  kind: 'RESPONSE';
  response: PipelineResponse;
}

export interface AckMessage {
  kind: 'ACK';
  nodeId: string;
  accepted: boolean;
  reason?: RejectReason;
}

export interface HeartbeatMessage {
  kind: 'HEARTBEAT';
  nodeId: string;
  role: string;
  sentAt: number;
  waitSamplesMs: number[];
  queueDepth: number;
}

export type WireMessage = RequestMessage | ResponseMessage | AckMessage | HeartbeatMessage;

export interface ServiceTimeRange {
  minMs: number;
  maxMs: number;
}

export interface StatsSnapshot {
  received: number;
  processed: number;
  forwarded: number;
  forwardFailures: number;
  rejected: number;
  avgWaitMs: number;
  avgQueueLength: number;
}

export interface NodeSnapshot {
  nodeId: string;
  kind: NodeKind;
  snapshotAt: number;
  stats: StatsSnapshot;
  availability?: Availability;
  queueDepth?: number;
  queueDepthByPriority?: Record<string, number>;
  routingTable?: string[];
  instanceCounts?: Record<string, number>;
  outcomes?: { pending: number; successful: number; failed: number };
}

export type OutcomeStatus = 'SUCCESS' | 'FAILED';

export type OutcomeReason = 'completed' | 'partial_failure' | 'timeout' | 'undeliverable';

export interface RequestOutcome {
  requestId: string;
  status: OutcomeStatus;
  reason: OutcomeReason;
  submittedAt: number;
  finalizedAt: number;
  expectedPeers: string[];
  responses: PipelineResponse[];
}

export interface SystemSnapshot {
  snapshotAt: number;
  nodes: Record<string, NodeSnapshot>;
  totalReceived: number;
  totalProcessed: number;
  totalRejected: number;
  bottleneckNodeId: string | null;
  outcomes: { pending: number; successful: number; failed: number };
  successRate: number;
}
