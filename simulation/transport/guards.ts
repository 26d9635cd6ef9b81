import type {
  PipelineRequest,
  PipelineResponse,
  RejectReason,
  RequestType,
  WireMessage,
} from '../types/pipeline.js';
import { REQUEST_TYPES } from '../types/pipeline.js';
import { priorityOf } from '../types/topology.js';

const REJECT_REASONS: readonly RejectReason[] = ['capacity', 'unavailable', 'unsupported', 'invalid'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function isRequestType(value: unknown): value is RequestType {
  return typeof value === 'string' && REQUEST_TYPES.some((type) => type === value);
}

export function isPipelineRequest(value: unknown): value is PipelineRequest {
  if (!isRecord(value)) return false;
  return (
    typeof value.requestId === 'string' &&
    value.requestId.length > 0 &&
    isRequestType(value.type) &&
    typeof value.clientId === 'string' &&
    typeof value.priority === 'number' &&
    value.priority === priorityOf(value.type) &&
    typeof value.createdAt === 'number' &&
    isStringArray(value.hops)
  );
}

export function isPipelineResponse(value: unknown): value is PipelineResponse {
  if (!isRecord(value)) return false;
  return (
    typeof value.requestId === 'string' &&
    isRequestType(value.type) &&
    typeof value.clientId === 'string' &&
    typeof value.processedBy === 'string' &&
    isStringArray(value.hops) &&
    typeof value.timestamp === 'number' &&
    typeof value.success === 'boolean'
  );
}

export function isWireMessage(value: unknown): value is WireMessage {
  if (!isRecord(value)) return false;
  switch (value.kind) {
    case 'REQUEST':
      return isPipelineRequest(value.request);
    case 'RESPONSE':
      return isPipelineResponse(value.response);
    case 'ACK':
      return (
        typeof value.nodeId === 'string' &&
        typeof value.accepted === 'boolean' &&
        (value.reason === undefined ||
          (typeof value.reason === 'string' && REJECT_REASONS.some((reason) => reason === value.reason)))
      );
    case 'HEARTBEAT':
      return (
        typeof value.nodeId === 'string' &&
        typeof value.role === 'string' &&
        typeof value.sentAt === 'number' &&
        Array.isArray(value.waitSamplesMs) &&
        value.waitSamplesMs.every((sample) => typeof sample === 'number' && Number.isFinite(sample)) &&
        typeof value.queueDepth === 'number'
      );
    default:
      return false;
  }
}
