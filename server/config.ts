import { createConfig, DEFAULT_CONFIG, type PipelineConfig } from '../simulation/types/config.js';
import type { DispatchMode, ServiceTimeRange } from '../simulation/types/pipeline.js';
import { PIPELINE_NODES, findNodeDefinition } from '../simulation/types/topology.js';
import { isLogLevel, type LogLevel } from '../simulation/utils/log.js';

export type Env = Readonly<Record<string, string | undefined>>;

export interface ServerConfig {
  pipeline: PipelineConfig;
  // 'all' runs every node in this process, otherwise the id of the one node to run.
  node: string;
  logLevel: LogLevel;
  adminPortBase: number | null;
  corsOrigin: string;
}

interface NumberRule {
  integer?: boolean;
  min?: number;
  max?: number;
}

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNumber(env: Env, name: string, fallback: number, rule: NumberRule = {}): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) throw new Error(`Invalid ${name}: expected a number, got "${raw}"`);
  if (rule.integer && !Number.isInteger(value)) throw new Error(`Invalid ${name}: expected an integer, got "${raw}"`);
  const min = rule.min ?? 0;
  if (value < min) throw new Error(`Invalid ${name}: must be at least ${min}`);
  if (rule.max !== undefined && value > rule.max) throw new Error(`Invalid ${name}: must be at most ${rule.max}`);
  return value;
}

function readRange(env: Env, prefix: string, fallback: ServiceTimeRange): ServiceTimeRange {
  const minMs = readNumber(env, `${prefix}_MIN`, fallback.minMs);
  const maxMs = readNumber(env, `${prefix}_MAX`, fallback.maxMs);
  if (minMs > maxMs) throw new Error(`Invalid ${prefix}_MIN/${prefix}_MAX: minimum ${minMs} exceeds maximum ${maxMs}`);
  return { minMs, maxMs };
}

function parseDispatchMode(value: string | undefined): DispatchMode {
  const normalized = value?.toLowerCase();
  if (!normalized || normalized === 'broadcast') return 'broadcast';
  if (normalized === 'single') return 'single';
  throw new Error('Invalid PIPELINE_DISPATCH_MODE. Expected single or broadcast');
}

function parseNode(value: string | undefined): string {
  if (!value || value.toLowerCase() === 'all') return 'all';
  if (!findNodeDefinition(value)) {
    throw new Error(`Invalid PIPELINE_NODE "${value}". Expected all or one of ${PIPELINE_NODES.map((node) => node.id).join(', ')}`);
  }
  return value;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase();
  if (!normalized) return 'info';
  if (!isLogLevel(normalized)) throw new Error('Invalid LOG_LEVEL. Expected debug, info, warn, error or silent');
  return normalized;
}

export function loadConfig(env: Env, base: PipelineConfig = DEFAULT_CONFIG): ServerConfig {
  const recoveryRange = readRange(env, 'FAILURE_RECOVERY_MS', {
    minMs: base.secondTier.failure.recoveryMinMs,
    maxMs: base.secondTier.failure.recoveryMaxMs
  });

  const pipeline = createConfig(
    {
      host: readString(env, 'PIPELINE_HOST') ?? base.host,
      dispatchMode: parseDispatchMode(readString(env, 'PIPELINE_DISPATCH_MODE')),
      queueMaxLength: readNumber(env, 'QUEUE_MAX_LENGTH', base.queueMaxLength, { integer: true, min: 1 }),
      shutdownGraceMs: readNumber(env, 'SHUTDOWN_GRACE_MS', base.shutdownGraceMs),
      transport: {
        ackTimeoutMs: readNumber(env, 'ACK_TIMEOUT_MS', base.transport.ackTimeoutMs, { min: 1 }),
        idleTimeoutMs: readNumber(env, 'IDLE_TIMEOUT_MS', base.transport.idleTimeoutMs, { min: 1 })
      },
      firstTier: {
        serviceTime: readRange(env, 'P1_SERVICE_MS', base.firstTier.serviceTime),
        heartbeatIntervalMs: readNumber(env, 'HEARTBEAT_INTERVAL_MS', base.firstTier.heartbeatIntervalMs, { min: 1 })
      },
      secondTier: {
        serviceTime: readRange(env, 'P2_SERVICE_MS', base.secondTier.serviceTime),
        failure: {
          probability: readNumber(env, 'FAILURE_PROBABILITY', base.secondTier.failure.probability, { max: 1 }),
          recoveryMinMs: recoveryRange.minMs,
          recoveryMaxMs: recoveryRange.maxMs,
          checkIntervalMs: readNumber(env, 'FAILURE_CHECK_INTERVAL_MS', base.secondTier.failure.checkIntervalMs, { min: 1 })
        }
      },
      scaling: {
        intervalMs: readNumber(env, 'SCALING_INTERVAL_MS', base.scaling.intervalMs, { min: 1 }),
        windowSize: readNumber(env, 'SCALING_WINDOW_SIZE', base.scaling.windowSize, { integer: true, min: 1 }),
        waitThresholdMs: readNumber(env, 'WAIT_THRESHOLD_MS', base.scaling.waitThresholdMs),
        scaleUpFactor: readNumber(env, 'SCALE_UP_FACTOR', base.scaling.scaleUpFactor),
        maxInstances: readNumber(env, 'SCALING_MAX_INSTANCES', base.scaling.maxInstances, { integer: true, min: 1 })
      },
      client: {
        timeoutMs: readNumber(env, 'CLIENT_TIMEOUT_MS', base.client.timeoutMs, { min: 1 }),
        requestIntervalMs: readNumber(env, 'CLIENT_REQUEST_INTERVAL_MS', base.client.requestIntervalMs),
        requestCount: readNumber(env, 'CLIENT_REQUEST_COUNT', base.client.requestCount, { integer: true })
      }
    },
    base
  );

  const adminRaw = readString(env, 'ADMIN_PORT_BASE');
  return {
    pipeline,
    node: parseNode(readString(env, 'PIPELINE_NODE')),
    logLevel: parseLogLevel(readString(env, 'LOG_LEVEL')),
    adminPortBase: adminRaw === undefined ? null : readNumber(env, 'ADMIN_PORT_BASE', 0, { integer: true, min: 1, max: 65535 }),
    corsOrigin: readString(env, 'ADMIN_CORS_ORIGIN') ?? 'http://localhost:5173'
  };
}

// Admin ports follow node start order: base, base + 1, ...
export function adminPortFor(adminPortBase: number, nodeId: string): number | null {
  const index = PIPELINE_NODES.findIndex((node) => node.id === nodeId);
  return index === -1 ? null : adminPortBase + index;
}
