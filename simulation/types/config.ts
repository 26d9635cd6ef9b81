import type { DispatchMode, ServiceTimeRange } from './pipeline.js';

export interface TransportConfig {
  ackTimeoutMs: number;
  idleTimeoutMs: number;
  maxFrameBytes: number;
}

export interface FirstTierConfig {
  serviceTime: ServiceTimeRange;
  heartbeatIntervalMs: number;
}

export interface FailureConfig {
  probability: number;
  recoveryMinMs: number;
  recoveryMaxMs: number;
  checkIntervalMs: number;
}

export interface SecondTierConfig {
  serviceTime: ServiceTimeRange;
  failure: FailureConfig;
}

export interface ScalingConfig {
  intervalMs: number;
  windowSize: number;
  waitThresholdMs: number;
  scaleUpFactor: number;
  maxInstances: number;
  instancePortOffset: number;
}

export interface ClientConfig {
  timeoutMs: number;
  requestIntervalMs: number;
  requestCount: number;
}

export interface PipelineConfig {
  host: string;
  ports: Record<string, number>;
  dispatchMode: DispatchMode;
  queueMaxLength: number;
  shutdownGraceMs: number;
  transport: TransportConfig;
  firstTier: FirstTierConfig;
  secondTier: SecondTierConfig;
  scaling: ScalingConfig;
  client: ClientConfig;
}

export interface ConfigOverrides {
  host?: string;
  ports?: Record<string, number>;
  dispatchMode?: DispatchMode;
  queueMaxLength?: number;
  shutdownGraceMs?: number;
  transport?: Partial<TransportConfig>;
  firstTier?: Partial<FirstTierConfig>;
  secondTier?: { serviceTime?: ServiceTimeRange; failure?: Partial<FailureConfig> };
  scaling?: Partial<ScalingConfig>;
  client?: Partial<ClientConfig>;
}

export const DEFAULT_PORTS: Readonly<Record<string, number>> = {
  K1: 5001,
  K2: 5002,
  Q1: 5010,
  P11: 5011,
  P12: 5012,
  P13: 5013,
  D: 5020,
  Q21: 5021,
  Q22: 5022,
  Q23: 5023,
  P21: 5031,
  P22: 5032,
  P23: 5033,
};

export const DEFAULT_CONFIG: PipelineConfig = {
  host: '127.0.0.1',
  ports: { ...DEFAULT_PORTS },
  dispatchMode: 'broadcast',
  queueMaxLength: 50,
  shutdownGraceMs: 2_000,
  transport: {
    ackTimeoutMs: 2_000,
    idleTimeoutMs: 5_000,
    maxFrameBytes: 1024 * 1024,
  },
  firstTier: {
    serviceTime: { minMs: 100, maxMs: 300 },
    heartbeatIntervalMs: 1_000,
  },
  secondTier: {
    serviceTime: { minMs: 200, maxMs: 500 },
    failure: {
      probability: 0.01,
      recoveryMinMs: 3_000,
      recoveryMaxMs: 8_000,
      checkIntervalMs: 2_000,
    },
  },
  scaling: {
    intervalMs: 3_000,
    windowSize: 10,
    waitThresholdMs: 2_000,
    scaleUpFactor: 1.5,
    maxInstances: 3,
    instancePortOffset: 100,
  },
  client: {
    timeoutMs: 10_000,
    requestIntervalMs: 500,
    requestCount: 100,
  },
};

export function createConfig(overrides: ConfigOverrides = {}, base: PipelineConfig = DEFAULT_CONFIG): PipelineConfig {
  return {
    host: overrides.host ?? base.host,
    ports: { ...base.ports, ...overrides.ports },
    dispatchMode: overrides.dispatchMode ?? base.dispatchMode,
    queueMaxLength: overrides.queueMaxLength ?? base.queueMaxLength,
    shutdownGraceMs: overrides.shutdownGraceMs ?? base.shutdownGraceMs,
    transport: { ...base.transport, ...overrides.transport },
    firstTier: { ...base.firstTier, ...overrides.firstTier },
    secondTier: {
      serviceTime: overrides.secondTier?.serviceTime ?? base.secondTier.serviceTime,
      failure: { ...base.secondTier.failure, ...overrides.secondTier?.failure },
    },
    scaling: { ...base.scaling, ...overrides.scaling },
    client: { ...base.client, ...overrides.client },
  };
}
