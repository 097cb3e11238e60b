import { cpus } from 'os';

/**
 * Centralized environment configuration.
 * All env keys and defaults in one place. Works with .env (local) and container env injection.
 */

/** Container runtime driver. */
export type ContainerRuntimeDriver = 'docker' | 'inmemory';

/** Env key constants (for reference and deployment manifests). */
export const EnvKeys = {
  PORT: 'PORT',
  PORT_RANGE_START: 'PORT_RANGE_START',
  PORT_RANGE_END: 'PORT_RANGE_END',
  MAX_CONTAINERS: 'MAX_CONTAINERS',
  MAX_TOTAL_CPU: 'MAX_TOTAL_CPU',
  MAX_TOTAL_MEMORY_MB: 'MAX_TOTAL_MEMORY_MB',
  MAX_CPU_PERCENT: 'MAX_CPU_PERCENT',
  CONTAINER_CPU_LIMIT: 'CONTAINER_CPU_LIMIT',
  CONTAINER_MEMORY_LIMIT_MB: 'CONTAINER_MEMORY_LIMIT_MB',
  CONTAINER_PORT: 'CONTAINER_PORT',
  MAX_CODE_SIZE_BYTES: 'MAX_CODE_SIZE_BYTES',
  LOG_RETENTION_LINES: 'LOG_RETENTION_LINES',
  MONITOR_INTERVAL_SECONDS: 'MONITOR_INTERVAL_SECONDS',
  MATCHMAKER_HEARTBEAT_TIMEOUT_SECONDS: 'MATCHMAKER_HEARTBEAT_TIMEOUT_SECONDS',
  MATCHMAKER_SWEEP_INTERVAL_SECONDS: 'MATCHMAKER_SWEEP_INTERVAL_SECONDS',
  MATCHMAKER_URL: 'MATCHMAKER_URL',
  CONTAINER_RUNTIME: 'CONTAINER_RUNTIME',
  DOCKER_SOCKET: 'DOCKER_SOCKET',
  DOCKER_NETWORK: 'DOCKER_NETWORK',
  IMAGE_PREFIX: 'IMAGE_PREFIX',
} as const;

function getEnvString(key: string, defaultValue: string): string {
  const v = process.env[key]?.trim();
  return v ? v : defaultValue;
}

function getEnvInt(key: string, defaultValue: number): number {
  const v = process.env[key];
  if (v == null || v.trim() === '') return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? defaultValue : n;
}

function getEnvFloat(key: string, defaultValue: number): number {
  const v = process.env[key];
  if (v == null || v.trim() === '') return defaultValue;
  const n = parseFloat(v);
  return Number.isNaN(n) ? defaultValue : n;
}

/** HTTP server port. */
export function getPort(): number {
  return getEnvInt(EnvKeys.PORT, 8080);
}

/** NestJS injection token for FactoryConfig. */
export const FACTORY_CONFIG = 'FactoryConfig' as const;

/** NestJS injection token for MatchmakerConfig. */
export const MATCHMAKER_CONFIG = 'MatchmakerConfig' as const;

/** NestJS injection token for RuntimeConfig. */
export const RUNTIME_CONFIG = 'RuntimeConfig' as const;

/** Provisioning pipeline, admission and port range settings. */
export interface FactoryConfig {
  /** Inclusive lower bound of host ports handed to game servers. */
  portRangeStart: number;
  /** Inclusive upper bound of host ports handed to game servers. */
  portRangeEnd: number;
  maxContainers: number;
  /** Ceiling for the sum of per-container CPU reservations. */
  maxTotalCpu: number;
  /** Ceiling for the sum of per-container memory reservations. */
  maxTotalMemoryMb: number;
  /** Ceiling for observed CPU usage, as a percentage of all host cores. */
  maxCpuPercent: number;
  hostCpuCount: number;
  containerCpuLimit: number;
  containerMemoryLimitMb: number;
  maxCodeSizeBytes: number;
  logRetentionLines: number;
  /** 0 disables the container monitor. */
  monitorIntervalMs: number;
  /** URL the scaffolded game server uses to reach the matchmaker. */
  matchmakerUrl: string;
}

/** Liveness registry timing. */
export interface MatchmakerConfig {
  heartbeatTimeoutMs: number;
  sweepIntervalMs: number;
}

/** Container runtime driver selection and Docker settings. */
export interface RuntimeConfig {
  driver: ContainerRuntimeDriver;
  dockerSocket: string;
  dockerNetwork: string;
  imagePrefix: string;
  /** Port the scaffolded server listens on inside its container. */
  containerPort: number;
}

export function getFactoryConfig(): FactoryConfig {
  return {
    portRangeStart: getEnvInt(EnvKeys.PORT_RANGE_START, 8081),
    portRangeEnd: getEnvInt(EnvKeys.PORT_RANGE_END, 9080),
    maxContainers: getEnvInt(EnvKeys.MAX_CONTAINERS, 50),
    maxTotalCpu: getEnvFloat(EnvKeys.MAX_TOTAL_CPU, 32),
    maxTotalMemoryMb: getEnvInt(EnvKeys.MAX_TOTAL_MEMORY_MB, 16384),
    maxCpuPercent: getEnvFloat(EnvKeys.MAX_CPU_PERCENT, 80),
    hostCpuCount: Math.max(1, cpus().length),
    containerCpuLimit: getEnvFloat(EnvKeys.CONTAINER_CPU_LIMIT, 1.0),
    containerMemoryLimitMb: getEnvInt(EnvKeys.CONTAINER_MEMORY_LIMIT_MB, 512),
    maxCodeSizeBytes: getEnvInt(EnvKeys.MAX_CODE_SIZE_BYTES, 1024 * 1024),
    logRetentionLines: getEnvInt(EnvKeys.LOG_RETENTION_LINES, 200),
    monitorIntervalMs: getEnvInt(EnvKeys.MONITOR_INTERVAL_SECONDS, 60) * 1000,
    matchmakerUrl: getEnvString(EnvKeys.MATCHMAKER_URL, `http://host.docker.internal:${getPort()}`),
  };
}

/** Heartbeat timeout defaults to 30s, sweep interval to 10s. */
export function getMatchmakerConfig(): MatchmakerConfig {
  return {
    heartbeatTimeoutMs: getEnvInt(EnvKeys.MATCHMAKER_HEARTBEAT_TIMEOUT_SECONDS, 30) * 1000,
    sweepIntervalMs: getEnvInt(EnvKeys.MATCHMAKER_SWEEP_INTERVAL_SECONDS, 10) * 1000,
  };
}

export function getRuntimeConfig(): RuntimeConfig {
  const raw = process.env[EnvKeys.CONTAINER_RUNTIME]?.toLowerCase();
  return {
    driver: raw === 'inmemory' ? 'inmemory' : 'docker',
    dockerSocket: getEnvString(EnvKeys.DOCKER_SOCKET, '/var/run/docker.sock'),
    dockerNetwork: getEnvString(EnvKeys.DOCKER_NETWORK, 'game-network'),
    imagePrefix: getEnvString(EnvKeys.IMAGE_PREFIX, 'game-server'),
    containerPort: getEnvInt(EnvKeys.CONTAINER_PORT, 8080),
  };
}
