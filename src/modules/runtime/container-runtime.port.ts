/**
 * Files and metadata needed to build one game server image.
 * Paths in `files` are relative to the build context root.
 */
export interface BuildDescriptor {
  /** Image tag suffix; unique per provisioning attempt. */
  tag: string;
  files: Record<string, string>;
  labels: Record<string, string>;
}

/** Host-to-container port mapping and launch settings. */
export interface PortBinding {
  hostPort: number;
  containerPort: number;
  name: string;
  env: Record<string, string>;
  labels: Record<string, string>;
  cpuLimit: number;
  memoryLimitMb: number;
}

export interface BuiltImage {
  imageRef: string;
}

export interface LaunchedContainer {
  containerRef: string;
}

/** Point-in-time container resource usage. */
export interface ContainerStats {
  cpuPercent: number;
  memoryMb: number;
  memoryLimitMb: number;
  networkRxMb: number;
  networkTxMb: number;
}

export interface LogQuery {
  /** Upper bound on lines returned, newest kept. */
  tail: number;
  /** Cursor from an earlier read; only lines written after it are returned. */
  after?: string;
}

export interface ContainerLogChunk {
  lines: string[];
  /** Position of the last returned line, or null when nothing new was read. */
  cursor: string | null;
}

/** Container state as reported by the runtime; `missing` when the container no longer exists. */
export type ContainerState =
  | 'created'
  | 'running'
  | 'paused'
  | 'restarting'
  | 'exited'
  | 'dead'
  | 'missing';

/**
 * Port for the container runtime that builds and runs sandboxed game servers.
 * Calls may be slow; callers must not hold registry locks across them.
 * Timeouts surface as rejected promises.
 */
export interface ContainerRuntime {
  buildImage(descriptor: BuildDescriptor): Promise<BuiltImage>;
  runContainer(imageRef: string, binding: PortBinding): Promise<LaunchedContainer>;
  stop(containerRef: string): Promise<void>;
  remove(containerRef: string): Promise<void>;
  removeImage(imageRef: string): Promise<void>;
  stats(containerRef: string): Promise<ContainerStats>;
  logs(containerRef: string, query: LogQuery): Promise<ContainerLogChunk>;
  inspect(containerRef: string): Promise<ContainerState>;
}

/** NestJS injection token for ContainerRuntime. */
export const CONTAINER_RUNTIME = 'ContainerRuntime' as const;
