import { Injectable } from '@nestjs/common';
import {
  BuildDescriptor,
  BuiltImage,
  ContainerLogChunk,
  ContainerRuntime,
  ContainerState,
  ContainerStats,
  LaunchedContainer,
  LogQuery,
  PortBinding,
} from './container-runtime.port';

/** Runtime operations that can be made to fail. */
export type RuntimeOperation = keyof ContainerRuntime;

interface FakeContainer {
  containerRef: string;
  imageRef: string;
  binding: PortBinding;
  state: ContainerState;
  logs: string[];
  stats: ContainerStats;
}

const IDLE_STATS: ContainerStats = {
  cpuPercent: 0,
  memoryMb: 0,
  memoryLimitMb: 0,
  networkRxMb: 0,
  networkTxMb: 0,
};

/**
 * In-memory ContainerRuntime for tests and CONTAINER_RUNTIME=inmemory.
 * Single-process; no Docker required. Failures are injected per operation with failOn.
 */
@Injectable()
export class InMemoryContainerRuntime implements ContainerRuntime {
  private readonly images = new Map<string, BuildDescriptor>();
  private readonly containers = new Map<string, FakeContainer>();
  private readonly failures = new Map<RuntimeOperation, string>();
  private seq = 0;

  /** Every later call to `op` rejects with `message` until clearFailures. */
  failOn(op: RuntimeOperation, message: string): void {
    this.failures.set(op, message);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  /** Simulates the container process exiting on its own. */
  markExited(containerRef: string): void {
    const c = this.containers.get(containerRef);
    if (c) c.state = 'exited';
  }

  /** Simulates the container being deleted outside the factory. */
  forget(containerRef: string): void {
    this.containers.delete(containerRef);
  }

  setStats(containerRef: string, stats: ContainerStats): void {
    const c = this.containers.get(containerRef);
    if (c) c.stats = { ...stats };
  }

  appendLog(containerRef: string, line: string): void {
    this.containers.get(containerRef)?.logs.push(line);
  }

  hasImage(imageRef: string): boolean {
    return this.images.has(imageRef);
  }

  getImage(imageRef: string): BuildDescriptor | undefined {
    return this.images.get(imageRef);
  }

  hasContainer(containerRef: string): boolean {
    return this.containers.has(containerRef);
  }

  getBinding(containerRef: string): PortBinding | undefined {
    return this.containers.get(containerRef)?.binding;
  }

  async buildImage(descriptor: BuildDescriptor): Promise<BuiltImage> {
    this.throwIfFailing('buildImage');
    const imageRef = `sha256:${this.nextId()}`;
    this.images.set(imageRef, descriptor);
    return { imageRef };
  }

  async runContainer(imageRef: string, binding: PortBinding): Promise<LaunchedContainer> {
    this.throwIfFailing('runContainer');
    if (!this.images.has(imageRef)) {
      throw new Error(`No such image: ${imageRef}`);
    }
    const containerRef = this.nextId();
    this.containers.set(containerRef, {
      containerRef,
      imageRef,
      binding,
      state: 'running',
      logs: [`listening on ${binding.containerPort}`],
      stats: { ...IDLE_STATS, memoryLimitMb: binding.memoryLimitMb },
    });
    return { containerRef };
  }

  async stop(containerRef: string): Promise<void> {
    this.throwIfFailing('stop');
    this.requireContainer(containerRef).state = 'exited';
  }

  async remove(containerRef: string): Promise<void> {
    this.throwIfFailing('remove');
    this.requireContainer(containerRef);
    this.containers.delete(containerRef);
  }

  async removeImage(imageRef: string): Promise<void> {
    this.throwIfFailing('removeImage');
    if (!this.images.delete(imageRef)) {
      throw new Error(`No such image: ${imageRef}`);
    }
  }

  async stats(containerRef: string): Promise<ContainerStats> {
    this.throwIfFailing('stats');
    return { ...this.requireContainer(containerRef).stats };
  }

  /** Cursors are 1-based line numbers in the container's full output. */
  async logs(containerRef: string, query: LogQuery): Promise<ContainerLogChunk> {
    this.throwIfFailing('logs');
    const all = this.requireContainer(containerRef).logs;
    const start = Math.max(query.after === undefined ? 0 : Number(query.after), all.length - query.tail, 0);
    const lines = all.slice(start);
    return { lines, cursor: lines.length > 0 ? String(all.length) : null };
  }

  async inspect(containerRef: string): Promise<ContainerState> {
    this.throwIfFailing('inspect');
    return this.containers.get(containerRef)?.state ?? 'missing';
  }

  private requireContainer(containerRef: string): FakeContainer {
    const c = this.containers.get(containerRef);
    if (!c) throw new Error(`No such container: ${containerRef}`);
    return c;
  }

  private throwIfFailing(op: RuntimeOperation): void {
    const message = this.failures.get(op);
    if (message !== undefined) throw new Error(message);
  }

  private nextId(): string {
    this.seq += 1;
    return this.seq.toString(16).padStart(12, '0');
  }
}
