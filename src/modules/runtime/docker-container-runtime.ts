import { Logger } from '@nestjs/common';
import Docker from 'dockerode';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { RuntimeConfig } from '../../infra/config/env.config';
import { describeError } from '../../infra/errors/factory-errors';
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

const STOP_TIMEOUT_SECONDS = 10;
const BYTES_PER_MB = 1024 * 1024;

function hasStatusCode(err: unknown, code: number): boolean {
  return typeof err === 'object' && err !== null && 'statusCode' in err && err.statusCode === code;
}

function toContainerState(status: string): ContainerState {
  switch (status) {
    case 'created':
    case 'running':
    case 'paused':
    case 'restarting':
    case 'exited':
    case 'dead':
      return status;
    default:
      // "removing" and anything newer
      return 'dead';
  }
}

interface RawCpuStats {
  cpu_usage: { total_usage: number; percpu_usage?: number[] };
  system_cpu_usage?: number;
  online_cpus?: number;
}

/** The part of the Engine API stats payload the factory reads. */
export interface RawContainerStats {
  cpu_stats: RawCpuStats;
  precpu_stats: RawCpuStats;
  memory_stats: { usage?: number; limit?: number };
  networks?: Record<string, { rx_bytes: number; tx_bytes: number }>;
}

/** Docker stats payload to CPU percent, MB of memory and MB of network traffic. */
export function toContainerStats(raw: RawContainerStats): ContainerStats {
  const cpuDelta = Math.max(0, raw.cpu_stats.cpu_usage.total_usage - raw.precpu_stats.cpu_usage.total_usage);
  const systemDelta = (raw.cpu_stats.system_cpu_usage ?? 0) - (raw.precpu_stats.system_cpu_usage ?? 0);
  const online = raw.cpu_stats.online_cpus || raw.cpu_stats.cpu_usage.percpu_usage?.length || 1;
  const cpuPercent = systemDelta > 0 ? (cpuDelta / systemDelta) * online * 100 : 0;

  let rx = 0;
  let tx = 0;
  for (const net of Object.values(raw.networks ?? {})) {
    rx += net.rx_bytes;
    tx += net.tx_bytes;
  }

  return {
    cpuPercent: round2(cpuPercent),
    memoryMb: round2((raw.memory_stats.usage ?? 0) / BYTES_PER_MB),
    memoryLimitMb: round2((raw.memory_stats.limit ?? 0) / BYTES_PER_MB),
    networkRxMb: round2(rx / BYTES_PER_MB),
    networkTxMb: round2(tx / BYTES_PER_MB),
  };
}

/**
 * Splits a multiplexed log buffer (8-byte frame headers, no TTY) into lines.
 * Buffers without frame headers are treated as plain text.
 */
export function demuxLogs(buf: Buffer): string[] {
  const chunks: string[] = [];
  let offset = 0;
  const framed = buf.length >= 8 && buf[0] <= 2 && buf[1] === 0 && buf[2] === 0 && buf[3] === 0;
  if (!framed) {
    chunks.push(buf.toString('utf8'));
  } else {
    while (offset + 8 <= buf.length) {
      const size = buf.readUInt32BE(offset + 4);
      chunks.push(buf.subarray(offset + 8, offset + 8 + size).toString('utf8'));
      offset += 8 + size;
    }
  }
  return chunks
    .join('')
    .split('\n')
    .map((line) => line.replace(/\r$/, ''))
    .filter((line) => line.length > 0);
}

const TIMESTAMPED_LINE = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?Z ?(.*)$/;

export interface TimestampedLine {
  /** RFC 3339 with nine fraction digits, so cursors compare as strings. */
  timestamp: string;
  text: string;
}

/** Parses lines read with `timestamps: true`; lines without a timestamp are dropped. */
export function parseTimestampedLines(lines: string[]): TimestampedLine[] {
  const parsed: TimestampedLine[] = [];
  for (const line of lines) {
    const m = TIMESTAMPED_LINE.exec(line);
    if (!m) continue;
    parsed.push({ timestamp: `${m[1]}.${(m[2] ?? '').padEnd(9, '0')}Z`, text: m[3] });
  }
  return parsed;
}

/** Whole seconds of a cursor, for the Engine API `since` filter (inclusive). */
export function cursorSeconds(cursor: string): number {
  return Math.floor(Date.parse(`${cursor.slice(0, 19)}Z`) / 1000);
}

/** Lines strictly after `after`, at most `tail` of them, with the cursor of the last one. */
export function selectLogChunk(lines: TimestampedLine[], query: LogQuery): ContainerLogChunk {
  const { after } = query;
  const fresh = (after === undefined ? lines : lines.filter((l) => l.timestamp > after)).slice(-query.tail);
  return {
    lines: fresh.map((l) => l.text),
    cursor: fresh.length > 0 ? fresh[fresh.length - 1].timestamp : null,
  };
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * ContainerRuntime backed by the Docker Engine API via dockerode.
 * Builds images from an on-disk context, runs them on the configured bridge network.
 */
export class DockerContainerRuntime implements ContainerRuntime {
  private readonly logger = new Logger(DockerContainerRuntime.name);
  private readonly docker: Docker;
  private networkReady: Promise<void> | null = null;

  constructor(private readonly config: RuntimeConfig) {
    this.docker = new Docker({ socketPath: config.dockerSocket });
  }

  async buildImage(descriptor: BuildDescriptor): Promise<BuiltImage> {
    const tag = `${this.config.imagePrefix}:${descriptor.tag}`;
    const contextDir = await mkdtemp(join(tmpdir(), `${this.config.imagePrefix}-`));
    try {
      for (const [path, content] of Object.entries(descriptor.files)) {
        const target = join(contextDir, path);
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, content, 'utf8');
      }
      const stream = await this.docker.buildImage(
        { context: contextDir, src: Object.keys(descriptor.files) },
        { t: tag, labels: descriptor.labels, rm: true, forcerm: true },
      );
      await this.consumeBuildOutput(stream);
      const info = await this.docker.getImage(tag).inspect();
      return { imageRef: info.Id };
    } finally {
      await rm(contextDir, { recursive: true, force: true });
    }
  }

  async runContainer(imageRef: string, binding: PortBinding): Promise<LaunchedContainer> {
    await this.ensureNetwork();
    const portKey = `${binding.containerPort}/tcp`;
    const container = await this.docker.createContainer({
      Image: imageRef,
      name: binding.name,
      Env: Object.entries(binding.env).map(([k, v]) => `${k}=${v}`),
      Labels: binding.labels,
      ExposedPorts: { [portKey]: {} },
      HostConfig: {
        PortBindings: { [portKey]: [{ HostPort: String(binding.hostPort) }] },
        Memory: binding.memoryLimitMb * BYTES_PER_MB,
        NanoCpus: Math.round(binding.cpuLimit * 1e9),
        NetworkMode: this.config.dockerNetwork,
        RestartPolicy: { Name: 'no' },
        ExtraHosts: ['host.docker.internal:host-gateway'],
      },
    });
    try {
      await container.start();
    } catch (err) {
      await container.remove({ force: true }).catch((removeErr: unknown) => {
        this.logger.warn(`Failed to remove unstarted container ${container.id}: ${describeError(removeErr)}`);
      });
      throw err;
    }
    return { containerRef: container.id };
  }

  async stop(containerRef: string): Promise<void> {
    try {
      await this.docker.getContainer(containerRef).stop({ t: STOP_TIMEOUT_SECONDS });
    } catch (err) {
      // 304: already stopped
      if (!hasStatusCode(err, 304)) throw err;
    }
  }

  async remove(containerRef: string): Promise<void> {
    try {
      await this.docker.getContainer(containerRef).remove({ force: true });
    } catch (err) {
      if (!hasStatusCode(err, 404)) throw err;
    }
  }

  async removeImage(imageRef: string): Promise<void> {
    try {
      await this.docker.getImage(imageRef).remove({ force: true });
    } catch (err) {
      if (!hasStatusCode(err, 404)) throw err;
    }
  }

  async stats(containerRef: string): Promise<ContainerStats> {
    const raw = await this.docker.getContainer(containerRef).stats({ stream: false });
    return toContainerStats(raw);
  }

  async logs(containerRef: string, query: LogQuery): Promise<ContainerLogChunk> {
    const buf = await this.docker.getContainer(containerRef).logs({
      stdout: true,
      stderr: true,
      follow: false,
      timestamps: true,
      tail: query.tail,
      ...(query.after !== undefined ? { since: cursorSeconds(query.after) } : {}),
    });
    return selectLogChunk(parseTimestampedLines(demuxLogs(buf)), query);
  }

  async inspect(containerRef: string): Promise<ContainerState> {
    try {
      const info = await this.docker.getContainer(containerRef).inspect();
      return toContainerState(info.State.Status);
    } catch (err) {
      if (hasStatusCode(err, 404)) return 'missing';
      throw err;
    }
  }

  private ensureNetwork(): Promise<void> {
    if (!this.networkReady) {
      this.networkReady = this.createNetworkIfMissing().catch((err: unknown) => {
        this.networkReady = null;
        throw err;
      });
    }
    return this.networkReady;
  }

  private async createNetworkIfMissing(): Promise<void> {
    const name = this.config.dockerNetwork;
    const existing = await this.docker.listNetworks({ filters: { name: [name] } });
    if (existing.some((n) => n.Name === name)) return;
    await this.docker.createNetwork({ Name: name, Driver: 'bridge' });
    this.logger.log(`Created network ${name}`);
  }

  /** Drains the newline-delimited JSON build stream; rejects on the first reported error. */
  private async consumeBuildOutput(stream: NodeJS.ReadableStream): Promise<void> {
    let pending = '';
    let failure: string | null = null;
    for await (const chunk of stream) {
      pending += typeof chunk === 'string' ? chunk : chunk.toString('utf8');
      const lines = pending.split('\n');
      pending = lines.pop() ?? '';
      for (const line of lines) {
        failure = failure ?? buildErrorOf(line);
      }
    }
    failure = failure ?? buildErrorOf(pending);
    if (failure !== null) throw new Error(failure);
  }
}

function buildErrorOf(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }
  if (typeof parsed === 'object' && parsed !== null && 'error' in parsed && typeof parsed.error === 'string') {
    return parsed.error;
  }
  return null;
}
