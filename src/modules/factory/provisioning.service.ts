import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { SerialLock } from '../../infra/concurrency/serial-lock';
import { FACTORY_CONFIG, FactoryConfig, RUNTIME_CONFIG, RuntimeConfig } from '../../infra/config/env.config';
import {
  BuildFailedError,
  InvalidInputError,
  LaunchFailedError,
  NotFoundError,
  ResourceExhaustedError,
  describeError,
} from '../../infra/errors/factory-errors';
import { CLOCK, Clock } from '../../infra/time/clock';
import { CONTAINER_RUNTIME, ContainerRuntime, PortBinding } from '../runtime/container-runtime.port';
import { AdmissionService } from './admission.service';
import { CodeAnalysis, analyzeCode } from './code-analyzer';
import { GameServerInstance } from './game-server-instance';
import { PortAllocatorService } from './port-allocator.service';
import { CREATED_BY_LABEL, buildDescriptor } from './scaffold';
import { ServerRegistryService } from './server-registry.service';

export const NAME_MAX_LENGTH = 100;
export const DESCRIPTION_MAX_LENGTH = 500;
export const DEFAULT_LOG_TAIL = 100;
export const MAX_LOG_TAIL = 1000;

export interface ProvisionRequest {
  userCode: string;
  name: string;
  description?: string;
}

/** `gs-<slug>-<12 hex>`; slug is the name's lowercase ASCII alphanumerics, at most 24. */
export function generateServerId(name: string): string {
  const slug = name.toLowerCase().replace(/[^a-z0-9]/g, '').slice(0, 24) || 'game';
  return `gs-${slug}-${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

function analysisLogLines(analysis: CodeAnalysis): string[] {
  return [
    ...analysis.issues.map((i) => `code analysis ${i.severity}: ${i.message} (line ${i.line})`),
    ...analysis.warnings.map((w) => `code analysis warning: ${w}`),
  ];
}

/**
 * Turns user code into a running game server and drives its lifecycle.
 * Runtime calls happen first and their outcome is recorded afterwards; every
 * failed attempt releases its port and leaves no registry record.
 */
@Injectable()
export class ProvisioningService {
  private readonly logger = new Logger(ProvisioningService.name);
  /** Admission check and pending reservation happen as one step. */
  private readonly admissionLock = new SerialLock();
  private readonly logLock = new SerialLock();
  /** Runtime log cursor per instance: container output up to it is already in `logs`. */
  private readonly logCursors = new Map<string, string>();

  constructor(
    @Inject(FACTORY_CONFIG) private readonly config: FactoryConfig,
    @Inject(RUNTIME_CONFIG) private readonly runtimeConfig: RuntimeConfig,
    @Inject(CONTAINER_RUNTIME) private readonly runtime: ContainerRuntime,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly registry: ServerRegistryService,
    private readonly allocator: PortAllocatorService,
    private readonly admission: AdmissionService,
  ) {}

  async provision(request: ProvisionRequest): Promise<GameServerInstance> {
    const name = request.name.trim();
    const description = (request.description ?? '').trim();
    this.validate(request.userCode, name, description);

    const analysis = analyzeCode(request.userCode);
    if (!analysis.valid) {
      throw new InvalidInputError('Code failed security analysis', {
        issues: analysis.issues.filter((i) => i.severity === 'high'),
      });
    }

    const serverId = generateServerId(name);
    await this.admit(serverId);
    try {
      return await this.buildAndLaunch(serverId, name, description, request.userCode, analysis);
    } finally {
      this.registry.clearPending(serverId);
    }
  }

  getInstance(serverId: string): GameServerInstance {
    return this.registry.get(serverId);
  }

  listInstances(): GameServerInstance[] {
    return this.registry.list();
  }

  /** Idempotent for stopped instances; a runtime failure moves the instance to error. */
  async stop(serverId: string): Promise<GameServerInstance> {
    const instance = this.registry.get(serverId);
    if (instance.status !== 'running' || instance.containerRef === null) return instance;

    try {
      await this.runtime.stop(instance.containerRef);
    } catch (err) {
      const message = describeError(err);
      this.logger.error(`Failed to stop ${serverId}: ${message}`);
      return this.registry.update(serverId, (i) => {
        if (i.status !== 'running') return;
        i.status = 'error';
        i.logs.push(`stop failed: ${message}`);
      });
    }
    this.logger.log(`Stopped ${serverId}`);
    return this.registry.update(serverId, (i) => {
      // A concurrent status refresh may already have moved it to error.
      if (i.status !== 'running') return;
      i.status = 'stopped';
      i.logs.push('server stopped');
    });
  }

  /** Stops if needed, removes container and image, then forgets the instance. */
  async remove(serverId: string): Promise<GameServerInstance> {
    let instance = this.registry.get(serverId);
    if (instance.status === 'running') {
      instance = await this.stop(serverId);
    }
    if (instance.containerRef !== null) {
      const containerRef = instance.containerRef;
      await this.runtime.remove(containerRef).catch((err: unknown) => {
        this.logger.warn(`Failed to remove container ${containerRef} of ${serverId}: ${describeError(err)}`);
      });
    }
    if (instance.imageRef !== null) {
      await this.discardImage(serverId, instance.imageRef);
    }
    this.registry.delete(serverId);
    this.logCursors.delete(serverId);
    this.logger.log(`Removed ${serverId}`);
    return {
      ...instance,
      status: 'removed',
      updatedAt: new Date(this.clock.now()),
      logs: [...instance.logs, 'server removed'],
    };
  }

  /** Live resource usage; falls back to the cached snapshot when the runtime fails. */
  async refreshStats(serverId: string): Promise<GameServerInstance> {
    const instance = this.registry.get(serverId);
    if (instance.containerRef === null) return instance;
    try {
      const stats = await this.runtime.stats(instance.containerRef);
      const observedAt = new Date(this.clock.now());
      return this.registry.update(serverId, (i) => {
        i.resourceUsage = { ...stats, observedAt };
      });
    } catch (err) {
      this.logger.warn(`Stats unavailable for ${serverId}: ${describeError(err)}`);
      return instance;
    }
  }

  /**
   * Last `tail` log lines. Container output written since the previous read is
   * appended first; when the runtime is unreachable the retained tail is returned.
   */
  async fetchLogs(serverId: string, tail = DEFAULT_LOG_TAIL): Promise<string[]> {
    if (!Number.isInteger(tail) || tail < 1 || tail > MAX_LOG_TAIL) {
      throw new InvalidInputError(`tail must be an integer between 1 and ${MAX_LOG_TAIL}`, { tail });
    }
    return this.logLock.runExclusive(async () => {
      const instance = this.registry.get(serverId);
      if (instance.containerRef === null) return instance.logs.slice(-tail);
      try {
        const chunk = await this.runtime.logs(instance.containerRef, {
          tail: this.config.logRetentionLines,
          after: this.logCursors.get(serverId),
        });
        if (chunk.cursor === null) return this.registry.get(serverId).logs.slice(-tail);
        const updated = this.registry.appendLog(serverId, ...chunk.lines);
        this.logCursors.set(serverId, chunk.cursor);
        return updated.logs.slice(-tail);
      } catch (err) {
        if (err instanceof NotFoundError) throw err;
        this.logger.warn(`Logs unavailable for ${serverId}: ${describeError(err)}`);
        return instance.logs.slice(-tail);
      }
    });
  }

  /** A running instance whose container exited or vanished moves to error. */
  async refreshStatus(serverId: string): Promise<GameServerInstance> {
    const instance = this.registry.get(serverId);
    if (instance.status !== 'running' || instance.containerRef === null) return instance;

    const state = await this.runtime.inspect(instance.containerRef).catch((err: unknown) => {
      this.logger.warn(`Inspect failed for ${serverId}: ${describeError(err)}`);
      return null;
    });
    if (state === null || state === 'running' || state === 'created' || state === 'restarting' || state === 'paused') {
      return instance;
    }
    this.logger.warn(`Container of ${serverId} is ${state}`);
    return this.registry.update(serverId, (i) => {
      if (i.status !== 'running') return;
      i.status = 'error';
      i.logs.push(state === 'missing' ? 'container disappeared' : `container ${state}`);
    });
  }

  private validate(userCode: string, name: string, description: string): void {
    if (userCode.trim().length === 0) {
      throw new InvalidInputError('userCode must not be empty');
    }
    const size = Buffer.byteLength(userCode, 'utf8');
    if (size > this.config.maxCodeSizeBytes) {
      throw new InvalidInputError(`userCode exceeds ${this.config.maxCodeSizeBytes} bytes`, {
        size,
        max: this.config.maxCodeSizeBytes,
      });
    }
    if (name.length < 1 || name.length > NAME_MAX_LENGTH) {
      throw new InvalidInputError(`name must be 1-${NAME_MAX_LENGTH} characters`);
    }
    if (description.length > DESCRIPTION_MAX_LENGTH) {
      throw new InvalidInputError(`description must be at most ${DESCRIPTION_MAX_LENGTH} characters`);
    }
  }

  private admit(serverId: string): Promise<void> {
    return this.admissionLock.runExclusive(async () => {
      const decision = await this.admission.canAdmit();
      if (!decision.allowed) {
        this.logger.warn(`Admission denied: ${decision.reason}`);
        throw new ResourceExhaustedError(decision.reason);
      }
      this.registry.addPending(serverId);
    });
  }

  private async buildAndLaunch(
    serverId: string,
    name: string,
    description: string,
    userCode: string,
    analysis: CodeAnalysis,
  ): Promise<GameServerInstance> {
    let imageRef: string;
    try {
      const descriptor = await buildDescriptor({ serverId, name, userCode });
      ({ imageRef } = await this.runtime.buildImage(descriptor));
    } catch (err) {
      const cause = describeError(err);
      this.logger.error(`Image build failed for ${serverId}: ${cause}`);
      throw new BuildFailedError(cause);
    }

    let port: number;
    try {
      port = await this.allocator.allocate();
    } catch (err) {
      await this.discardImage(serverId, imageRef);
      throw err;
    }

    let containerRef: string;
    try {
      ({ containerRef } = await this.runtime.runContainer(imageRef, this.bindingFor(serverId, name, port)));
    } catch (err) {
      const cause = describeError(err);
      this.logger.error(`Container launch failed for ${serverId} on port ${port}: ${cause}`);
      this.allocator.release(port);
      await this.discardImage(serverId, imageRef);
      throw new LaunchFailedError(cause);
    }

    const now = new Date(this.clock.now());
    const instance = this.registry.upsert({
      serverId,
      name,
      description,
      status: 'running',
      containerRef,
      imageRef,
      port,
      createdAt: now,
      updatedAt: now,
      resourceUsage: null,
      logs: [...analysisLogLines(analysis), `image built: ${imageRef}`, `container started on port ${port}`],
    });
    this.allocator.commit(port);
    this.logger.log(`Server ${serverId} (${name}) running on port ${port}`);
    return instance;
  }

  private bindingFor(serverId: string, name: string, hostPort: number): PortBinding {
    const containerPort = this.runtimeConfig.containerPort;
    return {
      hostPort,
      containerPort,
      name: serverId,
      env: {
        PORT: String(containerPort),
        PUBLIC_PORT: String(hostPort),
        SERVER_ID: serverId,
        ROOM_NAME: name,
        MATCHMAKER_URL: this.config.matchmakerUrl,
      },
      labels: { ...CREATED_BY_LABEL, server_id: serverId },
      cpuLimit: this.config.containerCpuLimit,
      memoryLimitMb: this.config.containerMemoryLimitMb,
    };
  }

  private async discardImage(serverId: string, imageRef: string): Promise<void> {
    await this.runtime.removeImage(imageRef).catch((err: unknown) => {
      this.logger.warn(`Failed to remove image ${imageRef} of ${serverId}: ${describeError(err)}`);
    });
  }
}
