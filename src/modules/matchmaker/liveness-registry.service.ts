import { Inject, Injectable, Logger } from '@nestjs/common';
import { isIP } from 'class-validator';
import { randomUUID } from 'crypto';
import { MATCHMAKER_CONFIG, MatchmakerConfig } from '../../infra/config/env.config';
import { GoneError, InvalidInputError, NotFoundError } from '../../infra/errors/factory-errors';
import { CLOCK, Clock } from '../../infra/time/clock';

export const DEFAULT_MAX_PLAYERS = 20;
export const MAX_PLAYERS_LIMIT = 100;

const ENTRY_KIND = 'Matchmaker server';

export interface MatchmakerEntry {
  serverId: string;
  ip: string;
  port: number;
  name: string;
  maxPlayers: number;
  currentPlayers: number;
  metadata: Record<string, unknown>;
  registeredAt: Date;
  lastHeartbeat: Date;
}

/** Entry as reported to callers; active and uptime are derived at read time. */
export interface MatchmakerEntryView extends MatchmakerEntry {
  active: boolean;
  uptimeSeconds: number;
}

export interface RegisterServerInput {
  ip: string;
  port: number;
  name: string;
  maxPlayers?: number;
  currentPlayers?: number;
  metadata?: Record<string, unknown>;
  /** Kept when free or held by a lapsed entry; refreshes a live entry at the same ip:port. */
  serverId?: string;
}

export interface MatchmakerStats {
  activeServers: number;
  totalRegisteredServers: number;
  /** Sum of currentPlayers over active entries. */
  totalPlayers: number;
  heartbeatTimeoutSeconds: number;
}

/**
 * In-memory liveness registry for discoverable game servers.
 * An entry is active while now - lastHeartbeat < heartbeatTimeoutMs. Lapsed entries
 * answer Gone until the sweeper removes them, then NotFound.
 */
@Injectable()
export class LivenessRegistryService {
  private readonly logger = new Logger(LivenessRegistryService.name);
  /** Insertion order breaks registeredAt ties in list(). */
  private readonly entries = new Map<string, MatchmakerEntry>();

  constructor(
    @Inject(MATCHMAKER_CONFIG) private readonly config: MatchmakerConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  register(input: RegisterServerInput): MatchmakerEntryView {
    this.validate(input);
    const now = this.clock.now();

    if (input.serverId) {
      const existing = this.entries.get(input.serverId);
      if (existing && this.isActive(existing, now)) {
        if (existing.ip === input.ip && existing.port === input.port) {
          existing.name = input.name;
          existing.maxPlayers = input.maxPlayers ?? existing.maxPlayers;
          existing.currentPlayers = input.currentPlayers ?? existing.currentPlayers;
          existing.metadata = { ...(input.metadata ?? existing.metadata) };
          existing.lastHeartbeat = new Date(now);
          return this.toView(existing, now);
        }
        this.logger.warn(`Server id ${input.serverId} held by ${existing.ip}:${existing.port}; assigning a new id`);
      } else {
        return this.insert(input.serverId, input, now);
      }
    }
    return this.insert(this.generateId(), input, now);
  }

  /** Refreshes lastHeartbeat; revives an entry that lapsed but was not swept yet. */
  heartbeat(serverId: string, currentPlayers?: number): MatchmakerEntryView {
    const entry = this.entries.get(serverId);
    if (!entry) throw new NotFoundError(ENTRY_KIND, serverId);
    if (currentPlayers !== undefined) {
      if (!Number.isInteger(currentPlayers) || currentPlayers < 0) {
        throw new InvalidInputError('currentPlayers must be a non-negative integer');
      }
      entry.currentPlayers = currentPlayers;
    }
    const now = this.clock.now();
    entry.lastHeartbeat = new Date(now);
    return this.toView(entry, now);
  }

  get(serverId: string): MatchmakerEntryView {
    const entry = this.entries.get(serverId);
    if (!entry) throw new NotFoundError(ENTRY_KIND, serverId);
    const now = this.clock.now();
    if (!this.isActive(entry, now)) throw new GoneError(ENTRY_KIND, serverId);
    return this.toView(entry, now);
  }

  /** Ordered by registeredAt, ties in registration order. */
  list(activeOnly = true): MatchmakerEntryView[] {
    const now = this.clock.now();
    return [...this.entries.values()]
      .filter((e) => !activeOnly || this.isActive(e, now))
      .sort((a, b) => a.registeredAt.getTime() - b.registeredAt.getTime())
      .map((e) => this.toView(e, now));
  }

  unregister(serverId: string): void {
    if (!this.entries.delete(serverId)) throw new NotFoundError(ENTRY_KIND, serverId);
    this.logger.log(`Unregistered ${serverId}`);
  }

  /** Removes every entry whose heartbeat window has lapsed at `now`. Returns the count removed. */
  sweep(now: number = this.clock.now()): number {
    let removed = 0;
    for (const [serverId, entry] of this.entries) {
      if (now - entry.lastHeartbeat.getTime() >= this.config.heartbeatTimeoutMs) {
        this.entries.delete(serverId);
        removed += 1;
        this.logger.log(`Evicted ${serverId} (${entry.ip}:${entry.port}); no heartbeat since ${entry.lastHeartbeat.toISOString()}`);
      }
    }
    return removed;
  }

  stats(): MatchmakerStats {
    const now = this.clock.now();
    let activeServers = 0;
    let totalPlayers = 0;
    for (const entry of this.entries.values()) {
      if (!this.isActive(entry, now)) continue;
      activeServers += 1;
      totalPlayers += entry.currentPlayers;
    }
    return {
      activeServers,
      totalRegisteredServers: this.entries.size,
      totalPlayers,
      heartbeatTimeoutSeconds: this.config.heartbeatTimeoutMs / 1000,
    };
  }

  private insert(serverId: string, input: RegisterServerInput, now: number): MatchmakerEntryView {
    // A lapsed entry with the same id is replaced and moves to the end of the order.
    this.entries.delete(serverId);
    const entry: MatchmakerEntry = {
      serverId,
      ip: input.ip,
      port: input.port,
      name: input.name,
      maxPlayers: input.maxPlayers ?? DEFAULT_MAX_PLAYERS,
      currentPlayers: input.currentPlayers ?? 0,
      metadata: { ...(input.metadata ?? {}) },
      registeredAt: new Date(now),
      lastHeartbeat: new Date(now),
    };
    this.entries.set(serverId, entry);
    this.logger.log(`Registered ${serverId} at ${entry.ip}:${entry.port} (${entry.name})`);
    return this.toView(entry, now);
  }

  private isActive(entry: MatchmakerEntry, now: number): boolean {
    return now - entry.lastHeartbeat.getTime() < this.config.heartbeatTimeoutMs;
  }

  private toView(entry: MatchmakerEntry, now: number): MatchmakerEntryView {
    return {
      ...entry,
      metadata: { ...entry.metadata },
      registeredAt: new Date(entry.registeredAt),
      lastHeartbeat: new Date(entry.lastHeartbeat),
      active: this.isActive(entry, now),
      uptimeSeconds: Math.floor((now - entry.registeredAt.getTime()) / 1000),
    };
  }

  private generateId(): string {
    let id: string;
    do {
      id = `mm-${randomUUID().replace(/-/g, '').slice(0, 16)}`;
    } while (this.entries.has(id));
    return id;
  }

  private validate(input: RegisterServerInput): void {
    if (!isIP(input.ip)) {
      throw new InvalidInputError('ip must be an IPv4 or IPv6 address');
    }
    if (!Number.isInteger(input.port) || input.port < 1 || input.port > 65535) {
      throw new InvalidInputError('port must be an integer between 1 and 65535');
    }
    if (input.name.length < 1 || input.name.length > 100) {
      throw new InvalidInputError('name must be 1-100 characters');
    }
    const maxPlayers = input.maxPlayers ?? DEFAULT_MAX_PLAYERS;
    if (!Number.isInteger(maxPlayers) || maxPlayers < 1 || maxPlayers > MAX_PLAYERS_LIMIT) {
      throw new InvalidInputError(`maxPlayers must be an integer between 1 and ${MAX_PLAYERS_LIMIT}`);
    }
    const currentPlayers = input.currentPlayers ?? 0;
    if (!Number.isInteger(currentPlayers) || currentPlayers < 0) {
      throw new InvalidInputError('currentPlayers must be a non-negative integer');
    }
  }
}
