import { INestApplication } from '@nestjs/common';
import { FactoryConfig, MatchmakerConfig, RuntimeConfig } from '../src/infra/config/env.config';
import { Clock } from '../src/infra/time/clock';
import { HostPortProbe } from '../src/modules/factory/host-port-probe';

const CLOSE_TIMEOUT_MS = 5000;

/** Manually advanced clock. */
export class FakeClock implements Clock {
  constructor(private current = Date.parse('2026-01-01T00:00:00.000Z')) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/** Reports only the listed ports as bound on the host. */
export class FakeHostPortProbe implements HostPortProbe {
  readonly busy = new Set<number>();
  probes = 0;

  async isInUse(port: number): Promise<boolean> {
    this.probes += 1;
    return this.busy.has(port);
  }
}

export function testFactoryConfig(overrides: Partial<FactoryConfig> = {}): FactoryConfig {
  return {
    portRangeStart: 9100,
    portRangeEnd: 9109,
    maxContainers: 50,
    maxTotalCpu: 32,
    maxTotalMemoryMb: 16384,
    maxCpuPercent: 80,
    hostCpuCount: 4,
    containerCpuLimit: 1,
    containerMemoryLimitMb: 512,
    maxCodeSizeBytes: 1024,
    logRetentionLines: 200,
    monitorIntervalMs: 0,
    matchmakerUrl: 'http://matchmaker.test',
    ...overrides,
  };
}

export function testMatchmakerConfig(overrides: Partial<MatchmakerConfig> = {}): MatchmakerConfig {
  return { heartbeatTimeoutMs: 30_000, sweepIntervalMs: 10_000, ...overrides };
}

export function testRuntimeConfig(): RuntimeConfig {
  return {
    driver: 'inmemory',
    dockerSocket: '/var/run/docker.sock',
    dockerNetwork: 'game-network',
    imagePrefix: 'game-server',
    containerPort: 8080,
  };
}

export const SIMPLE_GAME = `function initGame() {
  return { clickCount: 0 };
}

function handlePlayerAction(state, action) {
  if (action === 'click') state.clickCount += 1;
  return state;
}
`;

/** Closes the NestJS app with a timeout so Jest never hangs on teardown. */
export async function closeApp(app: INestApplication): Promise<void> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error('App close timeout')), CLOSE_TIMEOUT_MS);
  });
  try {
    await Promise.race([app.close(), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
