import { MatchmakerEntryView } from '../liveness-registry.service';

/** Wire shape of a matchmaker entry; dates as ISO strings. */
export interface MatchmakerEntryDto {
  serverId: string;
  ip: string;
  port: number;
  name: string;
  maxPlayers: number;
  currentPlayers: number;
  metadata: Record<string, unknown>;
  registeredAt: string;
  lastHeartbeat: string;
  active: boolean;
  uptimeSeconds: number;
}

export function toMatchmakerEntryDto(view: MatchmakerEntryView): MatchmakerEntryDto {
  return {
    ...view,
    registeredAt: view.registeredAt.toISOString(),
    lastHeartbeat: view.lastHeartbeat.toISOString(),
  };
}
