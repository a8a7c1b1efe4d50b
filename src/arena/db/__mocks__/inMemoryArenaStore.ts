import type { GameResult, Player, PlayerId, SessionId } from "../../domain/types";
import type { ArenaStore, SessionRecord } from "../repository";

export class InMemoryArenaStore implements ArenaStore {
  private players = new Map<PlayerId, Player>();
  readonly sessions = new Map<SessionId, SessionRecord>();
  readonly results = new Map<SessionId, GameResult>();

  async getPlayer(player_id: PlayerId): Promise<Player | null> {
    const p = this.players.get(player_id);
    return p ? { ...p } : null;
  }

  async listPlayers(opts: { builtin?: boolean } = {}): Promise<Player[]> {
    return [...this.players.values()]
      .filter((p) => opts.builtin == null || p.is_builtin === opts.builtin)
      .map((p) => ({ ...p }));
  }

  async upsertPlayer(player: Player): Promise<void> {
    const existing = this.players.get(player.player_id);
    this.players.set(player.player_id, {
      ...player,
      // counters belong to the store once the player exists
      total_matches: existing?.total_matches ?? player.total_matches,
      wins: existing?.wins ?? player.wins,
      losses: existing?.losses ?? player.losses,
      draws: existing?.draws ?? player.draws,
      created_at: existing?.created_at ?? player.created_at,
    });
  }

  async createSessionRecord(record: SessionRecord): Promise<void> {
    if (!this.sessions.has(record.session_id)) {
      this.sessions.set(record.session_id, { ...record });
    }
  }

  async completeSession(result: GameResult): Promise<void> {
    if (this.results.has(result.session_id)) return;
    this.results.set(result.session_id, result);

    const session = this.sessions.get(result.session_id);
    if (session) session.status = "completed";

    for (const player_id of Object.keys(result.final_scores)) {
      const p = this.players.get(player_id);
      if (!p) continue;
      p.total_matches += 1;
      if (result.winner === player_id) p.wins += 1;
      if (result.loser === player_id) p.losses += 1;
      if (result.result_type === "draw") p.draws += 1;
    }
  }
}
