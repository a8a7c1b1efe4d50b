import { Pool, PoolClient } from "pg";
import type { GameResult, Player, PlayerId, SessionId, SessionStatus } from "../domain/types";

export type SessionRecord = {
  session_id: SessionId;
  player_1_id: PlayerId;
  player_2_id: PlayerId;
  status: SessionStatus;
  created_at: string;
};

/** Persistence used by the orchestrator; failures never stop a match. */
export interface ArenaStore {
  getPlayer(player_id: PlayerId): Promise<Player | null>;
  listPlayers(opts?: { builtin?: boolean }): Promise<Player[]>;
  upsertPlayer(player: Player): Promise<void>;
  createSessionRecord(record: SessionRecord): Promise<void>;
  completeSession(result: GameResult): Promise<void>;
}

type PlayerRow = {
  player_id: string;
  player_name: string;
  submitted_from: string;
  is_builtin: boolean;
  total_matches: number;
  wins: number;
  losses: number;
  draws: number;
  created_at: Date;
};

function toPlayer(row: PlayerRow): Player {
  const from = row.submitted_from;
  return {
    player_id: row.player_id,
    player_name: row.player_name,
    submitted_from: from === "upload" || from === "builtin" ? from : "online",
    is_builtin: row.is_builtin,
    total_matches: Number(row.total_matches),
    wins: Number(row.wins),
    losses: Number(row.losses),
    draws: Number(row.draws),
    created_at: row.created_at.toISOString(),
  };
}

export class ArenaRepository implements ArenaStore {
  constructor(private pool: Pool) {}

  async withTx<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  // ---------------------------------------------------------------------------
  // Players
  // ---------------------------------------------------------------------------

  async getPlayer(player_id: PlayerId): Promise<Player | null> {
    const r = await this.pool.query<PlayerRow>(
      `SELECT player_id, player_name, submitted_from, is_builtin,
              total_matches, wins, losses, draws, created_at
       FROM players
       WHERE player_id = $1
       LIMIT 1`,
      [player_id]
    );
    if (r.rowCount === 0) return null;
    return toPlayer(r.rows[0]);
  }

  async listPlayers(opts: { builtin?: boolean } = {}): Promise<Player[]> {
    const r = await this.pool.query<PlayerRow>(
      `SELECT player_id, player_name, submitted_from, is_builtin,
              total_matches, wins, losses, draws, created_at
       FROM players
       WHERE ($1::boolean IS NULL OR is_builtin = $1)
       ORDER BY created_at ASC, player_id ASC`,
      [opts.builtin ?? null]
    );
    return r.rows.map(toPlayer);
  }

  async upsertPlayer(player: Player): Promise<void> {
    await this.pool.query(
      `INSERT INTO players
       (player_id, player_name, submitted_from, is_builtin, created_at)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (player_id) DO UPDATE
         SET player_name = EXCLUDED.player_name,
             submitted_from = EXCLUDED.submitted_from,
             is_builtin = EXCLUDED.is_builtin`,
      [player.player_id, player.player_name, player.submitted_from, player.is_builtin, player.created_at]
    );
  }

  // ---------------------------------------------------------------------------
  // Sessions & results
  // ---------------------------------------------------------------------------

  async createSessionRecord(record: SessionRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO sessions(session_id, player_1_id, player_2_id, status, created_at)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (session_id) DO NOTHING`,
      [record.session_id, record.player_1_id, record.player_2_id, record.status, record.created_at]
    );
  }

  async completeSession(result: GameResult): Promise<void> {
    await this.withTx(async (client) => {
      await client.query(
        `INSERT INTO game_results
         (session_id, winner_id, loser_id, result_type, end_condition,
          total_turns, first_player, game_duration, final_scores, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         ON CONFLICT (session_id) DO NOTHING`,
        [
          result.session_id,
          result.winner,
          result.loser,
          result.result_type,
          result.end_condition,
          result.total_turns,
          result.first_player,
          result.game_duration,
          JSON.stringify(result.final_scores),
          result.created_at,
        ]
      );

      await client.query(
        `UPDATE sessions
         SET status = 'completed', turn_index = $2, winner_id = $3, completed_at = $4
         WHERE session_id = $1`,
        [result.session_id, result.total_turns, result.winner, result.created_at]
      );

      for (const player_id of Object.keys(result.final_scores)) {
        await client.query(
          `UPDATE players
           SET total_matches = total_matches + 1,
               wins = wins + $2,
               losses = losses + $3,
               draws = draws + $4
           WHERE player_id = $1`,
          [
            player_id,
            result.winner === player_id ? 1 : 0,
            result.loser === player_id ? 1 : 0,
            result.result_type === "draw" ? 1 : 0,
          ]
        );
      }
    });
  }
}
