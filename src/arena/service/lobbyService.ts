import type { Logger } from "../../config/logger";
import type { ArenaStore } from "../db/repository";
import {
  LobbyCancelledError,
  LobbyTimeoutError,
  PlayerAlreadyInLobbyError,
  PlayerNotFoundError,
  errorMessage,
} from "../domain/errors";
import type { PlayerConfig, PlayerId, SessionId } from "../domain/types";
import type { SessionManager } from "./sessionManager";

export type LobbyMatch = {
  session_id: SessionId;
  opponent_id: PlayerId;
  opponent_name: string;
};

export type LobbyOptions = {
  /** How long a join waits for an opponent before giving up. */
  waitTimeoutMs: number;
  /** Passed to createSession for every lobby match. */
  visualize: boolean;
};

type Outcome = { ok: true; match: LobbyMatch } | { ok: false; error: Error };

type QueueEntry = {
  player_id: PlayerId;
  player_name: string;
  config: PlayerConfig;
  joined_at: Date;
  settle: (outcome: Outcome) => void;
};

/**
 * First-come-first-served matchmaking. join() parks the caller until a
 * second player arrives; the two oldest entries are paired and a session is
 * created for them.
 */
export class LobbyService {
  private readonly queue: QueueEntry[] = [];

  constructor(
    private readonly sessions: SessionManager,
    private readonly store: ArenaStore,
    private readonly logger: Logger,
    private readonly opts: LobbyOptions
  ) {}

  async join(player_id: PlayerId, config: PlayerConfig, signal?: AbortSignal): Promise<LobbyMatch> {
    const player = await this.store.getPlayer(player_id);
    if (!player) throw new PlayerNotFoundError(player_id);
    if (this.position(player_id) !== null) throw new PlayerAlreadyInLobbyError(player_id);
    if (signal?.aborted) throw new LobbyCancelledError(`player ${player_id} left the lobby`);

    const waiting = new Promise<LobbyMatch>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.remove(player_id)) {
          entry.settle({ ok: false, error: new LobbyTimeoutError(player_id, this.opts.waitTimeoutMs) });
        }
      }, this.opts.waitTimeoutMs);

      const onAbort = () => {
        if (this.remove(player_id)) {
          entry.settle({ ok: false, error: new LobbyCancelledError(`player ${player_id} left the lobby`) });
        }
      };

      const entry: QueueEntry = {
        player_id,
        player_name: player.player_name,
        config,
        joined_at: new Date(),
        settle: (outcome) => {
          clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
          if (outcome.ok) resolve(outcome.match);
          else reject(outcome.error);
        },
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.queue.push(entry);
    });

    this.logger.info({ player_id, position: this.queue.length }, "player joined lobby");
    this.tryMatch();
    return waiting;
  }

  /** Removes a waiting player; its pending join rejects. False if not queued. */
  leave(player_id: PlayerId): boolean {
    const entry = this.queue.find((e) => e.player_id === player_id);
    if (!entry || !this.remove(player_id)) return false;
    entry.settle({ ok: false, error: new LobbyCancelledError(`player ${player_id} left the lobby`) });
    this.logger.info({ player_id }, "player left lobby");
    return true;
  }

  /** 1-based queue position, or null when not waiting. */
  position(player_id: PlayerId): number | null {
    const idx = this.queue.findIndex((e) => e.player_id === player_id);
    return idx < 0 ? null : idx + 1;
  }

  size(): number {
    return this.queue.length;
  }

  close(): void {
    for (const entry of this.queue.splice(0)) {
      entry.settle({ ok: false, error: new LobbyCancelledError("lobby closed") });
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private remove(player_id: PlayerId): boolean {
    const idx = this.queue.findIndex((e) => e.player_id === player_id);
    if (idx < 0) return false;
    this.queue.splice(idx, 1);
    return true;
  }

  private tryMatch(): void {
    while (this.queue.length >= 2) {
      const [first, second] = this.queue.splice(0, 2);
      void this.startMatch(first, second);
    }
  }

  /** Never rejects: both waiters receive either the match or the failure. */
  private async startMatch(first: QueueEntry, second: QueueEntry): Promise<void> {
    this.logger.info({ player_1: first.player_id, player_2: second.player_id }, "lobby pairing players");
    try {
      const session_id = await this.sessions.createSession(first.config, second.config, this.opts.visualize);
      first.settle({
        ok: true,
        match: { session_id, opponent_id: second.player_id, opponent_name: second.player_name },
      });
      second.settle({
        ok: true,
        match: { session_id, opponent_id: first.player_id, opponent_name: first.player_name },
      });
    } catch (err) {
      this.logger.error(
        { err, player_1: first.player_id, player_2: second.player_id },
        `lobby match failed: ${errorMessage(err)}`
      );
      const error = err instanceof Error ? err : new Error(errorMessage(err));
      first.settle({ ok: false, error });
      second.settle({ ok: false, error });
    }
  }
}
