import { randomUUID } from "node:crypto";
import type { Logger } from "../../config/logger";
import { createRemotePlayer, type BotProxy } from "../bots/botProxy";
import type { BuiltinBotRegistry } from "../bots/builtinBots";
import type { ArenaStore } from "../db/repository";
import {
  ActionMismatchError,
  PlayerNotFoundError,
  SessionNotFoundError,
  ValidationError,
} from "../domain/errors";
import {
  SIDES,
  type ActionData,
  type ArenaEvent,
  type GameResult,
  type PlayerConfig,
  type PlayerId,
  type PlayerKind,
  type SessionId,
  type SessionStartEvent,
  type SessionStatus,
  type Side,
} from "../domain/types";
import { assertPlayerConfig } from "../domain/validate";
import { EngineAdapter } from "../engine-adapters/engineAdapter";
import type { SimulationEngineFactory } from "../engine/simulationContract";
import type { VisualizerHandles } from "../ports/visualizerPort";
import type { EventBroadcaster, Subscription } from "./eventBroadcaster";
import type { SessionContext } from "./sessionContext";
import { TurnProcessor, type TurnProcessorOptions } from "./turnProcessor";
import type { VisualizerBridge } from "./visualizerBridge";

export type SessionManagerOptions = TurnProcessorOptions & {
  /** Global switch; a session's `visualize` flag is ignored when off. */
  visualizationEnabled: boolean;
};

export type SessionManagerDeps = {
  engineFactory: SimulationEngineFactory;
  store: ArenaStore;
  bots: BuiltinBotRegistry;
  broadcaster: EventBroadcaster;
  visualizer: VisualizerBridge | null;
  logger: Logger;
  newId?: () => string;
};

export type SessionPlayerInfo = {
  player_id: PlayerId;
  name: string;
  kind: PlayerKind;
  bot_id: string | null;
};

export type SessionInfo = {
  session_id: SessionId;
  status: SessionStatus;
  turn: number;
  player_1: SessionPlayerInfo;
  player_2: SessionPlayerInfo;
  visualizer_enabled: boolean;
  created_at: string;
  winner: PlayerId | null;
  end_condition: GameResult["end_condition"] | null;
};

export class SessionManager {
  private readonly sessions = new Map<SessionId, SessionContext>();
  private readonly processor: TurnProcessor;
  private readonly newId: () => string;

  constructor(private readonly opts: SessionManagerOptions, private readonly deps: SessionManagerDeps) {
    this.newId = deps.newId ?? randomUUID;
    this.processor = new TurnProcessor(opts, {
      broadcaster: deps.broadcaster,
      visualizer: deps.visualizer,
      logger: deps.logger,
      onGameOver: (_ctx, result) => deps.store.completeSession(result),
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Validates both configs, initializes the engine and starts the match in
   * the background. Resolves with the id before turn 1 is played.
   */
  async createSession(
    player1: PlayerConfig,
    player2: PlayerConfig,
    visualize = false
  ): Promise<SessionId> {
    assertPlayerConfig(player1, "player_1_config");
    assertPlayerConfig(player2, "player_2_config");

    const proxies: Record<Side, BotProxy> = {
      player_1: await this.buildProxy(player1),
      player_2: await this.buildProxy(player2),
    };
    if (proxies.player_1.player_id === proxies.player_2.player_id) {
      throw new ValidationError(
        `both sides resolve to the same player: ${proxies.player_1.player_id}`
      );
    }

    const adapter = new EngineAdapter(this.deps.engineFactory);
    const initial = adapter.initialize(proxies.player_1, proxies.player_2);

    const session_id = this.newId();
    const logger = this.deps.logger.child({ session_id });
    const created_at = new Date();

    try {
      await this.deps.store.createSessionRecord({
        session_id,
        player_1_id: proxies.player_1.player_id,
        player_2_id: proxies.player_2.player_id,
        status: "active",
        created_at: created_at.toISOString(),
      });
    } catch (err) {
      logger.error({ err }, "failed to persist session record");
    }

    let visualizer: VisualizerHandles | null = null;
    if (visualize) {
      if (this.opts.visualizationEnabled && this.deps.visualizer) {
        visualizer = this.deps.visualizer.spawn(session_id, {
          player_1_name: proxies.player_1.name,
          player_2_name: proxies.player_2.name,
        });
      } else {
        logger.info("visualization requested but disabled on this server");
      }
    }

    const start: SessionStartEvent = {
      event: "session_start",
      session_id,
      turn: 0,
      player_1_name: proxies.player_1.name,
      player_2_name: proxies.player_2.name,
      initial_state: initial,
      timestamp: created_at.toISOString(),
    };

    const ctx: SessionContext = {
      session_id,
      proxies,
      adapter,
      turn: 0,
      game_state: initial,
      events: [start],
      status: "active",
      terminal: false,
      result: null,
      visualizer_enabled: visualizer !== null,
      visualizer,
      created_at,
      abort: new AbortController(),
      task: null,
      logger,
    };

    this.sessions.set(session_id, ctx);
    for (const side of SIDES) {
      const proxy = proxies[side];
      if (proxy.kind === "remote") proxy.slot.arm(1);
    }
    if (ctx.visualizer && this.deps.visualizer) {
      this.deps.visualizer.send(ctx.visualizer, start);
    }

    ctx.task = this.processor.run(ctx);
    logger.info(
      {
        player_1: proxies.player_1.player_id,
        player_2: proxies.player_2.player_id,
        visualizer_enabled: ctx.visualizer_enabled,
      },
      "session created"
    );
    return session_id;
  }

  /**
   * Stops the match if still running, waits for its loop, terminates the
   * visualizer and forgets the session. Returns false if already gone.
   */
  async cleanupSession(sessionId: SessionId): Promise<boolean> {
    const ctx = this.sessions.get(sessionId);
    if (!ctx) return false;
    this.sessions.delete(sessionId);

    if (!ctx.terminal) {
      ctx.status = "cancelled";
      ctx.terminal = true;
    }
    ctx.abort.abort();
    if (ctx.task) await ctx.task;

    if (ctx.visualizer_enabled && ctx.visualizer && this.deps.visualizer) {
      await this.deps.visualizer.terminate(ctx.visualizer);
    }
    this.deps.broadcaster.closeSession(sessionId);

    ctx.logger.info({ status: ctx.status, turn: ctx.turn }, "session cleaned up");
    return true;
  }

  async shutdown(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((id) => this.cleanupSession(id)));
    this.deps.broadcaster.disconnectAll();
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getSession(sessionId: SessionId): SessionContext {
    const ctx = this.sessions.get(sessionId);
    if (!ctx) throw new SessionNotFoundError(sessionId);
    return ctx;
  }

  listActive(): SessionId[] {
    return [...this.sessions.values()].filter((c) => !c.terminal).map((c) => c.session_id);
  }

  listActiveInfo(): SessionInfo[] {
    return this.listActive().map((id) => this.describe(id));
  }

  describe(sessionId: SessionId): SessionInfo {
    const ctx = this.getSession(sessionId);
    return {
      session_id: ctx.session_id,
      status: ctx.status,
      turn: ctx.turn,
      player_1: playerInfo(ctx.proxies.player_1),
      player_2: playerInfo(ctx.proxies.player_2),
      visualizer_enabled: ctx.visualizer_enabled,
      created_at: ctx.created_at.toISOString(),
      winner: ctx.result?.winner ?? null,
      end_condition: ctx.result?.end_condition ?? null,
    };
  }

  getResult(sessionId: SessionId): GameResult | null {
    return this.getSession(sessionId).result;
  }

  /** Recorded events whose turn lies within [from, to]; both bounds optional. */
  getReplay(sessionId: SessionId, from?: number, to?: number): ArenaEvent[] {
    if (from != null && to != null && from > to) {
      throw new ValidationError(`invalid range: from (${from}) > to (${to})`);
    }
    const ctx = this.getSession(sessionId);
    return ctx.events.filter(
      (e) => (from == null || e.turn >= from) && (to == null || e.turn <= to)
    );
  }

  // ---------------------------------------------------------------------------
  // Actions & streaming
  // ---------------------------------------------------------------------------

  submitAction(sessionId: SessionId, playerId: PlayerId, turn: number, action: ActionData): void {
    const ctx = this.getSession(sessionId);
    if (ctx.terminal) {
      throw new ActionMismatchError(`session ${sessionId} is over`);
    }

    const side = SIDES.find((s) => ctx.proxies[s].player_id === playerId);
    if (!side) {
      throw new ActionMismatchError(`player ${playerId} is not part of session ${sessionId}`);
    }
    const proxy = ctx.proxies[side];
    if (proxy.kind !== "remote") {
      throw new ActionMismatchError(`player ${playerId} is a builtin bot`);
    }

    const expected = ctx.turn + 1;
    if (turn !== expected) {
      throw new ActionMismatchError(`turn mismatch: expected ${expected}, got ${turn}`);
    }

    proxy.slot.offer(turn, action);
    ctx.logger.debug({ player_id: playerId, turn }, "action accepted");
  }

  subscribe(sessionId: SessionId): Subscription {
    const ctx = this.getSession(sessionId);
    return this.deps.broadcaster.subscribe(sessionId, {
      backlog: ctx.events,
      closed: ctx.terminal,
    });
  }

  unsubscribe(subscription: Subscription): void {
    this.deps.broadcaster.unsubscribe(subscription);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async buildProxy(cfg: PlayerConfig): Promise<BotProxy> {
    if (cfg.kind === "builtin") {
      return this.deps.bots.create(cfg.bot_id ?? "");
    }
    const playerId = cfg.player_id ?? "";
    const player = await this.deps.store.getPlayer(playerId);
    if (!player) throw new PlayerNotFoundError(playerId);
    return createRemotePlayer(player.player_id, player.player_name);
  }
}

function playerInfo(proxy: BotProxy): SessionPlayerInfo {
  return {
    player_id: proxy.player_id,
    name: proxy.name,
    kind: proxy.kind,
    bot_id: proxy.kind === "builtin" ? proxy.bot_id : null,
  };
}
