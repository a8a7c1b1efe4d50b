import type { Logger } from "../../config/logger";
import { isRemote } from "../bots/botProxy";
import { buildGameResult } from "../domain/gameResult";
import { defaultAction, normalizeBotAction } from "../domain/validate";
import { errorMessage } from "../domain/errors";
import {
  SIDES,
  type ActionData,
  type ArenaEvent,
  type EndCondition,
  type GameOverEvent,
  type GameResult,
  type PlayerId,
  type Side,
  type TurnAction,
  type TurnEvent,
} from "../domain/types";
import type { WinnerOutcome } from "../engine-adapters/engineAdapter";
import type { EventBroadcaster } from "./eventBroadcaster";
import type { SessionContext } from "./sessionContext";
import type { VisualizerBridge } from "./visualizerBridge";

export type TurnProcessorOptions = {
  turnTimeoutMs: number;
  maxTurns: number;
  startDelayMs: number;
  turnDelayMs: number;
};

export type TurnProcessorDeps = {
  broadcaster: EventBroadcaster;
  visualizer: VisualizerBridge | null;
  logger: Logger;
  /** Called once per session after game_over has been published. */
  onGameOver?: (ctx: SessionContext, result: GameResult) => Promise<void>;
};

type GameEnd = { winner: PlayerId | null; end_condition: EndCondition };

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, Math.max(0, ms));
    signal.addEventListener("abort", done, { once: true });
  });
}

export function summarizeTurn(turn: number, lines: readonly string[]): string {
  if (lines.length === 0) return `Turn ${turn}: No events`;
  return `Turn ${turn}: ${lines.slice(0, 3).join("; ")}`;
}

function toActionData(a: TurnAction): ActionData {
  return { move: a.move, spell: a.spell };
}

/**
 * Drives one session: collect both actions under a deadline, advance the
 * engine once, publish, then apply the end-of-game policy.
 */
export class TurnProcessor {
  constructor(private readonly opts: TurnProcessorOptions, private readonly deps: TurnProcessorDeps) {}

  /** Runs the match to completion or cancellation. Never rejects. */
  async run(ctx: SessionContext): Promise<void> {
    const signal = ctx.abort.signal;
    try {
      await sleep(this.opts.startDelayMs, signal);

      while (!ctx.terminal && !signal.aborted) {
        const actions = await this.collectActions(ctx, this.opts.turnTimeoutMs);
        if (ctx.terminal || signal.aborted) break;

        this.advance(ctx, actions);
        if (ctx.terminal) break;

        await sleep(this.opts.turnDelayMs, signal);
      }
    } catch (err) {
      ctx.logger.error({ err }, "turn loop crashed");
      if (!ctx.terminal) this.finish(ctx, { winner: null, end_condition: "error" });
    }

    if (ctx.result && this.deps.onGameOver) {
      try {
        await this.deps.onGameOver(ctx, ctx.result);
      } catch (err) {
        ctx.logger.error({ err }, "game over hook failed");
      }
    }

    ctx.logger.info(
      { turn: ctx.turn, status: ctx.status, end_condition: ctx.result?.end_condition ?? null },
      "turn loop finished"
    );
  }

  async collectActions(ctx: SessionContext, deadlineMs: number): Promise<Record<Side, TurnAction>> {
    const turn = ctx.turn + 1;
    const [player_1, player_2] = await Promise.all(
      SIDES.map((side) => this.collectOne(ctx, side, turn, deadlineMs))
    );
    return { player_1, player_2 };
  }

  /**
   * Applies one collected action set. Returns the game_over event when the
   * match ended on this turn, otherwise null.
   */
  advance(ctx: SessionContext, actions: Record<Side, TurnAction>): GameOverEvent | null {
    const turn = ctx.turn + 1;

    let outcome: WinnerOutcome;
    try {
      ctx.adapter.advanceTurn({
        player_1: toActionData(actions.player_1),
        player_2: toActionData(actions.player_2),
      });
      const snapshot = ctx.adapter.snapshot();
      const lines = ctx.adapter.turnLog();

      const event: TurnEvent = {
        event: "turn_update",
        session_id: ctx.session_id,
        turn,
        game_state: snapshot,
        actions: [actions.player_1, actions.player_2],
        events: lines,
        log_line: summarizeTurn(turn, lines),
        timestamp: new Date().toISOString(),
      };

      ctx.events.push(event);
      ctx.turn = turn;
      ctx.game_state = snapshot;
      for (const side of SIDES) {
        const proxy = ctx.proxies[side];
        if (isRemote(proxy)) proxy.slot.arm(turn + 1);
      }

      this.publish(ctx, event);
      outcome = ctx.adapter.winner();
    } catch (err) {
      ctx.logger.error({ err, turn }, `engine failed while advancing: ${errorMessage(err)}`);
      return this.finish(ctx, { winner: null, end_condition: "error" });
    }

    const end = this.resolveEnd(ctx, outcome, turn);
    return end ? this.finish(ctx, end) : null;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async collectOne(
    ctx: SessionContext,
    side: Side,
    turn: number,
    deadlineMs: number
  ): Promise<TurnAction> {
    const proxy = ctx.proxies[side];

    if (isRemote(proxy)) {
      const submitted = await proxy.slot.take(deadlineMs, ctx.abort.signal);
      if (!submitted) {
        if (!ctx.abort.signal.aborted) {
          ctx.logger.info({ player_id: proxy.player_id, turn }, "remote player timed out, using default action");
        }
        return { player_id: proxy.player_id, turn, ...defaultAction(), timed_out: true };
      }
      return { player_id: proxy.player_id, turn, ...submitted, timed_out: false };
    }

    let action: ActionData | null = null;
    try {
      action = normalizeBotAction(proxy.decide(ctx.adapter.playerView(side)));
      if (!action) {
        ctx.logger.warn({ bot_id: proxy.bot_id, turn }, "builtin bot returned a malformed action, using default");
      }
    } catch (err) {
      ctx.logger.warn({ err, bot_id: proxy.bot_id, turn }, "builtin bot failed, using default action");
    }
    return { player_id: proxy.player_id, turn, ...(action ?? defaultAction()), timed_out: false };
  }

  private resolveEnd(ctx: SessionContext, outcome: WinnerOutcome, turn: number): GameEnd | null {
    switch (outcome.kind) {
      case "side":
        return { winner: outcome.player_id, end_condition: "hp_zero" };
      case "draw":
        return { winner: null, end_condition: "draw" };
      case "unknown":
        ctx.logger.warn({ raw: outcome.raw, turn }, "engine reported an unknown winner, ending as draw");
        return { winner: null, end_condition: "unknown" };
      case "none":
        return turn >= this.opts.maxTurns ? { winner: null, end_condition: "max_turns" } : null;
    }
  }

  private finish(ctx: SessionContext, end: GameEnd): GameOverEvent {
    const result = buildGameResult({
      session_id: ctx.session_id,
      final_state: ctx.game_state,
      counters: {
        player_1: ctx.adapter.stats("player_1"),
        player_2: ctx.adapter.stats("player_2"),
      },
      winner: end.winner,
      end_condition: end.end_condition,
      total_turns: ctx.turn,
      started_at: ctx.created_at,
    });

    const winnerName =
      SIDES.map((s) => ctx.proxies[s]).find((p) => p.player_id === result.winner)?.name ?? null;

    const event: GameOverEvent = {
      event: "game_over",
      session_id: ctx.session_id,
      turn: ctx.turn,
      winner: result.winner,
      winner_name: winnerName,
      final_state: ctx.game_state,
      game_result: result,
      timestamp: new Date().toISOString(),
    };

    ctx.result = result;
    ctx.terminal = true;
    ctx.status = "completed";
    ctx.events.push(event);
    this.publish(ctx, event);
    this.deps.broadcaster.closeSession(ctx.session_id);

    ctx.logger.info(
      { turn: ctx.turn, winner: result.winner, end_condition: result.end_condition },
      "game over"
    );
    return event;
  }

  private publish(ctx: SessionContext, event: ArenaEvent): void {
    this.deps.broadcaster.publish(ctx.session_id, event);
    if (ctx.visualizer_enabled && ctx.visualizer && this.deps.visualizer) {
      this.deps.visualizer.send(ctx.visualizer, event);
    }
  }
}
