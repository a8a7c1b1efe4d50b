import type { ActionData, GameStateView, PlayerId, PlayerView, Side } from "../domain/types";
import { EngineError, InitializationError, errorMessage } from "../domain/errors";
import {
  DRAW_SENTINEL,
  type EngineParticipant,
  type SimulationEngine,
  type SimulationEngineFactory,
} from "../engine/simulationContract";
import { mapPlayerView, mapSnapshot, toEngineSide, type Participants } from "./snapshot.mapper";
import { emptyStats, mapStats, type SideStats } from "./stats.mapper";

export type WinnerOutcome =
  | { kind: "none" }
  | { kind: "draw" }
  | { kind: "side"; player_id: PlayerId }
  | { kind: "unknown"; raw: unknown };

/**
 * Adapter between the orchestrator and a simulation engine.
 * The engine implementation is injected through its factory.
 */
export class EngineAdapter {
  private engine: SimulationEngine | null = null;
  private participants: Participants | null = null;

  constructor(private readonly factory: SimulationEngineFactory) {}

  /** Builds the engine and returns its initial snapshot. */
  initialize(player1: EngineParticipant, player2: EngineParticipant): GameStateView {
    const participants: Participants = {
      p1: { player_id: player1.player_id, name: player1.name },
      p2: { player_id: player2.player_id, name: player2.name },
    };
    try {
      const engine = this.factory(participants);
      const initial = mapSnapshot(engine.getState(), participants);
      this.engine = engine;
      this.participants = participants;
      return initial;
    } catch (err) {
      throw new InitializationError(`engine initialization failed: ${errorMessage(err)}`, err);
    }
  }

  advanceTurn(actions: Record<Side, ActionData>): void {
    this.requireEngine().runTurn({
      p1: actions.player_1,
      p2: actions.player_2,
    });
  }

  snapshot(): GameStateView {
    return mapSnapshot(this.requireEngine().getState(), this.requireParticipants());
  }

  playerView(side: Side): PlayerView {
    return mapPlayerView(this.requireEngine().getState(), this.requireParticipants(), side);
  }

  winner(): WinnerOutcome {
    const raw = this.requireEngine().checkWinner();
    if (raw === null) return { kind: "none" };
    if (raw === DRAW_SENTINEL) return { kind: "draw" };
    if (raw === "p1" || raw === "p2") {
      return { kind: "side", player_id: this.requireParticipants()[raw].player_id };
    }
    return { kind: "unknown", raw };
  }

  turnLog(): string[] {
    return this.requireEngine().turnLog();
  }

  /** Per-side counters from the engine's structured log; zeros when unavailable. */
  stats(side: Side): SideStats {
    const engine = this.requireEngine();
    if (!engine.eventLog) return emptyStats();
    try {
      return mapStats(engine.eventLog(), toEngineSide(side));
    } catch {
      return emptyStats();
    }
  }

  private requireEngine(): SimulationEngine {
    if (!this.engine) throw new EngineError("engine not initialized");
    return this.engine;
  }

  private requireParticipants(): Participants {
    if (!this.participants) throw new EngineError("engine not initialized");
    return this.participants;
  }
}
