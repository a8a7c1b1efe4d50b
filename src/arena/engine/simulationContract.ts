// src/arena/engine/simulationContract.ts
//
// Contract between the orchestrator and a simulation engine.
// The orchestrator never looks at rules: it feeds one action per side, reads
// the resulting state and asks the engine whether the match is over.

import type { ActionData, PlayerId, Position } from "../domain/types";

export type EngineSide = "p1" | "p2";
export const ENGINE_SIDES: readonly EngineSide[] = ["p1", "p2"];

/** Value returned by checkWinner() when both sides went down together. */
export const DRAW_SENTINEL = "draw";

/**
 * null = match still running, DRAW_SENTINEL = draw, "p1" | "p2" = winning side.
 * Any other value is treated by the adapter as an unknown answer.
 */
export type EngineWinner = string | null;

export interface EngineParticipant {
  player_id: PlayerId;
  name: string;
}

export interface EngineWizardState {
  name: string;
  hp: number;
  mana: number;
  position: Position;
  shield_active: boolean;
  cooldowns: Record<string, number>;
}

export interface EngineArtifact {
  type: string;
  position: Position;
}

export interface EngineMinion {
  id: string;
  owner: EngineSide;
  hp: number;
  position: Position;
}

export interface EngineState {
  turn: number;
  board_size: number;
  wizards: Record<EngineSide, EngineWizardState>;
  artifacts: EngineArtifact[];
  minions: EngineMinion[];
}

export type EngineLogEntry =
  | { turn: number; type: "damage"; source: EngineSide; target: EngineSide; amount: number }
  | { turn: number; type: "spell"; caster: EngineSide; spell: string }
  | { turn: number; type: "artifact"; collector: EngineSide; artifact: string };

export interface SimulationEngine {
  readonly turn: number;
  runTurn(actions: Record<EngineSide, ActionData>): void;
  getState(): EngineState;
  checkWinner(): EngineWinner;
  /** Human-readable lines produced by the last runTurn(). */
  turnLog(): string[];
  /** Structured log of the whole match; optional. */
  eventLog?(): EngineLogEntry[];
}

export type SimulationEngineFactory = (
  participants: Record<EngineSide, EngineParticipant>
) => SimulationEngine;
