import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/arena/domain/errors";
import { buildGameResult } from "../src/arena/domain/gameResult";
import type { GameStateView } from "../src/arena/domain/types";
import {
  normalizeBotAction,
  parseActionSubmission,
  parsePlayerRegistration,
  parseStartSessionRequest,
} from "../src/arena/domain/validate";

describe("request parsing", () => {
  it("parses a start request and trims ids", () => {
    expect(
      parseStartSessionRequest({
        player_1_config: { kind: "remote", player_id: " carol " },
        player_2_config: { kind: "builtin", bot_id: "sample_bot" },
      })
    ).toEqual({
      player_1_config: { kind: "remote", player_id: "carol", bot_id: undefined },
      player_2_config: { kind: "builtin", player_id: undefined, bot_id: "sample_bot" },
      visualize: false,
    });
  });

  it("requires the id matching the player kind", () => {
    expect(() =>
      parseStartSessionRequest({
        player_1_config: { kind: "builtin", bot_id: "sample_bot" },
        player_2_config: { kind: "remote", bot_id: "sample_bot" },
      })
    ).toThrow("player_2_config.player_id is required for remote players");
    expect(() =>
      parseStartSessionRequest({
        player_1_config: { kind: "builtin", bot_id: "   " },
        player_2_config: { kind: "builtin", bot_id: "sample_bot" },
      })
    ).toThrow("player_1_config.bot_id is required for builtin bots");
  });

  it("rejects a non-boolean visualize flag", () => {
    expect(() =>
      parseStartSessionRequest({
        player_1_config: { kind: "builtin", bot_id: "a" },
        player_2_config: { kind: "builtin", bot_id: "b" },
        visualize: "yes",
      })
    ).toThrow(ValidationError);
  });

  it("parses an action submission", () => {
    expect(
      parseActionSubmission({
        player_id: "carol",
        turn: 4,
        action_data: { move: [-1, 0], spell: { name: " fireball ", target: [2, 3] } },
      })
    ).toEqual({
      player_id: "carol",
      turn: 4,
      action: { move: [-1, 0], spell: { name: "fireball", target: [2, 3] } },
    });
  });

  it("rejects out-of-range moves and bad turns", () => {
    expect(() =>
      parseActionSubmission({ player_id: "carol", turn: 1, action_data: { move: [2, 0] } })
    ).toThrow("move components must be within -1..1");
    expect(() =>
      parseActionSubmission({ player_id: "carol", turn: 0, action_data: { move: null } })
    ).toThrow("turn must be a positive integer");
    expect(() =>
      parseActionSubmission({ player_id: "carol", turn: 1, action_data: { spell: { target: [1, 1] } } })
    ).toThrow("spell.name is required");
  });

  it("normalizes bot output to null when unreadable", () => {
    expect(normalizeBotAction({ move: [1, 1] })).toEqual({ move: [1, 1], spell: null });
    expect(normalizeBotAction("attack!")).toBeNull();
    expect(normalizeBotAction({ move: [0, 0, 0] })).toBeNull();
  });

  it("parses player registrations", () => {
    expect(parsePlayerRegistration({ player_name: " Zed ", submitted_from: "upload" })).toEqual({
      player_name: "Zed",
      submitted_from: "upload",
    });
    expect(() => parsePlayerRegistration({ player_name: "x".repeat(51) })).toThrow(
      "player_name must be at most 50 characters"
    );
    expect(() => parsePlayerRegistration({ player_name: "Zed", submitted_from: "fax" })).toThrow(ValidationError);
  });
});

describe("buildGameResult", () => {
  const final_state: GameStateView = {
    turn: 12,
    board_size: 10,
    player_1: { player_id: "alice", name: "Alice", hp: 40, mana: 70, position: [3, 4], is_alive: true },
    player_2: { player_id: "bob", name: "Bob", hp: 0, mana: 10, position: [5, 5], is_alive: false },
    artifacts: [],
    minions: [],
  };
  const zero = { damage_dealt: 0, damage_received: 0, spells_cast: 0, artifacts_collected: 0 };
  const base = {
    session_id: "s1",
    final_state,
    counters: { player_1: { ...zero, damage_dealt: 100, spells_cast: 5 }, player_2: zero },
    total_turns: 12,
    started_at: new Date("2026-01-01T00:00:00.000Z"),
    now: new Date("2026-01-01T00:00:30.500Z"),
  };

  it("records a win with per-player scores", () => {
    const result = buildGameResult({ ...base, winner: "alice", end_condition: "hp_zero" });

    expect(result).toMatchObject({
      session_id: "s1",
      winner: "alice",
      loser: "bob",
      result_type: "win",
      total_turns: 12,
      first_player: "alice",
      game_duration: 30.5,
      end_condition: "hp_zero",
      created_at: "2026-01-01T00:00:30.500Z",
    });
    expect(result.final_scores.alice).toEqual({
      player_id: "alice",
      player_name: "Alice",
      final_hp: 40,
      final_mana: 70,
      final_position: [3, 4],
      damage_dealt: 100,
      damage_received: 0,
      spells_cast: 5,
      artifacts_collected: 0,
      turns_played: 12,
    });
  });

  it("falls back to a draw when the winner is not a participant", () => {
    const result = buildGameResult({ ...base, winner: "mallory", end_condition: "hp_zero" });

    expect(result.winner).toBeNull();
    expect(result.loser).toBeNull();
    expect(result.result_type).toBe("draw");
  });
});
