import { describe, expect, it } from "vitest";
import type { ArenaEvent, GameOverEvent, TurnEvent } from "../src/arena/domain/types";
import { env } from "../src/config/env";
import { ActionMismatchError } from "../src/arena/domain/errors";
import { summarizeTurn } from "../src/arena/service/turnProcessor";
import { botEntry, makeArena, remotePlayer, testBots } from "./_arenaTestUtils";

const right = { kind: "builtin" as const, bot_id: "right" };
const down = { kind: "builtin" as const, bot_id: "down" };

function turnEvents(events: ArenaEvent[]): TurnEvent[] {
  return events.filter((e): e is TurnEvent => e.event === "turn_update");
}

function gameOver(events: ArenaEvent[]): GameOverEvent {
  const last = events[events.length - 1];
  if (last.event !== "game_over") throw new Error(`expected game_over, got ${last.event}`);
  return last;
}

describe("turn loop", () => {
  it("records contiguous turns and ends with a draw at the turn cap", async () => {
    const { arena } = await makeArena({ maxTurns: 5 });
    const id = await arena.sessions.createSession(right, down);
    const ctx = arena.sessions.getSession(id);
    await ctx.task;

    expect(ctx.events.map((e) => e.event)).toEqual([
      "session_start",
      "turn_update",
      "turn_update",
      "turn_update",
      "turn_update",
      "turn_update",
      "game_over",
    ]);
    expect(turnEvents(ctx.events).map((e) => e.turn)).toEqual([1, 2, 3, 4, 5]);
    expect(ctx.status).toBe("completed");
    expect(ctx.result).toMatchObject({
      winner: null,
      loser: null,
      result_type: "draw",
      end_condition: "max_turns",
      total_turns: 5,
      first_player: "bot_right",
    });
  });

  it("stops at the default cap of 100 turns", async () => {
    expect(env.MAX_TURNS).toBe(100);
    // Unset so the service falls back to MAX_TURNS.
    const { arena } = await makeArena({ maxTurns: undefined });
    const id = await arena.sessions.createSession(right, down);
    const ctx = arena.sessions.getSession(id);
    await ctx.task;

    const turns = turnEvents(ctx.events);
    expect(turns).toHaveLength(100);
    expect(turns[99].turn).toBe(100);
    expect(gameOver(ctx.events).turn).toBe(100);
    expect(ctx.result).toMatchObject({ end_condition: "max_turns", total_turns: 100, result_type: "draw" });
  });

  it("ends with a win for the other side when one side drops at turn 2", async () => {
    const { arena, store } = await makeArena({ script: { winnerAt: { 2: "p1" } } });
    const id = await arena.sessions.createSession(right, down);
    const ctx = arena.sessions.getSession(id);
    await ctx.task;

    const over = gameOver(ctx.events);
    expect(over.turn).toBe(2);
    expect(over.winner).toBe("bot_right");
    expect(over.winner_name).toBe("Bot right");
    expect(over.game_result).toMatchObject({
      winner: "bot_right",
      loser: "bot_down",
      result_type: "win",
      end_condition: "hp_zero",
      total_turns: 2,
    });
    expect(over.final_state.player_2.is_alive).toBe(false);

    expect(store.results.get(id)?.end_condition).toBe("hp_zero");
    const winner = await store.getPlayer("bot_right");
    const loser = await store.getPlayer("bot_down");
    expect(winner).toMatchObject({ total_matches: 1, wins: 1, losses: 0, draws: 0 });
    expect(loser).toMatchObject({ total_matches: 1, wins: 0, losses: 1, draws: 0 });
  });

  it("treats the draw sentinel as a draw", async () => {
    const { arena } = await makeArena({ script: { winnerAt: { 1: "draw" } } });
    const id = await arena.sessions.createSession(right, down);
    await arena.sessions.getSession(id).task;

    expect(arena.sessions.getResult(id)).toMatchObject({ result_type: "draw", end_condition: "draw" });
  });

  it("turns an unrecognised winner into a draw", async () => {
    const { arena } = await makeArena({ script: { winnerAt: { 3: "nobody-knows" } } });
    const id = await arena.sessions.createSession(right, down);
    await arena.sessions.getSession(id).task;

    expect(arena.sessions.getResult(id)).toMatchObject({
      winner: null,
      result_type: "draw",
      end_condition: "unknown",
      total_turns: 3,
    });
  });

  it("recovers from an engine failure with a draw", async () => {
    const { arena } = await makeArena({ script: { throwAt: 3 } });
    const id = await arena.sessions.createSession(right, down);
    const ctx = arena.sessions.getSession(id);
    await ctx.task;

    expect(turnEvents(ctx.events).map((e) => e.turn)).toEqual([1, 2]);
    expect(gameOver(ctx.events).game_result).toMatchObject({
      result_type: "draw",
      end_condition: "error",
      total_turns: 2,
    });
  });

  it("summarises the first three log lines of a turn", async () => {
    const { arena } = await makeArena({
      maxTurns: 2,
      script: { lines: (turn) => (turn === 1 ? ["a", "b", "c", "d"] : []) },
    });
    const id = await arena.sessions.createSession(right, down);
    const ctx = arena.sessions.getSession(id);
    await ctx.task;

    const [first, second] = turnEvents(ctx.events);
    expect(first.log_line).toBe("Turn 1: a; b; c");
    expect(first.events).toEqual(["a", "b", "c", "d"]);
    expect(second.log_line).toBe("Turn 2: No events");
    expect(summarizeTurn(7, ["only"])).toBe("Turn 7: only");
  });

  it("applies builtin decisions and falls back to the default action when a bot fails", async () => {
    const bots = testBots([
      botEntry("broken", () => {
        throw new Error("bot crashed");
      }),
      botEntry("sloppy", () => ({ move: [5, 5], spell: null })),
    ]);

    const { arena, engines } = await makeArena({ bots, maxTurns: 1 });
    const id = await arena.sessions.createSession(
      { kind: "builtin", bot_id: "broken" },
      { kind: "builtin", bot_id: "sloppy" }
    );
    await arena.sessions.getSession(id).task;

    expect(engines[0].received).toEqual([
      { p1: { move: [0, 0], spell: null }, p2: { move: [0, 0], spell: null } },
    ]);

    const { arena: arena2, engines: engines2 } = await makeArena({ maxTurns: 1 });
    const id2 = await arena2.sessions.createSession(right, down);
    await arena2.sessions.getSession(id2).task;
    expect(engines2[0].received).toEqual([
      { p1: { move: [1, 0], spell: null }, p2: { move: [0, 1], spell: null } },
    ]);
  });

  it("gives a silent remote player the default action after the deadline", async () => {
    const { arena, store, engines } = await makeArena({ maxTurns: 1, turnTimeoutMs: 30 });
    await store.upsertPlayer(remotePlayer("carol"));

    const id = await arena.sessions.createSession({ kind: "remote", player_id: "carol" }, right);
    const ctx = arena.sessions.getSession(id);
    await ctx.task;

    const [turn1] = turnEvents(ctx.events);
    expect(turn1.actions[0]).toEqual({
      player_id: "carol",
      turn: 1,
      move: [0, 0],
      spell: null,
      timed_out: true,
    });
    expect(engines[0].received[0].p1).toEqual({ move: [0, 0], spell: null });
  });

  it("proceeds as soon as both remote players have submitted", async () => {
    const { arena, store, engines } = await makeArena({ maxTurns: 1, turnTimeoutMs: 5000 });
    await store.upsertPlayer(remotePlayer("carol"));
    await store.upsertPlayer(remotePlayer("dave"));

    const started = Date.now();
    const id = await arena.sessions.createSession(
      { kind: "remote", player_id: "carol" },
      { kind: "remote", player_id: "dave" }
    );
    arena.sessions.submitAction(id, "carol", 1, { move: [1, 1], spell: null });
    arena.sessions.submitAction(id, "dave", 1, { move: null, spell: { name: "shield" } });
    await arena.sessions.getSession(id).task;

    expect(Date.now() - started).toBeLessThan(2000);
    expect(engines[0].received).toEqual([
      { p1: { move: [1, 1], spell: null }, p2: { move: null, spell: { name: "shield" } } },
    ]);
    const [turn1] = turnEvents(arena.sessions.getSession(id).events);
    expect(turn1.actions.map((a) => a.timed_out)).toEqual([false, false]);
  });

  it("rejects a submission for another turn and still accepts the right one", async () => {
    const { arena, store, engines } = await makeArena({ maxTurns: 1, turnTimeoutMs: 5000 });
    await store.upsertPlayer(remotePlayer("carol"));

    const id = await arena.sessions.createSession({ kind: "remote", player_id: "carol" }, right);

    expect(() => arena.sessions.submitAction(id, "carol", 2, { move: [1, 0], spell: null })).toThrow(
      ActionMismatchError
    );
    arena.sessions.submitAction(id, "carol", 1, { move: [0, 1], spell: null });
    await arena.sessions.getSession(id).task;

    expect(engines[0].received[0].p1).toEqual({ move: [0, 1], spell: null });
  });

  it("accepts the next turn's action right after a turn is published", async () => {
    const { arena, store, engines } = await makeArena({ maxTurns: 2, turnTimeoutMs: 5000 });
    await store.upsertPlayer(remotePlayer("carol"));

    const id = await arena.sessions.createSession({ kind: "remote", player_id: "carol" }, right);
    const sub = arena.sessions.subscribe(id);
    arena.sessions.submitAction(id, "carol", 1, { move: [1, 0], spell: null });

    for await (const event of sub) {
      if (event.event === "turn_update" && event.turn === 1) {
        arena.sessions.submitAction(id, "carol", 2, { move: [0, 1], spell: null });
      }
    }
    await arena.sessions.getSession(id).task;

    expect(engines[0].received.map((a) => a.p1)).toEqual([
      { move: [1, 0], spell: null },
      { move: [0, 1], spell: null },
    ]);
  });
});
