import { describe, expect, it } from "vitest";
import {
  ActionMismatchError,
  InitializationError,
  NotFoundError,
  PlayerNotFoundError,
  SessionNotFoundError,
  ValidationError,
} from "../src/arena/domain/errors";
import { InMemoryArenaStore } from "../src/arena/db/__mocks__/inMemoryArenaStore";
import type { SessionRecord } from "../src/arena/db/repository";
import type { GameResult } from "../src/arena/domain/types";
import type { EngineState } from "../src/arena/engine/simulationContract";
import { makeArena, RecordingSink, remotePlayer, StubEngine } from "./_arenaTestUtils";

const right = { kind: "builtin" as const, bot_id: "right" };
const down = { kind: "builtin" as const, bot_id: "down" };

class FailingStore extends InMemoryArenaStore {
  async createSessionRecord(_record: SessionRecord): Promise<void> {
    throw new Error("database unavailable");
  }

  async completeSession(_result: GameResult): Promise<void> {
    throw new Error("database unavailable");
  }
}

describe("SessionManager", () => {
  describe("createSession validation", () => {
    it("rejects a builtin config without bot_id before creating anything", async () => {
      const { arena, store } = await makeArena();

      await expect(arena.sessions.createSession({ kind: "builtin" }, down)).rejects.toThrow(ValidationError);
      expect(arena.sessions.listActive()).toEqual([]);
      expect(store.sessions.size).toBe(0);
    });

    it("rejects an unknown builtin bot with a 404", async () => {
      const { arena } = await makeArena();

      const pending = arena.sessions.createSession({ kind: "builtin", bot_id: "ghost" }, down);
      await expect(pending).rejects.toBeInstanceOf(NotFoundError);
      await expect(pending).rejects.toMatchObject({
        statusCode: 404,
        message: "builtin bot not found: ghost",
      });
    });

    it("rejects an unregistered remote player", async () => {
      const { arena } = await makeArena();

      await expect(
        arena.sessions.createSession({ kind: "remote", player_id: "nobody" }, down)
      ).rejects.toThrow(PlayerNotFoundError);
    });

    it("rejects the same remote player on both sides", async () => {
      const { arena, store } = await makeArena();
      await store.upsertPlayer(remotePlayer("carol"));

      await expect(
        arena.sessions.createSession({ kind: "remote", player_id: "carol" }, { kind: "remote", player_id: "carol" })
      ).rejects.toThrow(ValidationError);
    });

    it("does not register a session when the engine fails to start", async () => {
      const { arena } = await makeArena({
        engineFactory: () => {
          throw new Error("rules file missing");
        },
      });

      await expect(arena.sessions.createSession(right, down)).rejects.toThrow(InitializationError);
      expect(arena.sessions.listActive()).toEqual([]);
    });
    it("reports an engine without a readable initial state as an init failure", async () => {
      class BrokenStateEngine extends StubEngine {
        getState(): EngineState {
          throw new Error("no board");
        }
      }
      const { arena } = await makeArena({
        engineFactory: (participants) => new BrokenStateEngine(participants, {}),
      });

      await expect(arena.sessions.createSession(right, down)).rejects.toMatchObject({
        code: "ENGINE_INIT_FAILED",
        message: "engine initialization failed: no board",
      });
      expect(arena.sessions.listActive()).toEqual([]);
    });

    it("keeps playing when the session cannot be persisted", async () => {
      const { arena } = await makeArena({ maxTurns: 2, store: new FailingStore() });

      const id = await arena.sessions.createSession(right, down);
      const ctx = arena.sessions.getSession(id);
      await ctx.task;

      expect(ctx.status).toBe("completed");
      expect(ctx.result).toMatchObject({ end_condition: "max_turns", total_turns: 2 });
    });
  });

  describe("queries", () => {
    it("throws SessionNotFoundError for unknown ids", async () => {
      const { arena } = await makeArena();

      expect(() => arena.sessions.getSession("missing")).toThrow(SessionNotFoundError);
      expect(() => arena.sessions.getSession("missing")).toThrow("session not found: missing");
    });

    it("describes a session and lists it while active", async () => {
      const { arena, store } = await makeArena({ turnTimeoutMs: 5000, newId: () => "session-1" });
      await store.upsertPlayer(remotePlayer("carol", "Carol"));

      const id = await arena.sessions.createSession({ kind: "remote", player_id: "carol" }, right);

      expect(id).toBe("session-1");
      expect(arena.sessions.listActive()).toEqual(["session-1"]);
      expect(arena.sessions.describe(id)).toMatchObject({
        session_id: "session-1",
        status: "active",
        turn: 0,
        player_1: { player_id: "carol", name: "Carol", kind: "remote", bot_id: null },
        player_2: { player_id: "bot_right", name: "Bot right", kind: "builtin", bot_id: "right" },
        visualizer_enabled: false,
        winner: null,
        end_condition: null,
      });
      expect(store.sessions.get(id)).toMatchObject({ player_1_id: "carol", player_2_id: "bot_right" });

      await arena.sessions.cleanupSession(id);
    });

    it("filters the replay by turn range", async () => {
      const { arena } = await makeArena({ maxTurns: 4 });
      const id = await arena.sessions.createSession(right, down);
      await arena.sessions.getSession(id).task;

      expect(arena.sessions.getReplay(id).map((e) => e.event)).toHaveLength(6);
      expect(arena.sessions.getReplay(id, 2, 3).map((e) => e.turn)).toEqual([2, 3]);
      expect(arena.sessions.getReplay(id, 4).map((e) => e.event)).toEqual(["turn_update", "game_over"]);
      expect(() => arena.sessions.getReplay(id, 3, 1)).toThrow("invalid range: from (3) > to (1)");
    });
  });

  describe("submitAction", () => {
    it("rejects players outside the session and builtin sides", async () => {
      const { arena, store } = await makeArena({ turnTimeoutMs: 5000 });
      await store.upsertPlayer(remotePlayer("carol"));
      const id = await arena.sessions.createSession({ kind: "remote", player_id: "carol" }, right);
      const action = { move: null, spell: null };

      expect(() => arena.sessions.submitAction(id, "mallory", 1, action)).toThrow(ActionMismatchError);
      expect(() => arena.sessions.submitAction(id, "bot_right", 1, action)).toThrow(
        "player bot_right is a builtin bot"
      );
      expect(() => arena.sessions.submitAction("missing", "carol", 1, action)).toThrow(SessionNotFoundError);

      arena.sessions.submitAction(id, "carol", 1, action);
      expect(() => arena.sessions.submitAction(id, "carol", 1, action)).toThrow(
        "action for turn 1 already submitted"
      );

      await arena.sessions.cleanupSession(id);
    });

    it("rejects submissions once the game is over", async () => {
      const { arena, store } = await makeArena({ maxTurns: 1, turnTimeoutMs: 10 });
      await store.upsertPlayer(remotePlayer("carol"));
      const id = await arena.sessions.createSession({ kind: "remote", player_id: "carol" }, right);
      await arena.sessions.getSession(id).task;

      expect(() => arena.sessions.submitAction(id, "carol", 2, { move: null, spell: null })).toThrow(
        `session ${id} is over`
      );
    });
  });

  describe("cleanup & visualizer", () => {
    it("terminates the visualizer only on cleanup and only once", async () => {
      const sink = new RecordingSink();
      const { arena } = await makeArena({ maxTurns: 3, visualizerSink: sink, visualizationEnabled: true });

      const id = await arena.sessions.createSession(right, down, true);
      const ctx = arena.sessions.getSession(id);
      expect(ctx.visualizer_enabled).toBe(true);
      await ctx.task;

      expect(sink.terminated).toBe(0);
      expect(sink.sent.map((m) => m.event)).toEqual([
        "session_start",
        "turn_update",
        "turn_update",
        "turn_update",
        "game_over",
      ]);

      await expect(arena.sessions.cleanupSession(id)).resolves.toBe(true);
      expect(sink.terminated).toBe(1);
      await expect(arena.sessions.cleanupSession(id)).resolves.toBe(false);
      expect(sink.terminated).toBe(1);
    });

    it("keeps going without a visualizer when spawning it fails", async () => {
      const sink = new RecordingSink();
      sink.failSpawn = true;
      const { arena } = await makeArena({ maxTurns: 2, visualizerSink: sink, visualizationEnabled: true });

      const id = await arena.sessions.createSession(right, down, true);
      const ctx = arena.sessions.getSession(id);
      expect(ctx.visualizer_enabled).toBe(false);
      await ctx.task;

      expect(ctx.result?.end_condition).toBe("max_turns");
      await arena.sessions.cleanupSession(id);
      expect(sink.terminated).toBe(0);
    });

    it("completes the match when every visualizer send fails", async () => {
      const sink = new RecordingSink();
      sink.failSend = true;
      const { arena } = await makeArena({
        maxTurns: 3,
        visualizerSink: sink,
        visualizationEnabled: true,
        script: { winnerAt: { 3: "p2" } },
      });

      const id = await arena.sessions.createSession(right, down, true);
      await arena.sessions.getSession(id).task;

      expect(arena.sessions.getResult(id)).toMatchObject({ winner: "bot_down", end_condition: "hp_zero" });
    });

    it("ignores the visualize flag when visualization is disabled", async () => {
      const sink = new RecordingSink();
      const { arena } = await makeArena({ maxTurns: 1, visualizerSink: sink, visualizationEnabled: false });

      const id = await arena.sessions.createSession(right, down, true);
      await arena.sessions.getSession(id).task;

      expect(sink.spawned).toEqual([]);
      expect(arena.sessions.getSession(id).visualizer_enabled).toBe(false);
    });

    it("cancels a running match without waiting for the deadline", async () => {
      const { arena, store } = await makeArena({ turnTimeoutMs: 10_000 });
      await store.upsertPlayer(remotePlayer("carol"));
      const id = await arena.sessions.createSession({ kind: "remote", player_id: "carol" }, right);
      const ctx = arena.sessions.getSession(id);

      const started = Date.now();
      await expect(arena.sessions.cleanupSession(id)).resolves.toBe(true);

      expect(Date.now() - started).toBeLessThan(2000);
      expect(ctx.status).toBe("cancelled");
      expect(ctx.result).toBeNull();
      expect(ctx.events.map((e) => e.event)).toEqual(["session_start"]);
      expect(() => arena.sessions.getSession(id)).toThrow(SessionNotFoundError);
    });

    it("shutdown cleans up every session", async () => {
      const { arena, store } = await makeArena({ turnTimeoutMs: 10_000 });
      await store.upsertPlayer(remotePlayer("carol"));
      await store.upsertPlayer(remotePlayer("dave"));
      await arena.sessions.createSession({ kind: "remote", player_id: "carol" }, right);
      await arena.sessions.createSession({ kind: "remote", player_id: "dave" }, down);

      await arena.sessions.shutdown();
      expect(arena.sessions.listActive()).toEqual([]);
    });
  });
});
