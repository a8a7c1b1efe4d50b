import { describe, expect, it } from "vitest";
import { DuelEngine } from "../src/arena/engine/duelEngine";
import type { ActionData } from "../src/arena/domain/types";

const idle: ActionData = { move: [0, 0], spell: null };

function makeEngine() {
  return new DuelEngine(
    {
      p1: { player_id: "alice", name: "Alice" },
      p2: { player_id: "bob", name: "Bob" },
    },
    7
  );
}

describe("DuelEngine", () => {
  it("starts both wizards in opposite corners at full hp and mana", () => {
    const state = makeEngine().getState();

    expect(state.turn).toBe(0);
    expect(state.board_size).toBe(10);
    expect(state.wizards.p1).toMatchObject({ name: "Alice", hp: 100, mana: 100, position: [0, 0] });
    expect(state.wizards.p2).toMatchObject({ name: "Bob", hp: 100, mana: 100, position: [9, 9] });
    expect(state.artifacts).toEqual([]);
    expect(state.minions).toEqual([]);
  });

  it("moves within the board and ignores moves off the edge", () => {
    const engine = makeEngine();
    engine.runTurn({ p1: { move: [1, 1], spell: null }, p2: { move: [1, 0], spell: null } });

    const state = engine.getState();
    expect(state.turn).toBe(1);
    expect(state.wizards.p1.position).toEqual([1, 1]);
    expect(state.wizards.p2.position).toEqual([9, 9]);
    expect(engine.turnLog()).toEqual(["Alice moved to [1, 1]"]);
  });

  it("teleports then lands a fireball in range", () => {
    const engine = makeEngine();
    engine.runTurn({ p1: { move: null, spell: { name: "teleport", target: [7, 7] } }, p2: idle });
    engine.runTurn({ p1: { move: null, spell: { name: "fireball", target: [9, 9] } }, p2: idle });

    const state = engine.getState();
    expect(state.wizards.p1.position).toEqual([7, 7]);
    expect(state.wizards.p1.mana).toBe(50);
    expect(state.wizards.p2.hp).toBe(80);
    expect(engine.turnLog()).toEqual(["Alice cast fireball", "Bob took 20 damage (HP: 80)"]);
    expect(engine.eventLog()).toEqual([
      { turn: 1, type: "spell", caster: "p1", spell: "teleport" },
      { turn: 2, type: "spell", caster: "p1", spell: "fireball" },
      { turn: 2, type: "damage", source: "p1", target: "p2", amount: 20 },
    ]);
  });

  it("lets a shield absorb a fireball", () => {
    const engine = makeEngine();
    engine.runTurn({
      p1: { move: null, spell: { name: "teleport", target: [7, 7] } },
      p2: { move: null, spell: { name: "shield" } },
    });
    engine.runTurn({ p1: { move: null, spell: { name: "fireball", target: [9, 9] } }, p2: idle });

    const state = engine.getState();
    expect(state.wizards.p2.hp).toBe(100);
    expect(state.wizards.p2.shield_active).toBe(false);
  });

  it("does nothing for a fireball out of range but still spends the cast", () => {
    const engine = makeEngine();
    engine.runTurn({ p1: { move: null, spell: { name: "fireball", target: [9, 9] } }, p2: idle });

    const state = engine.getState();
    expect(state.wizards.p2.hp).toBe(100);
    expect(state.wizards.p1.mana).toBe(80);
    expect(state.wizards.p1.cooldowns.fireball).toBe(1);
  });

  it("reports unknown spells as failed casts", () => {
    const engine = makeEngine();
    engine.runTurn({ p1: { move: null, spell: { name: "meteor" } }, p2: idle });

    expect(engine.turnLog()).toEqual(["Alice tried to cast meteor but failed."]);
    expect(engine.getState().wizards.p1.mana).toBe(100);
  });

  it("summons a minion next to the caster that walks toward the enemy", () => {
    const engine = makeEngine();
    engine.runTurn({ p1: { move: null, spell: { name: "summon" } }, p2: idle });

    const state = engine.getState();
    expect(state.minions).toEqual([{ id: "p1-1", owner: "p1", hp: 30, position: [1, 2] }]);
    expect(state.wizards.p1.mana).toBe(60);
    expect(engine.turnLog()).toEqual([
      "Alice cast summon",
      "Alice summoned a minion at [0, 1]",
      "Alice's minion moved to [1, 2]",
    ]);
  });

  it("declares the side left standing the winner", () => {
    const engine = makeEngine();
    engine.runTurn({ p1: { move: null, spell: { name: "teleport", target: [7, 7] } }, p2: idle });

    let turns = 1;
    while (engine.checkWinner() === null && turns < 80) {
      engine.runTurn({ p1: { move: null, spell: { name: "fireball", target: [9, 9] } }, p2: idle });
      turns += 1;
    }

    expect(engine.checkWinner()).toBe("p1");
    expect(engine.getState().wizards.p2.hp).toBeLessThanOrEqual(0);
  });
});
