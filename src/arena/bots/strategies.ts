import type { ActionData, MoveVector, PlayerView, Position } from "../domain/types";

const FIREBALL_RANGE = 3;

function chebyshev(a: Position, b: Position): number {
  return Math.max(Math.abs(a[0] - b[0]), Math.abs(a[1] - b[1]));
}

function unit(v: number): number {
  return v > 0 ? 1 : v < 0 ? -1 : 0;
}

function stepToward(from: Position, to: Position): MoveVector {
  return [unit(to[0] - from[0]), unit(to[1] - from[1])];
}

function stepAway(from: Position, threat: Position, boardSize: number): MoveVector {
  const [dx, dy] = stepToward(from, threat);
  const clamp = (v: number, d: number) => (v - d >= 0 && v - d < boardSize ? 0 - d : 0);
  return [clamp(from[0], dx), clamp(from[1], dy)];
}

function ready(view: PlayerView, spell: string, cost: number): boolean {
  return (view.self.cooldowns[spell] ?? 0) === 0 && view.self.mana >= cost;
}

function nearestArtifact(view: PlayerView): Position | null {
  let best: Position | null = null;
  for (const a of view.artifacts) {
    if (!best || chebyshev(view.self.position, a.position) < chebyshev(view.self.position, best)) {
      best = a.position;
    }
  }
  return best;
}

function hasMinion(view: PlayerView): boolean {
  return view.minions.some((m) => m.owner === view.self.player_id);
}

/** Closes in and fires; heals and summons when it can. */
export function aggressiveStrategy(view: PlayerView): ActionData {
  const me = view.self.position;
  const opp = view.opponent.position;

  if (ready(view, "fireball", 30) && chebyshev(me, opp) <= FIREBALL_RANGE) {
    return { move: [0, 0], spell: { name: "fireball", target: opp } };
  }
  if (view.self.hp <= 80 && ready(view, "heal", 25)) {
    return { move: stepToward(me, opp), spell: { name: "heal" } };
  }
  if (!hasMinion(view) && ready(view, "summon", 50)) {
    return { move: stepToward(me, opp), spell: { name: "summon" } };
  }
  return { move: stepToward(me, opp), spell: null };
}

/** Keeps its distance, shields under pressure, goes for artifacts. */
export function defensiveStrategy(view: PlayerView): ActionData {
  const me = view.self.position;
  const opp = view.opponent.position;
  const dist = chebyshev(me, opp);

  if (view.self.hp < 30 && ready(view, "heal", 25)) {
    return { move: stepAway(me, opp, view.board_size), spell: { name: "heal" } };
  }
  if (dist <= FIREBALL_RANGE && !view.self.shield_active && ready(view, "shield", 20)) {
    return { move: stepAway(me, opp, view.board_size), spell: { name: "shield" } };
  }
  if (dist <= FIREBALL_RANGE && ready(view, "fireball", 30)) {
    return { move: [0, 0], spell: { name: "fireball", target: opp } };
  }

  const artifact = nearestArtifact(view);
  if (artifact) return { move: stepToward(me, artifact), spell: null };
  return { move: stepAway(me, opp, view.board_size), spell: null };
}

/** Picks between attacking and recovering depending on hp and mana. */
export function tacticalStrategy(view: PlayerView): ActionData {
  const me = view.self.position;
  const opp = view.opponent.position;
  const dist = chebyshev(me, opp);
  const low = view.self.hp <= 50 || view.self.mana <= 40;

  if (dist <= FIREBALL_RANGE && ready(view, "fireball", 30)) {
    return { move: [0, 0], spell: { name: "fireball", target: opp } };
  }
  if (view.self.hp <= 60 && ready(view, "heal", 25)) {
    return { move: [0, 0], spell: { name: "heal" } };
  }

  const artifact = nearestArtifact(view);
  if (low && artifact) {
    if (chebyshev(me, artifact) > 2 && ready(view, "teleport", 40)) {
      return { move: null, spell: { name: "teleport", target: artifact } };
    }
    return { move: stepToward(me, artifact), spell: null };
  }

  if (dist > FIREBALL_RANGE + 1 && !hasMinion(view) && ready(view, "summon", 50)) {
    return { move: stepToward(me, opp), spell: { name: "summon" } };
  }
  if (dist === FIREBALL_RANGE + 1 && ready(view, "blink", 15)) {
    const step = stepToward(me, opp);
    const target: Position = [me[0] + step[0] * 2, me[1] + step[1] * 2];
    return { move: null, spell: { name: "blink", target } };
  }
  return { move: stepToward(me, opp), spell: null };
}
