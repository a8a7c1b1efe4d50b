import type { ActionData, Position, SpellAction } from "../domain/types";
import {
  DRAW_SENTINEL,
  ENGINE_SIDES,
  type EngineArtifact,
  type EngineLogEntry,
  type EngineMinion,
  type EngineParticipant,
  type EngineSide,
  type EngineState,
  type EngineWinner,
  type EngineWizardState,
  type SimulationEngine,
  type SimulationEngineFactory,
} from "./simulationContract";
import { SeededRng } from "./seededRng";

export const BOARD_SIZE = 10;
export const MAX_HP = 100;
export const MAX_MANA = 100;
export const MANA_REGEN = 10;
export const ARTIFACT_SPAWN_RATE = 3; // every N turns
const MINION_HP = 30;
const MINION_DAMAGE = 10;

export const SPELLS = {
  fireball: { cost: 30, cooldown: 2, damage: 20, range: 3 },
  shield: { cost: 20, cooldown: 3, block: 20 },
  teleport: { cost: 40, cooldown: 4 },
  summon: { cost: 50, cooldown: 5 },
  heal: { cost: 25, cooldown: 3, heal: 20 },
  blink: { cost: 15, cooldown: 2, distance: 2 },
} as const;

export type SpellName = keyof typeof SPELLS;

const ARTIFACT_TYPES = ["health", "mana", "cooldown"] as const;

function isSpellName(name: string): name is SpellName {
  return Object.prototype.hasOwnProperty.call(SPELLS, name);
}

function samePos(a: Position, b: Position): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

function chebyshev(a: Position, b: Position): number {
  return Math.max(Math.abs(a[0] - b[0]), Math.abs(a[1] - b[1]));
}

function manhattan(a: Position, b: Position): number {
  return Math.abs(a[0] - b[0]) + Math.abs(a[1] - b[1]);
}

function isValidTile(pos: Position): boolean {
  return pos[0] >= 0 && pos[0] < BOARD_SIZE && pos[1] >= 0 && pos[1] < BOARD_SIZE;
}

function other(side: EngineSide): EngineSide {
  return side === "p1" ? "p2" : "p1";
}

function newWizard(name: string, position: Position): EngineWizardState {
  const cooldowns: Record<string, number> = {};
  for (const spell of Object.keys(SPELLS)) cooldowns[spell] = 0;
  return { name, hp: MAX_HP, mana: MAX_MANA, position, shield_active: false, cooldowns };
}

/**
 * Reference two-wizard duel on a 10x10 grid. Wizards start in opposite
 * corners; p1 resolves first within each step.
 */
export class DuelEngine implements SimulationEngine {
  private _turn = 0;
  private readonly wizards: Record<EngineSide, EngineWizardState>;
  private artifacts: EngineArtifact[] = [];
  private minions: EngineMinion[] = [];
  private minionCounter = 0;
  private lines: string[] = [];
  private readonly log: EngineLogEntry[] = [];
  private readonly rng: SeededRng;

  constructor(participants: Record<EngineSide, EngineParticipant>, seed: number = Date.now()) {
    this.wizards = {
      p1: newWizard(participants.p1.name, [0, 0]),
      p2: newWizard(participants.p2.name, [BOARD_SIZE - 1, BOARD_SIZE - 1]),
    };
    this.rng = new SeededRng(seed);
  }

  get turn(): number {
    return this._turn;
  }

  runTurn(actions: Record<EngineSide, ActionData>): void {
    this._turn += 1;
    this.lines = [];

    if (this._turn % ARTIFACT_SPAWN_RATE === 0) {
      this.spawnArtifact();
    }

    for (const side of ENGINE_SIDES) this.processMovement(side, actions[side].move);
    for (const side of ENGINE_SIDES) this.checkPickup(side);
    for (const side of ENGINE_SIDES) this.processSpell(side, actions[side].spell);

    this.processMinions();

    for (const side of ENGINE_SIDES) {
      const wiz = this.wizards[side];
      wiz.mana = Math.min(MAX_MANA, wiz.mana + MANA_REGEN);
      for (const spell of Object.keys(wiz.cooldowns)) {
        if (wiz.cooldowns[spell] > 0) wiz.cooldowns[spell] -= 1;
      }
    }
  }

  getState(): EngineState {
    return {
      turn: this._turn,
      board_size: BOARD_SIZE,
      wizards: {
        p1: cloneWizard(this.wizards.p1),
        p2: cloneWizard(this.wizards.p2),
      },
      artifacts: this.artifacts.map((a) => ({ type: a.type, position: [a.position[0], a.position[1]] })),
      minions: this.minions
        .filter((m) => m.hp > 0)
        .map((m) => ({ ...m, position: [m.position[0], m.position[1]] })),
    };
  }

  checkWinner(): EngineWinner {
    const p1Down = this.wizards.p1.hp <= 0;
    const p2Down = this.wizards.p2.hp <= 0;
    if (p1Down && p2Down) return DRAW_SENTINEL;
    if (p1Down) return "p2";
    if (p2Down) return "p1";
    return null;
  }

  turnLog(): string[] {
    return [...this.lines];
  }

  eventLog(): EngineLogEntry[] {
    return [...this.log];
  }

  // ---------------------------------------------------------------------------
  // Steps
  // ---------------------------------------------------------------------------

  private spawnArtifact(): void {
    const position: Position = [this.rng.int(BOARD_SIZE), this.rng.int(BOARD_SIZE)];
    const type = this.rng.pick(ARTIFACT_TYPES);
    this.artifacts.push({ type, position });
    this.lines.push(`A ${type} artifact appeared at [${position.join(", ")}]`);
  }

  private processMovement(side: EngineSide, move: ActionData["move"]): void {
    if (!move) return;
    const wiz = this.wizards[side];
    const next: Position = [wiz.position[0] + move[0], wiz.position[1] + move[1]];
    if (samePos(next, wiz.position) || !isValidTile(next)) return;
    wiz.position = next;
    this.lines.push(`${wiz.name} moved to [${next.join(", ")}]`);
  }

  private checkPickup(side: EngineSide): void {
    const wiz = this.wizards[side];
    const idx = this.artifacts.findIndex((a) => samePos(a.position, wiz.position));
    if (idx < 0) return;
    const [artifact] = this.artifacts.splice(idx, 1);

    if (artifact.type === "health") {
      wiz.hp = Math.min(MAX_HP, wiz.hp + 20);
    } else if (artifact.type === "mana") {
      wiz.mana = Math.min(MAX_MANA, wiz.mana + 30);
    } else if (artifact.type === "cooldown") {
      for (const spell of Object.keys(wiz.cooldowns)) {
        if (wiz.cooldowns[spell] > 0) wiz.cooldowns[spell] -= 1;
      }
    }

    this.log.push({ turn: this._turn, type: "artifact", collector: side, artifact: artifact.type });
    this.lines.push(`${wiz.name} picked up a ${artifact.type} artifact`);
  }

  private processSpell(side: EngineSide, action: SpellAction | null): void {
    if (!action) return;
    const caster = this.wizards[side];
    const target = this.wizards[other(side)];
    const spell = action.name;

    if (!isSpellName(spell) || caster.mana < SPELLS[spell].cost || caster.cooldowns[spell] > 0) {
      this.lines.push(`${caster.name} tried to cast ${spell} but failed.`);
      return;
    }

    caster.mana -= SPELLS[spell].cost;
    caster.cooldowns[spell] = SPELLS[spell].cooldown;
    this.log.push({ turn: this._turn, type: "spell", caster: side, spell });
    this.lines.push(`${caster.name} cast ${spell}`);

    const dest = action.target ?? null;

    switch (spell) {
      case "fireball": {
        if (dest && chebyshev(caster.position, dest) <= SPELLS.fireball.range && samePos(dest, target.position)) {
          let damage: number = SPELLS.fireball.damage;
          if (target.shield_active) {
            damage = Math.max(0, damage - SPELLS.shield.block);
            target.shield_active = false;
          }
          target.hp -= damage;
          this.log.push({ turn: this._turn, type: "damage", source: side, target: other(side), amount: damage });
          this.lines.push(`${target.name} took ${damage} damage (HP: ${target.hp})`);
        }
        return;
      }
      case "shield":
        caster.shield_active = true;
        return;
      case "heal": {
        caster.hp = Math.min(caster.hp + SPELLS.heal.heal, MAX_HP);
        this.lines.push(`${caster.name} healed ${SPELLS.heal.heal} HP (HP: ${caster.hp})`);
        return;
      }
      case "teleport": {
        if (dest && isValidTile(dest)) {
          caster.position = [dest[0], dest[1]];
          this.lines.push(`${caster.name} teleported to [${dest.join(", ")}]`);
        }
        return;
      }
      case "blink": {
        if (dest && isValidTile(dest) && chebyshev(caster.position, dest) <= SPELLS.blink.distance) {
          caster.position = [dest[0], dest[1]];
          this.lines.push(`${caster.name} blinked to [${dest.join(", ")}]`);
        }
        return;
      }
      case "summon": {
        if (this.minions.some((m) => m.owner === side && m.hp > 0)) {
          this.lines.push(`${caster.name} already has a minion.`);
          return;
        }
        const spawn = this.adjacentFreeTile(caster.position);
        if (!spawn) {
          this.lines.push(`${caster.name} tried to summon but no space.`);
          return;
        }
        this.minionCounter += 1;
        this.minions.push({ id: `${side}-${this.minionCounter}`, owner: side, hp: MINION_HP, position: spawn });
        this.lines.push(`${caster.name} summoned a minion at [${spawn.join(", ")}]`);
        return;
      }
    }
  }

  private processMinions(): void {
    for (const minion of this.minions) {
      if (minion.hp <= 0) continue;

      const enemySide = other(minion.owner);
      const enemy = this.wizards[enemySide];
      const enemyMinions = this.minions.filter((m) => m.owner === enemySide && m.hp > 0);

      let targetPos = enemy.position;
      let targetMinion: EngineMinion | null = null;
      for (const m of enemyMinions) {
        if (manhattan(minion.position, m.position) < manhattan(minion.position, targetPos)) {
          targetPos = m.position;
          targetMinion = m;
        }
      }

      const ownerName = this.wizards[minion.owner].name;
      if (manhattan(minion.position, targetPos) === 1) {
        if (targetMinion) {
          targetMinion.hp -= MINION_DAMAGE;
          this.lines.push(`${ownerName}'s minion attacked ${enemy.name}'s minion for ${MINION_DAMAGE} dmg`);
        } else {
          enemy.hp -= MINION_DAMAGE;
          this.log.push({
            turn: this._turn,
            type: "damage",
            source: minion.owner,
            target: enemySide,
            amount: MINION_DAMAGE,
          });
          this.lines.push(`${ownerName}'s minion attacked ${enemy.name} for ${MINION_DAMAGE} dmg`);
        }
        continue;
      }

      const step: Position = [
        minion.position[0] + Math.sign(targetPos[0] - minion.position[0]),
        minion.position[1] + Math.sign(targetPos[1] - minion.position[1]),
      ];
      if (isValidTile(step) && !this.tileOccupied(step)) {
        minion.position = step;
        this.lines.push(`${ownerName}'s minion moved to [${step.join(", ")}]`);
      }
    }
  }

  private adjacentFreeTile(pos: Position): Position | null {
    const directions: Position[] = [
      [-1, -1], [-1, 0], [-1, 1],
      [0, -1], [0, 1],
      [1, -1], [1, 0], [1, 1],
    ];
    for (const [dx, dy] of directions) {
      const candidate: Position = [pos[0] + dx, pos[1] + dy];
      if (isValidTile(candidate) && !this.tileOccupied(candidate)) return candidate;
    }
    return null;
  }

  private tileOccupied(pos: Position): boolean {
    if (samePos(pos, this.wizards.p1.position) || samePos(pos, this.wizards.p2.position)) return true;
    return this.minions.some((m) => m.hp > 0 && samePos(m.position, pos));
  }
}

function cloneWizard(w: EngineWizardState): EngineWizardState {
  return { ...w, position: [w.position[0], w.position[1]], cooldowns: { ...w.cooldowns } };
}

export const createDuelEngine: SimulationEngineFactory = (participants) => new DuelEngine(participants);
