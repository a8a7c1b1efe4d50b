import type { Player, PlayerId } from "../domain/types";
import { NotFoundError } from "../domain/errors";
import type { BotStrategy, BuiltinBot } from "./botProxy";
import { aggressiveStrategy, defensiveStrategy, tacticalStrategy } from "./strategies";

export type BotDifficulty = "easy" | "medium" | "hard";

export interface BotInfo {
  bot_type: "builtin";
  bot_id: string;
  player_id: PlayerId;
  player_name: string;
  difficulty: BotDifficulty;
  description: string;
}

export type BotEntry = Omit<BotInfo, "bot_type"> & { strategy: BotStrategy };

const DEFAULT_BOTS: BotEntry[] = [
  {
    bot_id: "sample_bot",
    player_id: "builtin_sample",
    player_name: "Sample Bot",
    difficulty: "easy",
    description: "Walks straight at the opponent and fires when in range",
    strategy: aggressiveStrategy,
  },
  {
    bot_id: "defensive_bot",
    player_id: "builtin_defensive",
    player_name: "Defensive Bot",
    difficulty: "medium",
    description: "Keeps its distance, shields early and collects artifacts",
    strategy: defensiveStrategy,
  },
  {
    bot_id: "tactical_bot",
    player_id: "builtin_tactical",
    player_name: "Tactical Bot",
    difficulty: "medium",
    description: "Switches between pressure and recovery based on hp and mana",
    strategy: tacticalStrategy,
  },
];

export class BuiltinBotRegistry {
  private readonly bots = new Map<string, BotEntry>();

  constructor(entries: BotEntry[] = DEFAULT_BOTS) {
    for (const e of entries) this.bots.set(e.bot_id, e);
  }

  has(botId: string): boolean {
    return this.bots.has(botId);
  }

  create(botId: string): BuiltinBot {
    const entry = this.bots.get(botId);
    if (!entry) throw new NotFoundError(`builtin bot not found: ${botId}`);
    return {
      kind: "builtin",
      player_id: entry.player_id,
      name: entry.player_name,
      bot_id: entry.bot_id,
      decide: entry.strategy,
    };
  }

  list(): BotInfo[] {
    return [...this.bots.values()].map(({ strategy: _strategy, ...info }) => ({
      bot_type: "builtin" as const,
      ...info,
    }));
  }

  /** Player records for the catalogue, seeded into the store at startup. */
  players(now: Date = new Date()): Player[] {
    return [...this.bots.values()].map((e) => ({
      player_id: e.player_id,
      player_name: e.player_name,
      submitted_from: "builtin" as const,
      is_builtin: true,
      total_matches: 0,
      wins: 0,
      losses: 0,
      draws: 0,
      created_at: now.toISOString(),
    }));
  }
}
