import { randomUUID } from "node:crypto";
import type { Logger } from "../../config/logger";
import type { BuiltinBotRegistry } from "../bots/builtinBots";
import type { ArenaStore } from "../db/repository";
import { PlayerNotFoundError } from "../domain/errors";
import type { Player, PlayerId } from "../domain/types";
import type { PlayerRegistration } from "../domain/validate";

export type PlayerSummary = {
  total_players: number;
  user_players: number;
  builtin_players: number;
};

export class PlayerRegistry {
  constructor(
    private readonly store: ArenaStore,
    private readonly bots: BuiltinBotRegistry,
    private readonly logger: Logger,
    private readonly newId: () => string = randomUUID
  ) {}

  /** Makes every builtin bot's player known to the store. */
  async seedBuiltins(): Promise<void> {
    for (const player of this.bots.players()) {
      await this.store.upsertPlayer(player);
    }
  }

  async register(reg: PlayerRegistration): Promise<Player> {
    const player: Player = {
      player_id: this.newId(),
      player_name: reg.player_name,
      submitted_from: reg.submitted_from,
      is_builtin: false,
      total_matches: 0,
      wins: 0,
      losses: 0,
      draws: 0,
      created_at: new Date().toISOString(),
    };
    await this.store.upsertPlayer(player);
    this.logger.info({ player_id: player.player_id, player_name: player.player_name }, "player registered");
    return player;
  }

  async get(player_id: PlayerId): Promise<Player> {
    const player = await this.store.getPlayer(player_id);
    if (!player) throw new PlayerNotFoundError(player_id);
    return player;
  }

  list(opts: { builtin?: boolean } = {}): Promise<Player[]> {
    return this.store.listPlayers(opts);
  }

  listBuiltin(): Promise<Player[]> {
    return this.store.listPlayers({ builtin: true });
  }

  async summary(): Promise<PlayerSummary> {
    const all = await this.store.listPlayers();
    const builtin_players = all.filter((p) => p.is_builtin).length;
    return {
      total_players: all.length,
      user_players: all.length - builtin_players,
      builtin_players,
    };
  }
}
