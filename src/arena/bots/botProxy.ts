import type { PlayerId, PlayerView } from "../domain/types";
import { ActionSlot } from "./actionSlot";

/** Returns an action-shaped value; the turn processor validates it. */
export type BotStrategy = (view: PlayerView) => unknown;

export interface BuiltinBot {
  kind: "builtin";
  player_id: PlayerId;
  name: string;
  bot_id: string;
  decide: BotStrategy;
}

export interface RemotePlayer {
  kind: "remote";
  player_id: PlayerId;
  name: string;
  slot: ActionSlot;
}

export type BotProxy = BuiltinBot | RemotePlayer;

export function createRemotePlayer(player_id: PlayerId, name: string): RemotePlayer {
  return { kind: "remote", player_id, name, slot: new ActionSlot() };
}

export function isRemote(proxy: BotProxy): proxy is RemotePlayer {
  return proxy.kind === "remote";
}
