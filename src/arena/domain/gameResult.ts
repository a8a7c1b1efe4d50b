import type {
  EndCondition,
  GameResult,
  GameStateView,
  PlayerGameStats,
  PlayerId,
  PlayerStateView,
  SessionId,
} from "./types";

export type SideCounters = {
  damage_dealt: number;
  damage_received: number;
  spells_cast: number;
  artifacts_collected: number;
};

export type BuildGameResultInput = {
  session_id: SessionId;
  final_state: GameStateView;
  counters: { player_1: SideCounters; player_2: SideCounters };
  winner: PlayerId | null;
  end_condition: EndCondition;
  total_turns: number;
  started_at: Date;
  now?: Date;
};

export function buildGameResult(input: BuildGameResultInput): GameResult {
  const now = input.now ?? new Date();
  const p1 = input.final_state.player_1;
  const p2 = input.final_state.player_2;

  let loser: PlayerId | null = null;
  if (input.winner === p1.player_id) loser = p2.player_id;
  else if (input.winner === p2.player_id) loser = p1.player_id;

  const final_scores: Record<PlayerId, PlayerGameStats> = {};
  final_scores[p1.player_id] = playerStats(p1, input.counters.player_1, input.total_turns);
  final_scores[p2.player_id] = playerStats(p2, input.counters.player_2, input.total_turns);

  return {
    session_id: input.session_id,
    winner: loser ? input.winner : null,
    loser,
    result_type: loser ? "win" : "draw",
    total_turns: input.total_turns,
    first_player: p1.player_id,
    game_duration: Math.max(0, (now.getTime() - input.started_at.getTime()) / 1000),
    final_scores,
    end_condition: input.end_condition,
    created_at: now.toISOString(),
  };
}

function playerStats(view: PlayerStateView, counters: SideCounters, turns: number): PlayerGameStats {
  return {
    player_id: view.player_id,
    player_name: view.name,
    final_hp: view.hp,
    final_mana: view.mana,
    final_position: [view.position[0], view.position[1]],
    damage_dealt: counters.damage_dealt,
    damage_received: counters.damage_received,
    spells_cast: counters.spells_cast,
    artifacts_collected: counters.artifacts_collected,
    turns_played: turns,
  };
}
