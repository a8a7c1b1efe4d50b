export type SessionId = string;
export type PlayerId = string;

export type Position = [number, number];
export type MoveVector = [number, number];

/** Slot of a player inside a match. player_1 always moves first. */
export type Side = "player_1" | "player_2";
export const SIDES: readonly Side[] = ["player_1", "player_2"];

// ---------------------------------------------------------------------------
// Players & configs
// ---------------------------------------------------------------------------

export type PlayerKind = "builtin" | "remote";

export interface PlayerConfig {
  player_id?: PlayerId;
  kind: PlayerKind;
  /** Required iff kind === "builtin". */
  bot_id?: string;
}

export interface Player {
  player_id: PlayerId;
  player_name: string;
  submitted_from: "online" | "upload" | "builtin";
  is_builtin: boolean;
  total_matches: number;
  wins: number;
  losses: number;
  draws: number;
  created_at: string; // ISO
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export interface SpellAction {
  name: string;
  target?: Position | null;
}

export interface ActionData {
  move: MoveVector | null;
  spell: SpellAction | null;
}

export interface ActionSubmission {
  player_id: PlayerId;
  turn: number;
  action: ActionData;
}

/** Action as applied in a given turn, for observability. */
export interface TurnAction {
  player_id: PlayerId;
  turn: number;
  move: MoveVector | null;
  spell: SpellAction | null;
  timed_out: boolean;
}

// ---------------------------------------------------------------------------
// Game state views
// ---------------------------------------------------------------------------

export interface PlayerStateView {
  player_id: PlayerId;
  name: string;
  hp: number;
  mana: number;
  position: Position;
  is_alive: boolean;
}

export interface ArtifactView {
  type: string;
  position: Position;
}

export interface MinionView {
  owner: PlayerId;
  hp: number;
  position: Position;
}

export interface GameStateView {
  turn: number;
  board_size: number;
  player_1: PlayerStateView;
  player_2: PlayerStateView;
  artifacts: ArtifactView[];
  minions: MinionView[];
}

/** The deciding side additionally sees its own spell cooldowns. */
export interface SelfView extends PlayerStateView {
  cooldowns: Record<string, number>;
  shield_active: boolean;
}

/** What a builtin bot sees when it decides. */
export interface PlayerView {
  turn: number;
  board_size: number;
  self: SelfView;
  opponent: PlayerStateView;
  artifacts: ArtifactView[];
  minions: MinionView[];
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type GameResultType = "win" | "draw";

export type EndCondition = "hp_zero" | "draw" | "max_turns" | "unknown" | "error";

export interface PlayerGameStats {
  player_id: PlayerId;
  player_name: string;
  final_hp: number;
  final_mana: number;
  final_position: Position;
  damage_dealt: number;
  damage_received: number;
  spells_cast: number;
  artifacts_collected: number;
  turns_played: number;
}

export interface GameResult {
  session_id: SessionId;
  winner: PlayerId | null;
  loser: PlayerId | null;
  result_type: GameResultType;
  total_turns: number;
  first_player: PlayerId;
  game_duration: number; // seconds
  final_scores: Record<PlayerId, PlayerGameStats>;
  end_condition: EndCondition;
  created_at: string; // ISO
}

// ---------------------------------------------------------------------------
// Events (wire level)
// ---------------------------------------------------------------------------

export interface SessionStartEvent {
  event: "session_start";
  session_id: SessionId;
  turn: 0;
  player_1_name: string;
  player_2_name: string;
  initial_state: GameStateView;
  timestamp: string;
}

export interface TurnEvent {
  event: "turn_update";
  session_id: SessionId;
  turn: number;
  game_state: GameStateView;
  actions: TurnAction[];
  events: string[];
  log_line: string;
  timestamp: string;
}

export interface GameOverEvent {
  event: "game_over";
  session_id: SessionId;
  turn: number;
  winner: PlayerId | null;
  winner_name: string | null;
  final_state: GameStateView;
  game_result: GameResult;
  timestamp: string;
}

export type ArenaEvent = SessionStartEvent | TurnEvent | GameOverEvent;
export type ArenaEventType = ArenaEvent["event"];

export type SessionStatus = "active" | "completed" | "cancelled";
