import type {
  ActionData,
  ActionSubmission,
  MoveVector,
  PlayerConfig,
  Position,
  SpellAction,
} from "./types";
import { ValidationError } from "./errors";

/** No movement, no spell. Applied to any side that misses its deadline. */
export function defaultAction(): ActionData {
  return { move: [0, 0], spell: null };
}

export interface StartSessionRequest {
  player_1_config: PlayerConfig;
  player_2_config: PlayerConfig;
  visualize: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isIntegerPair(value: unknown): value is [number, number] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    Number.isInteger(value[0]) &&
    Number.isInteger(value[1])
  );
}

function optionalString(raw: Record<string, unknown>, key: string, label: string): string | undefined {
  const v = raw[key];
  if (v == null) return undefined;
  if (typeof v !== "string") throw new ValidationError(`${label}.${key} must be a string`);
  const trimmed = v.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

// ---------------------------------------------------------------------------
// Player configs
// ---------------------------------------------------------------------------

export function parsePlayerConfig(raw: unknown, label = "player_config"): PlayerConfig {
  if (!isRecord(raw)) throw new ValidationError(`${label} must be an object`);

  const kind = raw.kind;
  if (kind !== "builtin" && kind !== "remote") {
    throw new ValidationError(`${label}.kind must be "builtin" or "remote"`);
  }

  const player_id = optionalString(raw, "player_id", label);
  const bot_id = optionalString(raw, "bot_id", label);

  return assertPlayerConfig({ kind, player_id, bot_id }, label);
}

export function assertPlayerConfig(cfg: PlayerConfig, label = "player_config"): PlayerConfig {
  if (cfg.kind === "builtin" && !cfg.bot_id) {
    throw new ValidationError(`${label}.bot_id is required for builtin bots`);
  }
  if (cfg.kind === "remote" && !cfg.player_id) {
    throw new ValidationError(`${label}.player_id is required for remote players`);
  }
  return cfg;
}

export function parseStartSessionRequest(raw: unknown): StartSessionRequest {
  if (!isRecord(raw)) throw new ValidationError("request body must be an object");
  const visualize = raw.visualize;
  if (visualize != null && typeof visualize !== "boolean") {
    throw new ValidationError("visualize must be a boolean");
  }
  return {
    player_1_config: parsePlayerConfig(raw.player_1_config, "player_1_config"),
    player_2_config: parsePlayerConfig(raw.player_2_config, "player_2_config"),
    visualize: visualize === true,
  };
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

function parseMove(raw: unknown): MoveVector | null {
  if (raw == null) return null;
  if (!isIntegerPair(raw)) throw new ValidationError("move must be [dx, dy] integers or null");
  const [dx, dy] = raw;
  if (dx < -1 || dx > 1 || dy < -1 || dy > 1) {
    throw new ValidationError("move components must be within -1..1");
  }
  return [dx, dy];
}

function parseSpell(raw: unknown): SpellAction | null {
  if (raw == null) return null;
  if (!isRecord(raw)) throw new ValidationError("spell must be an object or null");
  const name = raw.name;
  if (typeof name !== "string" || name.trim().length === 0) {
    throw new ValidationError("spell.name is required");
  }
  let target: Position | null = null;
  if (raw.target != null) {
    if (!isIntegerPair(raw.target)) throw new ValidationError("spell.target must be [x, y] integers");
    target = [raw.target[0], raw.target[1]];
  }
  return { name: name.trim(), target };
}

export function parseActionData(raw: unknown): ActionData {
  if (!isRecord(raw)) throw new ValidationError("action_data must be an object");
  return {
    move: parseMove(raw.move),
    spell: parseSpell(raw.spell),
  };
}

export function parseActionSubmission(raw: unknown): ActionSubmission {
  if (!isRecord(raw)) throw new ValidationError("request body must be an object");
  const player_id = raw.player_id;
  if (typeof player_id !== "string" || player_id.length === 0) {
    throw new ValidationError("player_id is required");
  }
  const turn = raw.turn;
  if (typeof turn !== "number" || !Number.isInteger(turn) || turn < 1) {
    throw new ValidationError("turn must be a positive integer");
  }
  return { player_id, turn, action: parseActionData(raw.action_data) };
}

/**
 * Normalizes whatever a builtin bot returned. Returns null when the value
 * cannot be read as an action.
 */
export function normalizeBotAction(raw: unknown): ActionData | null {
  try {
    return parseActionData(raw);
  } catch (err) {
    if (err instanceof ValidationError) return null;
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Player registration
// ---------------------------------------------------------------------------

export interface PlayerRegistration {
  player_name: string;
  submitted_from: "online" | "upload";
}

export function parsePlayerRegistration(raw: unknown): PlayerRegistration {
  if (!isRecord(raw)) throw new ValidationError("request body must be an object");
  const name = raw.player_name;
  if (typeof name !== "string" || name.trim().length === 0) {
    throw new ValidationError("player_name is required");
  }
  if (name.trim().length > 50) {
    throw new ValidationError("player_name must be at most 50 characters");
  }
  const from = raw.submitted_from ?? "online";
  if (from !== "online" && from !== "upload") {
    throw new ValidationError(`submitted_from must be "online" or "upload"`);
  }
  return { player_name: name.trim(), submitted_from: from };
}

// ---------------------------------------------------------------------------
// Lobby
// ---------------------------------------------------------------------------

export interface LobbyJoinRequest {
  player_id: string;
  /** How the player takes part once matched; defaults to remote play. */
  bot_config: PlayerConfig;
}

export function parseLobbyJoinRequest(raw: unknown): LobbyJoinRequest {
  if (!isRecord(raw)) throw new ValidationError("request body must be an object");
  const player_id = raw.player_id;
  if (typeof player_id !== "string" || player_id.trim().length === 0) {
    throw new ValidationError("player_id is required");
  }
  const id = player_id.trim();
  const bot_config =
    raw.bot_config == null
      ? { kind: "remote" as const, player_id: id }
      : parsePlayerConfig(raw.bot_config, "bot_config");
  return { player_id: id, bot_config };
}
