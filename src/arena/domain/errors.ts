export class ArenaError extends Error {
  constructor(message: string, public code: string, public statusCode: number = 400) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends ArenaError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR", 400);
  }
}

export class NotFoundError extends ArenaError {
  constructor(message: string) {
    super(message, "NOT_FOUND", 404);
  }
}

export class SessionNotFoundError extends NotFoundError {
  constructor(public sessionId: string) {
    super(`session not found: ${sessionId}`);
  }
}

export class PlayerNotFoundError extends NotFoundError {
  constructor(public playerId: string) {
    super(`player not found: ${playerId}`);
  }
}

export class ActionMismatchError extends ArenaError {
  constructor(message: string) {
    super(message, "ACTION_MISMATCH", 400);
  }
}

export class PlayerAlreadyInLobbyError extends ArenaError {
  constructor(public playerId: string) {
    super(`player ${playerId} is already in the lobby queue`, "ALREADY_IN_LOBBY", 409);
  }
}

export class LobbyTimeoutError extends ArenaError {
  constructor(public playerId: string, waitedMs: number) {
    super(`no opponent found for ${playerId} within ${waitedMs}ms`, "LOBBY_TIMEOUT", 408);
  }
}

export class LobbyCancelledError extends ArenaError {
  constructor(message: string) {
    super(message, "LOBBY_CANCELLED", 409);
  }
}

export class InitializationError extends ArenaError {
  constructor(message: string, public cause?: unknown) {
    super(message, "ENGINE_INIT_FAILED", 500);
  }
}

export class EngineError extends ArenaError {
  constructor(message: string, public cause?: unknown) {
    super(message, "ENGINE_ERROR", 500);
  }
}

export class VisualizerError extends ArenaError {
  constructor(message: string, public cause?: unknown) {
    super(message, "VISUALIZER_ERROR", 500);
  }
}

export class BroadcastOverflowError extends ArenaError {
  constructor(public sessionId: string, public capacity: number) {
    super(
      `subscriber for session ${sessionId} fell behind (queue capacity ${capacity}) and was disconnected`,
      "BROADCAST_OVERFLOW",
      500
    );
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
