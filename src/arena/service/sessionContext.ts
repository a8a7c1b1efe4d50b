import type { Logger } from "../../config/logger";
import type { BotProxy } from "../bots/botProxy";
import type {
  ArenaEvent,
  GameResult,
  GameStateView,
  SessionId,
  SessionStatus,
  Side,
} from "../domain/types";
import type { EngineAdapter } from "../engine-adapters/engineAdapter";
import type { VisualizerHandles } from "../ports/visualizerPort";

/** Everything the orchestrator keeps for one live match. */
export interface SessionContext {
  session_id: SessionId;
  proxies: Record<Side, BotProxy>;
  adapter: EngineAdapter;
  /** Last processed turn; 0 until the first turn completes. */
  turn: number;
  game_state: GameStateView;
  /** session_start, turn_update x N, game_over. Append-only. */
  events: ArenaEvent[];
  status: SessionStatus;
  terminal: boolean;
  result: GameResult | null;
  visualizer_enabled: boolean;
  visualizer: VisualizerHandles | null;
  created_at: Date;
  abort: AbortController;
  task: Promise<void> | null;
  logger: Logger;
}
