import { env } from "../../config/env";
import { rootLogger, type Logger } from "../../config/logger";
import { ChildProcessVisualizer } from "../adapters/visualizer/childProcessVisualizer";
import { BuiltinBotRegistry } from "../bots/builtinBots";
import { createStoreFromEnv } from "../db/repoFactory";
import type { ArenaStore } from "../db/repository";
import { createDuelEngine } from "../engine/duelEngine";
import type { SimulationEngineFactory } from "../engine/simulationContract";
import type { VisualizerSink } from "../ports/visualizerPort";
import { EventBroadcaster } from "./eventBroadcaster";
import { LobbyService } from "./lobbyService";
import { PlayerRegistry } from "./playerRegistry";
import { SessionManager, type SessionManagerOptions } from "./sessionManager";
import { VisualizerBridge } from "./visualizerBridge";

export type ArenaService = {
  sessions: SessionManager;
  players: PlayerRegistry;
  lobby: LobbyService;
  bots: BuiltinBotRegistry;
  broadcaster: EventBroadcaster;
  store: ArenaStore;
  close?: () => Promise<void>;
};

export type CreateArenaServiceOptions = {
  store?: ArenaStore;
  engineFactory?: SimulationEngineFactory;
  visualizerSink?: VisualizerSink;
  bots?: BuiltinBotRegistry;
  logger?: Logger;
  newId?: () => string;
  lobbyWaitTimeoutMs?: number;
} & Partial<SessionManagerOptions> & { subscriberQueueSize?: number };

export function createArenaService(options: CreateArenaServiceOptions = {}): ArenaService {
  const logger = options.logger ?? rootLogger;

  let store: ArenaStore;
  let close: (() => Promise<void>) | undefined;
  if (options.store) {
    store = options.store;
  } else {
    ({ store, close } = createStoreFromEnv());
  }

  const visualizationEnabled = options.visualizationEnabled ?? env.ENABLE_VISUALIZATION;
  const sink =
    options.visualizerSink ??
    (visualizationEnabled && env.VISUALIZER_COMMAND
      ? new ChildProcessVisualizer({
          command: env.VISUALIZER_COMMAND,
          queueSize: env.VISUALIZER_QUEUE_SIZE,
          shutdownTimeoutMs: env.VISUALIZER_SHUTDOWN_TIMEOUT_MS,
          logger,
        })
      : null);

  const bots = options.bots ?? new BuiltinBotRegistry();
  const broadcaster = new EventBroadcaster({
    queueSize: options.subscriberQueueSize ?? env.SUBSCRIBER_QUEUE_SIZE,
    logger,
  });

  const sessions = new SessionManager(
    {
      turnTimeoutMs: options.turnTimeoutMs ?? env.TURN_TIMEOUT_MS,
      maxTurns: options.maxTurns ?? env.MAX_TURNS,
      startDelayMs: options.startDelayMs ?? env.MATCH_START_DELAY_MS,
      turnDelayMs: options.turnDelayMs ?? env.TURN_DELAY_MS,
      visualizationEnabled,
    },
    {
      engineFactory: options.engineFactory ?? createDuelEngine,
      store,
      bots,
      broadcaster,
      visualizer: sink ? new VisualizerBridge(sink, logger) : null,
      logger,
      newId: options.newId,
    }
  );

  const players = new PlayerRegistry(store, bots, logger);
  const lobby = new LobbyService(sessions, store, logger, {
    waitTimeoutMs: options.lobbyWaitTimeoutMs ?? env.LOBBY_WAIT_TIMEOUT_MS,
    visualize: true,
  });

  return { sessions, players, lobby, bots, broadcaster, store, close };
}
