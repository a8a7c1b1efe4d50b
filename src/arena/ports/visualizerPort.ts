import type { ArenaEvent, SessionId } from "../domain/types";

export interface VisualizerConfig {
  player_1_name: string;
  player_2_name: string;
}

/** Opaque per-session handle; only the sink that created it interprets it. */
export interface VisualizerHandles {
  session_id: SessionId;
  pid: number;
}

export interface VisualizerShutdownMessage {
  event: "shutdown";
  reason: "session_ended";
}

export type VisualizerMessage = ArenaEvent | VisualizerShutdownMessage;

export interface VisualizerSink {
  /** Returns null when the visualizer cannot be started. */
  spawn(sessionId: SessionId, config: VisualizerConfig): VisualizerHandles | null;
  send(handles: VisualizerHandles, message: VisualizerMessage): void;
  terminate(handles: VisualizerHandles): Promise<void>;
}
