import type { Logger } from "../../config/logger";
import type { ArenaEvent, SessionId } from "../domain/types";
import type {
  VisualizerConfig,
  VisualizerHandles,
  VisualizerSink,
} from "../ports/visualizerPort";

/**
 * Fire-and-forget front of a VisualizerSink. Nothing thrown by the sink ever
 * reaches the caller.
 */
export class VisualizerBridge {
  constructor(private readonly sink: VisualizerSink, private readonly logger: Logger) {}

  spawn(sessionId: SessionId, config: VisualizerConfig): VisualizerHandles | null {
    try {
      const handles = this.sink.spawn(sessionId, config);
      if (!handles) {
        this.logger.warn({ session_id: sessionId }, "visualizer unavailable, continuing without it");
      }
      return handles;
    } catch (err) {
      this.logger.error({ err, session_id: sessionId }, "visualizer spawn failed, continuing without it");
      return null;
    }
  }

  send(handles: VisualizerHandles, event: ArenaEvent): void {
    try {
      this.sink.send(handles, event);
    } catch (err) {
      this.logger.warn(
        { err, session_id: handles.session_id, event: event.event },
        "visualizer send failed"
      );
    }
  }

  async terminate(handles: VisualizerHandles): Promise<void> {
    try {
      await this.sink.terminate(handles);
    } catch (err) {
      this.logger.warn({ err, session_id: handles.session_id }, "visualizer terminate failed");
    }
  }
}
