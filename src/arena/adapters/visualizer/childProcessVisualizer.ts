import { spawn, type ChildProcess } from "node:child_process";
import type { Logger } from "../../../config/logger";
import type { SessionId } from "../../domain/types";
import { VisualizerError } from "../../domain/errors";
import type {
  VisualizerConfig,
  VisualizerHandles,
  VisualizerMessage,
  VisualizerSink,
} from "../../ports/visualizerPort";

type RunningVisualizer = {
  child: ChildProcess;
  pending: number;
  dropped: number;
};

export type ChildProcessVisualizerOptions = {
  /** Executable plus arguments, whitespace separated. */
  command: string;
  queueSize: number;
  shutdownTimeoutMs: number;
  logger: Logger;
};

/**
 * Runs one external renderer per session and streams events to it as JSON
 * lines on stdin. Writes beyond `queueSize` pending are dropped.
 */
export class ChildProcessVisualizer implements VisualizerSink {
  private readonly running = new Map<SessionId, RunningVisualizer>();

  constructor(private readonly opts: ChildProcessVisualizerOptions) {}

  spawn(sessionId: SessionId, config: VisualizerConfig): VisualizerHandles | null {
    const [cmd, ...args] = this.opts.command.trim().split(/\s+/).filter(Boolean);
    if (!cmd) return null;

    const log = this.opts.logger.child({ session_id: sessionId });
    let child: ChildProcess;
    try {
      child = spawn(cmd, args, {
        stdio: ["pipe", "ignore", "inherit"],
        env: {
          ...process.env,
          ARENA_SESSION_ID: sessionId,
          ARENA_PLAYER_1_NAME: config.player_1_name,
          ARENA_PLAYER_2_NAME: config.player_2_name,
        },
      });
    } catch (err) {
      log.warn({ err, command: cmd }, "visualizer could not be started");
      return null;
    }

    // ENOENT and EACCES surface as an "error" event with no pid assigned.
    child.on("error", (err) => {
      log.warn({ err }, "visualizer process error");
      if (this.running.get(sessionId)?.child === child) this.running.delete(sessionId);
    });
    if (child.pid === undefined) {
      log.warn({ command: cmd }, "visualizer could not be started");
      return null;
    }

    const entry: RunningVisualizer = { child, pending: 0, dropped: 0 };
    this.running.set(sessionId, entry);

    child.on("exit", (code, signal) => {
      log.info({ code, signal, dropped: entry.dropped }, "visualizer process exited");
      if (this.running.get(sessionId) === entry) this.running.delete(sessionId);
    });
    child.stdin?.on("error", (err) => {
      log.warn({ err }, "visualizer stdin error");
    });

    return { session_id: sessionId, pid: child.pid };
  }

  send(handles: VisualizerHandles, message: VisualizerMessage): void {
    const entry = this.running.get(handles.session_id);
    const stdin = entry?.child.stdin;
    if (!entry || !stdin || stdin.destroyed) {
      throw new VisualizerError(`visualizer for session ${handles.session_id} is not running`);
    }
    if (entry.pending >= this.opts.queueSize) {
      entry.dropped += 1;
      return;
    }
    entry.pending += 1;
    stdin.write(`${JSON.stringify(message)}\n`, () => {
      entry.pending -= 1;
    });
  }

  async terminate(handles: VisualizerHandles): Promise<void> {
    const entry = this.running.get(handles.session_id);
    if (!entry) return;
    this.running.delete(handles.session_id);

    const { child } = entry;
    if (child.exitCode !== null || child.signalCode !== null) return;

    const exited = new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        child.kill("SIGKILL");
        resolve();
      }, this.opts.shutdownTimeoutMs);
      child.once("exit", () => {
        clearTimeout(timer);
        resolve();
      });
    });

    const stdin = child.stdin;
    if (stdin && !stdin.destroyed) {
      const shutdown: VisualizerMessage = { event: "shutdown", reason: "session_ended" };
      stdin.end(`${JSON.stringify(shutdown)}\n`);
    }

    await exited;
  }
}
