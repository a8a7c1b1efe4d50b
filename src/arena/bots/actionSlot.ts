import type { ActionData } from "../domain/types";
import { ActionMismatchError } from "../domain/errors";

type SlotState = "idle" | "armed" | "filled" | "closed";

/**
 * One-shot hand-off between an HTTP submission and the turn loop.
 *
 * The slot is armed for exactly one turn. The first matching offer fills it;
 * anything else (wrong turn, second offer, offer after the deadline) is
 * rejected without touching the stored action.
 */
export class ActionSlot {
  private state: SlotState = "idle";
  private turn: number | null = null;
  private action: ActionData | null = null;
  private waiter: ((action: ActionData | null) => void) | null = null;

  get armedTurn(): number | null {
    return this.state === "armed" ? this.turn : null;
  }

  arm(turn: number): void {
    this.release(null);
    this.state = "armed";
    this.turn = turn;
    this.action = null;
  }

  offer(turn: number, action: ActionData): void {
    if (this.turn !== turn) {
      throw new ActionMismatchError(
        this.turn == null
          ? `no turn is open for submissions (got turn ${turn})`
          : `turn mismatch: expected ${this.turn}, got ${turn}`
      );
    }
    if (this.state === "filled") {
      throw new ActionMismatchError(`action for turn ${turn} already submitted`);
    }
    if (this.state !== "armed") {
      throw new ActionMismatchError(`turn ${turn} is closed for submissions`);
    }

    this.state = "filled";
    if (this.waiter) {
      this.release(action);
    } else {
      this.action = action;
    }
  }

  /**
   * Waits for the armed turn's action. Resolves null on timeout or abort;
   * either way the turn is closed afterwards.
   */
  take(timeoutMs: number, signal?: AbortSignal): Promise<ActionData | null> {
    if (this.state === "filled" && this.action) {
      const action = this.action;
      this.action = null;
      this.state = "closed";
      return Promise.resolve(action);
    }
    if (this.state !== "armed" || signal?.aborted) {
      this.state = "closed";
      return Promise.resolve(null);
    }

    return new Promise<ActionData | null>((resolve) => {
      const onAbort = () => finish(null);
      const timer = setTimeout(() => finish(null), timeoutMs);

      const finish = (action: ActionData | null) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.waiter = null;
        this.state = "closed";
        resolve(action);
      };

      this.waiter = finish;
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private release(action: ActionData | null): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(action);
  }
}
