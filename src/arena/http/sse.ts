import type { ServerResponse } from "node:http";

export function sseFrame(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function openSseStream(raw: ServerResponse): void {
  raw.writeHead(200, {
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    Connection: "keep-alive",
    "X-Accel-Buffering": "no",
  });
}

/**
 * Writes unless the client already went away. Returns false when the socket
 * buffer is full and the caller should wait for `drain`.
 */
export function writeFrame(raw: ServerResponse, event: string, data: unknown): boolean {
  if (raw.writableEnded || raw.destroyed) return true;
  return raw.write(sseFrame(event, data));
}

/** Resolves on `drain`, on client disconnect, or when `until` settles. */
export function waitForDrain(raw: ServerResponse, until: Promise<void>): Promise<void> {
  if (raw.destroyed || !raw.writableNeedDrain) return Promise.resolve();
  return new Promise<void>((resolve) => {
    const done = () => {
      raw.off("drain", done);
      raw.off("close", done);
      resolve();
    };
    raw.once("drain", done);
    raw.once("close", done);
    void until.then(done);
  });
}
