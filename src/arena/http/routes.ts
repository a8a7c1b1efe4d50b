import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { env } from "../../config/env";
import { ArenaError, BroadcastOverflowError, NotFoundError, ValidationError } from "../domain/errors";
import {
  parseActionSubmission,
  parseLobbyJoinRequest,
  parsePlayerRegistration,
  parseStartSessionRequest,
} from "../domain/validate";
import type { ArenaService } from "../service/createArenaService";
import type { Subscription } from "../service/eventBroadcaster";
import { openSseStream, waitForDrain, writeFrame } from "./sse";

type IdParams = { id: string };

function sendError(req: FastifyRequest, reply: FastifyReply, e: unknown) {
  if (e instanceof ArenaError) {
    return reply.status(e.statusCode).send({ ok: false, code: e.code, message: e.message });
  }
  req.log.error(e);
  return reply.status(500).send({ ok: false, code: "INTERNAL", message: "internal error" });
}

function optionalInt(q: Record<string, unknown>, key: string): number | undefined {
  const raw = q[key];
  if (raw == null || raw === "") return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new ValidationError(`invalid query param: ${key}`);
  return n;
}

function queryOf(req: FastifyRequest): Record<string, unknown> {
  const q = req.query;
  return typeof q === "object" && q !== null ? { ...q } : {};
}

export async function arenaRoutes(
  app: FastifyInstance,
  opts: { arena: ArenaService; heartbeatMs?: number }
) {
  const { sessions, players, lobby, bots } = opts.arena;
  const heartbeatMs = opts.heartbeatMs ?? env.SSE_HEARTBEAT_MS;

  // ---------------------------------------------------------------------------
  // Playground
  // ---------------------------------------------------------------------------

  app.post("/playground/start", async (req, reply) => {
    try {
      const body = parseStartSessionRequest(req.body);
      const session_id = await sessions.createSession(
        body.player_1_config,
        body.player_2_config,
        body.visualize
      );
      return reply.status(200).send({ ok: true, session_id });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get("/playground/active", async (req, reply) => {
    try {
      const active = sessions.listActiveInfo();
      return reply.send({ ok: true, count: active.length, sessions: active });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get<{ Params: IdParams }>("/playground/:id", async (req, reply) => {
    try {
      return reply.send({ ok: true, ...sessions.describe(req.params.id) });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.post<{ Params: IdParams }>("/playground/:id/action", async (req, reply) => {
    try {
      const sub = parseActionSubmission(req.body);
      sessions.submitAction(req.params.id, sub.player_id, sub.turn, sub.action);
      return reply.status(200).send({ ok: true, status: "accepted", turn: sub.turn });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get<{ Params: IdParams }>("/playground/:id/replay", async (req, reply) => {
    try {
      const q = queryOf(req);
      const from = optionalInt(q, "from");
      const to = optionalInt(q, "to");
      const events = sessions.getReplay(req.params.id, from, to);
      return reply.send({
        ok: true,
        session_id: req.params.id,
        from: from ?? null,
        to: to ?? null,
        count: events.length,
        events,
      });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get<{ Params: IdParams }>("/playground/:id/events", async (req, reply) => {
    let sub: Subscription;
    try {
      sub = sessions.subscribe(req.params.id);
    } catch (e) {
      return sendError(req, reply, e);
    }

    reply.hijack();
    const raw = reply.raw;
    openSseStream(raw);

    const heartbeat = setInterval(() => {
      if (raw.writableNeedDrain) return;
      writeFrame(raw, "heartbeat", { timestamp: new Date().toISOString() });
    }, heartbeatMs);
    raw.on("close", () => {
      clearInterval(heartbeat);
      sessions.unsubscribe(sub);
    });

    try {
      for await (const event of sub) {
        // Backpressure: nothing more is pulled until the socket drains.
        if (!writeFrame(raw, event.event, event)) await waitForDrain(raw, sub.closed);
      }
    } catch (e) {
      if (e instanceof BroadcastOverflowError) {
        writeFrame(raw, "error", { code: e.code, message: e.message });
        if (raw.writableNeedDrain) raw.destroy();
      } else {
        req.log.error(e);
      }
    } finally {
      clearInterval(heartbeat);
      if (!raw.writableEnded) raw.end();
    }
  });

  app.delete<{ Params: IdParams }>("/playground/:id", async (req, reply) => {
    try {
      sessions.getSession(req.params.id);
      await sessions.cleanupSession(req.params.id);
      return reply.send({ ok: true, status: "terminated", session_id: req.params.id });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  // ---------------------------------------------------------------------------
  // Players & bots
  // ---------------------------------------------------------------------------

  app.post("/players/register", async (req, reply) => {
    try {
      const player = await players.register(parsePlayerRegistration(req.body));
      return reply.status(201).send({ ok: true, player });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get("/players", async (req, reply) => {
    try {
      const q = queryOf(req);
      const builtin = q.builtin === "true" ? true : q.builtin === "false" ? false : undefined;
      const list = await players.list({ builtin });
      return reply.send({ ok: true, count: list.length, players: list });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get("/players/builtin/list", async (req, reply) => {
    try {
      const list = await players.listBuiltin();
      return reply.send({ ok: true, count: list.length, players: list });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get("/players/stats/summary", async (req, reply) => {
    try {
      return reply.send({ ok: true, ...(await players.summary()) });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get<{ Params: IdParams }>("/players/:id", async (req, reply) => {
    try {
      return reply.send({ ok: true, player: await players.get(req.params.id) });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  // ---------------------------------------------------------------------------
  // Lobby
  // ---------------------------------------------------------------------------

  app.post("/lobby/join", async (req, reply) => {
    const disconnected = new AbortController();
    reply.raw.on("close", () => disconnected.abort());
    try {
      const body = parseLobbyJoinRequest(req.body);
      const match = await lobby.join(body.player_id, body.bot_config, disconnected.signal);
      return reply.send({ ok: true, ...match });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get("/lobby/status", async (req, reply) => {
    try {
      const q = queryOf(req);
      const playerId = typeof q.player_id === "string" ? q.player_id : null;
      return reply.send({
        ok: true,
        queue_size: lobby.size(),
        position: playerId ? lobby.position(playerId) : null,
      });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.delete<{ Params: { player_id: string } }>("/lobby/leave/:player_id", async (req, reply) => {
    try {
      const { player_id } = req.params;
      if (!lobby.leave(player_id)) {
        throw new NotFoundError(`player ${player_id} is not in the lobby queue`);
      }
      return reply.send({ ok: true, status: "left", player_id });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get("/bots", async (req, reply) => {
    try {
      const list = bots.list();
      return reply.send({ ok: true, count: list.length, bots: list });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });
}
