import "dotenv/config";
import Fastify from "fastify";
import { env, getMaskedDatabaseLogInfo } from "./config/env";
import { rootLogger } from "./config/logger";
import { arenaRoutes } from "./arena/http/routes";
import { createArenaService } from "./arena/service/createArenaService";

async function buildServer() {
  const app = Fastify({ logger: rootLogger });

  app.get("/health", async () => ({ ok: true }));

  if (env.ARENA_REPO === "pg") {
    const dbInfo = getMaskedDatabaseLogInfo(env.DATABASE_URL);
    app.log.info(
      `Arena DB connectionString=${dbInfo.connectionString} (db=${dbInfo.db} host=${dbInfo.host} port=${dbInfo.port} user=${dbInfo.user})`
    );
  }

  const arena = createArenaService({ logger: rootLogger });
  await arena.players.seedBuiltins();

  await app.register(arenaRoutes, { arena });

  app.addHook("onClose", async () => {
    arena.lobby.close();
    await arena.sessions.shutdown();
    if (arena.close) await arena.close();
  });

  return app;
}

async function main() {
  const app = await buildServer();
  const port = env.PORT;

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info(`received ${signal}, shutting down`);
      app.close().then(
        () => process.exit(0),
        (err) => {
          app.log.error(err);
          process.exit(1);
        }
      );
    });
  }

  await app.listen({ port, host: env.HOST });
  app.log.info(`listening on http://${env.HOST}:${port}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
