import { Pool, type PoolConfig } from "pg";
import { env } from "../../config/env";
import { InMemoryArenaStore } from "./__mocks__/inMemoryArenaStore";
import { ArenaRepository, type ArenaStore } from "./repository";

export type RepoType = "inmem" | "pg";

export function createStoreFromEnv(): {
  store: ArenaStore;
  close?: () => Promise<void>;
} {
  const repoType: RepoType = env.ARENA_REPO === "pg" ? "pg" : "inmem";

  if (repoType === "pg") {
    const pool = new Pool(getPgConfigFromEnv());
    return {
      store: new ArenaRepository(pool),
      close: () => pool.end(),
    };
  }

  return { store: new InMemoryArenaStore() };
}

function getPgConfigFromEnv(): PoolConfig {
  if (env.DATABASE_URL) {
    return {
      connectionString: env.DATABASE_URL,
      max: 10,
    };
  }

  const { PGHOST, PGPORT, PGUSER, PGPASSWORD, PGDATABASE } = process.env;
  if (!PGHOST || !PGPORT || !PGUSER || !PGPASSWORD || !PGDATABASE) {
    const missing = Object.entries({ PGHOST, PGPORT, PGUSER, PGPASSWORD, PGDATABASE })
      .filter(([, v]) => !v)
      .map(([k]) => k);
    throw new Error(`Missing Postgres env vars for ARENA_REPO=pg. Missing: ${missing.join(", ")}`);
  }

  const host = PGHOST === "localhost" ? "127.0.0.1" : PGHOST;
  const port = Number(PGPORT);
  if (!Number.isFinite(port)) {
    throw new Error(`Invalid PGPORT: "${PGPORT}"`);
  }

  return { host, port, user: PGUSER, password: PGPASSWORD, database: PGDATABASE, max: 10 };
}
