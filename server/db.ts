import * as schema from "@shared/schema";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { config } from "./config";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

// Postgres only when DATABASE_URL is set. Without it the app runs on the
// in-memory storage seeded from server/data.
export const pool: pg.Pool | null = config.DATABASE_URL
  ? new Pool({
      connectionString: config.DATABASE_URL,
      ssl: config.NODE_ENV === "production" ? { rejectUnauthorized: false } : false,
    })
  : null;

export const db: Database | null = pool ? drizzle(pool, { schema }) : null;
