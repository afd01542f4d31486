/**
 * Database Connection
 *
 * Purpose:
 * Creates the Drizzle (Neon HTTP) client used by the Postgres checkpoint
 * store. Nothing connects at import time, so the in-memory backend runs
 * without a DATABASE_URL.
 *
 * Layer: Infrastructure
 */

import { drizzle } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";
import { ConfigurationError } from "./utils/errorHandler";

export type Database = ReturnType<typeof createDb>;

export function createDb(databaseUrl: string | undefined = process.env.DATABASE_URL) {
  if (!databaseUrl) {
    throw new ConfigurationError("DATABASE_URL is not set");
  }
  const queryClient = neon(databaseUrl);
  return drizzle(queryClient);
}
