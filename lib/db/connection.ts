import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";

let dbInstance: PostgresJsDatabase | null = null;
let clientInstance: ReturnType<typeof postgres> | null = null;

/**
 * Drizzle client for the congress store. The first call opens the pool
 * (explicit URL, else POSTGRES_URL); later calls return the same client.
 */
export function getDb(url?: string): PostgresJsDatabase {
  if (!dbInstance) {
    const dbUrl = url ?? process.env.POSTGRES_URL;
    if (!dbUrl) {
      throw new Error("POSTGRES_URL environment variable is required");
    }
    clientInstance = postgres(dbUrl, { max: 4 });
    dbInstance = drizzle(clientInstance);
  }
  return dbInstance;
}

// Ends the pool; the importer calls this before exiting
export async function closeDb(): Promise<void> {
  if (clientInstance) {
    await clientInstance.end();
    clientInstance = null;
    dbInstance = null;
  }
}
