import { drizzle } from "drizzle-orm/postgres-js";
import { migrate } from "drizzle-orm/postgres-js/migrator";
import postgres from "postgres";
import { loadImportConfig } from "../congress/config";

const isProd = process.argv.includes("--prod");

// Journal table lives beside the congress tables, not in drizzle's default schema
const MIGRATIONS = {
  migrationsFolder: "./lib/db/migrations",
  migrationsSchema: "congress",
};

async function applyCongressMigrations(): Promise<void> {
  const { postgresUrl } = loadImportConfig({ prod: isProd });
  const connection = postgres(postgresUrl, { max: 1 });

  console.log(
    `[migrate] Applying ${MIGRATIONS.migrationsFolder} to the ${isProd ? "production" : "local"} congress schema`
  );
  const startedAt = Date.now();
  try {
    await migrate(drizzle(connection), MIGRATIONS);
  } finally {
    await connection.end();
  }
  console.log(`[migrate] Done in ${Date.now() - startedAt} ms`);
}

applyCongressMigrations()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error("[migrate] Failed:", err);
    process.exit(1);
  });
