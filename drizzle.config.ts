import { config } from "dotenv";
import { defineConfig } from "drizzle-kit";

config({
  path: ".env.local",
});

export default defineConfig({
  schema: ["./lib/db/congress/schema.ts"],
  out: "./lib/db/migrations",
  dialect: "postgresql",
  schemaFilter: ["congress"],
  dbCredentials: {
    url: process.env.POSTGRES_URL ?? "",
  },
});
