import { defineConfig } from "drizzle-kit";

// The store is a local PGlite directory; DATABASE_DIR matches server/_core/env.ts
const dataDir = process.env.DATABASE_DIR || "./data/games-db";

console.log(`[Drizzle Config] Using PGlite database at ${dataDir}`);

export default defineConfig({
  schema: "./drizzle/schema.ts",
  out: "./drizzle",
  dialect: "postgresql",
  driver: "pglite",
  dbCredentials: {
    url: dataDir,
  },
});
