import { config as loadEnv } from "dotenv";
import type { Config } from "drizzle-kit";

// Same env files as the runtime configuration.
loadEnv({ path: ".env.local" });
loadEnv({ path: ".env" });

const DATABASE_URL = process.env.DATABASE_URL;
if (!DATABASE_URL) {
  throw new Error("Missing DATABASE_URL for drizzle-kit (company directory migrations).");
}

export default {
  schema: "./src/lib/db/schema.ts",
  out: "./drizzle",
  dialect: "postgresql",
  tablesFilter: ["companies"],
  strict: true,
  dbCredentials: {
    url: DATABASE_URL,
  },
} satisfies Config;
