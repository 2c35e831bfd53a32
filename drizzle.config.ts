import "dotenv/config";
import { defineConfig } from "drizzle-kit";

const databaseUrl = process.env.DATABASE_URL;
if (!databaseUrl) {
  console.warn(
    "DATABASE_URL is not set. Database tasks may fail until the variable is configured.",
  );
}

export default defineConfig({
  out: "./migrations",
  schema: "./shared/schema.ts",
  dialect: "postgresql",
  tablesFilter: ["promotions"],
  strict: true,
  dbCredentials: {
    url: databaseUrl ?? "",
  },
});
