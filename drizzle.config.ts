import "dotenv/config";
import { defineConfig } from "drizzle-kit";
import { resolveConnectionString } from "./src/db/client";

const url = resolveConnectionString();

if (!url) {
  throw new Error(
    "Missing database connection string. Set POSTGRES_URL_NON_POOLING, POSTGRES_URL, or DATABASE_URL."
  );
}

// Ledger tables only; budgets are keyed by the opaque user id.
export default defineConfig({
  dialect: "postgresql",
  schema: "./drizzle/schema.ts",
  out: "./drizzle/migrations",
  tablesFilter: ["budgets", "budget_months", "ledger_transactions"],
  dbCredentials: {
    url,
  },
  strict: true,
  verbose: true,
});
