import { z } from "zod";
import { resolveConnectionString } from "./db/client";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  AUTH_SECRET: z.string().min(1).default("dev-secret"),
  LEDGER_ENFORCEMENT_MODE: z.enum(["reject", "warn"]).default("reject"),
  LEDGER_STORAGE: z.enum(["file", "postgres", "memory"]).default("file"),
  LEDGER_DATA_DIR: z.string().min(1).default("./data"),
});

export type StorageDriver = z.infer<typeof envSchema>["LEDGER_STORAGE"];

export interface AppConfig {
  port: number;
  authSecret: string;
  enforcementMode: z.infer<typeof envSchema>["LEDGER_ENFORCEMENT_MODE"];
  storage: StorageDriver;
  dataDir: string;
  databaseUrl: string | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const databaseUrl = resolveConnectionString(env);
  if (parsed.LEDGER_STORAGE === "postgres" && !databaseUrl) {
    throw new Error(
      "Missing database connection string. Set POSTGRES_URL_NON_POOLING, POSTGRES_URL, or DATABASE_URL."
    );
  }
  return {
    port: parsed.PORT,
    authSecret: parsed.AUTH_SECRET,
    enforcementMode: parsed.LEDGER_ENFORCEMENT_MODE,
    storage: parsed.LEDGER_STORAGE,
    dataDir: parsed.LEDGER_DATA_DIR,
    databaseUrl,
  };
}
