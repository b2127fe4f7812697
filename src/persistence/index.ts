import type { AppConfig } from "../config";
import { getDb } from "../db/client";
import { FilePersistenceGateway, type PersistenceGateway } from "./gateway";
import { InMemoryPersistenceGateway } from "./memory";
import { PostgresPersistenceGateway } from "./postgres";

export function createGateway(config: Pick<AppConfig, "storage" | "dataDir" | "databaseUrl">): PersistenceGateway {
  switch (config.storage) {
    case "postgres":
      return new PostgresPersistenceGateway(getDb(config.databaseUrl));
    case "memory":
      return new InMemoryPersistenceGateway();
    case "file":
      return new FilePersistenceGateway(config.dataDir);
  }
}
