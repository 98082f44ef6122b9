// 存储适配器工厂：按 DB_TYPE 选择方言
import type { DatabaseConfig } from "../config/env.mjs";
import type { CheckpointAdapter } from "./base.mjs";
import { MySqlCheckpointAdapter } from "./mysql.mjs";
import { PostgresCheckpointAdapter } from "./postgres.mjs";
import { SqliteCheckpointAdapter } from "./sqlite.mjs";

export function createCheckpointAdapter(config: DatabaseConfig): CheckpointAdapter {
  switch (config.type) {
    case "postgresql":
      return new PostgresCheckpointAdapter({
        connectionString: config.url ?? "",
        maxConnections: config.maxConnections,
      });
    case "mysql":
      return new MySqlCheckpointAdapter({
        connectionString: config.url ?? "",
        maxConnections: config.maxConnections,
      });
    case "sqlite":
      return new SqliteCheckpointAdapter({ path: config.sqlitePath });
  }
}

export { CheckpointAdapter } from "./base.mjs";
export type * from "./types.mjs";
