// 路由测试：内存 SQLite + 可控配置
import type Database from "better-sqlite3";
import type { ServerConfig } from "../../config/env.mjs";
import { TraceServer } from "../../server.mjs";
import { SqliteCheckpointAdapter } from "../../storage/sqlite.mjs";
import { testPricing } from "../../offline/__tests__/helpers.mjs";

export function testConfig(realtime: Partial<ServerConfig["realtime"]> = {}): ServerConfig {
  return {
    port: 0,
    host: "127.0.0.1",
    database: { type: "sqlite", sqlitePath: ":memory:", maxConnections: 1 },
    corsOrigins: [],
    realtime: {
      enabled: true,
      bufferSize: 100,
      idleTtlMs: 60_000,
      subscriberQueueSize: 10,
      heartbeatIntervalMs: 60_000,
      ...realtime,
    },
  };
}

export function createTestServer(db: Database.Database, config: ServerConfig = testConfig()): TraceServer {
  return new TraceServer(config, { store: new SqliteCheckpointAdapter({ database: db }), pricing: testPricing() });
}

// 逐帧读取 SSE 响应体
export class FrameReader {
  private buffer = "";
  private readonly decoder = new TextDecoder();

  constructor(private readonly reader: ReadableStreamDefaultReader<Uint8Array>) {}

  async next(): Promise<{ event: string; id: string | null; data: unknown }> {
    while (!this.buffer.includes("\n\n")) {
      const { value, done } = await this.reader.read();
      if (done) throw new Error("stream ended");
      this.buffer += this.decoder.decode(value, { stream: true });
    }
    const end = this.buffer.indexOf("\n\n");
    const raw = this.buffer.slice(0, end);
    this.buffer = this.buffer.slice(end + 2);
    const fields = new Map<string, string>();
    for (const line of raw.split("\n")) {
      const colon = line.indexOf(": ");
      fields.set(line.slice(0, colon), line.slice(colon + 2));
    }
    const data: unknown = JSON.parse(fields.get("data") ?? "null");
    return { event: fields.get("event") ?? "", id: fields.get("id") ?? null, data };
  }

  async cancel(): Promise<void> {
    await this.reader.cancel();
  }
}
