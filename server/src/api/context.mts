// 请求上下文中注入的依赖
import type { ServerConfig } from "../config/env.mjs";
import type { OfflineService } from "../offline/service.mjs";
import type { RealtimeCollector } from "../realtime/collector.mjs";

export interface AppVariables {
  config: ServerConfig;
  offline: OfflineService;
  // ENABLE_REALTIME=false 时为 null
  realtime: RealtimeCollector | null;
}

export type AppEnv = { Variables: AppVariables };
