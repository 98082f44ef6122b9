// CORS 中间件封装
// 说明：CORS_ORIGINS 为空时开放所有来源；指定来源时允许携带凭据
import type { MiddlewareHandler } from "hono";
import { cors as honoCors } from "hono/cors";

export const cors = (allowOrigins: string[] = []): MiddlewareHandler => {
  if (allowOrigins.length === 0 || allowOrigins.includes("*")) {
    return honoCors({ origin: "*" });
  }

  return honoCors({
    origin: allowOrigins,
    allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
    credentials: true,
  });
};
