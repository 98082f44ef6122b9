// 事件摄取的内容类型校正
// sendBeacon 之类的上报通道以 text/plain 发送事件 JSON，裸字节上报则不带类型；两者都按 application/json 交给校验器
import type { MiddlewareHandler } from "hono";

const BODY_METHODS = new Set(["POST", "PUT", "PATCH"]);

export const ensureContentType = (): MiddlewareHandler => {
  return async (c, next) => {
    const contentType = c.req.header("content-type");
    if (BODY_METHODS.has(c.req.method) && (contentType === undefined || contentType.startsWith("text/plain"))) {
      c.req.raw.headers.set("content-type", "application/json");
    }
    await next();
  };
};
