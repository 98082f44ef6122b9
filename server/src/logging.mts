// 日志模块
// winston 结构化日志 + Hono 请求日志中间件；LOG_SILENT=true 时静默（测试环境）
import winston from "winston";
import type { MiddlewareHandler } from "hono";

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.LOG_SILENT === "true",
  defaultMeta: { service: "flowlens" },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      ),
    }),
  ],
});

// 请求日志：方法、路径、状态码与耗时
export const requestLogger = (): MiddlewareHandler => {
  return async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    logger.info(`${c.req.method} ${c.req.path} - ${c.res.status} (${duration}ms)`);
  };
};
