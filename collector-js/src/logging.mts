// 日志模块（采集端）
// 与服务端同一套 winston 配置；LOG_SILENT=true 时静默
import winston from "winston";

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.LOG_SILENT === "true",
  defaultMeta: { service: "flowlens-collector" },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ],
});

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
