// 错误类型
// NotFoundError -> 404；AdapterError -> 503 并向上传播；DecodeError 只在节点/通道内记录，不会变成 HTTP 错误

export class NotFoundError extends Error {
  constructor(
    readonly resource: string,
    readonly id: string
  ) {
    super(`${resource} not found: ${id}`);
    this.name = "NotFoundError";
  }
}

export class AdapterError extends Error {
  constructor(
    message: string,
    readonly dialect: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AdapterError";
  }
}

export class DecodeError extends Error {
  constructor(
    readonly encoding: string,
    readonly reason: string
  ) {
    super(`cannot decode ${encoding} payload: ${reason}`);
    this.name = "DecodeError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
