import type { WdomError } from "./types.js";

export function createWdomError(type: WdomError["type"], message: string, detail?: WdomError["detail"]): WdomError {
  return {
    type,
    message,
    detail,
    timestamp: Date.now()
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class InvalidThemeError extends Error {
  constructor(message = "[wdom] theme must provide stylesheets, scripts, headers or customElements.") {
    super(message);
    this.name = "InvalidThemeError";
  }
}
