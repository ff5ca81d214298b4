export type IdentityNamespace = "id" | "rimo_id";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface WdomError {
  type: "resource" | "request";
  message: string;
  detail?: Record<string, unknown> & {
    path?: string;
    method?: string;
    status?: number;
  };
  timestamp: number;
}

export interface WdomLogEntry {
  type: "debug" | "info" | "warn" | "error";
  scope: string;
  message: string;
  detail?: Record<string, unknown>;
  timestamp: number;
}

/**
 * Values handed to the client runtime through the bootstrap scripts.
 * Anything left undefined is either omitted or taken from the process-wide options.
 */
export type BootstrapConfig = {
  autoreload?: boolean;
  reloadWait?: number;
  logLevel?: string | number;
  logPrefix?: string;
  logConsole?: boolean;
  wsUrl?: string;
  messageWait?: number;
  includeRuntime?: boolean;
};

export type ResolvedBootstrapConfig = {
  autoreload: boolean;
  reloadWait?: number;
  logLevel?: string | number;
  logPrefix?: string;
  logConsole: boolean;
  wsUrl?: string;
  messageWait?: number;
  includeRuntime: boolean;
};

export type ElementInitializer = (element: Element) => void;

export type CustomElementDefinition = {
  name: string;
  extends?: string;
  init?: ElementInitializer;
};

export type DocumentConfig = BootstrapConfig & {
  doctype?: string;
  title?: string;
  charset?: string;
  defaultElement?: ElementInitializer;
};

export type CreateElementOptions = {
  is?: string;
  attrs?: Record<string, string>;
};
