export type WdomOptions = {
  debug: boolean;
  autoreload: boolean;
  logLevel: string | number;
  messageWait: number;
  wsUrl?: string;
  host: string;
  port: number;
  staticDir?: string;
};

const DEFAULT_OPTIONS: WdomOptions = {
  debug: false,
  autoreload: false,
  logLevel: "INFO",
  messageWait: 0.005,
  host: "localhost",
  port: 8888
};

let current: WdomOptions | null = null;

export function loadOptions(env: NodeJS.ProcessEnv = process.env): WdomOptions {
  return {
    debug: parseFlag(env.WDOM_DEBUG) ?? DEFAULT_OPTIONS.debug,
    autoreload: parseFlag(env.WDOM_AUTORELOAD) ?? DEFAULT_OPTIONS.autoreload,
    logLevel: parseLogLevel(env.WDOM_LOG_LEVEL) ?? DEFAULT_OPTIONS.logLevel,
    messageWait: parseNumber(env.WDOM_MESSAGE_WAIT) ?? DEFAULT_OPTIONS.messageWait,
    wsUrl: env.WDOM_WS_URL || undefined,
    host: env.WDOM_HOST || DEFAULT_OPTIONS.host,
    port: parseNumber(env.WDOM_PORT) ?? DEFAULT_OPTIONS.port,
    staticDir: env.WDOM_STATIC_DIR || undefined
  };
}

export function getOptions(): WdomOptions {
  if (!current) {
    current = loadOptions();
  }
  return current;
}

export function setOptions(patch: Partial<WdomOptions>): WdomOptions {
  current = { ...getOptions(), ...patch };
  return current;
}

export function resetOptions(): void {
  current = null;
}

function parseFlag(value: string | undefined): boolean | null {
  if (value == null || value === "") {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
    return false;
  }
  return null;
}

function parseNumber(value: string | undefined): number | null {
  if (value == null || value.trim() === "") {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

// Numeric levels follow the 10/20/30/40 convention; everything else stays a name.
function parseLogLevel(value: string | undefined): string | number | null {
  if (value == null || value.trim() === "") {
    return null;
  }
  const numeric = parseNumber(value);
  return numeric ?? value.trim().toUpperCase();
}
