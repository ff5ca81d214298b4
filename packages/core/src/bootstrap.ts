import { getOptions, type WdomOptions } from "./options.js";
import type { BootstrapConfig, ResolvedBootstrapConfig } from "./types.js";

export const RUNTIME_LIBRARY_SRC = "_static/js/rimo/rimo.js";

export type BootstrapScripts = {
  autoreload: string;
  logging: string | null;
  transport: string | null;
  runtime: boolean;
};

type SlotName = "logging" | "transport" | "runtime";

const SLOT_ORDER: SlotName[] = ["logging", "transport", "runtime"];

export function resolveBootstrapConfig(
  config: BootstrapConfig,
  options: WdomOptions = getOptions()
): ResolvedBootstrapConfig {
  return {
    autoreload: config.autoreload ?? (options.autoreload || options.debug),
    reloadWait: config.reloadWait,
    logLevel: config.logLevel ?? options.logLevel,
    logPrefix: config.logPrefix,
    logConsole: config.logConsole ?? false,
    wsUrl: config.wsUrl ?? options.wsUrl,
    messageWait: config.messageWait ?? options.messageWait,
    includeRuntime: config.includeRuntime ?? false
  };
}

export function composeBootstrap(config: ResolvedBootstrapConfig): BootstrapScripts {
  const autoreload: string[] = [];
  if (config.autoreload) {
    autoreload.push("var RIMO_AUTORELOAD = true");
    if (config.reloadWait != null) {
      autoreload.push(`var RIMO_RELOAD_WAIT = ${config.reloadWait}`);
    }
  }

  const logging: string[] = [];
  const hasLogging =
    config.messageWait != null || config.logLevel != null || Boolean(config.logPrefix) || config.logConsole;
  if (hasLogging) {
    logging.push(`var RIMO_MESSAGE_WAIT = ${config.messageWait ?? 0}`);
    if (typeof config.logLevel === "string") {
      logging.push(`var RIMO_LOG_LEVEL = ${toScriptString(config.logLevel)}`);
    } else if (typeof config.logLevel === "number") {
      logging.push(`var RIMO_LOG_LEVEL = ${config.logLevel}`);
    }
    if (config.logPrefix) {
      logging.push(`var RIMO_LOG_PREFIX = ${toScriptString(config.logPrefix)}`);
    }
    if (config.logConsole) {
      logging.push("var RIMO_LOG_CONSOLE = true");
    }
  }

  return {
    autoreload: wrapLines(autoreload),
    logging: logging.length > 0 ? wrapLines(logging) : null,
    transport: config.wsUrl ? wrapLines([`var RIMO_WS_URL = ${toScriptString(config.wsUrl)}`]) : null,
    runtime: config.includeRuntime
  };
}

/**
 * Keeps the runtime configuration scripts of one document's head up to date.
 *
 * The autoreload script is a fixed skeleton element; the logging, transport and
 * runtime-library scripts are created on demand, kept in that order, updated in place
 * on later refreshes and removed again once their configuration disappears.
 */
export class BootstrapInjector {
  private readonly slots: Record<SlotName, Element | null> = {
    logging: null,
    transport: null,
    runtime: null
  };

  constructor(
    private readonly head: Element,
    private readonly autoreloadScript: Element,
    private readonly createScript: () => Element
  ) {}

  refresh(config: ResolvedBootstrapConfig): void {
    const scripts = composeBootstrap(config);
    this.autoreloadScript.textContent = scripts.autoreload;
    this.fill("logging", scripts.logging, (script, content) => {
      script.textContent = content;
    });
    this.fill("transport", scripts.transport, (script, content) => {
      script.textContent = content;
    });
    this.fill("runtime", scripts.runtime ? RUNTIME_LIBRARY_SRC : null, (script, src) => {
      script.setAttribute("src", src);
    });
  }

  scripts(): Element[] {
    const result: Element[] = [];
    for (const name of SLOT_ORDER) {
      const script = this.slots[name];
      if (script) {
        result.push(script);
      }
    }
    return result;
  }

  private fill(name: SlotName, value: string | null, apply: (script: Element, value: string) => void): void {
    const existing = this.slots[name];
    if (value == null) {
      if (existing) {
        existing.remove();
        this.slots[name] = null;
      }
      return;
    }
    if (existing && existing.parentNode === this.head) {
      apply(existing, value);
      return;
    }
    const script = this.createScript();
    apply(script, value);
    const following = this.followingSlot(name);
    if (following) {
      this.head.insertBefore(script, following);
    } else {
      this.head.append(script);
    }
    this.slots[name] = script;
  }

  private followingSlot(name: SlotName): Element | null {
    for (const later of SLOT_ORDER.slice(SLOT_ORDER.indexOf(name) + 1)) {
      const script = this.slots[later];
      if (script && script.parentNode === this.head) {
        return script;
      }
    }
    return null;
  }
}

function wrapLines(lines: string[]): string {
  return lines.length > 0 ? `\n${lines.join("\n")}\n` : "";
}

function toScriptString(value: string): string {
  return JSON.stringify(value).replace(/</g, "\\u003c");
}
