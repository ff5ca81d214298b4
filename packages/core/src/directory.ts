import { WdomDocument } from "./document.js";
import { IdentityRegistry } from "./identity-registry.js";
import type { DocumentConfig } from "./types.js";
import { createLogger } from "./utils/logging.js";

export type DocumentFactory = (config: DocumentConfig, registry: IdentityRegistry) => WdomDocument;

export type DocumentDirectoryOptions = {
  registry?: IdentityRegistry;
  factory?: DocumentFactory;
};

const logger = createLogger("document");

const defaultFactory: DocumentFactory = (config, registry) => new WdomDocument(config, registry);

/**
 * Owns the identity registry shared by a set of documents and the slot holding the
 * current root document.
 */
export class DocumentDirectory {
  readonly registry: IdentityRegistry;
  private readonly factory: DocumentFactory;
  private root: WdomDocument | null = null;

  constructor(options: DocumentDirectoryOptions = {}) {
    this.registry = options.registry ?? new IdentityRegistry();
    this.factory = options.factory ?? defaultFactory;
  }

  createDocument(config: DocumentConfig = {}): WdomDocument {
    const document = this.factory({ includeRuntime: true, ...config }, this.registry);
    document.refreshBootstrap();
    logger.debug("created document", { title: document.title, tempdir: document.tempdir });
    return document;
  }

  /** Current root document; a default one is created on first access. */
  getDocument(): WdomDocument {
    if (!this.root) {
      this.root = this.createDocument();
    }
    return this.root;
  }

  // The previous document is not disposed; whoever created it owns it.
  setDocument(document: WdomDocument): void {
    this.root = document;
  }

  mountApplication(app: Element): void {
    const document = this.getDocument();
    document.prependTo(document.body, app);
  }

  getElementById(id: string | number): Element | null {
    return this.registry.resolve("id", id);
  }

  getElementByRimoId(id: string | number): Element | null {
    return this.registry.resolve("rimo_id", id);
  }
}

export const directory = new DocumentDirectory();

export function createDocument(config: DocumentConfig = {}): WdomDocument {
  return directory.createDocument(config);
}

export function getDocument(): WdomDocument {
  return directory.getDocument();
}

export function setDocument(document: WdomDocument): void {
  directory.setDocument(document);
}

export function mountApplication(app: Element): void {
  directory.mountApplication(app);
}

export function getElementById(id: string | number): Element | null {
  return directory.getElementById(id);
}

export function getElementByRimoId(id: string | number): Element | null {
  return directory.getElementByRimoId(id);
}
