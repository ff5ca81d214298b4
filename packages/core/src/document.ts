import { BootstrapInjector, resolveBootstrapConfig } from "./bootstrap.js";
import { EphemeralDirectory } from "./ephemeral-directory.js";
import { CORRELATION_ATTRIBUTE, IdentityRegistry } from "./identity-registry.js";
import { buildDocument } from "./serializer.js";
import { registerTheme, type Theme } from "./theme.js";
import { buildSkeleton } from "./tree-builder.js";
import { createLogger } from "./utils/logging.js";
import type {
  BootstrapConfig,
  CreateElementOptions,
  CustomElementDefinition,
  DocumentConfig,
  ElementInitializer
} from "./types.js";
import { Window } from "./window.js";

const logger = createLogger("document");

export const DEFAULT_DOCTYPE = "html";
export const DEFAULT_TITLE = "W-DOM";
export const DEFAULT_CHARSET = "utf-8";

/**
 * Server-side document.
 *
 * Prefer `createDocument()` from the directory over calling the constructor: the
 * directory shares its identity registry and performs the first bootstrap refresh.
 */
export class WdomDocument {
  readonly dom: Document;
  readonly html: HTMLElement;
  readonly head: HTMLHeadElement;
  readonly body: HTMLBodyElement;
  readonly defaultView: Window;
  readonly bootstrapConfig: Readonly<BootstrapConfig>;

  private readonly registry: IdentityRegistry;
  private readonly resource: EphemeralDirectory;
  private readonly charsetElement: HTMLMetaElement;
  private readonly titleElement: HTMLTitleElement;
  private readonly autoreloadScript: HTMLScriptElement;
  private readonly bootstrap: BootstrapInjector;
  private readonly defaultElement?: ElementInitializer;

  constructor(config: DocumentConfig = {}, registry: IdentityRegistry = new IdentityRegistry()) {
    const { doctype, title, charset, defaultElement, ...bootstrapConfig } = config;
    this.registry = registry;
    this.resource = new EphemeralDirectory(this);
    this.defaultView = new Window();
    this.defaultElement = defaultElement;
    this.bootstrapConfig = Object.freeze({ ...bootstrapConfig });

    const skeleton = buildSkeleton(
      {
        doctype: doctype ?? DEFAULT_DOCTYPE,
        title: title ?? DEFAULT_TITLE,
        charset: charset ?? DEFAULT_CHARSET
      },
      (element) => this.identify(element)
    );
    this.dom = skeleton.dom;
    this.html = skeleton.html;
    this.head = skeleton.head;
    this.body = skeleton.body;
    this.charsetElement = skeleton.charsetElement;
    this.titleElement = skeleton.titleElement;
    this.autoreloadScript = skeleton.autoreloadScript;
    this.bootstrap = new BootstrapInjector(this.head, this.autoreloadScript, () => this.createElement("script"));
  }

  get doctype(): DocumentType | null {
    return this.dom.doctype;
  }

  get tempdir(): string {
    return this.resource.path;
  }

  get disposed(): boolean {
    return this.resource.released;
  }

  get title(): string {
    return this.titleElement.textContent ?? "";
  }

  set title(value: string) {
    this.titleElement.textContent = value;
  }

  get characterSet(): string {
    return this.charsetElement.getAttribute("charset") ?? "";
  }

  set characterSet(value: string) {
    this.charsetElement.setAttribute("charset", value);
  }

  get charset(): string {
    return this.characterSet;
  }

  set charset(value: string) {
    this.characterSet = value;
  }

  /** Returns `null` when the id is unbound or held by an element of another document. */
  getElementById(id: string | number): Element | null {
    return this.registry.resolveForOwner("id", id, this.dom);
  }

  getElementByRimoId(id: string | number): Element | null {
    return this.registry.resolveForOwner("rimo_id", id, this.dom);
  }

  createElement(tag: string, options: CreateElementOptions = {}): Element {
    const definition = options.is
      ? this.defaultView.customElements.get(options.is, tag)
      : this.defaultView.customElements.get(tag);
    const element = this.dom.createElement(tag);
    this.identify(element);
    if (options.is) {
      element.setAttribute("is", options.is);
    }
    for (const [name, value] of Object.entries(options.attrs ?? {})) {
      element.setAttribute(name, value);
    }
    if (options.attrs?.id) {
      this.registry.register("id", options.attrs.id, element);
    }
    const init = definition ? definition.init : this.defaultElement;
    init?.(element);
    return element;
  }

  createTextNode(text: string): Text {
    return this.dom.createTextNode(text);
  }

  createComment(comment: string): Comment {
    return this.dom.createComment(comment);
  }

  createDocumentFragment(): DocumentFragment {
    return this.dom.createDocumentFragment();
  }

  /** Appends `nodes` to `parent` and registers the identities of every attached element. */
  appendTo(parent: Element, ...nodes: Node[]): void {
    const roots = collectElements(nodes);
    parent.append(...nodes);
    this.registerElements(roots);
  }

  prependTo(parent: Element, ...nodes: Node[]): void {
    const roots = collectElements(nodes);
    parent.prepend(...nodes);
    this.registerElements(roots);
  }

  addJsFile(src: string): void {
    this.appendTo(this.body, this.createElement("script", { attrs: { src } }));
  }

  addJsFileHead(src: string): void {
    this.appendTo(this.head, this.createElement("script", { attrs: { src } }));
  }

  addCssFile(href: string): void {
    this.appendTo(this.head, this.createElement("link", { attrs: { rel: "stylesheet", href } }));
  }

  addHeader(header: string): void {
    const template = this.dom.createElement("template");
    template.innerHTML = header;
    this.appendTo(this.head, ...Array.from(template.content.childNodes));
  }

  defineCustomElement(definition: CustomElementDefinition): void {
    const { customElements } = this.defaultView;
    if (customElements.has(definition.name, definition.extends)) {
      logger.debug("replacing custom element definition", { name: definition.name, extends: definition.extends });
    }
    customElements.define(definition);
  }

  registerTheme(theme: Theme): void {
    registerTheme(this, theme);
  }

  refreshBootstrap(): void {
    this.bootstrap.refresh(resolveBootstrapConfig(this.bootstrapConfig));
  }

  build(): string {
    return buildDocument(this);
  }

  dispose(): void {
    this.resource.dispose();
  }

  private identify(element: Element): void {
    const correlationId = this.registry.nextCorrelationId();
    element.setAttribute(CORRELATION_ATTRIBUTE, correlationId);
    this.registry.register("rimo_id", correlationId, element);
  }

  private registerElements(elements: Element[]): void {
    for (const element of elements) {
      this.registry.registerTree(element);
    }
  }
}

// fragments empty themselves on insertion, so their children are collected up front
function collectElements(nodes: Node[]): Element[] {
  const elements: Element[] = [];
  for (const node of nodes) {
    if (isElement(node)) {
      elements.push(node);
    } else if (isFragment(node)) {
      elements.push(...Array.from(node.children));
    }
  }
  return elements;
}

function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

function isFragment(node: Node): node is DocumentFragment {
  return node.nodeType === 11;
}
