export type {
  BootstrapConfig,
  CreateElementOptions,
  CustomElementDefinition,
  DocumentConfig,
  ElementInitializer,
  IdentityNamespace,
  LogLevel,
  ResolvedBootstrapConfig,
  WdomError,
  WdomLogEntry
} from "./types.js";
export type { BootstrapScripts } from "./bootstrap.js";
export type { DocumentDirectoryOptions, DocumentFactory } from "./directory.js";
export type { WdomOptions } from "./options.js";
export type { Skeleton, SkeletonOptions } from "./tree-builder.js";
export type { Theme, ThemeTarget } from "./theme.js";
export type { Logger } from "./utils/logging.js";

export { BootstrapInjector, RUNTIME_LIBRARY_SRC, composeBootstrap, resolveBootstrapConfig } from "./bootstrap.js";
export {
  DocumentDirectory,
  createDocument,
  directory,
  getDocument,
  getElementById,
  getElementByRimoId,
  mountApplication,
  setDocument
} from "./directory.js";
export { DEFAULT_CHARSET, DEFAULT_DOCTYPE, DEFAULT_TITLE, WdomDocument } from "./document.js";
export { EphemeralDirectory } from "./ephemeral-directory.js";
export { InvalidThemeError, createWdomError, describeError } from "./errors.js";
export { CORRELATION_ATTRIBUTE, IdentityRegistry } from "./identity-registry.js";
export { getOptions, loadOptions, resetOptions, setOptions } from "./options.js";
export { buildDocument, escapeHtml, serializeNode } from "./serializer.js";
export { registerTheme } from "./theme.js";
export { buildSkeleton } from "./tree-builder.js";
export { createLogger, levelValue, onLog } from "./utils/logging.js";
export { CustomElementRegistry, Window } from "./window.js";
