import { InvalidThemeError } from "./errors.js";
import type { CustomElementDefinition } from "./types.js";

/** Resources a theme contributes; at least one of them must be present. */
export interface Theme {
  stylesheets?: readonly string[];
  scripts?: readonly string[];
  headers?: readonly string[];
  customElements?: readonly CustomElementDefinition[];
}

export type ThemeTarget = {
  addCssFile(href: string): void;
  addJsFileHead(src: string): void;
  addHeader(header: string): void;
  defineCustomElement(definition: CustomElementDefinition): void;
};

export function registerTheme(target: ThemeTarget, theme: Theme): void {
  if (
    theme.stylesheets === undefined &&
    theme.scripts === undefined &&
    theme.headers === undefined &&
    theme.customElements === undefined
  ) {
    throw new InvalidThemeError();
  }
  for (const href of theme.stylesheets ?? []) {
    target.addCssFile(href);
  }
  for (const src of theme.scripts ?? []) {
    target.addJsFileHead(src);
  }
  for (const header of theme.headers ?? []) {
    target.addHeader(header);
  }
  for (const definition of theme.customElements ?? []) {
    target.defineCustomElement(definition);
  }
}
