import type { CustomElementDefinition } from "./types.js";

export class CustomElementRegistry {
  private readonly definitions = new Map<string, CustomElementDefinition>();

  define(definition: CustomElementDefinition): void {
    this.definitions.set(definitionKey(definition.name, definition.extends), definition);
  }

  get(name: string, extendsTag?: string): CustomElementDefinition | undefined {
    return this.definitions.get(definitionKey(name, extendsTag));
  }

  has(name: string, extendsTag?: string): boolean {
    return this.definitions.has(definitionKey(name, extendsTag));
  }
}

/** The document's view: holds what a browser keeps on `window`. */
export class Window {
  readonly customElements = new CustomElementRegistry();
}

function definitionKey(name: string, extendsTag?: string): string {
  const normalized = name.toLowerCase();
  return extendsTag ? `${normalized}|${extendsTag.toLowerCase()}` : normalized;
}
