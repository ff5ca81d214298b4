import { existsSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DocumentDirectory } from "./directory.js";
import type { WdomDocument } from "./document.js";
import { InvalidThemeError } from "./errors.js";
import { resetOptions, setOptions } from "./options.js";
import type { DocumentConfig, WdomLogEntry } from "./types.js";
import { onLog } from "./utils/logging.js";

describe("WdomDocument", () => {
  let directory: DocumentDirectory;
  const created: WdomDocument[] = [];

  const create = (config: DocumentConfig = {}): WdomDocument => {
    const document = directory.createDocument(config);
    created.push(document);
    return document;
  };

  beforeEach(() => {
    setOptions({ debug: false, autoreload: false, logLevel: "INFO", messageWait: 0.005 });
    directory = new DocumentDirectory();
  });

  afterEach(() => {
    for (const document of created.splice(0)) {
      document.dispose();
    }
    resetOptions();
  });

  it("serializes doctype, head and body in order", () => {
    const document = create({ title: "Hello", charset: "utf-8" });
    const html = document.build();

    expect(html).toMatch(
      /^<!DOCTYPE html><html[^>]*><head[^>]*><meta[^>]*charset="utf-8"[^>]*><title[^>]*>Hello<\/title>.*<\/head><body[^>]*>.*<\/body><\/html>$/s
    );
  });

  it("builds identical output when nothing changed", () => {
    const document = create({ autoreload: true, reloadWait: 1 });
    expect(document.build()).toBe(document.build());
  });

  it("keeps the head layout stable across builds", () => {
    const document = create();
    document.build();
    document.build();

    expect(Array.from(document.head.children, (child) => child.localName)).toEqual([
      "meta",
      "title",
      "script",
      "script",
      "script"
    ]);
    expect(document.head.lastElementChild?.getAttribute("src")).toBe("_static/js/rimo/rimo.js");
  });

  it("emits autoreload declarations when enabled", () => {
    const document = create({ autoreload: true, reloadWait: 2.5 });
    const html = document.build();

    expect(html).toContain("var RIMO_AUTORELOAD = true");
    expect(html).toContain("var RIMO_RELOAD_WAIT = 2.5");
  });

  it("leaves the autoreload placeholder empty when disabled", () => {
    const document = create({ autoreload: false, reloadWait: 2.5 });
    const html = document.build();

    expect(html).not.toContain("RIMO_AUTORELOAD");
    expect(html).toMatch(/<title[^>]*>W-DOM<\/title><script[^>]*><\/script>/);
  });

  it("follows the process debug flag when autoreload is unset", () => {
    const document = create();
    expect(document.build()).not.toContain("RIMO_AUTORELOAD");

    setOptions({ debug: true });
    expect(document.build()).toContain("var RIMO_AUTORELOAD = true");
  });

  it("omits the runtime library when not requested", () => {
    const document = create({ includeRuntime: false });
    document.build();
    expect(document.head.querySelector("script[src]")).toBeNull();
  });

  it("updates title and charset", () => {
    const document = create();
    expect(document.title).toBe("W-DOM");
    expect(document.charset).toBe("utf-8");

    document.title = "Renamed";
    document.charset = "euc-jp";

    expect(document.title).toBe("Renamed");
    expect(document.characterSet).toBe("euc-jp");
    expect(document.build()).toMatch(/<meta[^>]*charset="euc-jp"[^>]*><title[^>]*>Renamed<\/title>/);
  });

  describe("identity lookups", () => {
    it("does not resolve ids held by another document", () => {
      const owner = create();
      const other = create();
      const element = owner.createElement("div", { attrs: { id: "shared" } });
      owner.appendTo(owner.body, element);

      expect(owner.getElementById("shared")).toBe(element);
      expect(other.getElementById("shared")).toBeNull();
      expect(directory.registry.resolve("id", "shared")).toBe(element);
    });

    it("lets a later document shadow an id", () => {
      const first = create();
      const second = create();
      const original = first.createElement("div", { attrs: { id: "dup" } });
      const shadow = second.createElement("div", { attrs: { id: "dup" } });
      first.appendTo(first.body, original);
      second.appendTo(second.body, shadow);

      expect(directory.registry.resolve("id", "dup")).toBe(shadow);
      expect(first.getElementById("dup")).toBeNull();
      expect(second.getElementById("dup")).toBe(shadow);
      expect(original.getAttribute("id")).toBe("dup");
    });

    it("resolves elements by correlation id", () => {
      const document = create();
      const element = document.createElement("span");
      document.appendTo(document.body, element);
      const correlationId = element.getAttribute("rimo_id");

      expect(correlationId).not.toBeNull();
      expect(document.getElementByRimoId(correlationId ?? "")).toBe(element);
      expect(document.getElementByRimoId(document.body.getAttribute("rimo_id") ?? "")).toBe(document.body);
    });

    it("registers ids assigned before the element is attached", () => {
      const document = create();
      const element = document.createElement("p");
      element.setAttribute("id", "late");

      expect(document.getElementById("late")).toBeNull();
      document.appendTo(document.body, element);
      expect(document.getElementById("late")).toBe(element);
    });

    it("does not resolve an element that is not in the document tree", () => {
      const document = create();
      const element = document.createElement("span", { attrs: { id: "loose" } });

      expect(document.getElementById("loose")).toBeNull();
      expect(document.getElementByRimoId(element.getAttribute("rimo_id") ?? "")).toBeNull();
    });

    it("resolves an element for the document it was moved into", () => {
      const origin = create();
      const target = create();
      const element = origin.createElement("div", { attrs: { id: "travel" } });
      origin.appendTo(origin.body, element);

      target.appendTo(target.body, element);

      expect(target.getElementById("travel")).toBe(element);
      expect(origin.getElementById("travel")).toBeNull();
    });

    it("follows id attribute changes", () => {
      const document = create();
      const element = document.createElement("div", { attrs: { id: "first" } });
      document.appendTo(document.body, element);

      element.setAttribute("id", "second");

      expect(document.getElementById("first")).toBeNull();
      expect(document.getElementById("second")).toBe(element);
    });

    it("finds ids of elements appended with plain DOM calls", () => {
      const document = create();
      const element = document.createElement("p");
      element.setAttribute("id", "direct");
      document.body.append(element);

      expect(document.getElementById("direct")).toBe(element);
    });

    it("registers the children of an attached fragment", () => {
      const document = create();
      const fragment = document.createDocumentFragment();
      const child = document.createElement("li");
      child.setAttribute("id", "fragment-child");
      fragment.append(child);

      document.prependTo(document.body, fragment);

      expect(document.getElementById("fragment-child")).toBe(child);
      expect(document.body.firstElementChild).toBe(child);
    });
  });

  describe("createElement", () => {
    it("applies a registered custom element definition", () => {
      const document = create();
      document.defineCustomElement({ name: "x-card", init: (element) => element.setAttribute("data-card", "yes") });

      const element = document.createElement("x-card");

      expect(element.getAttribute("data-card")).toBe("yes");
    });

    it("replaces a custom element definition and logs the replacement", () => {
      const document = create();
      const entries: WdomLogEntry[] = [];
      const unsubscribe = onLog((entry) => entries.push(entry));
      document.defineCustomElement({ name: "x-note", init: (element) => element.setAttribute("data-version", "1") });
      document.defineCustomElement({ name: "x-note", init: (element) => element.setAttribute("data-version", "2") });
      unsubscribe();

      expect(document.createElement("x-note").getAttribute("data-version")).toBe("2");
      const replaced = entries.filter((entry) => entry.message === "replacing custom element definition");
      expect(replaced).toHaveLength(1);
      expect(replaced[0].detail).toEqual({ name: "x-note", extends: undefined });
    });

    it("applies customized built-in definitions through is", () => {
      const document = create();
      document.defineCustomElement({
        name: "fancy-button",
        extends: "button",
        init: (element) => element.setAttribute("data-fancy", "1")
      });

      const element = document.createElement("button", { is: "fancy-button" });

      expect(element.localName).toBe("button");
      expect(element.getAttribute("is")).toBe("fancy-button");
      expect(element.getAttribute("data-fancy")).toBe("1");
    });

    it("falls back to the default element initializer", () => {
      const document = create({ defaultElement: (element) => element.setAttribute("data-default", "true") });

      expect(document.createElement("div").getAttribute("data-default")).toBe("true");
    });
  });

  describe("resources", () => {
    it("adds scripts, stylesheets and raw headers", () => {
      const document = create();
      document.addJsFile("app.js");
      document.addCssFile("app.css");
      document.addHeader('<meta name="viewport" content="width=device-width">');

      expect(document.body.lastElementChild?.getAttribute("src")).toBe("app.js");
      const link = document.head.querySelector("link");
      expect(link?.getAttribute("rel")).toBe("stylesheet");
      expect(link?.getAttribute("href")).toBe("app.css");
      expect(document.head.lastElementChild?.getAttribute("name")).toBe("viewport");
    });

    it("rejects a theme without resources", () => {
      const document = create();
      expect(() => document.registerTheme({})).toThrow(InvalidThemeError);
    });

    it("appends exactly the theme stylesheets in order", () => {
      const document = create();
      const before = Array.from(document.head.children);

      document.registerTheme({ stylesheets: ["base.css", "theme.css"] });

      const after = Array.from(document.head.children);
      expect(after.slice(0, before.length)).toEqual(before);
      const added = after.slice(before.length);
      expect(added.map((element) => element.localName)).toEqual(["link", "link"]);
      expect(added.map((element) => element.getAttribute("href"))).toEqual(["base.css", "theme.css"]);
      expect(document.body.children).toHaveLength(1);
    });

    it("registers theme scripts, headers and custom elements", () => {
      const document = create();
      document.registerTheme({
        scripts: ["theme.js"],
        headers: ["<style>body { margin: 0; }</style>"],
        customElements: [{ name: "theme-box", init: (element) => element.setAttribute("data-theme", "box") }]
      });

      const children = Array.from(document.head.children);
      const script = children[children.length - 2];
      expect(script.getAttribute("src")).toBe("theme.js");
      expect(children[children.length - 1].localName).toBe("style");
      expect(document.createElement("theme-box").getAttribute("data-theme")).toBe("box");
    });

    it("removes the temporary directory on dispose", () => {
      const document = create();
      const path = document.tempdir;
      expect(existsSync(path)).toBe(true);

      document.dispose();

      expect(existsSync(path)).toBe(false);
      expect(document.disposed).toBe(true);
    });

    it("gives every document its own temporary directory", () => {
      const first = create();
      const second = create();
      expect(first.tempdir).not.toBe(second.tempdir);
    });
  });
});
