import { existsSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DocumentDirectory, createDocument, getElementById, getElementByRimoId } from "./directory.js";
import { WdomDocument } from "./document.js";
import { resetOptions, setOptions } from "./options.js";

describe("DocumentDirectory", () => {
  const created: WdomDocument[] = [];

  beforeEach(() => {
    setOptions({ debug: false, autoreload: false, logLevel: "INFO", messageWait: 0.005 });
  });

  afterEach(() => {
    for (const document of created.splice(0)) {
      document.dispose();
    }
    resetOptions();
  });

  it("creates the root document on first access", () => {
    const directory = new DocumentDirectory();
    const root = directory.getDocument();
    created.push(root);

    expect(directory.getDocument()).toBe(root);
    expect(root.title).toBe("W-DOM");
  });

  it("replaces the root document without disposing the previous one", () => {
    const directory = new DocumentDirectory();
    const previous = directory.getDocument();
    const next = directory.createDocument({ title: "Next" });
    created.push(previous, next);

    directory.setDocument(next);

    expect(directory.getDocument()).toBe(next);
    expect(previous.disposed).toBe(false);
    expect(existsSync(previous.tempdir)).toBe(true);
  });

  it("mounts the application as the first child of the body", () => {
    const directory = new DocumentDirectory();
    const root = directory.getDocument();
    created.push(root);
    const app = root.createElement("div", { attrs: { id: "app" } });

    directory.mountApplication(app);

    expect(root.body.firstElementChild).toBe(app);
    expect(root.body.children).toHaveLength(2);
    expect(root.getElementById("app")).toBe(app);
  });

  it("shares one registry between its documents", () => {
    const directory = new DocumentDirectory();
    const first = directory.createDocument();
    const second = directory.createDocument();
    created.push(first, second);

    expect(first.html.getAttribute("rimo_id")).toBe("1");
    expect(second.html.getAttribute("rimo_id")).not.toBe("1");
    expect(directory.getElementByRimoId("1")).toBe(first.html);
  });

  it("builds documents through a custom factory", () => {
    const titles: Array<string | undefined> = [];
    const directory = new DocumentDirectory({
      factory: (config, registry) => {
        titles.push(config.title);
        return new WdomDocument({ ...config, title: `[${config.title ?? ""}]` }, registry);
      }
    });

    const document = directory.createDocument({ title: "custom" });
    created.push(document);

    expect(titles).toEqual(["custom"]);
    expect(document.title).toBe("[custom]");
    expect(document.head.lastElementChild?.getAttribute("src")).toBe("_static/js/rimo/rimo.js");
  });

  it("resolves ids globally through the default directory", () => {
    const document = createDocument();
    created.push(document);
    const element = document.createElement("section", { attrs: { id: "global-section" } });
    document.appendTo(document.body, element);

    expect(getElementById("global-section")).toBe(element);
    expect(getElementByRimoId(element.getAttribute("rimo_id") ?? "")).toBe(element);
  });
});
