import { parseHTML } from "linkedom";

export type SkeletonOptions = {
  doctype: string;
  title: string;
  charset: string;
};

export type Skeleton = {
  dom: Document;
  html: HTMLElement;
  head: HTMLHeadElement;
  body: HTMLBodyElement;
  charsetElement: HTMLMetaElement;
  titleElement: HTMLTitleElement;
  autoreloadScript: HTMLScriptElement;
  bodyScript: HTMLScriptElement;
};

/**
 * Lays out the fixed skeleton every document starts with:
 *
 * ```html
 * <!DOCTYPE html>
 * <html>
 *   <head><meta charset><title></title><script></script></head>
 *   <body><script></script></body>
 * </html>
 * ```
 *
 * `identify` sees each skeleton element once, in document order.
 */
export function buildSkeleton(options: SkeletonOptions, identify: (element: Element) => void = () => {}): Skeleton {
  const { document } = parseHTML(`<!DOCTYPE ${options.doctype}><html></html>`);
  const dom: Document = document;
  const html = dom.documentElement;
  if (!html || html.tagName.toLowerCase() !== "html" || html.childNodes.length > 0) {
    throw new Error("[wdom] unexpected document skeleton.");
  }

  const head = dom.createElement("head");
  const charsetElement = dom.createElement("meta");
  const titleElement = dom.createElement("title");
  const autoreloadScript = dom.createElement("script");
  const body = dom.createElement("body");
  const bodyScript = dom.createElement("script");
  for (const element of [html, head, charsetElement, titleElement, autoreloadScript, body, bodyScript]) {
    identify(element);
  }

  charsetElement.setAttribute("charset", options.charset);
  titleElement.textContent = options.title;
  head.append(charsetElement, titleElement, autoreloadScript);
  body.append(bodyScript);
  html.append(head, body);

  return {
    dom,
    html,
    head,
    body,
    charsetElement,
    titleElement,
    autoreloadScript,
    bodyScript
  };
}
