const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const COMMENT_NODE = 8;
const DOCUMENT_TYPE_NODE = 10;

export type Buildable = {
  readonly dom: Document;
  refreshBootstrap(): void;
};

export function buildDocument(document: Buildable): string {
  document.refreshBootstrap();
  const { doctype, childNodes } = document.dom;
  let output = doctype ? serializeNode(doctype) : "";
  for (const node of Array.from(childNodes)) {
    if (!isDocumentType(node)) {
      output += serializeNode(node);
    }
  }
  return output;
}

export function serializeNode(node: Node): string {
  if (isElement(node)) {
    return node.outerHTML;
  }
  if (isDocumentType(node)) {
    return `<!DOCTYPE ${node.name}>`;
  }
  if (node.nodeType === TEXT_NODE) {
    return escapeHtml(node.textContent ?? "");
  }
  if (node.nodeType === COMMENT_NODE) {
    return `<!--${node.textContent ?? ""}-->`;
  }
  return "";
}

const HTML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;"
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ENTITIES[char] ?? char);
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isDocumentType(node: Node): node is DocumentType {
  return node.nodeType === DOCUMENT_TYPE_NODE;
}
