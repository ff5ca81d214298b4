import type { IdentityNamespace } from "./types.js";

type Binding = {
  namespace: IdentityNamespace;
  id: string;
  ref: WeakRef<Element>;
};

export const CORRELATION_ATTRIBUTE = "rimo_id";

/**
 * Process-wide lookup from identity strings to the element currently holding them.
 *
 * Bindings are weak: registering an element never keeps it alive, and a binding whose
 * element was collected resolves to `null`. A later registration under the same key
 * replaces the earlier one, across documents too; use {@link resolveForOwner} to scope
 * a lookup to one document tree.
 *
 * Public ids follow the element's `id` attribute: a binding whose element no longer
 * carries the key is dropped on lookup.
 */
export class IdentityRegistry {
  private readonly bindings: Record<IdentityNamespace, Map<string, WeakRef<Element>>> = {
    id: new Map(),
    rimo_id: new Map()
  };

  private readonly lastKeys: Record<IdentityNamespace, WeakMap<Element, string>> = {
    id: new WeakMap(),
    rimo_id: new WeakMap()
  };

  private readonly reaper = new FinalizationRegistry<Binding>((binding) => {
    const map = this.bindings[binding.namespace];
    // only drop the entry if nobody re-registered the key in the meantime
    if (map.get(binding.id) === binding.ref) {
      map.delete(binding.id);
    }
  });

  private lastCorrelationId = 0;

  register(namespace: IdentityNamespace, id: string | number, element: Element): void {
    const key = String(id);
    const map = this.bindings[namespace];
    const previousKey = this.lastKeys[namespace].get(element);
    if (previousKey !== undefined && previousKey !== key && map.get(previousKey)?.deref() === element) {
      map.delete(previousKey);
    }
    this.lastKeys[namespace].set(element, key);
    if (map.get(key)?.deref() === element) {
      return;
    }
    const ref = new WeakRef(element);
    map.set(key, ref);
    this.reaper.register(element, { namespace, id: key, ref });
  }

  resolve(namespace: IdentityNamespace, id: string | number): Element | null {
    const key = String(id);
    const map = this.bindings[namespace];
    const element = map.get(key)?.deref() ?? null;
    if (element && namespace === "id" && element.getAttribute("id") !== key) {
      map.delete(key);
      return null;
    }
    return element;
  }

  /**
   * Resolves `id` only when the bound element sits in `owner`'s tree. Public ids that
   * were never registered, such as ids set after a plain DOM insert, are looked up in
   * the tree and registered on the way.
   */
  resolveForOwner(namespace: IdentityNamespace, id: string | number, owner: Document): Element | null {
    const key = String(id);
    const element = this.resolve(namespace, key);
    if (element) {
      return rootOf(element) === owner ? element : null;
    }
    if (namespace !== "id") {
      return null;
    }
    const found = owner.getElementById(key);
    if (found) {
      this.register("id", key, found);
    }
    return found;
  }

  /** Registers every element of the subtree that carries an `id` or a correlation id. */
  registerTree(root: Element): void {
    const id = root.getAttribute("id");
    if (id) {
      this.register("id", id, root);
    }
    const correlationId = root.getAttribute(CORRELATION_ATTRIBUTE);
    if (correlationId) {
      this.register("rimo_id", correlationId, root);
    }
    for (const child of Array.from(root.children)) {
      this.registerTree(child);
    }
  }

  nextCorrelationId(): string {
    this.lastCorrelationId += 1;
    return String(this.lastCorrelationId);
  }

  size(namespace: IdentityNamespace): number {
    return this.bindings[namespace].size;
  }
}

// ownerDocument is fixed at creation; the tree an element sits in is found by walking up
function rootOf(node: Node): Node {
  let current = node;
  while (current.parentNode) {
    current = current.parentNode;
  }
  return current;
}
