/**
 * Identifier of a resolved package: "type:namespace:name:version".
 *
 * Instances are interned, so identifiers with equal fields are the same object
 * and can be used directly as keys of Set and Map. The intern table only holds
 * weak references; an entry goes away once nothing else uses the identifier.
 */

export class Identifier {
  private static readonly interned = new Map<string, WeakRef<Identifier>>();

  // Runs after an identifier was collected. The key may already be taken by a
  // newer instance, so only an empty slot is removed.
  private static readonly cleanup = new FinalizationRegistry<string>((key) => {
    if (!Identifier.interned.get(key)?.deref()) {
      Identifier.interned.delete(key);
    }
  });

  static readonly EMPTY = Identifier.of("", "", "", "");

  private constructor(
    readonly type: string,
    readonly namespace: string,
    readonly name: string,
    readonly version: string,
  ) {
    Object.freeze(this);
  }

  static of(type: string, namespace: string, name: string, version: string): Identifier {
    // JSON keeps the key unambiguous when a field contains ":"
    const key = JSON.stringify([type, namespace, name, version]);
    const existing = Identifier.interned.get(key)?.deref();
    if (existing) return existing;

    const id = new Identifier(type, namespace, name, version);
    Identifier.interned.set(key, new WeakRef(id));
    Identifier.cleanup.register(id, key);
    return id;
  }

  /** Number of entries in the intern table, including not yet cleaned up ones. */
  static get internedCount(): number {
    return Identifier.interned.size;
  }

  /**
   * Parse "type:namespace:name:version". Missing components are empty; anything
   * after the third colon is part of the version.
   */
  static fromCoordinates(coordinates: string): Identifier {
    const [type = "", namespace = "", name = "", ...version] = coordinates.split(":");
    return Identifier.of(type, namespace, name, version.join(":"));
  }

  static compare(a: Identifier, b: Identifier): number {
    return compareStrings(a.type, b.type)
      || compareStrings(a.namespace, b.namespace)
      || compareStrings(a.name, b.name)
      || compareStrings(a.version, b.version);
  }

  toCoordinates(): string {
    return `${this.type}:${this.namespace}:${this.name}:${this.version}`;
  }

  toString(): string {
    return this.toCoordinates();
  }
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Return the identifiers sorted by their natural order.
 */
export function sortIdentifiers(ids: Iterable<Identifier>): Identifier[] {
  return [...ids].sort(Identifier.compare);
}
