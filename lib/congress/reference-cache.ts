/**
 * In-memory caches for reference data looked up once per bill.
 *
 * People and subject terms are small tables compared with the number of bill
 * documents, so each cache loads its whole table on first use and serves
 * every later lookup from memory. Caches are built once per run and passed
 * to the components that need them; they are not refreshed mid-run, so the
 * taxonomy pass must finish before the first bill lookup.
 */

import { type TermType, termTypeForCongress } from "./constants";
import { type ReferenceKind, ReferenceNotFoundError } from "./errors";
import type { CongressStore } from "./store";
import type { Person, Term } from "./types";

const WHITESPACE_RUN_REGEX = /\s{2,}/g;

/**
 * Collapse runs of whitespace to a single space and lowercase.
 * "Foreign  Trade\tand   Tariffs" → "foreign trade and tariffs"
 */
export function normalizeTermName(name: string): string {
  return name.replace(WHITESPACE_RUN_REGEX, " ").toLowerCase();
}

export function termKey(termType: TermType, name: string): string {
  return `${termType}|${normalizeTermName(name)}`;
}

export class ReferenceCache<V> {
  private entries: Map<string, V> | null = null;
  private loading: Promise<Map<string, V>> | null = null;
  private readonly kind: ReferenceKind;
  private readonly load: () => Promise<V[]>;
  private readonly keyOf: (value: V) => string;

  constructor(options: {
    kind: ReferenceKind;
    load: () => Promise<V[]>;
    keyOf: (value: V) => string;
  }) {
    this.kind = options.kind;
    this.load = options.load;
    this.keyOf = options.keyOf;
  }

  get isPopulated(): boolean {
    return this.entries !== null;
  }

  get size(): number {
    return this.entries?.size ?? 0;
  }

  /**
   * Load the full table. Later calls are no-ops.
   */
  async populate(): Promise<void> {
    if (this.entries) {
      return;
    }
    if (!this.loading) {
      this.loading = this.load().then((values) => {
        const entries = new Map<string, V>();
        for (const value of values) {
          entries.set(this.keyOf(value), value);
        }
        return entries;
      });
    }
    try {
      this.entries = await this.loading;
    } finally {
      this.loading = null;
    }
  }

  async find(key: string): Promise<V | undefined> {
    await this.populate();
    return this.entries?.get(key);
  }

  /**
   * @throws ReferenceNotFoundError when key is not cached
   */
  async get(key: string): Promise<V> {
    const value = await this.find(key);
    if (value === undefined) {
      throw new ReferenceNotFoundError(this.kind, key);
    }
    return value;
  }
}

export class PersonCache {
  private readonly cache: ReferenceCache<Person>;

  constructor(store: Pick<CongressStore, "listPeople">) {
    this.cache = new ReferenceCache<Person>({
      kind: "person",
      load: () => store.listPeople(),
      keyOf: (person) => String(person.id),
    });
  }

  populate(): Promise<void> {
    return this.cache.populate();
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Look up a person by numeric identifier ("400001" or 400001).
   * Non-numeric identifiers never match.
   */
  find(id: string | number): Promise<Person | undefined> {
    return this.cache.find(personKey(id));
  }

  get(id: string | number): Promise<Person> {
    return this.cache.get(personKey(id));
  }
}

function personKey(id: string | number): string {
  if (typeof id === "number") {
    return String(id);
  }
  const trimmed = id.trim();
  return /^\d+$/.test(trimmed) ? String(Number.parseInt(trimmed, 10)) : trimmed;
}

export class TermCache {
  private readonly cache: ReferenceCache<Term>;

  constructor(store: Pick<CongressStore, "listTerms">) {
    this.cache = new ReferenceCache<Term>({
      kind: "term",
      load: () => store.listTerms(),
      keyOf: (term) => termKey(term.termType, term.name),
    });
  }

  populate(): Promise<void> {
    return this.cache.populate();
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Find a subject term by name in the scheme used by the given congress.
   */
  find(name: string, congress: number): Promise<Term | undefined> {
    return this.cache.find(termKey(termTypeForCongress(congress), name));
  }

  get(name: string, congress: number): Promise<Term> {
    return this.cache.get(termKey(termTypeForCongress(congress), name));
  }
}
