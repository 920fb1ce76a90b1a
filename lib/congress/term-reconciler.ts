/**
 * Subject-term taxonomy reconciliation.
 *
 * Taxonomy files are two-level trees:
 *
 *   <liv>
 *     <top-term value="Agriculture and Food">
 *       <term value="Agricultural trade"/>
 *     </top-term>
 *   </liv>
 *
 * A pass walks every file of the covered schemes, reuses terms that already
 * exist under the same (scheme, normalized name), creates the rest, and then
 * deletes every term of a covered scheme that no file mentioned.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import {
  AttributeMapper,
  AttributeSchema,
  asTrimmedString,
} from "./attribute-mapper";
import { TAXONOMY_FILES, TERM_TYPES, type TermType } from "./constants";
import { congressLogger, type Logger } from "./debug";
import {
  DuplicateTermError,
  MalformedDocumentError,
  MappingError,
} from "./errors";
import { normalizeTermName, termKey } from "./reference-cache";
import type { CongressStore } from "./store";
import type { Term } from "./types";
import { childElements, parseXmlDocument, type XmlElement } from "./xml";

export type TaxonomySource = {
  path: string;
  termType: TermType;
};

export type TermReconcileResult = {
  created: number;
  reused: number;
  deleted: number;
  duplicates: number;
  skipped: number;
};

type TermFields = { name: string };

export const termMapper = new AttributeMapper<TermFields>(
  AttributeSchema.for<TermFields>().required("value", "name", asTrimmedString)
);

/**
 * Taxonomy files under dataDir, old scheme first.
 */
export function taxonomySources(
  dataDir: string,
  termTypes: readonly TermType[] = TERM_TYPES
): TaxonomySource[] {
  return TERM_TYPES.filter((termType) => termTypes.includes(termType)).flatMap(
    (termType) =>
      TAXONOMY_FILES[termType].map((file) => ({
        path: join(dataDir, file),
        termType,
      }))
  );
}

type PassState = {
  index: Map<string, Term>;
  seen: Set<string>;
  topTermIds: Set<string>;
  // Subterms whose parent was settled earlier in this pass
  parented: Set<string>;
  result: TermReconcileResult;
};

export class TermReconciler {
  private readonly store: CongressStore;
  private readonly log: Logger;
  private readonly readFile: (path: string) => string;

  constructor(deps: {
    store: CongressStore;
    logger?: Logger;
    readFile?: (path: string) => string;
  }) {
    this.store = deps.store;
    this.log = deps.logger ?? congressLogger("terms");
    this.readFile = deps.readFile ?? ((path) => readFileSync(path, "utf-8"));
  }

  /**
   * Run one taxonomy pass over the given files.
   *
   * @throws MalformedDocumentError if a taxonomy file is not well-formed
   */
  async reconcile(
    sources: readonly TaxonomySource[]
  ): Promise<TermReconcileResult> {
    const coveredTypes = TERM_TYPES.filter((termType) =>
      sources.some((source) => source.termType === termType)
    );

    const state: PassState = {
      index: new Map(),
      seen: new Set(),
      topTermIds: new Set(),
      parented: new Set(),
      result: { created: 0, reused: 0, deleted: 0, duplicates: 0, skipped: 0 },
    };

    // Terms are few enough to hold the whole covered set in memory
    for (const term of await this.store.listTerms(coveredTypes)) {
      state.index.set(termKey(term.termType, term.name), term);
    }

    for (const termType of coveredTypes) {
      this.log.info("Processing %s bill terms", termType);
      for (const source of sources) {
        if (source.termType === termType) {
          await this.processFile(source, state);
        }
      }
    }

    const stale = [...state.index.values()].filter(
      (term) => !state.seen.has(term.id)
    );
    for (const term of stale) {
      this.log.debug("Deleted %s (%s)", term.name, term.termType);
    }
    if (stale.length > 0) {
      state.result.deleted = await this.store.deleteTerms(
        stale.map((term) => term.id)
      );
    }

    return state.result;
  }

  private async processFile(
    source: TaxonomySource,
    state: PassState
  ): Promise<void> {
    const root = parseXmlDocument(this.readFile(source.path), source.path);
    if (root.name !== "liv") {
      throw new MalformedDocumentError(
        source.path,
        `expected <liv> root, found <${root.name}>`
      );
    }

    for (const topNode of childElements(root, "top-term")) {
      const topTerm = await this.processTopTerm(topNode, source.termType, state);
      if (!topTerm) {
        continue;
      }
      for (const subNode of childElements(topNode, "term")) {
        await this.processSubterm(subNode, topTerm, source.termType, state);
      }
    }
  }

  private async processTopTerm(
    node: XmlElement,
    termType: TermType,
    state: PassState
  ): Promise<Term | null> {
    const name = this.mapName(node, state);
    if (name === null) {
      return null;
    }

    const existing = state.index.get(termKey(termType, name));
    if (existing) {
      // No other attributes to update on an existing term
      if (existing.parentId !== null) {
        await this.store.setTermParent(existing.id, null);
        existing.parentId = null;
      }
      this.markSeen(existing, state);
      state.topTermIds.add(existing.id);
      state.result.reused++;
      return existing;
    }

    const created = await this.create(node, name, termType, null, state);
    if (created) {
      state.topTermIds.add(created.id);
    }
    return created;
  }

  private async processSubterm(
    node: XmlElement,
    parent: Term,
    termType: TermType,
    state: PassState
  ): Promise<void> {
    const name = this.mapName(node, state);
    if (name === null) {
      return;
    }

    const existing = state.index.get(termKey(termType, name));
    if (existing) {
      // A subterm belongs to the first top term that lists it in a pass
      const claimable =
        !state.topTermIds.has(existing.id) && !state.parented.has(existing.id);
      if (claimable && existing.parentId !== parent.id) {
        await this.store.setTermParent(existing.id, parent.id);
        existing.parentId = parent.id;
      }
      state.parented.add(existing.id);
      this.markSeen(existing, state);
      state.result.reused++;
      return;
    }

    const created = await this.create(node, name, termType, parent.id, state);
    if (created) {
      state.parented.add(created.id);
    }
  }

  private async create(
    node: XmlElement,
    name: string,
    termType: TermType,
    parentId: string | null,
    state: PassState
  ): Promise<Term | null> {
    try {
      const term = await this.store.insertTerm({
        name,
        nameNormalized: normalizeTermName(name),
        termType,
        parentId,
      });
      this.log.debug("Created %s (%s)", term.name, term.termType);
      state.index.set(termKey(termType, name), term);
      this.markSeen(term, state);
      state.result.created++;
      return term;
    } catch (error) {
      if (error instanceof DuplicateTermError) {
        this.log.error("Duplicated term %s", termMapper.describe(node));
        state.result.duplicates++;
        return null;
      }
      throw error;
    }
  }

  private mapName(node: XmlElement, state: PassState): string | null {
    try {
      return termMapper.process({ name: "" }, node).name;
    } catch (error) {
      if (error instanceof MappingError) {
        this.log.error("Skipping term: %s", error.message);
        state.result.skipped++;
        return null;
      }
      throw error;
    }
  }

  private markSeen(term: Term, state: PassState): void {
    state.seen.add(term.id);
  }
}
