import { expect, test } from "@playwright/test";
import { ReferenceNotFoundError } from "@/lib/congress/errors";
import {
  normalizeTermName,
  PersonCache,
  ReferenceCache,
  TermCache,
  termKey,
} from "@/lib/congress/reference-cache";
import type { Person, Term } from "@/lib/congress/types";
import { MemoryCongressStore } from "./memory-store";

function person(id: number, lastName: string): Person {
  return { id, firstName: "Test", lastName, roles: [] };
}

function term(id: string, name: string, termType: Term["termType"]): Term {
  return {
    id,
    name,
    nameNormalized: normalizeTermName(name),
    termType,
    parentId: null,
  };
}

test.describe("normalizeTermName", () => {
  test("collapses whitespace runs and lowercases", () => {
    expect(normalizeTermName("Foreign  Trade and   Tariffs")).toBe(
      "foreign trade and tariffs"
    );
  });

  test("termKey prefixes the scheme", () => {
    expect(termKey("new", "Agriculture  and Food")).toBe(
      "new|agriculture and food"
    );
  });
});

test.describe("ReferenceCache", () => {
  test("loads the table once for any number of lookups", async () => {
    let loads = 0;
    const cache = new ReferenceCache<Person>({
      kind: "person",
      load: async () => {
        loads++;
        return [person(400001, "Alpha"), person(400002, "Beta")];
      },
      keyOf: (p) => String(p.id),
    });

    expect(cache.isPopulated).toBe(false);
    await Promise.all([cache.populate(), cache.populate()]);
    await cache.find("400001");
    await cache.find("400002");
    await cache.find("499999");

    expect(loads).toBe(1);
    expect(cache.isPopulated).toBe(true);
    expect(cache.size).toBe(2);
  });

  test("get raises ReferenceNotFoundError for a missing key", async () => {
    const cache = new ReferenceCache<Person>({
      kind: "person",
      load: async () => [],
      keyOf: (p) => String(p.id),
    });

    await expect(cache.get("999")).rejects.toThrow(ReferenceNotFoundError);
    await expect(cache.get("999")).rejects.toThrow("Could not find person 999");
  });
});

test.describe("PersonCache", () => {
  test("finds people by numeric or string identifier", async () => {
    const store = new MemoryCongressStore();
    store.people = [person(400001, "Alpha")];
    const cache = new PersonCache(store);

    expect((await cache.find("400001"))?.lastName).toBe("Alpha");
    expect((await cache.find(400001))?.lastName).toBe("Alpha");
    expect((await cache.find(" 0400001 "))?.lastName).toBe("Alpha");
    expect(await cache.find("S000001")).toBeUndefined();
  });

  test("does not see people added after population", async () => {
    const store = new MemoryCongressStore();
    store.people = [person(400001, "Alpha")];
    const cache = new PersonCache(store);
    await cache.populate();

    store.people.push(person(400002, "Beta"));

    expect(await cache.find(400002)).toBeUndefined();
    expect(cache.size).toBe(1);
  });
});

test.describe("TermCache", () => {
  const store = new MemoryCongressStore();
  for (const t of [
    term("t-old", "Agriculture and Food", "old"),
    term("t-new", "Agriculture and food", "new"),
  ]) {
    store.terms.set(t.id, t);
  }

  test("resolves the scheme from the congress number", async () => {
    const cache = new TermCache(store);

    expect((await cache.find("Agriculture and Food", 110))?.id).toBe("t-old");
    expect((await cache.find("Agriculture and Food", 111))?.id).toBe("t-new");
  });

  test("matches names case- and spacing-insensitively", async () => {
    const cache = new TermCache(store);

    expect((await cache.find("AGRICULTURE   and FOOD", 113))?.id).toBe("t-new");
  });

  test("get raises for an unknown term", async () => {
    const cache = new TermCache(store);

    await expect(cache.get("Space policy", 113)).rejects.toThrow(
      "Could not find term new|space policy"
    );
  });
});
