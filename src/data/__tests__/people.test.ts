// src/data/__tests__/people.test.ts

import { openDatabase, DatabaseHandle } from "../../db";
import { PeopleStore } from "../people";

describe("PeopleStore", () => {
  let handle: DatabaseHandle;
  let store: PeopleStore;

  beforeEach(() => {
    handle = openDatabase(":memory:");
    store = new PeopleStore(handle.db);
  });

  afterEach(() => {
    handle.close();
  });

  const seed = () => {
    store.add({ name: "Alice Moreno", age: 28, profession: "Designer" });
    store.add({ name: "Bob Okafor", age: 42, profession: "Engineer" });
    store.add({ name: "Chen Wei", age: 30, profession: "Data Engineer" });
  };

  describe("add", () => {
    it("should insert a row and report success", () => {
      expect(
        store.add({ name: "Alice Moreno", age: 28, profession: "Designer" }),
      ).toBe(true);
      expect(store.query()).toEqual([
        { id: 1, name: "Alice Moreno", age: 28, profession: "Designer" },
      ]);
    });

    it("should reject blank fields and out-of-range ages without inserting", () => {
      expect(store.add({ name: "", age: 200, profession: " " })).toBe(false);
      expect(store.add({ name: "Dana Reyes", age: 35.5, profession: "Chef" })).toBe(false);
      expect(store.add({ name: "Dana Reyes", age: -1, profession: "Chef" })).toBe(false);
      expect(store.count()).toBe(0);
    });

    it("should store trimmed names and professions", () => {
      store.add({ name: "  Dana Reyes ", age: 35, profession: " Chef " });
      expect(store.query()).toEqual([
        { id: 1, name: "Dana Reyes", age: 35, profession: "Chef" },
      ]);
    });

    it("should return false instead of throwing when the insert fails", () => {
      handle.close();
      expect(
        store.add({ name: "Alice Moreno", age: 28, profession: "Designer" }),
      ).toBe(false);
      // reopen so afterEach can close again
      handle = openDatabase(":memory:");
    });
  });

  describe("query", () => {
    beforeEach(seed);

    it("should return every row in storage order by default", () => {
      expect(store.query().map((p) => p.name)).toEqual([
        "Alice Moreno",
        "Bob Okafor",
        "Chen Wei",
      ]);
    });

    it("should filter by inclusive age bounds", () => {
      expect(store.query({ minAge: 31 }).map((p) => p.name)).toEqual([
        "Bob Okafor",
      ]);
      expect(store.query({ minAge: 28, maxAge: 30 }).map((p) => p.id)).toEqual(
        [1, 3],
      );
    });

    it("should match name and profession case-insensitively", () => {
      expect(store.query({ name: "BOB" }).map((p) => p.id)).toEqual([2]);
      expect(store.query({ profession: "engineer" }).map((p) => p.id)).toEqual(
        [2, 3],
      );
    });

    it("should treat wildcard characters in filters literally", () => {
      expect(store.query({ name: "%" })).toEqual([]);
    });

    it("should apply the limit after ordering", () => {
      expect(store.query({ limit: 2 }).map((p) => p.id)).toEqual([1, 2]);
    });

    it("should return an empty list for an invalid filter", () => {
      expect(store.query({ limit: 0 })).toEqual([]);
      expect(store.query({ minAge: 30.5 })).toEqual([]);
      expect(store.query({ name: "  " })).toEqual([]);
    });

    it("should return an empty list when the read fails", () => {
      handle.close();
      expect(store.query()).toEqual([]);
      handle = openDatabase(":memory:");
    });
  });

  describe("count", () => {
    it("should count rows", () => {
      expect(store.count()).toBe(0);
      seed();
      expect(store.count()).toBe(3);
    });
  });
});
