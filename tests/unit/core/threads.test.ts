import { describe, it, expect } from "vitest";
import {
  dedup,
  findThreadEmailIds,
  groupByThread,
  removeEmailsByIds,
} from "../../../src/core/threads.js";
import { createTestEmail } from "../../helpers/fixtures.js";

describe("dedup", () => {
  it("keeps the first copy of a duplicated id, not the freshest", () => {
    const first = createTestEmail("1", { subject: "first copy", timestamp: 100 });
    const later = createTestEmail("1", { subject: "relabelled", timestamp: 500 });
    const other = createTestEmail("2", { timestamp: 200 });

    const result = dedup([first, other, later]);

    expect(result.map((e) => e.id)).toEqual(["2", "1"]);
    expect(result[1]?.subject).toBe("first copy");
  });

  it("sorts newest first with zero timestamps last", () => {
    const result = dedup([
      createTestEmail("a", { timestamp: 0 }),
      createTestEmail("b", { timestamp: 300 }),
      createTestEmail("c", { timestamp: 100 }),
    ]);

    expect(result.map((e) => e.id)).toEqual(["b", "c", "a"]);
  });

  it("preserves dedup order when every timestamp is zero", () => {
    const result = dedup([
      createTestEmail("x", { timestamp: 0 }),
      createTestEmail("y", { timestamp: 0 }),
      createTestEmail("x", { timestamp: 0 }),
      createTestEmail("z", { timestamp: 0 }),
    ]);

    expect(result.map((e) => e.id)).toEqual(["x", "y", "z"]);
  });

  it("is idempotent", () => {
    const input = [
      createTestEmail("1", { timestamp: 5 }),
      createTestEmail("2", { timestamp: 9 }),
      createTestEmail("1", { timestamp: 7 }),
      createTestEmail("3", { timestamp: 5 }),
    ];

    const once = dedup(input);
    expect(dedup(once)).toEqual(once);
  });

  it("returns an empty list for empty input", () => {
    expect(dedup([])).toEqual([]);
  });

  it("keeps a record with an empty id", () => {
    const result = dedup([
      createTestEmail("", { timestamp: 10 }),
      createTestEmail("1", { timestamp: 20 }),
      createTestEmail("", { timestamp: 30 }),
    ]);

    expect(result.map((e) => [e.id, e.timestamp])).toEqual([
      ["1", 20],
      ["", 10],
    ]);
  });
});

describe("groupByThread", () => {
  it("folds a thread into one group represented by its newest member", () => {
    const older = createTestEmail("1", { threadId: "t1", timestamp: 100 });
    const newer = createTestEmail("2", { threadId: "t1", timestamp: 200 });

    const groups = groupByThread([older, newer]);

    expect(groups).toHaveLength(1);
    expect(groups[0]?.representative).toBe(newer);
    expect(groups[0]?.memberCount).toBe(2);
    expect([...(groups[0]?.memberIds ?? [])].sort()).toEqual(["1", "2"]);
  });

  it("never merges messages without a thread id", () => {
    const groups = groupByThread([
      createTestEmail("1", { threadId: "" }),
      createTestEmail("2", { threadId: "" }),
    ]);

    expect(groups.map((g) => g.key)).toEqual(["id:1", "id:2"]);
    expect(groups.every((g) => g.memberCount === 1)).toBe(true);
  });

  it("breaks representative ties by input order", () => {
    const a = createTestEmail("a", { threadId: "t", timestamp: 50 });
    const b = createTestEmail("b", { threadId: "t", timestamp: 50 });

    expect(groupByThread([a, b])[0]?.representative.id).toBe("a");
  });

  it("sorts groups by representative timestamp, newest first", () => {
    const groups = groupByThread([
      createTestEmail("1", { threadId: "old", timestamp: 10 }),
      createTestEmail("2", { threadId: "new", timestamp: 30 }),
      createTestEmail("3", { threadId: "old", timestamp: 20 }),
    ]);

    expect(groups.map((g) => g.key)).toEqual(["new", "old"]);
    expect(groups[1]?.representative.id).toBe("3");
  });

  it("accounts for every email exactly once", () => {
    const emails = [
      createTestEmail("1", { threadId: "t1", timestamp: 1 }),
      createTestEmail("2", { threadId: "t2", timestamp: 2 }),
      createTestEmail("3", { threadId: "t1", timestamp: 3 }),
      createTestEmail("4", { threadId: "", timestamp: 4 }),
      createTestEmail("5", { threadId: "t2", timestamp: 5 }),
      createTestEmail("6", { threadId: "t3", timestamp: 0 }),
    ];

    const groups = groupByThread(emails);
    const total = groups.reduce((sum, g) => sum + g.memberCount, 0);
    const ids = groups.flatMap((g) => [...g.memberIds]);

    expect(total).toBe(emails.length);
    expect(ids.sort()).toEqual(["1", "2", "3", "4", "5", "6"]);
  });
});

describe("findThreadEmailIds", () => {
  const emails = [
    createTestEmail("1", { threadId: "t1" }),
    createTestEmail("2", { threadId: "t2" }),
    createTestEmail("3", { threadId: "t1" }),
    createTestEmail("4", { threadId: "" }),
  ];

  it("returns every id in the thread", () => {
    expect(findThreadEmailIds(emails, "3")).toEqual(["1", "3"]);
  });

  it("returns just the id for a message without a thread", () => {
    expect(findThreadEmailIds(emails, "4")).toEqual(["4"]);
  });

  it("returns just the id when it is unknown", () => {
    expect(findThreadEmailIds(emails, "99")).toEqual(["99"]);
  });
});

describe("removeEmailsByIds", () => {
  it("drops matching ids and keeps order", () => {
    const emails = [createTestEmail("1"), createTestEmail("2"), createTestEmail("3")];
    expect(removeEmailsByIds(emails, ["2"]).map((e) => e.id)).toEqual(["1", "3"]);
  });
});
