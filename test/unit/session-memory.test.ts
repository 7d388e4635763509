import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { createSilentLogger } from "../../src/logging/logger.js";
import { FileSessionMemory } from "../../src/memory/file-store.js";
import { InMemorySessionMemory } from "../../src/memory/in-memory.js";
import { lastRounds, type ConversationTurn } from "../../src/memory/types.js";
import { makeTempDir } from "../helpers/fixtures.js";

function round(n: number): ConversationTurn[] {
  return [
    { role: "user", content: `question ${n}` },
    { role: "assistant", content: `answer ${n}` },
  ];
}

describe("lastRounds", () => {
  const turns = [...round(1), ...round(2), ...round(3)];

  it("keeps the most recent pairs", () => {
    expect(lastRounds(turns, 2)).toEqual([...round(2), ...round(3)]);
  });

  it("returns everything when there are fewer rounds", () => {
    expect(lastRounds(turns, 10)).toEqual(turns);
  });

  it("returns nothing for zero rounds", () => {
    expect(lastRounds(turns, 0)).toEqual([]);
  });
});

describe("InMemorySessionMemory", () => {
  it("keeps sessions apart", async () => {
    const memory = new InMemorySessionMemory();
    await memory.append("a", round(1));
    await memory.append("b", round(2));
    expect(await memory.getHistory("a")).toEqual(round(1));
    expect(await memory.getHistory("b")).toEqual(round(2));
    expect(await memory.getHistory("c")).toEqual([]);
  });

  it("trims to the configured rounds", async () => {
    const memory = new InMemorySessionMemory(2);
    for (const n of [1, 2, 3]) await memory.append("a", round(n));
    expect(await memory.getHistory("a")).toEqual([...round(2), ...round(3)]);
    expect(await memory.getHistory("a", 1)).toEqual(round(3));
  });

  it("clears a session", async () => {
    const memory = new InMemorySessionMemory();
    await memory.append("a", round(1));
    await memory.clear("a");
    expect(await memory.getHistory("a")).toEqual([]);
  });
});

describe("FileSessionMemory", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("ticketdesk-memory-");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("persists history across instances", async () => {
    const first = new FileSessionMemory(dir, createSilentLogger());
    await first.append("a", round(1));

    const second = new FileSessionMemory(dir, createSilentLogger());
    expect(await second.getHistory("a")).toEqual(round(1));
  });

  it("writes sessions as JSON", async () => {
    const memory = new FileSessionMemory(dir, createSilentLogger());
    await memory.append("a", round(1));
    expect(JSON.parse(readFileSync(join(dir, "memory.json"), "utf-8"))).toEqual({ a: round(1) });
  });

  it("trims stored history", async () => {
    const memory = new FileSessionMemory(dir, createSilentLogger(), 1);
    await memory.append("a", round(1));
    await memory.append("a", round(2));
    expect(await new FileSessionMemory(dir, createSilentLogger()).getHistory("a")).toEqual(round(2));
  });

  it("keeps every write when appends overlap", async () => {
    const memory = new FileSessionMemory(dir, createSilentLogger());
    await Promise.all([memory.append("a", round(1)), memory.append("b", round(2))]);
    const stored = JSON.parse(readFileSync(join(dir, "memory.json"), "utf-8"));
    expect(stored).toEqual({ a: round(1), b: round(2) });
  });

  it("keeps a first append that overlaps a first read of an existing file", async () => {
    writeFileSync(join(dir, "memory.json"), JSON.stringify({ s1: round(1) }));
    const memory = new FileSessionMemory(dir, createSilentLogger());

    const [, history] = await Promise.all([memory.append("s2", round(2)), memory.getHistory("s1")]);
    await memory.append("s1", round(3));

    expect(history).toEqual(round(1));
    expect(await memory.getHistory("s2")).toEqual(round(2));
    expect(JSON.parse(readFileSync(join(dir, "memory.json"), "utf-8"))).toEqual({
      s1: [...round(1), ...round(3)],
      s2: round(2),
    });
  });

  it("sees writes made by another instance on the same directory", async () => {
    const first = new FileSessionMemory(dir, createSilentLogger());
    const second = new FileSessionMemory(dir, createSilentLogger());
    await first.getHistory("a");

    await Promise.all([first.append("a", round(1)), second.append("b", round(2))]);

    expect(await first.getHistory("b")).toEqual(round(2));
    expect(await second.getHistory("a")).toEqual(round(1));
  });

  it("releases the lock after each operation", async () => {
    const memory = new FileSessionMemory(dir, createSilentLogger());
    await memory.append("a", round(1));
    expect(existsSync(join(dir, "memory.json.lock"))).toBe(false);
  });

  it("starts empty when the file is unreadable", async () => {
    writeFileSync(join(dir, "memory.json"), "{ not json");
    const memory = new FileSessionMemory(dir, createSilentLogger());
    expect(await memory.getHistory("a")).toEqual([]);
  });

  it("starts empty when no file exists yet", async () => {
    const memory = new FileSessionMemory(dir, createSilentLogger());
    expect(await memory.getHistory("a")).toEqual([]);
    expect(existsSync(join(dir, "memory.json"))).toBe(false);
  });

  it("clears a session on disk", async () => {
    const memory = new FileSessionMemory(dir, createSilentLogger());
    await memory.append("a", round(1));
    await memory.clear("a");
    expect(JSON.parse(readFileSync(join(dir, "memory.json"), "utf-8"))).toEqual({});
  });
});
