import { describe, expect, it } from "vitest";
import { MemorySessionBackend, MemorySessionTable } from "../src";

const START = Date.UTC(2024, 5, 1, 0, 0, 0);

function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 10));
}

describe("MemorySessionBackend", () => {
  it("stamps last_activity from the table clock on save", async () => {
    const table = new MemorySessionTable(() => START);
    const backend = new MemorySessionBackend(table);

    await backend.save("sid-1", "a=1");

    expect(table.get("sid-1")).toEqual({ data: "a=1", lastActivity: START });
  });

  it("keeps a row exactly at the expiry threshold and collects older ones", async () => {
    let now = START;
    const table = new MemorySessionTable(() => now);
    const backend = new MemorySessionBackend(table);

    await backend.save("sid-stale", "old");
    now = START + 1000;
    await backend.save("sid-edge", "edge");
    now = START + 1000 + 1800 * 1000;

    await expect(backend.select("sid-edge", 1800)).resolves.toBe("edge");
    await expect(backend.select("sid-stale", 1800)).resolves.toBeNull();

    await expect(backend.gc(1800)).resolves.toBe(true);
    expect(table.ids()).toEqual(["sid-edge"]);
  });

  it("treats deleting a missing row as success", async () => {
    await expect(new MemorySessionBackend().delete("sid-none")).resolves.toBe(true);
  });

  it("makes a save on a locked row wait for the holder's commit", async () => {
    const table = new MemorySessionTable();
    const holder = new MemorySessionBackend(table);
    const writer = new MemorySessionBackend(table);
    await holder.save("sid-locked", "v=1");

    await holder.beginTransaction();
    await holder.select("sid-locked", 60);
    expect(table.isLocked("sid-locked")).toBe(true);

    let saved = false;
    const pending = writer.save("sid-locked", "v=writer").then((ok) => {
      saved = ok;
    });

    await settle();
    expect(saved).toBe(false);
    expect(table.get("sid-locked")?.data).toBe("v=1");

    await holder.commit();
    await pending;

    expect(saved).toBe(true);
    expect(table.get("sid-locked")?.data).toBe("v=writer");
  });

  it("does not block saves on other ids", async () => {
    const table = new MemorySessionTable();
    const holder = new MemorySessionBackend(table);
    await holder.beginTransaction();
    await holder.select("sid-a", 60);

    await expect(new MemorySessionBackend(table).save("sid-b", "b")).resolves.toBe(true);
    await holder.commit();
  });

  it("restores rows touched inside a rolled back transaction", async () => {
    const table = new MemorySessionTable();
    const backend = new MemorySessionBackend(table);
    await backend.save("sid-keep", "before");

    await backend.beginTransaction();
    await backend.save("sid-keep", "after");
    await backend.save("sid-new", "fresh");
    await backend.delete("sid-keep");
    await expect(backend.rollback()).resolves.toBe(true);

    expect(table.get("sid-keep")?.data).toBe("before");
    expect(table.get("sid-new")).toBeUndefined();
    expect(table.isLocked("sid-keep")).toBe(false);
  });

  it("reports transaction state and refuses nested transactions", async () => {
    const backend = new MemorySessionBackend();

    await expect(backend.commit()).resolves.toBe(false);
    await expect(backend.beginTransaction()).resolves.toBe(true);
    await expect(backend.beginTransaction()).resolves.toBe(false);
    expect(backend.inTransaction()).toBe(true);
    await expect(backend.commit()).resolves.toBe(true);
    expect(backend.inTransaction()).toBe(false);
  });

  it("rejects identifier lengths below 256", () => {
    expect(() => new MemorySessionBackend(new MemorySessionTable(), { sessionIdLength: 128 })).toThrow(
      "Session ID length cannot be less than 256.",
    );
    expect(new MemorySessionBackend(new MemorySessionTable(), { sessionIdLength: 512 }).sessionIdLength()).toBe(512);
  });
});
