import { beforeEach, describe, expect, it, vi } from "vitest";
import { FakeSheet } from "../testing";
import type { ShareRecord } from "../types";
import { ROW_HEADER, toRow } from "./rows";
import { SheetRecordStore } from "./sheets";

const record = (share_id: string, innovation = 50): ShareRecord => ({
  timestamp: "2026-07-04T09:30:00.000Z",
  share_id,
  nickname: "Alex",
  inputs: { innovation: "i", collaboration: "c", leadership: "l", tech_acumen: "t" },
  result: {
    scores: { innovation, collaboration: 40, leadership: 30, tech_acumen: 20 },
    analysis: "analysis",
    golden_sentence: "slogan",
  },
});

describe("SheetRecordStore", () => {
  let sheet: FakeSheet;
  let store: SheetRecordStore;

  beforeEach(() => {
    sheet = new FakeSheet();
    store = new SheetRecordStore(sheet);
  });

  it("finds an appended record by share id", async () => {
    sheet.rows.push([...ROW_HEADER]);
    await store.append(record("aaa"));
    await store.append(record("bbb", 77));

    const found = await store.findByShareId("bbb");
    expect(found).toEqual({ ok: true, value: record("bbb", 77) });
  });

  it("only appends rows", async () => {
    await store.append(record("aaa"));
    await store.append(record("aaa", 10));
    expect(sheet.rows).toEqual([toRow(record("aaa")), toRow(record("aaa", 10))]);
  });

  it("returns null for an unknown id", async () => {
    await store.append(record("aaa"));
    expect(await store.findByShareId("zzz")).toEqual({ ok: true, value: null });
  });

  it("does not match the header row", async () => {
    sheet.rows.push([...ROW_HEADER]);
    expect(await store.findByShareId("share_id")).toEqual({ ok: true, value: null });
  });

  it("reports gateway failures as persistence errors", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    sheet.fail = new Error("403 PERMISSION_DENIED");

    const appended = await store.append(record("aaa"));
    const read = await store.findByShareId("aaa");

    expect(appended).toMatchObject({ ok: false, error: { kind: "persistence", cause: "403 PERMISSION_DENIED" } });
    expect(read).toMatchObject({ ok: false, error: { kind: "persistence" } });
  });
});
