import { describe, expect, it } from "vitest";
import { FALLBACK_ANALYSIS } from "../parser";
import type { ShareRecord } from "../types";
import { fromRow, isHeaderRow, ROW_HEADER, toRow } from "./rows";

const record: ShareRecord = {
  timestamp: "2026-07-04T09:30:00.000Z",
  share_id: "a1b2c3d4e5f6",
  nickname: "Alex",
  inputs: {
    innovation: "Built a new caching layer",
    collaboration: "Led standup",
    leadership: "Reassigned tasks",
    tech_acumen: "Excited about agents",
  },
  result: {
    scores: { innovation: 90, collaboration: 75, leadership: 60, tech_acumen: 85 },
    analysis: "动手能力强。",
    golden_sentence: "让想法跑起来",
  },
};

describe("row codec", () => {
  it("writes columns in header order", () => {
    expect(toRow(record)).toEqual([
      "2026-07-04T09:30:00.000Z",
      "a1b2c3d4e5f6",
      "Alex",
      "Built a new caching layer",
      "Led standup",
      "Reassigned tasks",
      "Excited about agents",
      "90",
      "75",
      "60",
      "85",
      "动手能力强。",
      "让想法跑起来",
    ]);
    expect(toRow(record)).toHaveLength(ROW_HEADER.length);
  });

  it("reads a row back into the same record", () => {
    expect(fromRow(toRow(record))).toEqual(record);
  });

  it("tolerates short rows and numeric cells", () => {
    const r = fromRow(["t", "id", "", "a", "b", "c", "d", 12, "x"]);
    expect(r.result.scores).toEqual({ innovation: 12, collaboration: 0, leadership: 0, tech_acumen: 0 });
    expect(r.result.analysis).toBe(FALLBACK_ANALYSIS);
  });

  it("recognises the header row", () => {
    expect(isHeaderRow([...ROW_HEADER])).toBe(true);
    expect(isHeaderRow(toRow(record))).toBe(false);
  });
});
