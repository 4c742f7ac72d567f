import { describe, expect, it } from "vitest";
import { buildRadarSeries } from "./radar";

const scores = { innovation: 10, collaboration: 20, leadership: 30, tech_acumen: 40 };

describe("buildRadarSeries", () => {
  it("closes the polygon with the first dimension", () => {
    const chart = buildRadarSeries(scores, "Alex");
    expect(chart.points).toHaveLength(5);
    expect(chart.points.map((p) => p.value)).toEqual([10, 20, 30, 40, 10]);
    expect(chart.points[4]).toEqual({ key: "innovation", category: "创新指数", value: 10 });
    expect(chart.points[4]).toEqual(chart.points[0]);
    expect(chart.domain).toEqual([0, 100]);
    expect(chart.title).toBe("Alex 的 AI 潜力雷达图");
  });

  it("is deterministic", () => {
    expect(buildRadarSeries(scores, "Alex")).toEqual(buildRadarSeries(scores, "Alex"));
  });
});
