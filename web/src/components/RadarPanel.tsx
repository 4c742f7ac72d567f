import React, { useRef, useState } from "react";
import { PolarAngleAxis, PolarGrid, PolarRadiusAxis, Radar, RadarChart, Tooltip } from "recharts";
import { chartFileName, downloadBlob, renderChartPng } from "../lib/chartImage";
import { toChartData } from "../lib/format";
import type { RadarSeries } from "../lib/types";

const COLOR = "rgba(31, 119, 180, 1)";
export const CHART_SIZE = { width: 420, height: 340 };

interface Props {
  chart: RadarSeries;
  nickname: string;
}

export default function RadarPanel({ chart, nickname }: Props) {
  const chartRef = useRef<HTMLDivElement>(null);
  const [exporting, setExporting] = useState<"idle" | "busy" | "failed">("idle");

  const download = async () => {
    const svg = chartRef.current?.querySelector("svg.recharts-surface");
    if (!(svg instanceof SVGSVGElement)) return;
    setExporting("busy");
    try {
      const blob = await renderChartPng(svg, chart.title, CHART_SIZE);
      downloadBlob(chartFileName(nickname, new Date()), blob);
      setExporting("idle");
    } catch (e) {
      console.error("chart export failed:", e);
      setExporting("failed");
    }
  };

  return (
    <figure style={{ margin: 0 }}>
      <figcaption style={{ fontSize: 20, fontWeight: 700, color: "#2c3e50", textAlign: "center" }}>
        🎯 {chart.title}
      </figcaption>
      <div ref={chartRef}>
        <RadarChart {...CHART_SIZE} data={toChartData(chart)} outerRadius={120}>
          <PolarGrid />
          <PolarAngleAxis dataKey="category" tick={{ fontSize: 14, fill: "#2c3e50" }} />
          <PolarRadiusAxis angle={90} domain={chart.domain} tick={{ fontSize: 12 }} />
          <Tooltip formatter={(value) => [`${value} / 100`, "得分"]} />
          <Radar
            dataKey="value"
            stroke={COLOR}
            strokeWidth={3}
            fill={COLOR}
            fillOpacity={0.3}
            isAnimationActive={false}
          />
        </RadarChart>
      </div>
      <button
        onClick={download}
        disabled={exporting === "busy"}
        style={{ display: "block", margin: "8px auto 0", padding: "8px 12px", border: "1px solid #ccc", borderRadius: 8 }}
      >
        {exporting === "busy" ? "正在生成图片..." : "📱 下载结果图，分享你的 AI 潜力"}
      </button>
      {exporting === "failed" && (
        <p style={{ color: "#b91c1c", fontSize: 12, textAlign: "center" }}>图片生成失败，请直接截图保存</p>
      )}
    </figure>
  );
}
