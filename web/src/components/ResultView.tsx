import React from "react";
import { formatScore } from "../lib/format";
import { QUESTIONS } from "../lib/questions";
import type { AnalysisOutcome } from "../lib/types";
import RadarPanel from "./RadarPanel";

interface Props {
  outcome: AnalysisOutcome;
  shareUrl: string | null;
  qrUrl: string | null;
  copied: "idle" | "ok" | "ng";
  onCopyLink: () => void;
  onCopySummary: () => void;
  onRestart: () => void;
}

const h2 = { fontSize: 24, fontWeight: 700, marginBottom: 8 } as const;

export default function ResultView({ outcome, shareUrl, qrUrl, copied, onCopyLink, onCopySummary, onRestart }: Props) {
  const { result, chart, share } = outcome;
  const name = outcome.nickname || "你";

  return (
    <div style={{ marginTop: 24 }}>
      <h2 style={h2}>🎉 Hey, {name}！这是你的 AI 潜力画像：</h2>

      <div
        data-testid="golden-sentence"
        style={{
          textAlign: "center",
          fontSize: 24,
          color: "#ff6b6b",
          fontWeight: 700,
          padding: 16,
          background: "#fff3cd",
          borderRadius: 10,
          margin: "16px 0",
        }}
      >
        ✨ {result.golden_sentence} ✨
      </div>

      <div style={{ display: "flex", flexWrap: "wrap", gap: 24 }}>
        <RadarPanel chart={chart} nickname={outcome.nickname} />
        <section>
          <h3 style={{ fontSize: 20, fontWeight: 700 }}>📊 详细得分</h3>
          <ul style={{ listStyle: "none", padding: 0 }}>
            {QUESTIONS.map((q) => (
              <li key={q.key} data-testid={`score-${q.key}`} style={{ fontSize: 18, marginBottom: 8 }}>
                {q.icon} {q.label}：<strong>{formatScore(result.scores[q.key])}</strong>
              </li>
            ))}
          </ul>
        </section>
      </div>

      <section
        style={{ background: "#f8f9fa", padding: 24, borderRadius: 10, borderLeft: "4px solid #1f77b4", margin: "16px 0" }}
      >
        <h3 style={{ fontSize: 20, fontWeight: 700 }}>🔍 AI 综合分析</h3>
        <p style={{ fontSize: 17, lineHeight: 1.6 }}>{result.analysis}</p>
      </section>

      <section style={{ marginTop: 20 }}>
        <h2 style={h2}>📥 保存与分享</h2>
        {shareUrl ? (
          <div style={{ display: "flex", gap: 16, alignItems: "center", flexWrap: "wrap" }}>
            {qrUrl && <img src={qrUrl} alt="分享二维码" width={160} height={160} />}
            <div>
              <code data-testid="share-url" style={{ wordBreak: "break-all" }}>
                {shareUrl}
              </code>
              <div style={{ marginTop: 8 }}>
                <button onClick={onCopyLink} style={{ padding: "8px 12px", border: "1px solid #ccc", borderRadius: 8 }}>
                  🔗 复制分享链接
                </button>
              </div>
            </div>
          </div>
        ) : (
          <p style={{ color: "#92400e" }}>{share.notice}</p>
        )}
        <button
          onClick={onCopySummary}
          style={{ marginTop: 12, padding: "8px 12px", border: "1px solid #ccc", borderRadius: 8 }}
        >
          📋 复制结果文字
        </button>
        <div style={{ height: 18, fontSize: 12, marginTop: 4 }}>
          {copied === "ok" && <span style={{ color: "#059669" }}>已复制</span>}
          {copied === "ng" && <span style={{ color: "#b91c1c" }}>复制失败，请检查浏览器的剪贴板权限</span>}
        </div>
      </section>

      <button onClick={onRestart} style={{ width: "100%", marginTop: 16, padding: "10px 16px", borderRadius: 8 }}>
        🔄 重新分析
      </button>
    </div>
  );
}
