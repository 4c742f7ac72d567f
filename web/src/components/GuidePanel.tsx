import React from "react";

const STEPS = ["输入您的昵称", "详细回答四个维度的问题", "等待AI分析（约30秒）", "获得专属潜力雷达图", "下载图片分享给朋友"];
const TIPS = ["回答越详细，分析越准确", "可以结合具体案例和数据", "真实回答比完美回答更有价值"];

export default function GuidePanel() {
  return (
    <aside style={{ background: "#f8f9fa", borderRadius: 10, padding: "12px 20px", marginBottom: 20 }}>
      <h3 style={{ fontSize: 18, fontWeight: 700 }}>📋 使用说明</h3>
      <ol data-testid="guide-steps" style={{ margin: "4px 0 12px" }}>
        {STEPS.map((s) => (
          <li key={s}>{s}</li>
        ))}
      </ol>
      <h3 style={{ fontSize: 18, fontWeight: 700 }}>💡 小贴士</h3>
      <ul style={{ margin: "4px 0" }}>
        {TIPS.map((t) => (
          <li key={t}>{t}</li>
        ))}
      </ul>
    </aside>
  );
}
