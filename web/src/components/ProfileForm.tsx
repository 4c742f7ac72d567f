import React from "react";
import { QUESTIONS } from "../lib/questions";
import type { FormSession, SessionAction } from "../lib/session";

interface Props {
  session: FormSession;
  dispatch: React.Dispatch<SessionAction>;
  onSubmit: () => void;
}

export default function ProfileForm({ session, dispatch, onSubmit }: Props) {
  const loading = session.status === "loading";
  const name = session.nickname.trim();

  return (
    <form
      onSubmit={(e) => {
        e.preventDefault();
        onSubmit();
      }}
    >
      <label style={{ display: "block", fontWeight: 600, marginBottom: 6 }} htmlFor="nickname">
        👤 请输入您的昵称
      </label>
      <input
        id="nickname"
        value={session.nickname}
        onChange={(e) => dispatch({ type: "nickname", value: e.target.value })}
        placeholder="例如：小王、Alex、技术达人..."
        style={{ width: "100%", padding: 10, fontSize: 16, marginBottom: 16 }}
      />

      <h3 style={{ fontSize: 20, fontWeight: 700 }}>
        {name ? `👋 Hi ${name}，请回答以下四个问题：` : "📝 请详细回答以下问题，这将帮助AI更准确地分析你的潜力："}
      </h3>

      {QUESTIONS.map((q) => (
        <div key={q.key} style={{ marginBottom: 16 }}>
          <label htmlFor={q.key} style={{ display: "block", marginBottom: 6 }}>
            {q.icon} <strong>{q.label}</strong>：{q.prompt}
          </label>
          <textarea
            id={q.key}
            value={session.answers[q.key]}
            onChange={(e) => dispatch({ type: "answer", key: q.key, value: e.target.value })}
            placeholder={q.placeholder}
            style={{ width: "100%", height: 120, padding: 12, fontSize: 16 }}
          />
        </div>
      ))}

      {session.warning && (
        <div role="alert" style={{ color: "#92400e", marginBottom: 12 }}>
          {session.warning}
        </div>
      )}

      <button
        type="submit"
        disabled={loading}
        style={{
          width: "100%",
          padding: "12px 16px",
          borderRadius: 8,
          fontWeight: 600,
          cursor: loading ? "not-allowed" : "pointer",
        }}
      >
        {loading ? "✨ AI 大模型正在为您深度分析，请稍候..." : "🚀 开始生成我的 AI 画像"}
      </button>
    </form>
  );
}
