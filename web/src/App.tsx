import React, { useEffect, useReducer, useRef } from "react";
import GuidePanel from "./components/GuidePanel";
import ProfileForm from "./components/ProfileForm";
import ResultView from "./components/ResultView";
import { apiBase, qrImageUrl, requestAnalysis, requestShare } from "./lib/api";
import { copyText } from "./lib/clipboard";
import { makeSummaryText } from "./lib/format";
import { initialSession, missingAnswers, sessionReducer, type FormSession, type SessionAction } from "./lib/session";
import { readShareId } from "./lib/share";

/** App name: drives the H1 and the browser title. */
const APP_NAME = "🤖 AI 潜力画像生成器";

const VALIDATION_WARNING = "⚠️ 请完整回答所有四个问题，这样AI才能给出更准确的分析哦！";

export default function App({ base = apiBase() }: { base?: string }) {
  const [session, dispatch] = useReducer(sessionReducer, initialSession());

  const copiedTimer = useRef<ReturnType<typeof setTimeout> | null>(null);

  useEffect(() => {
    document.title = APP_NAME;
    return () => {
      if (copiedTimer.current) clearTimeout(copiedTimer.current);
    };
  }, []);

  // share link: skip the form and replay the stored record
  useEffect(() => {
    const shareId = readShareId(window.location.search);
    if (!shareId) return;
    let alive = true;
    dispatch({ type: "replay" });
    (async () => {
      const r = await requestShare(base, shareId);
      if (!alive) return;
      dispatch(r.ok ? { type: "succeeded", outcome: r.value, replayed: true } : { type: "failed", error: r.message });
    })();
    return () => {
      alive = false;
    };
  }, [base]);

  const analyze = async () => {
    if (missingAnswers(session.answers).length > 0) {
      dispatch({ type: "invalid", warning: VALIDATION_WARNING });
      return;
    }
    dispatch({ type: "submit" });
    const r = await requestAnalysis(base, session.nickname, session.answers);
    dispatch(r.ok ? { type: "succeeded", outcome: r.value } : { type: "failed", error: r.message });
  };

  const shareId = session.outcome?.share.shareId ?? null;
  const shareUrl = session.outcome?.share.url ?? null;

  // only the latest copy's timer may reset the status
  const flashCopied = (state: "ok" | "ng", ms: number) => {
    if (copiedTimer.current) clearTimeout(copiedTimer.current);
    dispatch({ type: "copied", state });
    copiedTimer.current = setTimeout(() => {
      copiedTimer.current = null;
      dispatch({ type: "copied", state: "idle" });
    }, ms);
  };

  const copy = async (text: string) => {
    try {
      await copyText(text);
      flashCopied("ok", 2000);
    } catch {
      flashCopied("ng", 4000);
    }
  };

  const copyLink = async () => {
    if (shareUrl) await copy(shareUrl);
  };

  const copySummary = async () => {
    if (session.outcome) await copy(makeSummaryText(session.outcome, shareUrl ?? undefined));
  };

  const restart = () => {
    if (session.replayed) window.history.replaceState(null, "", window.location.pathname);
    dispatch({ type: "restart" });
  };

  return (
    <div style={{ maxWidth: 960, margin: "0 auto", padding: 16 }}>
      <h1 style={{ fontSize: 40, fontWeight: 800, marginBottom: 16, textAlign: "center", color: "#1f77b4" }}>
        {APP_NAME}
      </h1>

      <Body
        session={session}
        shareUrl={shareUrl}
        qrUrl={shareId ? qrImageUrl(base, shareId) : null}
        onSubmit={analyze}
        onCopyLink={copyLink}
        onCopySummary={copySummary}
        onRestart={restart}
        dispatch={dispatch}
      />

      {session.error && (
        <div role="alert" style={{ color: "#b91c1c", marginTop: 16, whiteSpace: "pre-wrap" }}>
          {session.error}
        </div>
      )}
    </div>
  );
}

interface BodyProps {
  session: FormSession;
  shareUrl: string | null;
  qrUrl: string | null;
  onSubmit: () => void;
  onCopyLink: () => void;
  onCopySummary: () => void;
  onRestart: () => void;
  dispatch: React.Dispatch<SessionAction>;
}

function Body({ session, dispatch, onSubmit, ...result }: BodyProps) {
  if (session.status === "replaying") {
    return <p>正在加载分享的画像...</p>;
  }
  if (session.status === "done" && session.outcome) {
    return <ResultView outcome={session.outcome} copied={session.copied} {...result} />;
  }
  return (
    <>
      <p style={{ fontSize: 18 }}>
        🎯 发现你的AI时代潜力：通过AI深度分析，生成你的专属潜力雷达图。只需几分钟，获得专业的职业发展洞察！
      </p>
      <GuidePanel />
      <ProfileForm session={session} dispatch={dispatch} onSubmit={onSubmit} />
    </>
  );
}
