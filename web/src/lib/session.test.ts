import { describe, expect, it } from "vitest";
import { initialSession, missingAnswers, sessionReducer } from "./session";
import type { AnalysisOutcome } from "./types";

const outcome: AnalysisOutcome = {
  nickname: "Alex",
  result: {
    scores: { innovation: 90, collaboration: 75, leadership: 60, tech_acumen: 85 },
    analysis: "a",
    golden_sentence: "g",
  },
  chart: { title: "t", domain: [0, 100], points: [] },
  share: { saved: true, shareId: "s1", url: "https://profile.example.com/?share=s1" },
};

describe("sessionReducer", () => {
  it("keeps answers across a submit and a failure", () => {
    let s = sessionReducer(initialSession(), { type: "answer", key: "leadership", value: "Reassigned tasks" });
    s = sessionReducer(s, { type: "submit" });
    expect(s.status).toBe("loading");
    s = sessionReducer(s, { type: "failed", error: "boom" });
    expect(s).toMatchObject({ status: "editing", error: "boom", outcome: null });
    expect(s.answers.leadership).toBe("Reassigned tasks");
  });

  it("stores the outcome and clears it on restart", () => {
    let s = sessionReducer(initialSession(), { type: "succeeded", outcome, replayed: true });
    expect(s).toMatchObject({ status: "done", replayed: true });
    s = sessionReducer(s, { type: "restart" });
    expect(s).toMatchObject({ status: "editing", outcome: null, replayed: false });
  });

  it("clears the warning when an answer changes", () => {
    let s = sessionReducer(initialSession(), { type: "invalid", warning: "fill everything" });
    expect(s.warning).toBe("fill everything");
    s = sessionReducer(s, { type: "answer", key: "innovation", value: "x" });
    expect(s.warning).toBe("");
  });
});

describe("missingAnswers", () => {
  it("lists blank answers in dimension order", () => {
    expect(
      missingAnswers({ innovation: " ", collaboration: "ok", leadership: "", tech_acumen: "ok" }),
    ).toEqual(["innovation", "leadership"]);
  });
});
