import { DIMENSIONS, type AnalysisOutcome, type Answers, type Dimension } from "./types";

/** Everything the form needs to survive a re-render, held in one object. */
export interface FormSession {
  nickname: string;
  answers: Answers;
  status: "editing" | "loading" | "done" | "replaying";
  outcome: AnalysisOutcome | null;
  /** true when the outcome came from a share link */
  replayed: boolean;
  error: string;
  warning: string;
  copied: "idle" | "ok" | "ng";
}

export type SessionAction =
  | { type: "nickname"; value: string }
  | { type: "answer"; key: Dimension; value: string }
  | { type: "submit" }
  | { type: "invalid"; warning: string }
  | { type: "replay" }
  | { type: "succeeded"; outcome: AnalysisOutcome; replayed?: boolean }
  | { type: "failed"; error: string }
  | { type: "copied"; state: FormSession["copied"] }
  | { type: "restart" };

const emptyAnswers = (): Answers => ({ innovation: "", collaboration: "", leadership: "", tech_acumen: "" });

export const initialSession = (): FormSession => ({
  nickname: "",
  answers: emptyAnswers(),
  status: "editing",
  outcome: null,
  replayed: false,
  error: "",
  warning: "",
  copied: "idle",
});

export function missingAnswers(answers: Answers): Dimension[] {
  return DIMENSIONS.filter((d) => answers[d].trim().length === 0);
}

export function sessionReducer(s: FormSession, a: SessionAction): FormSession {
  switch (a.type) {
    case "nickname":
      return { ...s, nickname: a.value };
    case "answer":
      return { ...s, answers: { ...s.answers, [a.key]: a.value }, warning: "" };
    case "submit":
      return { ...s, status: "loading", outcome: null, error: "", warning: "" };
    case "invalid":
      return { ...s, status: "editing", warning: a.warning };
    case "replay":
      return { ...s, status: "replaying", error: "" };
    case "succeeded":
      return { ...s, status: "done", outcome: a.outcome, replayed: a.replayed ?? false, error: "" };
    case "failed":
      return { ...s, status: "editing", outcome: null, error: a.error };
    case "copied":
      return { ...s, copied: a.state };
    case "restart":
      // answers stay so the user can tweak and resubmit
      return { ...s, status: "editing", outcome: null, replayed: false, error: "", copied: "idle" };
  }
}
