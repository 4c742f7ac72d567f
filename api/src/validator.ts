import { z } from "zod";
import { MESSAGES, type ValidationError } from "./errors";
import { err, ok, type Result } from "./result";
import { DIMENSIONS, type ProfileInputs, type Submission } from "./types";

const text = z.unknown().transform((v) => (typeof v === "string" ? v : ""));

/** Accepts any JSON body; non-string fields read as empty. */
export const SubmissionSchema = z.object({
  nickname: text,
  innovation: text,
  collaboration: text,
  leadership: text,
  tech_acumen: text,
});

export function readSubmission(body: unknown): Submission {
  const parsed = SubmissionSchema.safeParse(body ?? {});
  return parsed.success
    ? parsed.data
    : { nickname: "", innovation: "", collaboration: "", leadership: "", tech_acumen: "" };
}

export interface ValidatedSubmission {
  nickname: string;
  inputs: ProfileInputs;
}

/**
 * All four answers must be non-empty after trimming.
 * Answers are passed on verbatim; only the nickname is trimmed.
 */
export function validateSubmission(s: Submission): Result<ValidatedSubmission, ValidationError> {
  const missing = DIMENSIONS.filter((d) => s[d].trim().length === 0);
  if (missing.length > 0) {
    return err({ kind: "validation", message: MESSAGES.validation, missing });
  }
  return ok({
    nickname: s.nickname.trim(),
    inputs: {
      innovation: s.innovation,
      collaboration: s.collaboration,
      leadership: s.leadership,
      tech_acumen: s.tech_acumen,
    },
  });
}
