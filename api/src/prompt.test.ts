import { describe, expect, it } from "vitest";
import { buildPrompt, SYSTEM_PROMPT } from "./prompt";

const inputs = {
  innovation: "Built a new caching layer",
  collaboration: "Led standup",
  leadership: "Reassigned tasks",
  tech_acumen: "Excited about agents",
};

describe("buildPrompt", () => {
  it("embeds the nickname and every answer", () => {
    const { system, user } = buildPrompt(inputs, "Alex");
    expect(system).toBe(SYSTEM_PROMPT);
    expect(user).toContain("用户昵称：Alex");
    for (const answer of Object.values(inputs)) expect(user).toContain(answer);
  });

  it("omits the nickname line when none is given", () => {
    expect(buildPrompt(inputs).user).not.toContain("用户昵称");
    expect(buildPrompt(inputs, "  ").user).not.toContain("用户昵称");
  });

  it("asks for every JSON key", () => {
    for (const key of ["innovation", "collaboration", "leadership", "tech_acumen", "analysis", "golden_sentence"]) {
      expect(SYSTEM_PROMPT).toContain(`"${key}"`);
    }
  });
});
