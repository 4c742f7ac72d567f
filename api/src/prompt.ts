import type { ProfileInputs } from "./types";

/* =========================
   Fixed scoring instruction
   ========================= */
export const SYSTEM_PROMPT = `你是一位资深的技术招聘官和职业发展顾问，具有丰富的人才评估经验。
请基于用户提供的信息，从四个维度进行专业分析：创新指数、协作潜力、领导特质、技术敏感度。

评分标准：
- 创新指数(innovation)：原创思维、问题解决能力、创意实现
- 协作潜力(collaboration)：团队合作、沟通能力、集体意识
- 领导特质(leadership)：决策能力、责任担当、影响力
- 技术敏感度(tech_acumen)：技术理解、学习能力、前瞻性

请严格按照以下JSON格式输出，不要添加任何其他内容：
{
  "scores": {
    "innovation": <1-100之间的整数>,
    "collaboration": <1-100之间的整数>,
    "leadership": <1-100之间的整数>,
    "tech_acumen": <1-100之间的整数>
  },
  "analysis": "<约100-150字的综合分析，语言积极鼓励，突出闪光点>",
  "golden_sentence": "<一句精炼的专属评语，作为用户的AI Slogan>"
}

必须遵守：
- 四个分数都必须是 1 到 100 之间的整数（数值类型，不要加引号）。
- JSON以外的文字（前后的说明、代码块符号\`\`\` 等）一律不要输出。`;

export interface PromptPair {
  system: string;
  user: string;
}

export function buildPrompt(inputs: ProfileInputs, nickname?: string): PromptPair {
  const name = nickname?.trim();
  const lines = ["请分析以下用户信息：", ""];
  if (name) lines.push(`用户昵称：${name}`, "");
  lines.push(
    "创新指数相关信息：",
    inputs.innovation,
    "",
    "协作潜力相关信息：",
    inputs.collaboration,
    "",
    "领导特质相关信息：",
    inputs.leadership,
    "",
    "技术敏感度相关信息：",
    inputs.tech_acumen,
    "",
    "请基于以上信息进行专业分析并按JSON格式输出。",
  );
  return { system: SYSTEM_PROMPT, user: lines.join("\n") };
}
