import { DIMENSIONS, type Dimension } from "./types";

export interface Question {
  key: Dimension;
  icon: string;
  label: string;
  prompt: string;
  placeholder: string;
}

const QUESTION_BY_KEY: Record<Dimension, Omit<Question, "key">> = {
  innovation: {
    icon: "🧠",
    label: "创新指数",
    prompt: "请描述一个你近期主导或参与的最有创意的项目或想法，你是如何贡献原创思路的？",
    placeholder: "请详细描述你的创新经历...",
  },
  collaboration: {
    icon: "🤝",
    label: "协作潜力",
    prompt: "请描述一次重要的团队合作经历。你的角色是什么？你如何促进沟通和团队效率？",
    placeholder: "请分享你的团队协作经验...",
  },
  leadership: {
    icon: "👑",
    label: "领导特质",
    prompt: "想象你领导的项目严重落后，你会采取哪三个关键步骤来扭转局面？",
    placeholder: "请描述你的领导策略...",
  },
  tech_acumen: {
    icon: "⚡",
    label: "技术敏感度",
    prompt:
      "哪一项新兴 AI 技术（如：多模态、AI Agent、生成式视频）最让你感到兴奋？为什么？你认为它会如何改变你所在的行业？",
    placeholder: "请分享你对AI技术的见解...",
  },
};

export const QUESTIONS: Question[] = DIMENSIONS.map((key) => ({ key, ...QUESTION_BY_KEY[key] }));

export const labelOf = (d: Dimension) => QUESTION_BY_KEY[d].label;
