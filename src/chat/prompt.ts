import type { ChatCompletionMessageParam } from "openai/resources/chat/completions.js";
import type {
  Chatbot,
  Mentor,
  Preferences,
  TargetProfile,
} from "./directory.js";
import type { ChatRole, RetrievalResult } from "../memory/types.js";

// ── Prompt Composer ──────────────────────────────────────
// Everything here is pure: same inputs, same string.

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface PromptInputs {
  targetName?: string;
  profile?: Pick<TargetProfile, "profileData" | "aiSummary" | "currentStatus">;
  preferences?: Preferences;
  retrievalResults?: RetrievalResult[];
}

const STATUS_LABELS: Record<string, string> = {
  pursuing: "pursuing",
  dating: "dating",
  friend: "friends",
  complicated: "it's complicated",
  ended: "ended",
};

/** `Label: value` lines for every profile field that is present. */
export function buildProfileSummary(profile: PromptInputs["profile"]): string {
  if (!profile) return "";
  const p = profile.profileData;
  const lines: string[] = [];

  if (p.tags?.length) lines.push(`Tags: ${p.tags.join(", ")}`);
  if (p.mbti) lines.push(`MBTI: ${p.mbti}`);
  if (p.zodiac) lines.push(`Zodiac: ${p.zodiac}`);
  if (p.ageRange) lines.push(`Age: ${p.ageRange}`);
  if (p.occupation) lines.push(`Occupation: ${p.occupation}`);
  if (p.location) lines.push(`Location: ${p.location}`);

  const traits = Object.entries(p.personality ?? {});
  if (traits.length > 0) {
    lines.push(`Personality: ${traits.map(([k, v]) => `${k}:${v}`).join(", ")}`);
  }

  if (profile.aiSummary) lines.push(`Summary: ${profile.aiSummary}`);
  if (profile.currentStatus) {
    lines.push(
      `Status: ${STATUS_LABELS[profile.currentStatus] ?? profile.currentStatus}`,
    );
  }
  return lines.join("\n");
}

export function buildPreferencesSummary(prefs: Preferences | undefined): string {
  if (!prefs) return "";
  const lines: string[] = [];
  if (prefs.likes?.length) lines.push(`Likes: ${prefs.likes.join(", ")}`);
  if (prefs.dislikes?.length) lines.push(`Dislikes: ${prefs.dislikes.join(", ")}`);
  return lines.join("\n");
}

/** One `- [YYYY-MM-DD] content` line per result, in rank order (UTC dates). */
export function buildContextBlock(results: RetrievalResult[] | undefined): string {
  if (!results?.length) return "";
  return [...results]
    .sort((a, b) => a.rank - b.rank)
    .map(
      (r) =>
        `- [${r.memory.happenedAt.toISOString().slice(0, 10)}] ${r.memory.content}`,
    )
    .join("\n");
}

const PLACEHOLDER = /\{(target_name|profile_summary|preferences|context)\}/g;

/**
 * Substitute the four placeholders everywhere they occur. Other braces are
 * left alone, and substituted values are never expanded again.
 */
export function renderPrompt(template: string, inputs: PromptInputs): string {
  const values: Record<string, string> = {
    target_name: inputs.targetName ?? "",
    profile_summary: buildProfileSummary(inputs.profile),
    preferences: buildPreferencesSummary(inputs.preferences),
    context: buildContextBlock(inputs.retrievalResults),
  };
  return template.replace(PLACEHOLDER, (match, key: string) => values[key] ?? match);
}

/** The chatbot's own prompt wins over its mentor's template. */
export function selectTemplate(
  chatbot: Pick<Chatbot, "customSystemPrompt">,
  mentor: Pick<Mentor, "systemPromptTemplate">,
): string {
  const custom = chatbot.customSystemPrompt;
  return custom && custom.trim() ? custom : mentor.systemPromptTemplate;
}

/** System prompt, then history oldest first, then the new user message. */
export function buildChatMessages(
  systemPrompt: string,
  history: ChatMessage[],
  userMessage: string,
): ChatCompletionMessageParam[] {
  return [
    { role: "system", content: systemPrompt },
    ...history.map((m): ChatCompletionMessageParam =>
      m.role === "assistant"
        ? { role: "assistant", content: m.content }
        : { role: "user", content: m.content },
    ),
    { role: "user", content: userMessage },
  ];
}
