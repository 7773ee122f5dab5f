import { readFileSync } from "fs";
import { resolve } from "path";
import type { RAGSettings } from "../memory/types.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { log } from "../logger.js";

// ── Directory: chatbots, mentors and targets (read-only) ─

export interface ProfileData {
  tags?: string[];
  mbti?: string;
  zodiac?: string;
  ageRange?: string;
  occupation?: string;
  location?: string;
  personality?: Record<string, string>;
}

export interface Preferences {
  likes?: string[];
  dislikes?: string[];
}

export interface TargetProfile {
  id: string;
  name: string;
  currentStatus?: string;
  aiSummary?: string;
  profileData: ProfileData;
  preferences: Preferences;
}

export interface Mentor {
  id: string;
  name: string;
  styleTag?: string;
  /** Placeholders: {target_name} {profile_summary} {preferences} {context} */
  systemPromptTemplate: string;
  defaultRagSettings?: Partial<RAGSettings>;
}

export interface Chatbot {
  id: string;
  targetId: string;
  mentorId: string;
  title: string;
  /** Replaces the mentor template when set. */
  customSystemPrompt?: string;
  ragSettings?: Partial<RAGSettings>;
}

export interface Directory {
  getChatbot(id: string): Promise<Chatbot>;
  getMentor(id: string): Promise<Mentor>;
  getTarget(id: string): Promise<TargetProfile>;
}

// ── In-memory directory ──────────────────────────────────

export interface DirectoryData {
  mentors: Mentor[];
  chatbots: Chatbot[];
  targets: TargetProfile[];
}

export class StaticDirectory implements Directory {
  private mentors = new Map<string, Mentor>();
  private chatbots = new Map<string, Chatbot>();
  private targets = new Map<string, TargetProfile>();

  constructor(data: DirectoryData) {
    for (const m of data.mentors) this.mentors.set(m.id, m);
    for (const c of data.chatbots) this.chatbots.set(c.id, c);
    for (const t of data.targets) this.targets.set(t.id, t);
  }

  async getChatbot(id: string): Promise<Chatbot> {
    const found = this.chatbots.get(id);
    if (!found) throw new NotFoundError("Chatbot", id);
    return found;
  }

  async getMentor(id: string): Promise<Mentor> {
    const found = this.mentors.get(id);
    if (!found) throw new NotFoundError("Mentor", id);
    return found;
  }

  async getTarget(id: string): Promise<TargetProfile> {
    const found = this.targets.get(id);
    if (!found) throw new NotFoundError("Target", id);
    return found;
  }
}

// ── JSON parsing ─────────────────────────────────────────

type Json = Record<string, unknown>;

function isObject(v: unknown): v is Json {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function reqString(obj: Json, key: string, where: string): string {
  const v = obj[key];
  if (typeof v !== "string" || !v) {
    throw new ValidationError(`${where}: "${key}" must be a non-empty string`);
  }
  return v;
}

function optString(obj: Json, key: string): string | undefined {
  const v = obj[key];
  return typeof v === "string" && v ? v : undefined;
}

function optStrings(obj: Json, key: string): string[] | undefined {
  const v = obj[key];
  if (!Array.isArray(v)) return undefined;
  return v.filter((s): s is string => typeof s === "string");
}

function optStringMap(obj: Json, key: string): Record<string, string> | undefined {
  const v = obj[key];
  if (!isObject(v)) return undefined;
  const out: Record<string, string> = {};
  for (const [k, val] of Object.entries(v)) {
    if (typeof val === "string" || typeof val === "number") out[k] = String(val);
  }
  return out;
}

function list(obj: Json, key: string): Json[] {
  const v = obj[key];
  return Array.isArray(v) ? v.filter(isObject) : [];
}

/** Accepts camelCase and the snake_case keys older exports used. */
export function parseRagSettings(raw: unknown): Partial<RAGSettings> | undefined {
  if (!isObject(raw)) return undefined;
  const pick = (camel: string, snake: string) => raw[camel] ?? raw[snake];

  const out: Partial<RAGSettings> = {};
  const enabled = pick("enabled", "enabled");
  const maxMemories = pick("maxMemories", "max_memories");
  const maxRecent = pick("maxRecentMessages", "max_recent_messages");
  const decay = pick("timeDecayFactor", "time_decay_factor");
  const minScore = pick("minRelevanceScore", "min_relevance_score");

  if (typeof enabled === "boolean") out.enabled = enabled;
  if (typeof maxMemories === "number") out.maxMemories = maxMemories;
  if (typeof maxRecent === "number") out.maxRecentMessages = maxRecent;
  if (typeof decay === "number") out.timeDecayFactor = decay;
  if (typeof minScore === "number") out.minRelevanceScore = minScore;
  return out;
}

export function parseDirectoryData(raw: unknown): DirectoryData {
  if (!isObject(raw)) throw new ValidationError("Directory must be a JSON object");

  const mentors: Mentor[] = list(raw, "mentors").map((m, i) => ({
    id: reqString(m, "id", `mentors[${i}]`),
    name: reqString(m, "name", `mentors[${i}]`),
    styleTag: optString(m, "styleTag"),
    systemPromptTemplate: reqString(m, "systemPromptTemplate", `mentors[${i}]`),
    defaultRagSettings: parseRagSettings(m["defaultRagSettings"]),
  }));

  const chatbots: Chatbot[] = list(raw, "chatbots").map((c, i) => ({
    id: reqString(c, "id", `chatbots[${i}]`),
    targetId: reqString(c, "targetId", `chatbots[${i}]`),
    mentorId: reqString(c, "mentorId", `chatbots[${i}]`),
    title: optString(c, "title") ?? "",
    customSystemPrompt: optString(c, "customSystemPrompt"),
    ragSettings: parseRagSettings(c["ragSettings"]),
  }));

  const targets: TargetProfile[] = list(raw, "targets").map((t, i) => {
    const profile = isObject(t["profileData"]) ? t["profileData"] : {};
    const prefs = isObject(t["preferences"]) ? t["preferences"] : {};
    return {
      id: reqString(t, "id", `targets[${i}]`),
      name: reqString(t, "name", `targets[${i}]`),
      currentStatus: optString(t, "currentStatus"),
      aiSummary: optString(t, "aiSummary"),
      profileData: {
        tags: optStrings(profile, "tags"),
        mbti: optString(profile, "mbti"),
        zodiac: optString(profile, "zodiac"),
        ageRange: optString(profile, "ageRange"),
        occupation: optString(profile, "occupation"),
        location: optString(profile, "location"),
        personality: optStringMap(profile, "personality"),
      },
      preferences: {
        likes: optStrings(prefs, "likes"),
        dislikes: optStrings(prefs, "dislikes"),
      },
    };
  });

  return { mentors, chatbots, targets };
}

/** Load the directory file (relative paths resolve from the cwd). */
export function loadDirectory(path: string): StaticDirectory {
  const fullPath = resolve(process.cwd(), path);
  const data = parseDirectoryData(JSON.parse(readFileSync(fullPath, "utf-8")));
  log.info(
    {
      path: fullPath,
      mentors: data.mentors.length,
      chatbots: data.chatbots.length,
      targets: data.targets.length,
    },
    "📇 Directory loaded",
  );
  return new StaticDirectory(data);
}
