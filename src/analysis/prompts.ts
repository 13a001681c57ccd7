import type { ContentRecord } from "../storage/types.js";
import type { ProviderRequest } from "./provider.js";
import {
  ACTION_VERDICTS,
  PRIMARY_GENRES,
  SCHEMA_VERSION,
  TARGET_DEMOGRAPHICS,
  type Verdict,
} from "./schema.js";

export const PERSONA_VERSION = "persona-v1";

export const PERSONA_INSTRUCTION = `
### ROLE
You audit a child's video viewing history on behalf of a skeptical parent.
You are not a brand-safety filter: you look for content farms, brainrot,
manipulative monetization and early signs of radicalization.

### RULES
1. Fill in visual_grounding first, listing only what is plausibly on screen.
2. Judge narrative quality and cognitive nutrition strictly; strange but
   coherent art is not slop, incoherent low-effort noise is.
3. Short vertical videos get extra scrutiny for dopamine-loop editing.
4. Summarize the creator's intent in one or two blunt sentences.
`.trim();

const list = (values: readonly string[]) => values.map((v) => `"${v}"`).join(" | ");

/** Response contract handed to the model alongside the persona. */
export function describeVerdictSchema(): string {
  return `
Respond with a single JSON object (schema ${SCHEMA_VERSION}) and nothing else:
{
  "visual_grounding": { "detected_entities": string[], "setting": string, "text_on_screen": string | null },
  "video_metadata": {
    "format": "Standard_Landscape" | "Short_Vertical" | "Livestream_VOD" | "Unknown",
    "duration_perceived": "Micro (<1 min)" | "Short (1-5 min)" | "Medium (5-20 min)" | "Long (20+ min)"
  },
  "content_taxonomy": {
    "primary_genre": ${list(PRIMARY_GENRES)},
    "specific_topic": string,
    "target_demographic": ${list(TARGET_DEMOGRAPHICS)}
  },
  "narrative_quality": {
    "structural_integrity": "Coherent_Narrative" | "Loose_Vlog_Style" | "Compilation_Clips" | "Incoherent_Chaos",
    "creative_intent": "Artistic/Creative" | "Informational" | "Parasocial/Vlog" | "Algorithmic/Slop",
    "weirdness_verdict": "Normal" | "Creative_Surrealism" | "Disturbing_Uncanny" | "Lazy_Randomness"
  },
  "cognitive_nutrition": {
    "intellectual_density": "Void (Mindless)" | "Low (Trivia)" | "Medium (Story/Hobby)" | "High (Educational)",
    "emotional_volatility": "Calm" | "Upbeat" | "High_Stress" | "Aggressive_Screaming",
    "is_brainrot": boolean,
    "is_slop": boolean
  },
  "risk_assessment": {
    "safety_score": integer 0-100,
    "flags": {
      "ideological_radicalization": boolean, "pseudoscience_misinfo": boolean,
      "body_image_harm": boolean, "dangerous_behavior": boolean,
      "commercial_exploitation": boolean, "lootbox_gambling": boolean,
      "sexual_themes": boolean, "mascot_horror": boolean
    }
  },
  "summary": string,
  "verdict": { "action": ${list(ACTION_VERDICTS)}, "reason": string }
}`.trim();
}

export function buildAnalysisPrompt(record: ContentRecord): string {
  const lines = [
    `Title: ${record.title || "(untitled)"}`,
    `URL: ${record.url}`,
    `Channel: ${record.channelName || "(unknown)"}`,
  ];
  if (record.channelUrl) lines.push(`Channel URL: ${record.channelUrl}`);
  if (record.transcriptStatus === "FETCHED" && record.transcriptText) {
    lines.push("", "Transcript:", record.transcriptText);
  }
  lines.push("", "Analyze the video according to the system instructions.");
  return lines.join("\n");
}

export function buildAnalysisRequest(record: ContentRecord): ProviderRequest {
  return {
    system: `${PERSONA_INSTRUCTION}\n\n${describeVerdictSchema()}`,
    prompt: buildAnalysisPrompt(record),
    purpose: "analysis",
  };
}

export type JudgeCandidate = {
  label: "A" | "B";
  model: string;
  verdict: Verdict;
};

export function buildJudgeRequest(
  record: ContentRecord,
  a: JudgeCandidate,
  b: JudgeCandidate
): ProviderRequest {
  const prompt = [
    "ORIGINAL SYSTEM INSTRUCTION:",
    PERSONA_INSTRUCTION,
    "",
    "USER PROMPT:",
    buildAnalysisPrompt(record),
    "",
    `RESPONSE A (${a.model}):`,
    JSON.stringify(a.verdict, null, 2),
    "",
    `RESPONSE B (${b.model}):`,
    JSON.stringify(b.verdict, null, 2),
    "",
    "TASK:",
    "Compare both responses for accuracy, persona adherence and schema use.",
    'Reply with JSON only: { "winner": "A" | "B" | "tie", "reasoning": string,',
    '"reconciled_verdict": <optional object in the same schema as the responses> }',
  ].join("\n");
  return {
    system: "You are an expert evaluator of content-safety analyses.",
    prompt,
    purpose: "judge",
  };
}
