import { z } from "zod";

/** Bumped whenever a field or enum domain of the verdict changes. */
export const SCHEMA_VERSION = "v1";

// --- visual grounding: what is physically on screen ---
export const visualGroundingSchema = z
  .object({
    detected_entities: z.array(z.string()),
    setting: z.string(),
    text_on_screen: z.string().nullable().optional(),
  })
  .passthrough();

// --- content taxonomy ---
export const PRIMARY_GENRES = [
  "Gaming_Gameplay",
  "Gaming_Culture",
  "Animation_Storytime",
  "Animation_ContentFarm",
  "Toys_Unboxing",
  "Pranks_Challenges",
  "Education_STEM",
  "Education_Humanities",
  "Mascot_Horror",
  "Internet_Culture",
  "Vlog_Lifestyle",
  "Music_Dance",
  "Pseudoscience_Conspiracy",
  "Other",
] as const;

export const TARGET_DEMOGRAPHICS = [
  "Toddler (0-4)",
  "Child (5-9)",
  "Pre-Teen (10-12)",
  "Teen (13+)",
  "Adult",
] as const;

export const contentTaxonomySchema = z
  .object({
    primary_genre: z.enum(PRIMARY_GENRES),
    specific_topic: z.string(),
    target_demographic: z.enum(TARGET_DEMOGRAPHICS),
  })
  .passthrough();

// --- narrative quality ---
export const narrativeQualitySchema = z
  .object({
    structural_integrity: z.enum([
      "Coherent_Narrative",
      "Loose_Vlog_Style",
      "Compilation_Clips",
      "Incoherent_Chaos",
    ]),
    creative_intent: z.enum([
      "Artistic/Creative",
      "Informational",
      "Parasocial/Vlog",
      "Algorithmic/Slop",
    ]),
    weirdness_verdict: z.enum([
      "Normal",
      "Creative_Surrealism",
      "Disturbing_Uncanny",
      "Lazy_Randomness",
    ]),
  })
  .passthrough();

// --- cognitive nutrition ---
export const cognitiveNutritionSchema = z
  .object({
    intellectual_density: z.enum([
      "Void (Mindless)",
      "Low (Trivia)",
      "Medium (Story/Hobby)",
      "High (Educational)",
    ]),
    emotional_volatility: z.enum([
      "Calm",
      "Upbeat",
      "High_Stress",
      "Aggressive_Screaming",
    ]),
    is_brainrot: z.boolean(),
    is_slop: z.boolean(),
  })
  .passthrough();

// --- risk assessment ---
export const riskFlagsSchema = z
  .object({
    ideological_radicalization: z.boolean(),
    pseudoscience_misinfo: z.boolean(),
    body_image_harm: z.boolean(),
    dangerous_behavior: z.boolean(),
    commercial_exploitation: z.boolean(),
    lootbox_gambling: z.boolean(),
    sexual_themes: z.boolean(),
    mascot_horror: z.boolean(),
  })
  .passthrough();

export const riskAssessmentSchema = z
  .object({
    safety_score: z.number().int().min(0).max(100),
    flags: riskFlagsSchema,
  })
  .passthrough();

// --- optional sections ---
export const videoMetadataSchema = z
  .object({
    format: z.enum(["Standard_Landscape", "Short_Vertical", "Livestream_VOD", "Unknown"]),
    duration_perceived: z.enum([
      "Micro (<1 min)",
      "Short (1-5 min)",
      "Medium (5-20 min)",
      "Long (20+ min)",
    ]),
  })
  .passthrough();

export const ACTION_VERDICTS = ["Approve", "Monitor", "Block_Video", "Block_Channel"] as const;

export const actionVerdictSchema = z
  .object({
    action: z.enum(ACTION_VERDICTS),
    reason: z.string(),
  })
  .passthrough();

export const verdictSchema = z
  .object({
    visual_grounding: visualGroundingSchema,
    content_taxonomy: contentTaxonomySchema,
    narrative_quality: narrativeQualitySchema,
    cognitive_nutrition: cognitiveNutritionSchema,
    risk_assessment: riskAssessmentSchema,
    video_metadata: videoMetadataSchema.optional(),
    summary: z.string().optional(),
    verdict: actionVerdictSchema.optional(),
  })
  .passthrough();

export type Verdict = z.infer<typeof verdictSchema>;
export type PrimaryGenre = (typeof PRIMARY_GENRES)[number];

export const judgeSchema = z
  .object({
    winner: z.enum(["A", "B", "tie"]),
    reasoning: z.string().min(1),
    reconciled_verdict: verdictSchema.optional(),
  })
  .passthrough();

export type JudgeVerdict = z.infer<typeof judgeSchema>;
