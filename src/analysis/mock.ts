import type {
  AnalysisProvider,
  ProviderRequest,
  ProviderResponse,
} from "./provider.js";
import type { Verdict } from "./schema.js";

export const MOCK_VERDICT: Verdict = {
  visual_grounding: {
    detected_entities: ["Presenter", "Whiteboard", "Robot Kit"],
    setting: "Classroom",
    text_on_screen: "Robotics 101",
  },
  video_metadata: {
    format: "Standard_Landscape",
    duration_perceived: "Medium (5-20 min)",
  },
  content_taxonomy: {
    primary_genre: "Education_STEM",
    specific_topic: "Robotics",
    target_demographic: "Child (5-9)",
  },
  narrative_quality: {
    structural_integrity: "Coherent_Narrative",
    creative_intent: "Informational",
    weirdness_verdict: "Normal",
  },
  cognitive_nutrition: {
    intellectual_density: "High (Educational)",
    emotional_volatility: "Calm",
    is_brainrot: false,
    is_slop: false,
  },
  risk_assessment: {
    safety_score: 95,
    flags: {
      ideological_radicalization: false,
      pseudoscience_misinfo: false,
      body_image_harm: false,
      dangerous_behavior: false,
      commercial_exploitation: false,
      lootbox_gambling: false,
      sexual_themes: false,
      mascot_horror: false,
    },
  },
  summary: "Offline mock analysis.",
  verdict: { action: "Approve", reason: "Mock provider; no model was called." },
};

export const MOCK_USAGE = { inputTokens: 100, outputTokens: 50 };

/** Offline provider for dry runs: fixed verdicts, fixed token usage. */
export class MockAnalysisProvider implements AnalysisProvider {
  name: "mock" = "mock";

  constructor(public model: string) {}

  async generate(
    request: ProviderRequest,
    opts: { signal: AbortSignal }
  ): Promise<ProviderResponse> {
    opts.signal.throwIfAborted();
    const body =
      request.purpose === "judge"
        ? { winner: "A", reasoning: "Mock judge: both responses are identical." }
        : MOCK_VERDICT;
    return {
      output: { kind: "text", text: JSON.stringify(body) },
      usage: { ...MOCK_USAGE },
      model: this.model,
    };
  }
}
