import { AiComposeInput, ComposedBody } from "../types/lead";
import { composeTemplate } from "./outreach";
import { RandomSource, defaultRandom } from "./random";
import {
  GenerationErrorKind,
  GenerationPrompt,
  TextGenerationError,
  TextGenerator,
} from "./textGenerator";

export const DEFAULT_AI_TIMEOUT_MS = 15_000;

// ============================================================================
// RESULT TYPE
// ============================================================================

export interface GeneratorError {
  kind: GenerationErrorKind | "not_configured";
  message: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface ComposeAiOptions {
  /** null/undefined means no AI service is configured */
  generator?: TextGenerator | null;
  timeoutMs?: number;
  /** Used by the template fallback */
  random?: RandomSource;
}

// ============================================================================
// PROMPT
// ============================================================================

const SYSTEM_PROMPT =
  "You are an expert sales representative specializing in property management technology. " +
  "Write compelling, personalized outreach emails that connect local market conditions to the value proposition.";

const VALUE_PROPOSITIONS = [
  "Automate resident communications (maintenance requests, announcements, rent reminders)",
  "Reduce administrative overhead and save time",
  "Improve resident satisfaction and retention",
  "Streamline property management operations",
  "Provide data-driven insights for better decision making",
  "Scale communication across multiple properties",
];

const REQUIREMENTS = [
  "Start with a personalized greeting using their name",
  "Reference the current weather in their city naturally",
  "Connect their local market conditions to the value proposition",
  "Mention specific benefits relevant to their demographic profile",
  "Include a clear call-to-action for a conversation",
  "Keep it professional but conversational (2-3 paragraphs)",
  "End with a professional signature placeholder",
  "Make it feel personal and relevant to their specific situation",
];

export function buildOutreachPrompt(input: AiComposeInput): GenerationPrompt {
  const user = [
    "You are a sales representative for a property management technology company that helps automate resident communications and streamline operations.",
    "",
    "Generate a personalized, professional outreach email for a property management lead with the following details:",
    "",
    "LEAD INFORMATION:",
    `- Name: ${input.name}`,
    `- Company: ${input.company}`,
    `- Location: ${input.city}, ${input.state}`,
    `- Current Weather: ${input.weather_description} (${input.temperature}°F)`,
    `- Area Demographics: ${formatNumber(input.population)} population, $${formatNumber(input.median_income)} median income, ${input.percent_renters.toFixed(1)}% renters`,
    `- Market Insights: ${input.insights}`,
    "",
    "VALUE PROPOSITIONS:",
    ...VALUE_PROPOSITIONS.map(v => `- ${v}`),
    "",
    "REQUIREMENTS:",
    ...REQUIREMENTS.map((r, i) => `${i + 1}. ${r}`),
    "",
    "TONE: Professional, helpful, consultative, not pushy",
    "LENGTH: 150-250 words",
  ].join("\n");

  return { system: SYSTEM_PROMPT, user };
}

// ============================================================================
// GENERATION
// ============================================================================

/**
 * One attempt at the external generator. Never throws; every failure comes
 * back as a GeneratorError.
 */
export async function generateWithAI(
  input: AiComposeInput,
  generator: TextGenerator,
  timeoutMs: number = DEFAULT_AI_TIMEOUT_MS
): Promise<Result<string, GeneratorError>> {
  try {
    const text = await withTimeout(
      generator.generate(buildOutreachPrompt(input), { timeoutMs }),
      timeoutMs
    );
    if (typeof text !== "string" || !text.trim()) {
      return { ok: false, error: { kind: "empty_response", message: "Generator returned no text" } };
    }
    return { ok: true, value: text.trim() };
  } catch (error) {
    if (error instanceof TextGenerationError) {
      return { ok: false, error: { kind: error.kind, message: error.message } };
    }
    const message = error instanceof Error ? error.message : "Unknown error";
    return { ok: false, error: { kind: "failed", message } };
  }
}

/**
 * AI-assisted outreach body. Always yields a usable body: any generator
 * failure is replaced by the template path for the same lead.
 */
export async function composeAI(
  input: AiComposeInput,
  options: ComposeAiOptions = {}
): Promise<ComposedBody> {
  const { generator, timeoutMs = DEFAULT_AI_TIMEOUT_MS, random = defaultRandom } = options;

  const result: Result<string, GeneratorError> = generator
    ? await generateWithAI(input, generator, timeoutMs)
    : { ok: false, error: { kind: "not_configured", message: "No text generator configured" } };

  if (result.ok) {
    console.log(`[ai-composer] Generated outreach for ${input.company} via ${generator?.name}`);
    return { body: result.value, source: "ai" };
  }

  console.warn(`[ai-composer] Falling back to template:`, {
    company: input.company,
    kind: result.error.kind,
    message: result.error.message,
  });

  return {
    body: composeTemplate(
      {
        name: input.name,
        company: input.company,
        city: input.city,
        weather_description: input.weather_description,
        insights: input.insights,
      },
      random
    ),
    source: "template",
    fallback_reason: result.error.kind,
  };
}

// ============================================================================
// HELPERS
// ============================================================================

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TextGenerationError("timeout", `Generation timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    promise.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      error => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

function formatNumber(value: number): string {
  return value.toLocaleString("en-US");
}
