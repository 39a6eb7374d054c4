import templates from "../data/outreach-templates.json";
import { OutreachMessage, TemplateInput } from "../types/lead";
import { normalizeWeather } from "./weather";
import { RandomSource, defaultRandom, pick } from "./random";

// ============================================================================
// TEMPLATE BANK
// Placeholders: {name} {company} {city} {weather}
// ============================================================================

interface InsightTemplate {
  key: string;
  sentences: string[];
}

// Scanned in order; the first key found in the insight string wins
const INSIGHT_TEMPLATES: readonly InsightTemplate[] = templates.insightTemplates;

type Placeholders = Record<"name" | "company" | "city" | "weather", string>;

/**
 * Single-pass substitution, so values containing "{city}" are left alone
 */
function fill(template: string, values: Placeholders): string {
  return template.replace(/\{(name|company|city|weather)\}/g, (_m, key: keyof Placeholders) => values[key]);
}

// ============================================================================
// COMPOSITION
// ============================================================================

export function buildSubject(company: string, city: string): string {
  return `Property Management Solutions for ${company} in ${city}`;
}

/**
 * Compose an outreach body from the template bank.
 *
 * Sections, in order and separated by blank lines: greeting, weather
 * opening, insight sentence, value proposition, call to action, closing.
 */
export function composeTemplate(input: TemplateInput, random: RandomSource = defaultRandom): string {
  const values: Placeholders = {
    name: input.name,
    company: input.company,
    city: input.city,
    weather: normalizeWeather(input.weather_description),
  };

  const greeting = pick(templates.greetings, random);
  const weatherOpening = pick(templates.weatherOpenings, random);
  const valueProp = pick(templates.valuePropositions, random);
  const cta = pick(templates.callsToAction, random);
  const closing = pick(templates.closings, random);

  const insights = input.insights.toLowerCase();
  const matched = INSIGHT_TEMPLATES.find(t => insights.includes(t.key));
  const insightSentence = matched ? pick(matched.sentences, random) : templates.genericInsight;

  return [greeting, weatherOpening, insightSentence, valueProp, cta, closing]
    .map(section => fill(section, values))
    .join("\n\n");
}

/**
 * Subject + template body for one lead
 */
export function composeOutreach(input: TemplateInput, random: RandomSource = defaultRandom): OutreachMessage {
  return {
    subject: buildSubject(input.company, input.city),
    body: composeTemplate(input, random),
  };
}

export function generateAlternativeMessages(
  input: TemplateInput,
  count: number = 3,
  random: RandomSource = defaultRandom
): string[] {
  const messages: string[] = [];
  for (let i = 0; i < count; i++) {
    messages.push(composeTemplate(input, random));
  }
  return messages;
}

/**
 * Tone catalogue matching the three greeting variants
 */
export function getMessageTemplates() {
  return {
    casual: {
      greeting: "Hi {name},",
      tone: "Friendly and approachable",
      use_case: "For smaller companies or personal connections",
    },
    professional: {
      greeting: "Hello {name},",
      tone: "Formal and business-focused",
      use_case: "For larger companies or formal business contexts",
    },
    warm: {
      greeting: "Hi there {name},",
      tone: "Warm and personal",
      use_case: "For established relationships or warm leads",
    },
  };
}

// ============================================================================
// MESSAGE ANALYSIS
// ============================================================================

const PERSONALIZATION_KEYWORDS = ["weather", "city", "company", "area", "market"];
const VALUE_KEYWORDS = ["help", "automate", "save time", "improve", "streamline", "benefit"];
const CTA_KEYWORDS = ["chat", "call", "schedule", "discuss", "explore", "connect"];
const POSITIVE_WORDS = ["great", "excellent", "wonderful", "amazing", "fantastic", "perfect"];
const NEGATIVE_WORDS = ["problem", "issue", "difficult", "challenge", "struggle"];

export interface MessageAnalysis {
  length: number;
  word_count: number;
  has_personalization: boolean;
  has_value_proposition: boolean;
  has_call_to_action: boolean;
  /** Positive keyword hits minus negative keyword hits */
  tone_score: number;
}

export function analyzeMessageEffectiveness(message: string): MessageAnalysis {
  const lower = message.toLowerCase();
  const words = message.split(/\s+/).filter(w => w.length > 0);

  const positive = POSITIVE_WORDS.filter(w => lower.includes(w)).length;
  const negative = NEGATIVE_WORDS.filter(w => lower.includes(w)).length;

  return {
    length: message.length,
    word_count: words.length,
    has_personalization: PERSONALIZATION_KEYWORDS.some(k => lower.includes(k)),
    has_value_proposition: VALUE_KEYWORDS.some(k => lower.includes(k)),
    has_call_to_action: CTA_KEYWORDS.some(k => lower.includes(k)),
    tone_score: positive - negative,
  };
}
