import {
  AiComposeInput,
  ComposedBody,
  LeadInsert,
  LeadRecord,
  NewLeadInput,
  OutreachSource,
  ProcessLeadResult,
} from "../types/lead";
import { composeAI, DEFAULT_AI_TIMEOUT_MS } from "./aiComposer";
import { enrichLocation, WeatherProvider } from "./enrichment";
import { deriveInsights, formatInsights } from "./insights";
import { composeTemplate } from "./outreach";
import { RandomSource, defaultRandom } from "./random";
import { getScoreBreakdown } from "./scoring";
import { TextGenerator } from "./textGenerator";

/**
 * Storage the pipeline writes to. The db/leads module satisfies this.
 */
export interface LeadRepository {
  insertLead(data: LeadInsert): Promise<LeadRecord>;
  updateLeadOutreach(id: string, message: string, source: OutreachSource): Promise<LeadRecord | null>;
}

export interface PipelineDeps {
  repository: LeadRepository;
  weatherProvider: WeatherProvider | null;
  generator: TextGenerator | null;
  /** Default for leads that don't say */
  useAi: boolean;
  timeoutMs?: number;
  random?: RandomSource;
}

/**
 * Enrich -> score -> insights -> compose -> persist
 */
export async function processLead(input: NewLeadInput, deps: PipelineDeps): Promise<ProcessLeadResult> {
  const startTime = Date.now();

  const enrichment = await enrichLocation(
    { city: input.city, state: input.state, country: input.country },
    deps.weatherProvider
  );
  const signal = enrichment.signal;

  const scoring = getScoreBreakdown(signal.percent_renters, signal.median_income, signal.temperature);
  const insights = formatInsights(
    deriveInsights(signal.percent_renters, signal.median_income, signal.temperature)
  );

  const outreach = await compose(
    {
      name: input.name,
      company: input.company,
      city: input.city,
      state: input.state,
      insights,
      ...signal,
    },
    input.use_ai ?? deps.useAi,
    deps
  );

  const lead = await deps.repository.insertLead({
    name: input.name,
    email: input.email,
    company: input.company,
    property_address: input.property_address?.trim() || null,
    city: input.city,
    state: input.state,
    country: input.country,
    ...signal,
    score: scoring.total_score,
    score_category: scoring.category,
    insights,
    outreach_message: outreach.body,
    outreach_source: outreach.source,
  });

  console.log(`[pipeline] Processed lead ${lead.id}:`, {
    company: lead.company,
    score: lead.score,
    category: lead.score_category,
    outreach_source: outreach.source,
    weather_source: enrichment.meta.weather_source,
    durationMs: Date.now() - startTime,
  });

  return {
    lead,
    scoring,
    enrichment_meta: enrichment.meta,
    outreach,
  };
}

/**
 * Recompose the outreach message for a stored lead from its saved signals.
 * Returns null when the lead has disappeared from storage.
 */
export async function regenerateOutreach(
  lead: LeadRecord,
  deps: PipelineDeps,
  useAi: boolean = deps.useAi
): Promise<{ lead: LeadRecord; outreach: ComposedBody } | null> {
  const outreach = await compose(
    {
      name: lead.name,
      company: lead.company,
      city: lead.city,
      state: lead.state,
      insights: lead.insights,
      temperature: lead.temperature,
      weather_description: lead.weather_description,
      median_income: lead.median_income,
      population: lead.population,
      percent_renters: lead.percent_renters,
    },
    useAi,
    deps
  );

  const updated = await deps.repository.updateLeadOutreach(lead.id, outreach.body, outreach.source);
  if (!updated) return null;

  console.log(`[pipeline] Regenerated outreach for ${lead.id} (${outreach.source})`);
  return { lead: updated, outreach };
}

function compose(input: AiComposeInput, useAi: boolean, deps: PipelineDeps): Promise<ComposedBody> {
  const random = deps.random ?? defaultRandom;

  if (useAi) {
    return composeAI(input, {
      generator: deps.generator,
      timeoutMs: deps.timeoutMs ?? DEFAULT_AI_TIMEOUT_MS,
      random,
    });
  }

  return Promise.resolve({ body: composeTemplate(input, random), source: "template" });
}
