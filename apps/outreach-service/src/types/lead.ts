/**
 * Lead enrichment, scoring and outreach types
 * Record types match the `leads` table in Supabase
 */

// ============================================================================
// ENUMS
// ============================================================================

export type ScoreCategory = 'High' | 'Medium' | 'Low';
export type RentalCategory = 'Excellent' | 'High' | 'Moderate' | 'Low' | 'Very Low';
export type IncomeCategory = 'High' | 'Above Average' | 'Average' | 'Below Average' | 'Low' | 'Very Low';
export type TemperatureCategory = 'Optimal' | 'Good' | 'Moderate' | 'Poor' | 'Extreme';

export type RentalInsight = 'high rental market' | 'moderate rental market' | 'low rental market';
export type IncomeInsight = 'affluent area' | 'middle-income area' | 'budget-conscious area';
export type ClimateInsight = 'warm climate' | 'cool climate' | 'temperate climate';

export type OutreachSource = 'ai' | 'template';

// ============================================================================
// ENRICHMENT
// ============================================================================

/**
 * Weather + demographic signals for a lead's location
 */
export interface EnrichmentSignal {
  /** Degrees Fahrenheit */
  temperature: number;
  /** Free text from the weather provider, any casing */
  weather_description: string;
  median_income: number;
  population: number;
  /** Percentage, conventionally 0-100 */
  percent_renters: number;
}

export interface EnrichmentMeta {
  weather_source: 'openweather' | 'estimate';
  demographics_source: 'table';
  enriched_at: string;
  errors: string[];
}

// ============================================================================
// SCORING
// ============================================================================

export interface ScoreResult {
  /** 0-100 */
  total_score: number;
  rental_score: number;
  income_score: number;
  temp_score: number;
  category: ScoreCategory;
}

export interface ScoreBreakdown extends ScoreResult {
  rental_category: RentalCategory;
  income_category: IncomeCategory;
  temp_category: TemperatureCategory;
  breakdown: {
    rental_percentage: string;
    median_income: string;
    temperature: string;
  };
}

/** Always rental, income, climate - in that order */
export type Insights = [RentalInsight, IncomeInsight, ClimateInsight];

// ============================================================================
// OUTREACH
// ============================================================================

export interface OutreachMessage {
  subject: string;
  body: string;
}

/**
 * Inputs for the template path
 */
export interface TemplateInput {
  name: string;
  company: string;
  city: string;
  weather_description: string;
  /** Joined insight string, e.g. "high rental market, affluent area, temperate climate" */
  insights: string;
}

/**
 * Inputs for the AI-assisted path (superset of the template inputs)
 */
export interface AiComposeInput extends TemplateInput {
  state: string;
  temperature: number;
  median_income: number;
  percent_renters: number;
  population: number;
}

export interface ComposedBody {
  body: string;
  source: OutreachSource;
  /** Set when the template path stood in for the AI path */
  fallback_reason?: string;
}

// ============================================================================
// DATABASE RECORD TYPES
// ============================================================================

export interface LeadRecord {
  id: string;
  created_at: string;

  // Identity
  name: string;
  email: string;
  company: string;
  property_address: string | null;
  city: string;
  state: string;
  country: string;

  // Enrichment
  temperature: number;
  weather_description: string;
  median_income: number;
  population: number;
  percent_renters: number;

  // Scoring
  score: number;
  score_category: ScoreCategory;
  insights: string;

  // Outreach
  outreach_message: string;
  outreach_source: OutreachSource;
}

export type LeadInsert = Omit<LeadRecord, 'id' | 'created_at'> & {
  id?: string;
};

// ============================================================================
// INPUT / OUTPUT TYPES (API Contract)
// ============================================================================

/**
 * Lead submitted by the operator
 */
export interface NewLeadInput {
  name: string;
  email: string;
  company: string;
  property_address?: string;
  city: string;
  state: string;
  country: string;
  /** Overrides config.useAi for this lead */
  use_ai?: boolean;
}

export interface ProcessLeadResult {
  lead: LeadRecord;
  scoring: ScoreBreakdown;
  enrichment_meta: EnrichmentMeta;
  outreach: ComposedBody;
}
