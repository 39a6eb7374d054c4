import { ScoreBreakdown, ScoreCategory } from "../types/lead";
import { categorizeScore, getScoreBreakdown } from "./scoring";

/**
 * Firmographics for the lead's company (from a CRM or enrichment vendor)
 */
export interface CompanyData {
  employee_count?: number;
  revenue?: number;
  industry?: string;
  total_funding?: number;
}

/**
 * Interaction history for the lead
 */
export interface HistoricalData {
  has_previous_interaction?: boolean;
  /** 0-1 */
  conversion_probability?: number;
  has_deal_history?: boolean;
  days_in_crm?: number;
}

export interface EnhancedSignals {
  /** 0-100 engagement score from the CRM */
  crmEngagementScore?: number;
  company?: CompanyData;
  history?: HistoricalData;
}

export interface EnhancedScoreResult {
  total_score: number;
  base_score: number;
  crm_bonus: number;
  company_bonus: number;
  history_bonus: number;
  category: ScoreCategory;
  base_breakdown: ScoreBreakdown;
  reasons: string[];
}

const PROPERTY_RELATED_INDUSTRIES = [
  "real estate", "property management", "housing",
  "construction", "facilities management"
];

/**
 * Base location score plus CRM, company and history bonuses (up to 10 each).
 */
export function scoreLeadEnhanced(
  percentRenters: number,
  medianIncome: number,
  temperature: number,
  signals: EnhancedSignals = {}
): EnhancedScoreResult {
  const base = getScoreBreakdown(percentRenters, medianIncome, temperature);
  const reasons: string[] = [];

  const crmBonus = scoreCrmEngagement(signals.crmEngagementScore, reasons);
  const companyBonus = scoreCompany(signals.company, reasons);
  const historyBonus = scoreHistory(signals.history, reasons);

  const total = Math.round(
    Math.max(0, Math.min(100, base.total_score + crmBonus + companyBonus + historyBonus))
  );

  return {
    total_score: total,
    base_score: base.total_score,
    crm_bonus: Math.round(crmBonus * 10) / 10,
    company_bonus: companyBonus,
    history_bonus: historyBonus,
    category: categorizeScore(total),
    base_breakdown: base,
    reasons,
  };
}

function scoreCrmEngagement(engagement: number | undefined, reasons: string[]): number {
  if (engagement === undefined) return 0;
  const bonus = Math.min(10, engagement / 10);
  reasons.push(`CRM engagement score: ${engagement} → +${bonus.toFixed(1)} points`);
  return bonus;
}

function scoreCompany(company: CompanyData | undefined, reasons: string[]): number {
  if (!company) return 0;
  let bonus = 0;

  const employees = company.employee_count ?? 0;
  if (employees > 200) {
    bonus += 3;
    reasons.push(`Large company (${employees} employees) → +3 points`);
  } else if (employees > 50) {
    bonus += 2;
    reasons.push(`Medium company (${employees} employees) → +2 points`);
  } else if (employees > 10) {
    bonus += 1;
    reasons.push(`Small company (${employees} employees) → +1 point`);
  }

  const revenue = company.revenue ?? 0;
  if (revenue > 10_000_000) {
    bonus += 3;
    reasons.push(`High revenue ($${(revenue / 1_000_000).toFixed(1)}M) → +3 points`);
  } else if (revenue > 1_000_000) {
    bonus += 2;
    reasons.push(`Medium revenue ($${(revenue / 1_000_000).toFixed(1)}M) → +2 points`);
  } else if (revenue > 100_000) {
    bonus += 1;
    reasons.push(`Low revenue ($${(revenue / 1000).toFixed(0)}K) → +1 point`);
  }

  const industry = (company.industry ?? "").toLowerCase();
  if (PROPERTY_RELATED_INDUSTRIES.some(i => industry.includes(i))) {
    bonus += 2;
    reasons.push(`Property-related industry: ${company.industry} → +2 points`);
  }

  const funding = company.total_funding ?? 0;
  if (funding > 10_000_000) {
    bonus += 2;
    reasons.push(`Well funded ($${(funding / 1_000_000).toFixed(1)}M) → +2 points`);
  } else if (funding > 1_000_000) {
    bonus += 1;
    reasons.push(`Funded ($${(funding / 1_000_000).toFixed(1)}M) → +1 point`);
  }

  return bonus;
}

function scoreHistory(history: HistoricalData | undefined, reasons: string[]): number {
  if (!history) return 0;
  let bonus = 0;

  if (history.has_previous_interaction) {
    bonus += 3;
    reasons.push("Previous interaction → +3 points");
  }

  const probability = history.conversion_probability ?? 0;
  const pct = `${Math.round(probability * 100)}%`;
  if (probability > 0.7) {
    bonus += 3;
    reasons.push(`High conversion probability (${pct}) → +3 points`);
  } else if (probability > 0.5) {
    bonus += 2;
    reasons.push(`Medium conversion probability (${pct}) → +2 points`);
  } else if (probability > 0.3) {
    bonus += 1;
    reasons.push(`Low conversion probability (${pct}) → +1 point`);
  }

  if (history.has_deal_history) {
    bonus += 2;
    reasons.push("Deal history → +2 points");
  }

  // Recent leads get a bonus; unknown age counts as old
  const days = history.days_in_crm ?? 999;
  if (days < 30) {
    bonus += 2;
    reasons.push(`Recent lead (${days} days in CRM) → +2 points`);
  } else if (days < 90) {
    bonus += 1;
    reasons.push(`Lead ${days} days in CRM → +1 point`);
  }

  return bonus;
}
