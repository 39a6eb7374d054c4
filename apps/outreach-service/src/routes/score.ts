import { Router, Request, Response } from "express";
import { getScoreBreakdown, getScoringWeights } from "../services/scoring";
import { deriveInsights, formatInsights } from "../services/insights";
import { CompanyData, HistoricalData, scoreLeadEnhanced } from "../services/enhancedScoring";
import { isRecord } from "../lib/guards";

const router = Router();

const SIGNAL_FIELDS = ["percent_renters", "median_income", "temperature"] as const;

type SignalInput = Record<(typeof SIGNAL_FIELDS)[number], number>;

/**
 * POST /score
 * Score raw signals without enriching or storing anything
 */
router.post("/", (req: Request, res: Response) => {
  const parsed = parseSignals(req.body);
  if (!parsed.ok) {
    return res.status(400).json({ error: `Invalid or missing numeric fields: ${parsed.invalid.join(", ")}` });
  }

  const { percent_renters, median_income, temperature } = parsed.value;
  const insights = deriveInsights(percent_renters, median_income, temperature);

  return res.json({
    ...getScoreBreakdown(percent_renters, median_income, temperature),
    insights,
    insights_text: formatInsights(insights),
  });
});

/**
 * POST /score/enhanced
 * Base signals plus optional CRM engagement, company and history bonuses
 */
router.post("/enhanced", (req: Request, res: Response) => {
  const body: unknown = req.body;
  const parsed = parseSignals(body);
  if (!parsed.ok) {
    return res.status(400).json({ error: `Invalid or missing numeric fields: ${parsed.invalid.join(", ")}` });
  }

  const extra: Record<string, unknown> = isRecord(body) ? body : {};
  const engagement = extra.crm_engagement_score;

  const result = scoreLeadEnhanced(
    parsed.value.percent_renters,
    parsed.value.median_income,
    parsed.value.temperature,
    {
      crmEngagementScore: typeof engagement === "number" ? engagement : undefined,
      company: parseCompany(extra.company),
      history: parseHistory(extra.history),
    }
  );

  console.log(`[score] Enhanced score ${result.total_score} (base ${result.base_score})`);
  return res.json(result);
});

router.get("/weights", (_req: Request, res: Response) => {
  res.json(getScoringWeights());
});

// ============================================================================
// PARSING
// ============================================================================

export function parseSignals(body: unknown): { ok: true; value: SignalInput } | { ok: false; invalid: string[] } {
  const record: Record<string, unknown> = isRecord(body) ? body : {};
  const invalid = SIGNAL_FIELDS.filter(field => {
    const value = record[field];
    return typeof value !== "number" || !Number.isFinite(value);
  });

  if (invalid.length > 0) return { ok: false, invalid: [...invalid] };

  return {
    ok: true,
    value: {
      percent_renters: Number(record.percent_renters),
      median_income: Number(record.median_income),
      temperature: Number(record.temperature),
    },
  };
}

function parseCompany(value: unknown): CompanyData | undefined {
  if (!isRecord(value)) return undefined;
  return {
    employee_count: numberOrUndefined(value.employee_count),
    revenue: numberOrUndefined(value.revenue),
    industry: typeof value.industry === "string" ? value.industry : undefined,
    total_funding: numberOrUndefined(value.total_funding),
  };
}

function parseHistory(value: unknown): HistoricalData | undefined {
  if (!isRecord(value)) return undefined;
  return {
    has_previous_interaction: value.has_previous_interaction === true,
    conversion_probability: numberOrUndefined(value.conversion_probability),
    has_deal_history: value.has_deal_history === true,
    days_in_crm: numberOrUndefined(value.days_in_crm),
  };
}

function numberOrUndefined(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export default router;
