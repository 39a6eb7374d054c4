import {
  ScoreResult,
  ScoreBreakdown,
  ScoreCategory,
  RentalCategory,
  IncomeCategory,
  TemperatureCategory,
} from "../types/lead";

export const SCORING_VERSION = "v1";

// ============================================================================
// CATEGORY THRESHOLDS
// Independent product constants - not derived from the component maxima
// ============================================================================

const HIGH_THRESHOLD = 71;
const MEDIUM_THRESHOLD = 41;

// ============================================================================
// COMPONENT BANDS
// Ordered highest first; first band whose floor is met wins
// ============================================================================

const RENTAL_BANDS: Array<{ min: number; score: number; category: RentalCategory }> = [
  { min: 60, score: 40, category: "Excellent" },
  { min: 50, score: 35, category: "High" },
  { min: 40, score: 25, category: "Moderate" },
  { min: 30, score: 15, category: "Low" },
];

const INCOME_BANDS: Array<{ min: number; score: number; category: IncomeCategory }> = [
  { min: 80000, score: 30, category: "High" },
  { min: 70000, score: 25, category: "Above Average" },
  { min: 60000, score: 20, category: "Average" },
  { min: 50000, score: 15, category: "Below Average" },
  { min: 40000, score: 10, category: "Low" },
];

interface ComponentScore<C> {
  score: number;
  category: C;
}

// ============================================================================
// MAIN SCORING FUNCTIONS
// ============================================================================

/**
 * Score a lead from its enrichment signals.
 * Components are computed independently and summed, then clamped to 0-100.
 */
export function scoreLead(
  percentRenters: number,
  medianIncome: number,
  temperature: number
): ScoreResult {
  const rental = scoreRental(percentRenters);
  const income = scoreIncome(medianIncome);
  const temp = scoreTemperature(temperature);

  const total = clampScore(rental.score + income.score + temp.score);

  return {
    total_score: total,
    rental_score: rental.score,
    income_score: income.score,
    temp_score: temp.score,
    category: categorizeScore(total),
  };
}

/**
 * Map a total score to its High/Medium/Low bucket
 */
export function categorizeScore(score: number): ScoreCategory {
  if (score >= HIGH_THRESHOLD) return "High";
  if (score >= MEDIUM_THRESHOLD) return "Medium";
  return "Low";
}

/**
 * Same numbers as scoreLead, plus a label per component and
 * human-readable explanation strings
 */
export function getScoreBreakdown(
  percentRenters: number,
  medianIncome: number,
  temperature: number
): ScoreBreakdown {
  const rental = scoreRental(percentRenters);
  const income = scoreIncome(medianIncome);
  const temp = scoreTemperature(temperature);

  const total = clampScore(rental.score + income.score + temp.score);

  return {
    total_score: total,
    rental_score: rental.score,
    income_score: income.score,
    temp_score: temp.score,
    category: categorizeScore(total),
    rental_category: rental.category,
    income_category: income.category,
    temp_category: temp.category,
    breakdown: {
      rental_percentage: `${percentRenters.toFixed(1)}% renters (${rental.category}) → ${rental.score} points`,
      median_income: `${formatCurrency(medianIncome)} income (${income.category}) → ${income.score} points`,
      temperature: `${temperature}°F (${temp.category}) → ${temp.score} points`,
    },
  };
}

/**
 * Static description of the scoring model, for display
 */
export function getScoringWeights() {
  return {
    version: SCORING_VERSION,
    weights: {
      rental_percentage: 40,
      median_income: 30,
      temperature: 20,
    },
    explanations: {
      rental_percentage: "Higher rental percentage indicates more potential customers for property management services",
      median_income: "Higher income areas have more disposable income for premium services",
      temperature: "Comfortable weather conditions correlate with higher resident engagement",
    },
    ranges: {
      rental_percentage: "5-40 points (60%+ renters for the maximum)",
      median_income: "5-30 points ($80k+ median income for the maximum)",
      temperature: "0-20 points (65-75°F is optimal)",
    },
    categories: {
      High: `${HIGH_THRESHOLD}-100`,
      Medium: `${MEDIUM_THRESHOLD}-${HIGH_THRESHOLD - 1}`,
      Low: `0-${MEDIUM_THRESHOLD - 1}`,
    },
  };
}

// ============================================================================
// INDIVIDUAL SCORING FUNCTIONS
// ============================================================================

function scoreRental(percentRenters: number): ComponentScore<RentalCategory> {
  const band = RENTAL_BANDS.find(b => percentRenters >= b.min);
  return band ?? { score: 5, category: "Very Low" };
}

function scoreIncome(medianIncome: number): ComponentScore<IncomeCategory> {
  const band = INCOME_BANDS.find(b => medianIncome >= b.min);
  return band ?? { score: 5, category: "Very Low" };
}

/**
 * Bands are symmetric around 65-75°F. The optimal band is inclusive on both
 * ends; every outer band includes its inner-side edge on the low side and
 * its outer edge on the high side (60 is Good, 75.01 is Good).
 */
function scoreTemperature(t: number): ComponentScore<TemperatureCategory> {
  if (t >= 65 && t <= 75) return { score: 20, category: "Optimal" };
  if ((t >= 60 && t < 65) || (t > 75 && t <= 80)) return { score: 15, category: "Good" };
  if ((t >= 55 && t < 60) || (t > 80 && t <= 85)) return { score: 10, category: "Moderate" };
  if ((t >= 50 && t < 55) || (t > 85 && t <= 90)) return { score: 5, category: "Poor" };
  return { score: 0, category: "Extreme" };
}

function clampScore(total: number): number {
  return Math.round(Math.max(0, Math.min(100, total)));
}

function formatCurrency(amount: number): string {
  return `$${amount.toLocaleString("en-US", { maximumFractionDigits: 0 })}`;
}
