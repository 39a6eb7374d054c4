import { Insights, RentalInsight, IncomeInsight, ClimateInsight } from "../types/lead";

/**
 * Derive the three human-facing insight tags for a location.
 * Coarser than the scoring bands; order is rental, income, climate.
 */
export function deriveInsights(
  percentRenters: number,
  medianIncome: number,
  temperature: number
): Insights {
  return [
    rentalInsight(percentRenters),
    incomeInsight(medianIncome),
    climateInsight(temperature),
  ];
}

/**
 * Join tags for display and for template matching
 */
export function formatInsights(insights: readonly string[]): string {
  return insights.join(", ");
}

function rentalInsight(percentRenters: number): RentalInsight {
  if (percentRenters > 50) return "high rental market";
  if (percentRenters > 30) return "moderate rental market";
  return "low rental market";
}

function incomeInsight(medianIncome: number): IncomeInsight {
  if (medianIncome > 75000) return "affluent area";
  if (medianIncome > 50000) return "middle-income area";
  return "budget-conscious area";
}

function climateInsight(temperature: number): ClimateInsight {
  if (temperature > 80) return "warm climate";
  if (temperature < 40) return "cool climate";
  return "temperate climate";
}
