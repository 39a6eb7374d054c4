import { LeadRecord } from "../types/lead";
import { HubSpotEnrichmentProperties, MappedLeadInput } from "../types/crm";
import { isRecord } from "../lib/guards";

/**
 * Detect if payload is a HubSpot contact
 */
export function isHubSpotPayload(payload: Record<string, unknown>): boolean {
  // HubSpot uses lowercase field names and often has 'vid' or 'properties' object
  return (
    typeof payload.vid === "number" ||
    isRecord(payload.properties) ||
    typeof payload.firstname === "string" ||
    typeof payload.lastname === "string" ||
    typeof payload.lifecyclestage === "string"
  );
}

/**
 * Map a HubSpot contact (nested `properties` or flat v3 webhook format)
 * to lead input fields
 */
export function mapHubSpotToLeadInput(payload: Record<string, unknown>): {
  input: MappedLeadInput;
  externalId: string | null;
} {
  const getValue = (key: string): string | undefined => {
    const properties = payload.properties;
    if (isRecord(properties)) {
      const prop = properties[key];
      if (isRecord(prop) && typeof prop.value === "string") return prop.value;
      if (typeof prop === "string") return prop;
    }
    const val = payload[key];
    return typeof val === "string" ? val : undefined;
  };

  const name = [getValue("firstname"), getValue("lastname")]
    .filter(part => !!part)
    .join(" ");

  let externalId: string | null = null;
  if (typeof payload.vid === "number") externalId = payload.vid.toString();
  else if (typeof payload.id === "string") externalId = payload.id;

  return {
    input: {
      name: name || undefined,
      email: getValue("email"),
      company: getValue("company"),
      property_address: getValue("address"),
      city: getValue("city"),
      state: getValue("state"),
      country: getValue("country"),
    },
    externalId,
  };
}

/**
 * Enrichment results as HubSpot contact properties
 */
export function toHubSpotProperties(lead: LeadRecord): HubSpotEnrichmentProperties {
  return {
    enrichment_lead_score: lead.score,
    enrichment_score_category: lead.score_category,
    enrichment_temperature: lead.temperature,
    enrichment_weather_description: lead.weather_description,
    enrichment_median_income: lead.median_income,
    enrichment_percent_renters: lead.percent_renters,
    enrichment_population: lead.population,
    enrichment_insights: lead.insights,
    enrichment_outreach_message: lead.outreach_message,
    enrichment_enrichment_status: "Success",
  };
}
