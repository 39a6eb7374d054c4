import { LeadRecord } from "../types/lead";
import { MappedLeadInput, SalesforceEnrichmentFields } from "../types/crm";

/**
 * Detect if payload is a Salesforce Lead or Contact
 */
export function isSalesforcePayload(payload: Record<string, unknown>): boolean {
  // Salesforce uses PascalCase field names
  return (
    typeof payload.LastName === "string" ||
    typeof payload.Company === "string" ||
    typeof payload.MailingCity === "string" ||
    (typeof payload.Id === "string" && payload.Id.length === 18) // Salesforce IDs are 18 chars
  );
}

/**
 * Map a Salesforce Lead to lead input fields.
 * Contacts carry their address on the Mailing* fields instead.
 */
export function mapSalesforceToLeadInput(payload: Record<string, unknown>): {
  input: MappedLeadInput;
  externalId: string | null;
} {
  const str = (key: string): string | undefined => {
    const val = payload[key];
    return typeof val === "string" && val ? val : undefined;
  };

  const name = [str("FirstName"), str("LastName")]
    .filter(part => !!part)
    .join(" ");

  return {
    input: {
      name: name || undefined,
      email: str("Email"),
      company: str("Company"),
      property_address: str("Street") ?? str("MailingStreet"),
      city: str("City") ?? str("MailingCity"),
      state: str("State") ?? str("MailingState"),
      country: str("Country") ?? str("MailingCountry"),
    },
    externalId: str("Id") ?? null,
  };
}

/**
 * Enrichment results as Salesforce custom fields
 */
export function toSalesforceFields(lead: LeadRecord): SalesforceEnrichmentFields {
  return {
    Enrichment_Lead_Score__c: lead.score,
    Enrichment_Score_Category__c: lead.score_category,
    Enrichment_Temperature__c: lead.temperature,
    Enrichment_Weather_Description__c: lead.weather_description,
    Enrichment_Median_Income__c: lead.median_income,
    Enrichment_Percent_Renters__c: lead.percent_renters,
    Enrichment_Population__c: lead.population,
    Enrichment_Insights__c: lead.insights,
    Enrichment_Outreach_Message__c: lead.outreach_message,
    Enrichment_Enrichment_Status__c: "Success",
  };
}
