/**
 * CRM field shapes for enrichment write-back
 * Field names match the custom properties/fields created in each CRM
 */

export type SourceCRM = "hubspot" | "salesforce" | "api";

export type EnrichmentStatus = "Success";

/**
 * HubSpot contact custom properties (lowercase, enrichment_ prefix)
 */
export interface HubSpotEnrichmentProperties {
  enrichment_lead_score: number;
  enrichment_score_category: string;
  enrichment_temperature: number;
  enrichment_weather_description: string;
  enrichment_median_income: number;
  enrichment_percent_renters: number;
  enrichment_population: number;
  enrichment_insights: string;
  enrichment_outreach_message: string;
  enrichment_enrichment_status: EnrichmentStatus;
}

/**
 * Salesforce Lead/Contact custom fields (__c suffix)
 */
export interface SalesforceEnrichmentFields {
  Enrichment_Lead_Score__c: number;
  Enrichment_Score_Category__c: string;
  Enrichment_Temperature__c: number;
  Enrichment_Weather_Description__c: string;
  Enrichment_Median_Income__c: number;
  Enrichment_Percent_Renters__c: number;
  Enrichment_Population__c: number;
  Enrichment_Insights__c: string;
  Enrichment_Outreach_Message__c: string;
  Enrichment_Enrichment_Status__c: EnrichmentStatus;
}

/**
 * Lead fields pulled from a CRM record; may be incomplete
 */
export interface MappedLeadInput {
  name?: string;
  email?: string;
  company?: string;
  property_address?: string;
  city?: string;
  state?: string;
  country?: string;
}
