import { isHubSpotPayload, mapHubSpotToLeadInput, toHubSpotProperties } from "../hubspot";
import { isSalesforcePayload, mapSalesforceToLeadInput, toSalesforceFields } from "../salesforce";
import { LeadRecord } from "../../types/lead";

const lead: LeadRecord = {
  id: "lead-1",
  created_at: "2025-01-02T03:04:05.000Z",
  name: "Jordan Lee",
  email: "jordan@acme.example",
  company: "Acme Properties",
  property_address: "12 Main St",
  city: "Austin",
  state: "TX",
  country: "US",
  temperature: 72,
  weather_description: "Clear Sky",
  median_income: 60000,
  population: 29000000,
  percent_renters: 45,
  score: 75,
  score_category: "High",
  insights: "moderate rental market, middle-income area, temperate climate",
  outreach_message: "Hi Jordan Lee",
  outreach_source: "ai",
};

describe("HubSpot mapper", () => {
  it("should detect HubSpot contacts", () => {
    expect(isHubSpotPayload({ vid: 101 })).toBe(true);
    expect(isHubSpotPayload({ properties: {} })).toBe(true);
    expect(isHubSpotPayload({ firstname: "Jordan" })).toBe(true);
    expect(isHubSpotPayload({ name: "Jordan Lee", company: "Acme" })).toBe(false);
  });

  it("should map nested properties", () => {
    const result = mapHubSpotToLeadInput({
      vid: 101,
      properties: {
        firstname: { value: "Jordan" },
        lastname: { value: "Lee" },
        email: { value: "jordan@acme.example" },
        company: { value: "Acme Properties" },
        city: { value: "Austin" },
        state: { value: "TX" },
        country: { value: "US" },
      },
    });

    expect(result.externalId).toBe("101");
    expect(result.input).toEqual({
      name: "Jordan Lee",
      email: "jordan@acme.example",
      company: "Acme Properties",
      property_address: undefined,
      city: "Austin",
      state: "TX",
      country: "US",
    });
  });

  it("should map the flat webhook format", () => {
    const result = mapHubSpotToLeadInput({
      id: "hs-55",
      lastname: "Lee",
      email: "jordan@acme.example",
      address: "12 Main St",
    });

    expect(result.externalId).toBe("hs-55");
    expect(result.input.name).toBe("Lee");
    expect(result.input.property_address).toBe("12 Main St");
    expect(result.input.company).toBeUndefined();
  });

  it("should write enrichment as HubSpot properties", () => {
    expect(toHubSpotProperties(lead)).toEqual({
      enrichment_lead_score: 75,
      enrichment_score_category: "High",
      enrichment_temperature: 72,
      enrichment_weather_description: "Clear Sky",
      enrichment_median_income: 60000,
      enrichment_percent_renters: 45,
      enrichment_population: 29000000,
      enrichment_insights: "moderate rental market, middle-income area, temperate climate",
      enrichment_outreach_message: "Hi Jordan Lee",
      enrichment_enrichment_status: "Success",
    });
  });
});

describe("Salesforce mapper", () => {
  it("should detect Salesforce records", () => {
    expect(isSalesforcePayload({ LastName: "Lee" })).toBe(true);
    expect(isSalesforcePayload({ Id: "00Q5g00000ABCDEFGH" })).toBe(true);
    expect(isSalesforcePayload({ Id: "short" })).toBe(false);
    expect(isSalesforcePayload({ company: "Acme" })).toBe(false);
  });

  it("should map Lead fields", () => {
    const result = mapSalesforceToLeadInput({
      Id: "00Q5g00000ABCDEFGH",
      FirstName: "Jordan",
      LastName: "Lee",
      Email: "jordan@acme.example",
      Company: "Acme Properties",
      Street: "12 Main St",
      City: "Austin",
      State: "TX",
      Country: "US",
    });

    expect(result.externalId).toBe("00Q5g00000ABCDEFGH");
    expect(result.input).toEqual({
      name: "Jordan Lee",
      email: "jordan@acme.example",
      company: "Acme Properties",
      property_address: "12 Main St",
      city: "Austin",
      state: "TX",
      country: "US",
    });
  });

  it("should read Contact mailing address fields", () => {
    const result = mapSalesforceToLeadInput({
      LastName: "Lee",
      MailingCity: "Denver",
      MailingState: "CO",
      MailingCountry: "US",
    });

    expect(result.input.city).toBe("Denver");
    expect(result.input.state).toBe("CO");
    expect(result.input.country).toBe("US");
    expect(result.externalId).toBeNull();
  });

  it("should write enrichment as Salesforce custom fields", () => {
    expect(toSalesforceFields(lead)).toEqual({
      Enrichment_Lead_Score__c: 75,
      Enrichment_Score_Category__c: "High",
      Enrichment_Temperature__c: 72,
      Enrichment_Weather_Description__c: "Clear Sky",
      Enrichment_Median_Income__c: 60000,
      Enrichment_Percent_Renters__c: 45,
      Enrichment_Population__c: 29000000,
      Enrichment_Insights__c: "moderate rental market, middle-income area, temperate climate",
      Enrichment_Outreach_Message__c: "Hi Jordan Lee",
      Enrichment_Enrichment_Status__c: "Success",
    });
  });
});
