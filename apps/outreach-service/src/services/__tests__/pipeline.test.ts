import { processLead, regenerateOutreach, LeadRepository, PipelineDeps } from "../pipeline";
import { WeatherProvider } from "../enrichment";
import { TextGenerator } from "../textGenerator";
import { composeTemplate } from "../outreach";
import { MemoryStore } from "../../db/memoryStore";
import { LeadInsert, LeadRecord, NewLeadInput, OutreachSource } from "../../types/lead";

class FakeRepository implements LeadRepository {
  store = new MemoryStore<LeadRecord>();
  private nextId = 1;

  async insertLead(data: LeadInsert): Promise<LeadRecord> {
    return this.store.insert({
      ...data,
      id: data.id ?? `lead-${this.nextId++}`,
      created_at: "2025-01-02T03:04:05.000Z",
    });
  }

  async updateLeadOutreach(id: string, message: string, source: OutreachSource): Promise<LeadRecord | null> {
    return this.store.update(id, { outreach_message: message, outreach_source: source });
  }
}

const clearSkies: WeatherProvider = {
  name: "openweather",
  getWeather: async () => ({ temperature: 70, weather_description: "Clear Sky" }),
};

const input: NewLeadInput = {
  name: "Jordan Lee",
  email: "jordan@acme.example",
  company: "Acme Properties",
  property_address: "  12 Main St ",
  city: "New York",
  state: "NY",
  country: "US",
};

function deps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
  return {
    repository: new FakeRepository(),
    weatherProvider: clearSkies,
    generator: null,
    useAi: false,
    random: () => 0,
    ...overrides,
  };
}

describe("Lead Pipeline", () => {
  describe("processLead", () => {
    it("should enrich, score, compose and persist a lead", async () => {
      const result = await processLead(input, deps());

      // New York: 65% renters, NY $70k income, 70°F
      expect(result.scoring.rental_score).toBe(40);
      expect(result.scoring.income_score).toBe(25);
      expect(result.scoring.temp_score).toBe(20);
      expect(result.lead).toMatchObject({
        id: "lead-1",
        name: "Jordan Lee",
        property_address: "12 Main St",
        temperature: 70,
        weather_description: "Clear Sky",
        median_income: 70000,
        population: 20000000,
        percent_renters: 65,
        score: 85,
        score_category: "High",
        insights: "high rental market, middle-income area, temperate climate",
        outreach_source: "template",
      });
      expect(result.enrichment_meta.weather_source).toBe("openweather");
    });

    it("should compose the template body from the lead's signals", async () => {
      const result = await processLead(input, deps());

      expect(result.lead.outreach_message).toBe(
        composeTemplate(
          {
            name: "Jordan Lee",
            company: "Acme Properties",
            city: "New York",
            weather_description: "Clear Sky",
            insights: "high rental market, middle-income area, temperate climate",
          },
          () => 0
        )
      );
      expect(result.outreach.fallback_reason).toBeUndefined();
    });

    it("should store a missing address as null", async () => {
      const result = await processLead({ ...input, property_address: "   " }, deps());

      expect(result.lead.property_address).toBeNull();
    });

    it("should use the generator when AI is enabled", async () => {
      const generator: TextGenerator = {
        name: "fake",
        generate: async () => "Hi Jordan Lee, a note for Acme Properties.",
      };

      const result = await processLead(input, deps({ generator, useAi: true }));

      expect(result.lead.outreach_source).toBe("ai");
      expect(result.lead.outreach_message).toBe("Hi Jordan Lee, a note for Acme Properties.");
    });

    it("should let the lead override the AI default", async () => {
      let calls = 0;
      const generator: TextGenerator = {
        name: "fake",
        generate: async () => {
          calls++;
          return "AI text";
        },
      };

      const result = await processLead({ ...input, use_ai: false }, deps({ generator, useAi: true }));

      expect(calls).toBe(0);
      expect(result.lead.outreach_source).toBe("template");
    });

    it("should fall back to the template when the generator fails", async () => {
      const generator: TextGenerator = {
        name: "fake",
        generate: async () => {
          throw new Error("503 Service Unavailable");
        },
      };

      const result = await processLead(input, deps({ generator, useAi: true }));

      expect(result.lead.outreach_source).toBe("template");
      expect(result.outreach.fallback_reason).toBe("failed");
      expect(result.lead.outreach_message).toContain("Jordan Lee");
    });

    it("should estimate weather without a provider", async () => {
      const result = await processLead(input, deps({ weatherProvider: null }));

      expect(result.lead.temperature).toBe(60);
      expect(result.lead.weather_description).toBe("mild and variable");
      expect(result.enrichment_meta.errors).toEqual(["Weather API: not configured"]);
    });
  });

  describe("regenerateOutreach", () => {
    it("should replace the stored message", async () => {
      const repository = new FakeRepository();
      const { lead } = await processLead(input, deps({ repository }));

      const generator: TextGenerator = { name: "fake", generate: async () => "Fresh AI text" };
      const result = await regenerateOutreach(lead, deps({ repository, generator }), true);

      expect(result?.outreach).toEqual({ body: "Fresh AI text", source: "ai" });
      expect(repository.store.getById(lead.id)?.outreach_message).toBe("Fresh AI text");
      expect(repository.store.getById(lead.id)?.outreach_source).toBe("ai");
    });

    it("should return null when the lead no longer exists", async () => {
      const repository = new FakeRepository();
      const { lead } = await processLead(input, deps({ repository }));
      repository.store.clear();

      expect(await regenerateOutreach(lead, deps({ repository }))).toBeNull();
    });
  });
});
