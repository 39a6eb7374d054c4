import { Server } from "http";
import { SendMailOptions } from "nodemailer";
import { createApp } from "../../app";
import * as leads from "../../db/leads";
import { SmtpEmailSender, MailTransport } from "../../services/delivery";

class FakeTransport implements MailTransport {
  sent: SendMailOptions[] = [];

  async sendMail(options: SendMailOptions): Promise<{ messageId?: string }> {
    this.sent.push(options);
    return { messageId: `<${this.sent.length}@test>` };
  }
}

const API_KEY = "test-operator-key";

const newLead = {
  name: "Jordan Lee",
  email: "jordan@acme.example",
  company: "Acme Properties",
  city: "New York",
  state: "NY",
  country: "US",
};

interface CallResult {
  status: number;
  headers: Headers;
  text: string;
  body: Record<string, unknown>;
}

describe("HTTP API", () => {
  const transport = new FakeTransport();
  let server: Server;
  let baseUrl = "";

  beforeAll(async () => {
    const app = createApp({
      store: leads,
      pipeline: {
        weatherProvider: null,
        generator: null,
        useAi: false,
        random: () => 0,
      },
      emailSender: new SmtpEmailSender(
        {
          host: "smtp.example.com",
          port: 587,
          secure: false,
          senderName: "Sales Team",
          senderEmail: "sales@example.com",
          password: "test-secret",
        },
        transport
      ),
      operatorApiKey: API_KEY,
    });

    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("Server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  });

  beforeEach(() => {
    leads.memoryLeads.clear();
    transport.sent = [];
  });

  async function call(
    method: string,
    path: string,
    options: { body?: unknown; apiKey?: string | null } = {}
  ): Promise<CallResult> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    const apiKey = options.apiKey === undefined ? API_KEY : options.apiKey;
    if (apiKey) headers["x-api-key"] = apiKey;

    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    const text = await response.text();

    let body: Record<string, unknown> = {};
    if ((response.headers.get("content-type") ?? "").includes("application/json")) {
      const parsed: unknown = JSON.parse(text);
      if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
        body = Object.fromEntries(Object.entries(parsed));
      }
    }

    return { status: response.status, headers: response.headers, text, body };
  }

  async function createLead(overrides: Record<string, unknown> = {}): Promise<string> {
    const res = await call("POST", "/leads", { body: { ...newLead, ...overrides } });
    expect(res.status).toBe(201);
    const stored = leads.memoryLeads.list();
    return stored[stored.length - 1].id;
  }

  describe("GET /health", () => {
    it("should answer without an API key", async () => {
      const res = await call("GET", "/health", { apiKey: null });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ status: "ok", ai: "disabled", weather: "estimate", email: "configured" });
    });
  });

  describe("auth", () => {
    it("should reject requests without a key", async () => {
      const res = await call("GET", "/leads", { apiKey: null });

      expect(res.status).toBe(401);
      expect(res.body.error).toBe(
        "Missing API key. Provide via X-API-Key header, Authorization Bearer, or api_key query param"
      );
    });

    it("should reject a wrong key", async () => {
      const res = await call("GET", "/leads", { apiKey: "wrong-key" });

      expect(res.status).toBe(401);
      expect(res.body.error).toBe("Invalid API key");
    });

    it("should accept the key as a query param", async () => {
      const res = await call("GET", `/leads?api_key=${API_KEY}`, { apiKey: null });

      expect(res.status).toBe(200);
    });
  });

  describe("POST /leads", () => {
    it("should list missing required fields", async () => {
      const res = await call("POST", "/leads", { body: { name: "Jordan Lee", company: "Acme", state: "NY", country: "US" } });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: "Missing required fields: email, city",
        missing_fields: ["email", "city"],
      });
    });

    it("should reject a malformed email", async () => {
      const res = await call("POST", "/leads", { body: { ...newLead, email: "not-an-email" } });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Invalid email address: not-an-email");
    });

    it("should process and store a lead", async () => {
      const res = await call("POST", "/leads", { body: newLead });

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        source: "api",
        external_id: null,
        lead: {
          name: "Jordan Lee",
          temperature: 60,
          percent_renters: 65,
          median_income: 70000,
          score: 80,
          score_category: "High",
          outreach_source: "template",
        },
        scoring: { rental_score: 40, income_score: 25, temp_score: 15 },
        enrichment_meta: { weather_source: "estimate" },
      });
      expect(leads.memoryLeads.size).toBe(1);
    });

    it("should accept a HubSpot contact payload", async () => {
      const res = await call("POST", "/leads", {
        body: {
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
        },
      });

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({ source: "hubspot", external_id: "101", lead: { city: "Austin" } });
    });
  });

  describe("GET /leads", () => {
    it("should filter by category", async () => {
      await createLead();
      await createLead({ city: "Smallville", state: "ZZ" });

      const res = await call("GET", "/leads?category=High");

      expect(res.status).toBe(200);
      expect(res.body.count).toBe(1);
    });

    it("should reject an unknown category", async () => {
      const res = await call("GET", "/leads?category=Hot");

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Invalid category: Hot. Use High, Medium or Low");
    });

    it("should export CSV", async () => {
      await createLead();

      const res = await call("GET", "/leads/export.csv");

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("text/csv; charset=utf-8");
      expect(res.headers.get("content-disposition")).toMatch(/^attachment; filename="leads-.*\.csv"$/);
      expect(res.text.split("\r\n")).toHaveLength(2);
    });
  });

  describe("single lead routes", () => {
    it("should return 404 for an unknown lead", async () => {
      const res = await call("GET", "/leads/missing-id");

      expect(res.status).toBe(404);
      expect(res.body.error).toBe("Lead not found");
    });

    it("should fetch a stored lead", async () => {
      const id = await createLead();

      const res = await call("GET", `/leads/${id}`);

      expect(res.status).toBe(200);
      expect(res.body.id).toBe(id);
    });

    it("should regenerate outreach", async () => {
      const id = await createLead();

      const res = await call("POST", `/leads/${id}/outreach`, { body: { use_ai: true } });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        outreach: { source: "template", fallback_reason: "not_configured" },
        lead: { id },
      });
    });

    it("should list template alternatives with analysis", async () => {
      const id = await createLead();

      const res = await call("GET", `/leads/${id}/outreach/alternatives?count=2`);

      expect(res.status).toBe(200);
      expect(Array.isArray(res.body.alternatives)).toBe(true);
      expect(res.body.alternatives).toHaveLength(2);
    });

    it("should build compose links", async () => {
      const id = await createLead();

      const res = await call("GET", `/leads/${id}/compose-links`);

      expect(res.status).toBe(200);
      expect(String(res.body.gmail_url)).toMatch(/^https:\/\/mail\.google\.com\/mail\/\?view=cm&fs=1&to=jordan%40acme\.example&su=/);
      expect(String(res.body.mailto_url)).toMatch(/^mailto:jordan@acme\.example\?subject=/);
    });

    it("should send the stored message over SMTP", async () => {
      const id = await createLead();

      const res = await call("POST", `/leads/${id}/send`, { body: {} });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, message: "Email sent successfully to jordan@acme.example" });
      expect(transport.sent).toHaveLength(1);
      expect(transport.sent[0].to).toBe("jordan@acme.example");
    });

    it("should map enrichment for a CRM", async () => {
      const id = await createLead();

      const res = await call("GET", `/leads/${id}/crm/salesforce`);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        crm: "salesforce",
        lead_id: id,
        fields: { Enrichment_Lead_Score__c: 80, Enrichment_Enrichment_Status__c: "Success" },
      });
    });

    it("should reject an unsupported CRM", async () => {
      const id = await createLead();

      const res = await call("GET", `/leads/${id}/crm/pipedrive`);

      expect(res.status).toBe(400);
    });
  });

  describe("POST /leads/send-bulk", () => {
    it("should email leads at or above the minimum score", async () => {
      await createLead();
      await createLead({ name: "Casey Park", email: "casey@low.example", city: "Smallville", state: "ZZ" });

      const res = await call("POST", "/leads/send-bulk", { body: {} });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ success: true, total_leads: 1, successful_sends: 1, failed_sends: 0 });
      expect(transport.sent.map(m => m.to)).toEqual(["jordan@acme.example"]);
    });

    it("should answer 404 when nothing qualifies", async () => {
      const res = await call("POST", "/leads/send-bulk", { body: { min_score: 95 } });

      expect(res.status).toBe(404);
      expect(res.body.error).toBe("No leads found with score >= 95");
    });
  });

  describe("POST /score", () => {
    it("should score raw signals", async () => {
      const res = await call("POST", "/score", {
        body: { percent_renters: 65, median_income: 85000, temperature: 70 },
      });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        total_score: 90,
        category: "High",
        insights: ["high rental market", "affluent area", "temperate climate"],
        insights_text: "high rental market, affluent area, temperate climate",
      });
    });

    it("should name invalid fields", async () => {
      const res = await call("POST", "/score", { body: { percent_renters: 65, median_income: "lots" } });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Invalid or missing numeric fields: median_income, temperature");
    });

    it("should add enhanced bonuses", async () => {
      const res = await call("POST", "/score/enhanced", {
        body: { percent_renters: 65, median_income: 85000, temperature: 70, crm_engagement_score: 75 },
      });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ total_score: 98, base_score: 90, crm_bonus: 7.5 });
    });

    it("should describe the scoring weights", async () => {
      const res = await call("GET", "/score/weights");

      expect(res.status).toBe(200);
      expect(res.body.version).toBe("v1");
    });
  });
});
