import { Router, Request, Response } from "express";
import { LeadRecord, NewLeadInput, ScoreCategory } from "../types/lead";
import { MappedLeadInput, SourceCRM } from "../types/crm";
import { ListLeadsOptions } from "../db/leads";
import { LeadRepository, PipelineDeps, processLead, regenerateOutreach } from "../services/pipeline";
import {
  HIGH_PRIORITY_MIN_SCORE,
  SmtpEmailSender,
  buildGmailComposeUrl,
  buildMailtoUrl,
} from "../services/delivery";
import { analyzeMessageEffectiveness, generateAlternativeMessages } from "../services/outreach";
import { leadsToCsv, sendCsv, datedFilename } from "../lib/csv";
import { isRecord } from "../lib/guards";

// Import CRM mappers
import { mapSalesforceToLeadInput, isSalesforcePayload, toSalesforceFields } from "../mappers/salesforce";
import { mapHubSpotToLeadInput, isHubSpotPayload, toHubSpotProperties } from "../mappers/hubspot";

export interface LeadStore extends LeadRepository {
  getLeadById(id: string): Promise<LeadRecord | null>;
  listLeads(options?: ListLeadsOptions): Promise<LeadRecord[]>;
}

export interface LeadsRouterDeps {
  store: LeadStore;
  pipeline: Omit<PipelineDeps, "repository">;
  emailSender: SmtpEmailSender;
}

const REQUIRED_FIELDS = ["name", "email", "company", "city", "state", "country"] as const;
const SCORE_CATEGORIES: readonly ScoreCategory[] = ["High", "Medium", "Low"];
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function createLeadsRouter(deps: LeadsRouterDeps): Router {
  const router = Router();
  const pipelineDeps: PipelineDeps = { ...deps.pipeline, repository: deps.store };

  /**
   * POST /leads
   * Flow: Detect CRM → Map → Validate → Enrich → Score → Compose → Persist
   */
  router.post("/", async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        return res.status(400).json({ error: "Request body must be a JSON object" });
      }

      const { source, input, externalId } = detectAndMap(body);
      const parsed = parseLeadRequest({ ...input, use_ai: body.use_ai });

      if (!parsed.ok) {
        return res.status(400).json({ error: parsed.error, missing_fields: parsed.missing });
      }

      console.log(`[leads] Processing lead from ${source}:`, {
        company: parsed.value.company,
        city: parsed.value.city,
        external_id: externalId,
      });

      const result = await processLead(parsed.value, pipelineDeps);

      return res.status(201).json({ ...result, source, external_id: externalId });
    } catch (error) {
      return sendError(res, error);
    }
  });

  /**
   * GET /leads?category=High&min_score=50&limit=20
   */
  router.get("/", async (req: Request, res: Response) => {
    try {
      const parsed = parseListQuery(req.query);
      if (!parsed.ok) {
        return res.status(400).json({ error: parsed.error });
      }
      const records = await deps.store.listLeads(parsed.value);
      return res.json({ leads: records, count: records.length });
    } catch (error) {
      return sendError(res, error);
    }
  });

  router.get("/export.csv", async (_req: Request, res: Response) => {
    try {
      const records = await deps.store.listLeads();
      sendCsv(res, datedFilename("leads"), leadsToCsv(records));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /leads/send-bulk
   * Email every stored lead at or above min_score (default: High priority)
   */
  router.post("/send-bulk", async (req: Request, res: Response) => {
    try {
      if (!deps.emailSender.isConfigured()) {
        return res.status(503).json({
          error: "Email not configured",
          config: deps.emailSender.getConfigStatus(),
        });
      }

      const body: unknown = req.body;
      const rawMin = isRecord(body) ? body.min_score : undefined;
      const minScore = rawMin === undefined ? HIGH_PRIORITY_MIN_SCORE : Number(rawMin);
      if (!Number.isFinite(minScore)) {
        return res.status(400).json({ error: "min_score must be a number" });
      }

      const records = await deps.store.listLeads({ minScore });
      const result = await deps.emailSender.sendBulk(records, minScore);

      if (!result.success) {
        return res.status(404).json({ error: result.message });
      }
      return res.json(result);
    } catch (error) {
      return sendError(res, error);
    }
  });

  router.get("/:id", async (req: Request, res: Response) => {
    try {
      const lead = await deps.store.getLeadById(req.params.id);
      if (!lead) return res.status(404).json({ error: "Lead not found" });
      return res.json(lead);
    } catch (error) {
      return sendError(res, error);
    }
  });

  /**
   * POST /leads/:id/outreach
   * Recompose the stored message. Body: { use_ai?: boolean }
   */
  router.post("/:id/outreach", async (req: Request, res: Response) => {
    try {
      const lead = await deps.store.getLeadById(req.params.id);
      if (!lead) return res.status(404).json({ error: "Lead not found" });

      const body: unknown = req.body;
      const useAi = isRecord(body) && typeof body.use_ai === "boolean" ? body.use_ai : pipelineDeps.useAi;

      const result = await regenerateOutreach(lead, pipelineDeps, useAi);
      if (!result) return res.status(404).json({ error: "Lead not found" });

      return res.json(result);
    } catch (error) {
      return sendError(res, error);
    }
  });

  /**
   * GET /leads/:id/outreach/alternatives?count=3
   * Template variants of the message with a quick effectiveness read
   */
  router.get("/:id/outreach/alternatives", async (req: Request, res: Response) => {
    try {
      const lead = await deps.store.getLeadById(req.params.id);
      if (!lead) return res.status(404).json({ error: "Lead not found" });

      const count = clampCount(req.query.count);
      const messages = generateAlternativeMessages(
        {
          name: lead.name,
          company: lead.company,
          city: lead.city,
          weather_description: lead.weather_description,
          insights: lead.insights,
        },
        count,
        pipelineDeps.random
      );

      return res.json({
        alternatives: messages.map(message => ({
          message,
          analysis: analyzeMessageEffectiveness(message),
        })),
      });
    } catch (error) {
      return sendError(res, error);
    }
  });

  router.get("/:id/compose-links", async (req: Request, res: Response) => {
    try {
      const lead = await deps.store.getLeadById(req.params.id);
      if (!lead) return res.status(404).json({ error: "Lead not found" });

      const gmail = buildGmailComposeUrl(lead, lead.outreach_message);
      const mailto = buildMailtoUrl(lead, lead.outreach_message);

      if (!gmail.success || !mailto.success) {
        return res.status(400).json({ error: "No email address found for this lead" });
      }
      return res.json({ gmail_url: gmail.url, mailto_url: mailto.url });
    } catch (error) {
      return sendError(res, error);
    }
  });

  /**
   * POST /leads/:id/send
   * Body: { recipient_email?: string } - defaults to the lead's own address
   */
  router.post("/:id/send", async (req: Request, res: Response) => {
    try {
      if (!deps.emailSender.isConfigured()) {
        return res.status(503).json({
          error: "Email not configured",
          config: deps.emailSender.getConfigStatus(),
        });
      }

      const lead = await deps.store.getLeadById(req.params.id);
      if (!lead) return res.status(404).json({ error: "Lead not found" });

      const body: unknown = req.body;
      const recipient = isRecord(body) && typeof body.recipient_email === "string"
        ? body.recipient_email
        : undefined;

      const result = await deps.emailSender.sendLeadEmail(lead, lead.outreach_message, recipient);
      return res.status(result.success ? 200 : 502).json(result);
    } catch (error) {
      return sendError(res, error);
    }
  });

  /**
   * GET /leads/:id/crm/:crm
   * Field mapping for writing enrichment back to hubspot | salesforce
   */
  router.get("/:id/crm/:crm", async (req: Request, res: Response) => {
    try {
      const crm = req.params.crm;
      if (crm !== "hubspot" && crm !== "salesforce") {
        return res.status(400).json({ error: "Unsupported CRM. Use hubspot or salesforce" });
      }

      const lead = await deps.store.getLeadById(req.params.id);
      if (!lead) return res.status(404).json({ error: "Lead not found" });

      const fields = crm === "hubspot" ? toHubSpotProperties(lead) : toSalesforceFields(lead);
      return res.json({ crm, lead_id: lead.id, fields });
    } catch (error) {
      return sendError(res, error);
    }
  });

  return router;
}

// ============================================================================
// REQUEST PARSING
// ============================================================================

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; missing: string[] };

/**
 * Validate a new-lead request. Required fields must be non-blank strings.
 */
export function parseLeadRequest(input: MappedLeadInput & { use_ai?: unknown }): ParseResult<NewLeadInput> {
  const missing = REQUIRED_FIELDS.filter(field => !input[field]?.trim());
  if (missing.length > 0) {
    return { ok: false, error: `Missing required fields: ${missing.join(", ")}`, missing: [...missing] };
  }

  const value: NewLeadInput = {
    name: (input.name ?? "").trim(),
    email: (input.email ?? "").trim(),
    company: (input.company ?? "").trim(),
    property_address: input.property_address?.trim() || undefined,
    city: (input.city ?? "").trim(),
    state: (input.state ?? "").trim(),
    country: (input.country ?? "").trim(),
  };

  if (!EMAIL_PATTERN.test(value.email)) {
    return { ok: false, error: `Invalid email address: ${value.email}`, missing: [] };
  }

  if (typeof input.use_ai === "boolean") {
    value.use_ai = input.use_ai;
  }

  return { ok: true, value };
}

export function parseListQuery(query: Request["query"]): ParseResult<ListLeadsOptions> {
  const options: ListLeadsOptions = {};

  const category = query.category;
  if (typeof category === "string" && category) {
    const match = SCORE_CATEGORIES.find(c => c === category);
    if (!match) {
      return { ok: false, error: `Invalid category: ${category}. Use High, Medium or Low`, missing: [] };
    }
    options.category = match;
  }

  if (typeof query.min_score === "string" && query.min_score) {
    const minScore = Number(query.min_score);
    if (!Number.isFinite(minScore)) {
      return { ok: false, error: "min_score must be a number", missing: [] };
    }
    options.minScore = minScore;
  }

  if (typeof query.limit === "string" && query.limit) {
    const limit = parseInt(query.limit, 10);
    if (!Number.isInteger(limit) || limit <= 0) {
      return { ok: false, error: "limit must be a positive integer", missing: [] };
    }
    options.limit = limit;
  }

  return { ok: true, value: options };
}

/**
 * Detect CRM source and map to lead input fields
 */
export function detectAndMap(payload: Record<string, unknown>): {
  source: SourceCRM;
  input: MappedLeadInput;
  externalId: string | null;
} {
  // Check for explicit source hint
  const hintedSource = payload._source;

  if (hintedSource === "salesforce" || (hintedSource === undefined && isSalesforcePayload(payload))) {
    const result = mapSalesforceToLeadInput(payload);
    return { source: "salesforce", input: result.input, externalId: result.externalId };
  }

  if (hintedSource === "hubspot" || (hintedSource === undefined && isHubSpotPayload(payload))) {
    const result = mapHubSpotToLeadInput(payload);
    return { source: "hubspot", input: result.input, externalId: result.externalId };
  }

  // Default: the service's own snake_case payload
  const str = (key: string): string | undefined => {
    const val = payload[key];
    return typeof val === "string" ? val : undefined;
  };

  return {
    source: "api",
    input: {
      name: str("name"),
      email: str("email"),
      company: str("company"),
      property_address: str("property_address"),
      city: str("city"),
      state: str("state"),
      country: str("country"),
    },
    externalId: str("external_id") ?? null,
  };
}

// ============================================================================
// HELPERS
// ============================================================================

function clampCount(raw: unknown): number {
  const count = typeof raw === "string" ? parseInt(raw, 10) : NaN;
  if (!Number.isInteger(count)) return 3;
  return Math.max(1, Math.min(10, count));
}

function sendError(res: Response, error: unknown) {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`[leads] Error:`, message);
  return res.status(500).json({ error: message });
}

