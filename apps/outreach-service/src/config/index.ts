import { DEFAULT_AI_TIMEOUT_MS } from "../services/aiComposer";

/**
 * Integer from an env var, or the fallback when unset or not a number
 */
export function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Environment configuration
 */
export const config = {
  port: parseIntOr(process.env.PORT, 3000),

  // Supabase (leads table). In-memory store when unset.
  supabaseUrl: process.env.SUPABASE_URL || "",
  supabaseServiceKey: process.env.SUPABASE_SERVICE_KEY || "",

  // AI-assisted outreach
  openaiApiKey: process.env.OPENAI_API_KEY || "",
  openaiModel: process.env.OPENAI_MODEL || "gpt-3.5-turbo",
  aiTimeoutMs: parseIntOr(process.env.AI_TIMEOUT_MS, DEFAULT_AI_TIMEOUT_MS),
  useAi: process.env.USE_AI !== "false",

  // Enrichment
  openWeatherApiKey: process.env.OPENWEATHER_API_KEY || "",

  // SMTP delivery + sender identity
  smtpHost: process.env.SMTP_HOST || "smtp.gmail.com",
  smtpPort: parseIntOr(process.env.SMTP_PORT, 587),
  smtpSecure: process.env.SMTP_SECURE === "true",
  senderEmail: process.env.SENDER_EMAIL || "",
  senderPassword: process.env.SENDER_PASSWORD || "",
  senderName: process.env.SENDER_NAME || "Sales Team",

  // Optional operator key; dev mode when empty
  operatorApiKey: process.env.OPERATOR_API_KEY || "",

  nodeEnv: process.env.NODE_ENV || "development"
};
