import nodemailer, { SendMailOptions } from "nodemailer";
import { LeadRecord } from "../types/lead";
import { buildSubject } from "./outreach";

/** Leads at or above this score are "high priority" for bulk sends */
export const HIGH_PRIORITY_MIN_SCORE = 71;

export type LeadContact = Pick<LeadRecord, "name" | "email" | "company" | "city" | "score" | "score_category">;

export type DeliveryChannel = "smtp" | "web";

/**
 * Who outreach is sent as. Injected, never hard-coded.
 */
export interface SenderIdentity {
  senderName: string;
  senderEmail: string;
}

export interface SmtpSettings extends SenderIdentity {
  host: string;
  port: number;
  secure: boolean;
  password: string;
}

export interface DeliveryResult {
  success: boolean;
  message: string;
}

export type ComposeLinkResult =
  | { success: true; url: string }
  | { success: false; message: string };

const UNSUBSCRIBE_LINE =
  `If you'd prefer not to receive these emails, please reply with "UNSUBSCRIBE" and we'll remove you from our list.`;

// ============================================================================
// CONTENT
// ============================================================================

/**
 * Subject + plain-text body. The composed outreach body is passed through
 * verbatim; only a footer is appended.
 */
export function buildEmailContent(
  lead: Pick<LeadContact, "email" | "company" | "city">,
  body: string,
  channel: DeliveryChannel
): { subject: string; text: string } {
  const reason = channel === "smtp"
    ? `This email was sent to ${lead.email} because your company was identified as a high-potential lead for our property management services.`
    : "This email was sent because your company was identified as a high-priority lead for our property management services.";

  return {
    subject: buildSubject(lead.company, lead.city),
    text: `${body}\n\n---\n${reason}\n${UNSUBSCRIBE_LINE}`,
  };
}

export function buildEmailHtml(lead: Pick<LeadContact, "email">, body: string, year: number = new Date().getFullYear()): string {
  const content = escapeHtml(body).replace(/\n/g, "<br>");
  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head><meta charset=\"UTF-8\"></head>",
    "<body style=\"font-family: Arial, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px;\">",
    "<div style=\"background: #f9f9f9; padding: 30px; border-radius: 10px;\">",
    `<div style="background: white; padding: 20px; border-radius: 5px;">${content}</div>`,
    "</div>",
    "<div style=\"margin-top: 30px; padding-top: 20px; border-top: 1px solid #ddd; font-size: 12px; color: #666;\">",
    `<p>This email was sent to ${escapeHtml(lead.email)} because your company was identified as a high-potential lead for our property management services.</p>`,
    `<p>${escapeHtml(UNSUBSCRIBE_LINE)}</p>`,
    `<p>Property Management Solutions | ${year}</p>`,
    "</div>",
    "</body>",
    "</html>",
  ].join("\n");
}

// ============================================================================
// COMPOSE LINKS (Gmail web, mailto)
// ============================================================================

export function buildGmailComposeUrl(
  lead: Pick<LeadContact, "email" | "company" | "city">,
  body: string
): ComposeLinkResult {
  if (!lead.email) {
    return { success: false, message: "No email address found for this lead" };
  }
  const { subject, text } = buildEmailContent(lead, body, "web");
  const url =
    `https://mail.google.com/mail/?view=cm&fs=1&to=${encodeURIComponent(lead.email)}` +
    `&su=${encodeURIComponent(subject)}&body=${encodeURIComponent(text)}`;
  return { success: true, url };
}

export function buildMailtoUrl(
  lead: Pick<LeadContact, "email" | "company" | "city">,
  body: string
): ComposeLinkResult {
  if (!lead.email) {
    return { success: false, message: "No email address found for this lead" };
  }
  const { subject, text } = buildEmailContent(lead, body, "web");
  return {
    success: true,
    url: `mailto:${lead.email}?subject=${encodeURIComponent(subject)}&body=${encodeURIComponent(text)}`,
  };
}

// ============================================================================
// SMTP
// ============================================================================

/**
 * The part of a nodemailer transport we use
 */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<{ messageId?: string }>;
}

export interface BulkSendSummary {
  summary: string;
  successful_sends: number;
  failed_sends: number;
  total_leads: number;
  results: Array<{
    name: string;
    email: string;
    company: string;
    score: number;
    success: boolean;
    message: string;
  }>;
}

export class SmtpEmailSender {
  private transport: MailTransport | null;

  constructor(private settings: SmtpSettings, transport?: MailTransport) {
    this.transport = transport ?? null;
  }

  isConfigured(): boolean {
    return !!(this.settings.senderEmail && this.settings.password);
  }

  getConfigStatus() {
    return {
      configured: this.isConfigured(),
      smtp_server: this.settings.host,
      smtp_port: this.settings.port,
      sender_email: this.settings.senderEmail,
      sender_name: this.settings.senderName,
      missing_config: [
        this.settings.senderEmail ? null : "SENDER_EMAIL",
        this.settings.password ? null : "SENDER_PASSWORD",
      ].filter((item): item is string => item !== null),
    };
  }

  /**
   * Send one lead's outreach. Transport errors come back as a failed result.
   */
  async sendLeadEmail(
    lead: LeadContact,
    body: string,
    recipientEmail?: string
  ): Promise<DeliveryResult> {
    if (!this.isConfigured()) {
      return { success: false, message: "Email not configured. Set SENDER_EMAIL and SENDER_PASSWORD" };
    }

    const to = recipientEmail || lead.email;
    if (!to) {
      return { success: false, message: "No email address provided" };
    }

    const { subject, text } = buildEmailContent({ ...lead, email: to }, body, "smtp");

    try {
      await this.getTransport().sendMail({
        from: `"${this.settings.senderName}" <${this.settings.senderEmail}>`,
        to,
        subject,
        text,
        html: buildEmailHtml({ email: to }, body),
      });
      console.log(`[delivery] Email sent to ${to}`);
      return { success: true, message: `Email sent successfully to ${to}` };
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error(`[delivery] Send failed for ${to}:`, message);
      return { success: false, message: `Failed to send email: ${message}` };
    }
  }

  /**
   * Send to every lead scoring at least minScore, one at a time
   */
  async sendBulk(
    leads: Array<LeadContact & { outreach_message: string }>,
    minScore: number = HIGH_PRIORITY_MIN_SCORE
  ): Promise<{ success: false; message: string } | ({ success: true } & BulkSendSummary)> {
    if (!this.isConfigured()) {
      return { success: false, message: "Email not configured. Set SENDER_EMAIL and SENDER_PASSWORD" };
    }

    const targets = leads.filter(l => l.score >= minScore);
    if (targets.length === 0) {
      return { success: false, message: `No leads found with score >= ${minScore}` };
    }

    const results: BulkSendSummary["results"] = [];
    for (const lead of targets) {
      const result = await this.sendLeadEmail(lead, lead.outreach_message);
      results.push({
        name: lead.name,
        email: lead.email,
        company: lead.company,
        score: lead.score,
        success: result.success,
        message: result.message,
      });
    }

    const successful = results.filter(r => r.success).length;
    const failed = results.length - successful;

    return {
      success: true,
      summary: `Email campaign completed: ${successful} successful, ${failed} failed`,
      successful_sends: successful,
      failed_sends: failed,
      total_leads: targets.length,
      results,
    };
  }

  private getTransport(): MailTransport {
    if (!this.transport) {
      this.transport = nodemailer.createTransport({
        host: this.settings.host,
        port: this.settings.port,
        secure: this.settings.secure,
        auth: {
          user: this.settings.senderEmail,
          pass: this.settings.password,
        },
      });
    }
    return this.transport;
  }
}

export function createEmailSender(config: {
  smtpHost: string;
  smtpPort: number;
  smtpSecure: boolean;
  senderEmail: string;
  senderPassword: string;
  senderName: string;
}): SmtpEmailSender {
  return new SmtpEmailSender({
    host: config.smtpHost,
    port: config.smtpPort,
    secure: config.smtpSecure,
    senderEmail: config.senderEmail,
    senderName: config.senderName,
    password: config.senderPassword,
  });
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
