import { randomUUID } from "crypto";
import { getSupabase } from "./supabase";
import { MemoryStore } from "./memoryStore";
import { LeadInsert, LeadRecord, OutreachSource, ScoreCategory } from "../types/lead";

const TABLE = "leads";

// Fallback when Supabase isn't configured
export const memoryLeads = new MemoryStore<LeadRecord>();

export interface ListLeadsOptions {
  category?: ScoreCategory;
  minScore?: number;
  limit?: number;
}

/**
 * Insert a newly enriched lead
 */
export async function insertLead(data: LeadInsert): Promise<LeadRecord> {
  const record: LeadRecord = {
    ...data,
    id: data.id ?? randomUUID(),
    created_at: new Date().toISOString(),
  };

  const supabase = getSupabase();

  if (!supabase) {
    console.log(`[leads] Supabase not configured, storing in memory: ${record.id}`);
    return memoryLeads.insert(record);
  }

  const { data: result, error } = await supabase
    .from(TABLE)
    .insert(record)
    .select()
    .single();

  if (error) {
    console.error("[leads] Insert error:", error.message);
    throw new Error(`Failed to insert lead: ${error.message}`);
  }

  return result as LeadRecord;
}

/**
 * Get a lead by ID
 */
export async function getLeadById(leadId: string): Promise<LeadRecord | null> {
  const supabase = getSupabase();

  if (!supabase) return memoryLeads.getById(leadId);

  const { data, error } = await supabase
    .from(TABLE)
    .select("*")
    .eq("id", leadId)
    .single();

  if (error) {
    if (error.code === "PGRST116") return null; // Not found
    throw new Error(`Failed to get lead: ${error.message}`);
  }

  return data as LeadRecord;
}

/**
 * List leads, newest first, with optional filters
 */
export async function listLeads(options: ListLeadsOptions = {}): Promise<LeadRecord[]> {
  const supabase = getSupabase();

  if (!supabase) {
    let records = memoryLeads.list().reverse();
    if (options.category) {
      records = records.filter(r => r.score_category === options.category);
    }
    if (options.minScore !== undefined) {
      const minScore = options.minScore;
      records = records.filter(r => r.score >= minScore);
    }
    return options.limit ? records.slice(0, options.limit) : records;
  }

  let query = supabase
    .from(TABLE)
    .select("*")
    .order("created_at", { ascending: false });

  if (options.category) {
    query = query.eq("score_category", options.category);
  }

  if (options.minScore !== undefined) {
    query = query.gte("score", options.minScore);
  }

  if (options.limit) {
    query = query.limit(options.limit);
  }

  const { data, error } = await query;

  if (error) {
    throw new Error(`Failed to list leads: ${error.message}`);
  }

  return (data || []) as LeadRecord[];
}

/**
 * Replace the stored outreach message for a lead
 */
export async function updateLeadOutreach(
  leadId: string,
  message: string,
  source: OutreachSource
): Promise<LeadRecord | null> {
  const supabase = getSupabase();

  if (!supabase) {
    return memoryLeads.update(leadId, { outreach_message: message, outreach_source: source });
  }

  const { data, error } = await supabase
    .from(TABLE)
    .update({ outreach_message: message, outreach_source: source })
    .eq("id", leadId)
    .select()
    .single();

  if (error) {
    if (error.code === "PGRST116") return null;
    console.error("[leads] Update outreach error:", error.message);
    throw new Error(`Failed to update lead outreach: ${error.message}`);
  }

  return data as LeadRecord;
}
