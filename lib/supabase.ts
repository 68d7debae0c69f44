import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { ethers } from "ethers";
import type { AccountId, ReputationEvent, UserProfile } from "./types";

export const EVENTS_TABLE = "reputation_events";
export const PROFILES_TABLE = "user_profiles";

export interface StoredReputationEvent {
  event_type: ReputationEvent["type"];
  account: AccountId | null;
  payload: ReputationEvent;
  proof_hash: string;
  recorded_at: string;
}

export interface StoredProfile {
  user_address: AccountId;
  points: number;
  level: number;
  streak_days: number;
  last_action_day: number | null;
  unlocked_count: number;
  minted_count: number;
  updated_at: string;
}

export function createSupabaseClient(
  url: string,
  key: string
): SupabaseClient | null {
  if (!url || !key) return null;
  return createClient(url, key, { auth: { persistSession: false } });
}

/// keccak256 of the event's JSON, used as its audit fingerprint
export function eventProofHash(event: ReputationEvent): string {
  return ethers.keccak256(ethers.toUtf8Bytes(JSON.stringify(event)));
}

/// Account an event is filed under, null for catalog events
export function eventAccount(event: ReputationEvent): AccountId | null {
  switch (event.type) {
    case "PointsEarned":
    case "LevelUp":
    case "BadgeUnlocked":
    case "BadgeMinted":
      return event.account;
    case "Transfer":
      return event.to;
    case "UserEndorsed":
      return event.endorsed;
    case "BadgeCreated":
    case "BadgeMetadataUpdated":
      return null;
  }
}

export function toStoredEvent(
  event: ReputationEvent,
  recordedAt: Date
): StoredReputationEvent {
  return {
    event_type: event.type,
    account: eventAccount(event),
    payload: event,
    proof_hash: eventProofHash(event),
    recorded_at: recordedAt.toISOString(),
  };
}

export function toStoredProfile(
  profile: UserProfile,
  updatedAt: Date
): StoredProfile {
  return {
    user_address: profile.account,
    points: profile.points,
    level: profile.level,
    streak_days: profile.streakDays,
    last_action_day: profile.lastActionDay,
    unlocked_count: profile.unlockedCount,
    minted_count: profile.mintedCount,
    updated_at: updatedAt.toISOString(),
  };
}

// Append an action's events to the audit table
export async function recordReputationEvents(
  supabase: SupabaseClient,
  events: ReputationEvent[],
  recordedAt = new Date()
): Promise<{ success: boolean; count?: number; error?: string }> {
  if (events.length === 0) {
    return { success: true, count: 0 };
  }

  try {
    const rows = events.map((event) => toStoredEvent(event, recordedAt));
    const { error } = await supabase.from(EVENTS_TABLE).insert(rows);

    if (error) {
      console.error("❌ [Supabase] Error recording events:", error.message);
      return { success: false, error: error.message };
    }

    console.log(`✅ [Supabase] Recorded ${rows.length} events`);
    return { success: true, count: rows.length };
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    console.error("❌ [Supabase] Failed to record events:", message);
    return { success: false, error: message };
  }
}

// Upsert the latest profile snapshots, one row per account
export async function saveUserProfiles(
  supabase: SupabaseClient,
  profiles: UserProfile[],
  updatedAt = new Date()
): Promise<{ success: boolean; error?: string }> {
  if (profiles.length === 0) {
    return { success: true };
  }

  try {
    const rows = profiles.map((profile) => toStoredProfile(profile, updatedAt));
    const { error } = await supabase
      .from(PROFILES_TABLE)
      .upsert(rows, { onConflict: "user_address" });

    if (error) {
      console.error("❌ [Supabase] Error saving profiles:", error.message);
      return { success: false, error: error.message };
    }

    return { success: true };
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    console.error("❌ [Supabase] Failed to save profiles:", message);
    return { success: false, error: message };
  }
}
