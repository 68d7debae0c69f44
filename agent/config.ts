import { ethers } from "ethers";
import { SECONDS_PER_DAY } from "../lib/scores";
import type { AgentConfig } from "./types";

/// Read agent configuration from the environment
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AgentConfig {
  const admin = env.REPUTATION_ADMIN_ADDRESS;
  if (!admin) {
    throw new Error("REPUTATION_ADMIN_ADDRESS environment variable not set");
  }
  if (!ethers.isAddress(admin)) {
    throw new Error(`Invalid REPUTATION_ADMIN_ADDRESS: ${admin}`);
  }

  let daySeconds = SECONDS_PER_DAY;
  if (env.REPUTATION_DAY_SECONDS) {
    daySeconds = Number(env.REPUTATION_DAY_SECONDS);
    if (!Number.isInteger(daySeconds) || daySeconds <= 0) {
      throw new Error(
        `Invalid REPUTATION_DAY_SECONDS: ${env.REPUTATION_DAY_SECONDS}`
      );
    }
  }

  const supabaseUrl = env.SUPABASE_URL || "";
  const supabaseKey = env.SUPABASE_SERVICE_KEY || "";
  if (!supabaseUrl || !supabaseKey) {
    console.warn(
      "⚠️ Supabase credentials not configured. Events will not be persisted."
    );
  }

  return {
    adminAddress: ethers.getAddress(admin),
    daySeconds,
    supabaseUrl,
    supabaseKey,
  };
}
