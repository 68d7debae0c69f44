import type { SupabaseClient } from "@supabase/supabase-js";
import { HostClock, systemClock } from "../lib/clock";
import { EventLog } from "../lib/events";
import { RewardEngine } from "../lib/reward-engine";
import {
  createSupabaseClient,
  eventAccount,
  recordReputationEvents,
  saveUserProfiles,
} from "../lib/supabase";
import type { AccountId } from "../lib/types";
import { executeAction } from "./executor";
import type { AgentAction, AgentConfig, ExecutionResult } from "./types";

export interface Agent {
  engine: RewardEngine;
  log: EventLog;
  clock: HostClock;
  supabase: SupabaseClient | null;
  run(action: AgentAction): Promise<ExecutionResult>;
}

export interface AgentOptions {
  clock?: HostClock;
  /// Overrides the client built from the config; null disables persistence
  supabase?: SupabaseClient | null;
}

/// Wire engine, audit log and persistence from configuration
export function createAgent(
  config: AgentConfig,
  options: AgentOptions = {}
): Agent {
  // Action files carry their own timestamps; wall-clock time only fills in
  // for actions that omit one
  const clock = options.clock ?? new HostClock(0);
  const log = new EventLog();
  const engine = new RewardEngine({
    admin: config.adminAddress,
    clock,
    daySeconds: config.daySeconds,
    listeners: [log],
  });
  const supabase =
    options.supabase !== undefined
      ? options.supabase
      : createSupabaseClient(config.supabaseUrl, config.supabaseKey);

  // Actions are queued so that each one completes before the next starts
  let queue: Promise<unknown> = Promise.resolve();

  const run = (action: AgentAction): Promise<ExecutionResult> => {
    const next = queue.then(() => runOne(action));
    // The caller sees a failure through `next`; the queue keeps going
    queue = next.catch(() => undefined);
    return next;
  };

  const runOne = async (action: AgentAction): Promise<ExecutionResult> => {
    console.log(`[Agent] ${action.type} from ${action.account}`);
    try {
      return await applyAction(action);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`❌ [Agent] ${action.type} failed:`, errorMessage);
      return {
        success: false,
        action: action.type,
        events: [],
        error: errorMessage,
      };
    }
  };

  const applyAction = async (action: AgentAction): Promise<ExecutionResult> => {
    const timestamp =
      action.timestamp ?? Math.max(clock.now(), systemClock.now());
    const problem = !Number.isFinite(timestamp)
      ? `Invalid timestamp: ${timestamp}`
      : timestamp < clock.now()
        ? `Timestamp ${timestamp} is earlier than ${clock.now()}`
        : null;
    if (problem) {
      console.error(`❌ [Agent] ${problem}`);
      return {
        success: false,
        action: action.type,
        events: [],
        code: "InvalidInput",
        error: problem,
      };
    }
    clock.set(timestamp);

    const result = executeAction(engine, log, action);
    if (!result.success) {
      console.error(`❌ [Agent] ${action.type} rejected (${result.code ?? "Error"}): ${result.error}`);
      return result;
    }

    for (const event of result.events) {
      console.log(`[Agent]   ${describeEvent(event.type, eventAccount(event))}`);
    }

    if (!supabase) return result;

    const accounts = new Set<AccountId>();
    for (const event of result.events) {
      const account = eventAccount(event);
      if (account) accounts.add(account);
    }

    const recorded = await recordReputationEvents(supabase, result.events);
    const saved = await saveUserProfiles(
      supabase,
      [...accounts].map((account) => engine.getUserProfile(account))
    );
    result.persisted = recorded.success && saved.success;
    if (!result.persisted) {
      // Don't fail the action - it has already been applied
      console.warn(
        "⚠️ [Agent] Failed to persist to Supabase:",
        recorded.error ?? saved.error
      );
    }
    return result;
  };

  return { engine, log, clock, supabase, run };
}

function describeEvent(type: string, account: AccountId | null): string {
  return account ? `${type} -> ${account}` : type;
}

/// Run actions one after another, in order
export async function runAgent(
  agent: Agent,
  actions: AgentAction[]
): Promise<ExecutionResult[]> {
  console.log(`\n=== Reputation Agent: ${actions.length} actions ===`);

  const results: ExecutionResult[] = [];
  for (const action of actions) {
    results.push(await agent.run(action));
  }

  const failed = results.filter((result) => !result.success).length;
  console.log(`\n✅ Reputation Agent: ${results.length - failed} applied, ${failed} rejected`);
  return results;
}

export default runAgent;
