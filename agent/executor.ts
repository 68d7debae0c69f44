import { ethers } from "ethers";
import { ReputationError, isReputationError } from "../lib/errors";
import type { EventLog } from "../lib/events";
import type { RewardEngine } from "../lib/reward-engine";
import type { AgentAction, ExecutionResult } from "./types";

/// Checksum form of an EVM address; anything else is rejected
export function normalizeAccount(raw: string): string {
  if (!raw || !ethers.isAddress(raw)) {
    throw new ReputationError("InvalidInput", `Invalid account address: ${raw}`);
  }
  return ethers.getAddress(raw);
}

function dispatch(engine: RewardEngine, action: AgentAction): number | undefined {
  if (action.type === "TRANSFER") {
    throw new ReputationError(
      "NonTransferable",
      `Token ${action.tokenId} is soulbound and cannot be transferred`
    );
  }
  const account = normalizeAccount(action.account);

  switch (action.type) {
    case "CHECK_IN":
      return engine.checkIn(account);
    case "ACTION":
      return engine.performAction(account, action.label);
    case "ENDORSE":
      engine.endorseUser(account, normalizeAccount(action.target));
      return undefined;
    case "MINT":
      return engine.mintBadgeNFT(account, action.badgeIndex);
    case "ADD_BADGE":
      return engine.addCustomBadge(account, {
        name: action.name,
        description: action.description,
        requiredPoints: action.requiredPoints,
        metadataRef: action.metadataRef,
      });
    case "UPDATE_BADGE_URI":
      engine.updateBadgeURI(account, action.badgeIndex, action.metadataRef);
      return action.badgeIndex;
  }
}

/// Apply one action against the engine, capturing its events from the log
export function executeAction(
  engine: RewardEngine,
  log: EventLog,
  action: AgentAction
): ExecutionResult {
  const offset = log.length;

  try {
    const value = dispatch(engine, action);
    return {
      success: true,
      action: action.type,
      value,
      events: log.since(offset),
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return {
      success: false,
      action: action.type,
      events: [],
      code: isReputationError(error) ? error.code : undefined,
      error: errorMessage,
    };
  }
}
