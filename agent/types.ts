import type { ReputationErrorCode } from "../lib/errors";
import type { ReputationEvent } from "../lib/types";

interface BaseAction {
  /// Calling account (EVM address)
  account: string;
  /// Unix seconds; the runner's clock is used when omitted
  timestamp?: number;
}

export type AgentAction =
  | (BaseAction & { type: "CHECK_IN" })
  | (BaseAction & { type: "ACTION"; label: string })
  | (BaseAction & { type: "ENDORSE"; target: string })
  | (BaseAction & { type: "MINT"; badgeIndex: number })
  | (BaseAction & {
      type: "ADD_BADGE";
      name: string;
      description: string;
      requiredPoints: number;
      metadataRef: string;
    })
  | (BaseAction & {
      type: "UPDATE_BADGE_URI";
      badgeIndex: number;
      metadataRef: string;
    })
  | (BaseAction & { type: "TRANSFER"; to: string; tokenId: number });

export type AgentActionType = AgentAction["type"];

export interface ExecutionResult {
  success: boolean;
  action: AgentActionType;
  /// Points awarded, token id or badge index, depending on the action
  value?: number;
  events: ReputationEvent[];
  persisted?: boolean;
  code?: ReputationErrorCode;
  error?: string;
}

export interface AgentConfig {
  adminAddress: string;
  daySeconds: number;
  supabaseUrl: string;
  supabaseKey: string;
}
