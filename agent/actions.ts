import type { AgentAction } from "./types";

type Fields = Record<string, unknown>;

function isObject(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(fields: Fields, key: string, position: number): string {
  const value = fields[key];
  if (typeof value !== "string") {
    throw new Error(`Action ${position}: "${key}" must be a string`);
  }
  return value;
}

function int(fields: Fields, key: string, position: number): number {
  const value = fields[key];
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new Error(`Action ${position}: "${key}" must be a non-negative integer`);
  }
  return value;
}

function parseAction(raw: unknown, position: number): AgentAction {
  if (!isObject(raw)) {
    throw new Error(`Action ${position} must be an object`);
  }

  const account = str(raw, "account", position);
  const timestamp =
    raw.timestamp === undefined ? undefined : int(raw, "timestamp", position);
  const base = { account, timestamp };

  switch (raw.type) {
    case "CHECK_IN":
      return { ...base, type: "CHECK_IN" };
    case "ACTION":
      return { ...base, type: "ACTION", label: str(raw, "label", position) };
    case "ENDORSE":
      return { ...base, type: "ENDORSE", target: str(raw, "target", position) };
    case "MINT":
      return { ...base, type: "MINT", badgeIndex: int(raw, "badgeIndex", position) };
    case "ADD_BADGE":
      return {
        ...base,
        type: "ADD_BADGE",
        name: str(raw, "name", position),
        description: str(raw, "description", position),
        requiredPoints: int(raw, "requiredPoints", position),
        metadataRef: str(raw, "metadataRef", position),
      };
    case "UPDATE_BADGE_URI":
      return {
        ...base,
        type: "UPDATE_BADGE_URI",
        badgeIndex: int(raw, "badgeIndex", position),
        metadataRef: str(raw, "metadataRef", position),
      };
    case "TRANSFER":
      return {
        ...base,
        type: "TRANSFER",
        to: str(raw, "to", position),
        tokenId: int(raw, "tokenId", position),
      };
    default:
      throw new Error(`Action ${position}: unknown type ${String(raw.type)}`);
  }
}

/// Validate a decoded JSON document as a list of agent actions
export function parseActions(raw: unknown): AgentAction[] {
  if (!Array.isArray(raw)) {
    throw new Error("Actions file must contain a JSON array");
  }
  return raw.map((item, position) => parseAction(item, position));
}
