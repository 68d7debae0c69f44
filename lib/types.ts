export type AccountId = string;

export interface Badge {
  index: number;
  name: string;
  description: string;
  requiredPoints: number;
  metadataRef: string;
}

export interface NewBadge {
  name: string;
  description: string;
  requiredPoints: number;
  metadataRef: string;
}

export interface UserState {
  points: number;
  level: number;
  lastActionDay: number | null;
  streakDays: number;
  unlockedBadges: Set<number>;
}

export interface MintedToken {
  tokenId: number;
  badgeIndex: number;
  owner: AccountId;
  mintedAt: number;
}

export interface UserProfile {
  account: AccountId;
  points: number;
  level: number;
  streakDays: number;
  lastActionDay: number | null;
  unlockedCount: number;
  mintedCount: number;
}

export interface ReputationStats {
  totalUsers: number;
  badgeCount: number;
  tokensMinted: number;
  nextTokenId: number;
}

export type AwardReason = "CHECK_IN" | "ACTION" | "ENDORSEMENT";

export type ReputationEvent =
  | {
      type: "PointsEarned";
      account: AccountId;
      amount: number;
      reason: AwardReason;
      totalPoints: number;
    }
  | { type: "LevelUp"; account: AccountId; level: number }
  | { type: "BadgeUnlocked"; account: AccountId; badgeIndex: number }
  | {
      type: "BadgeMinted";
      account: AccountId;
      badgeIndex: number;
      tokenId: number;
    }
  | { type: "Transfer"; from: null; to: AccountId; tokenId: number }
  | { type: "UserEndorsed"; endorser: AccountId; endorsed: AccountId }
  | {
      type: "BadgeCreated";
      badgeIndex: number;
      name: string;
      requiredPoints: number;
    }
  | { type: "BadgeMetadataUpdated"; badgeIndex: number; metadataRef: string };

export interface ReputationEventListener {
  onEvent(event: ReputationEvent): void;
}

/// Host-supplied time source, in whole seconds
export interface Clock {
  now(): number;
}
