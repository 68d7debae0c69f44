import type {
  AccountId,
  AwardReason,
  Badge,
  Clock,
  NewBadge,
  ReputationEvent,
  ReputationEventListener,
  ReputationStats,
  UserProfile,
} from "./types";
import { ReputationError } from "./errors";
import { BadgeCatalog } from "./badge-catalog";
import { ReputationLedger } from "./reputation-ledger";
import { EndorsementGraph } from "./endorsements";
import { BadgeMintRegistry } from "./badge-minting";
import {
  ACTION_POINTS,
  ENDORSEMENT_POINTS,
  MIN_ENDORSER_POINTS,
  SECONDS_PER_DAY,
  checkInReward,
  computeLevel,
  dayOf,
} from "./scores";

export interface RewardEngineOptions {
  admin: AccountId;
  clock: Clock;
  daySeconds?: number;
  /// Catalog seed; the five default badges when omitted
  badges?: NewBadge[];
  ledger?: ReputationLedger;
  endorsements?: EndorsementGraph;
  listeners?: ReputationEventListener[];
}

type Emit = (event: ReputationEvent) => void;

/**
 * Entry point for every reputation mutation.
 *
 * Each operation validates all of its preconditions before touching state
 * and buffers its events, which reach listeners only once the mutation has
 * completed. A thrown ReputationError therefore leaves no trace.
 *
 * Callers are expected to run one operation at a time.
 */
export class RewardEngine {
  readonly catalog: BadgeCatalog;
  readonly ledger: ReputationLedger;
  readonly endorsements: EndorsementGraph;
  readonly registry: BadgeMintRegistry;

  private readonly clock: Clock;
  private readonly daySeconds: number;
  private readonly listeners: ReputationEventListener[];

  constructor(options: RewardEngineOptions) {
    this.clock = options.clock;
    this.daySeconds = options.daySeconds ?? SECONDS_PER_DAY;
    this.catalog = new BadgeCatalog(options.admin, options.badges);
    this.ledger = options.ledger ?? new ReputationLedger();
    this.endorsements = options.endorsements ?? new EndorsementGraph();
    this.registry = new BadgeMintRegistry(this.catalog, this.ledger);
    this.listeners = [...(options.listeners ?? [])];
  }

  subscribe(listener: ReputationEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  // ─── Mutations ─────────────────────────────────────────────

  /// Daily check-in; returns the points awarded
  checkIn(account: AccountId): number {
    requireAccount(account);
    const currentDay = dayOf(this.clock.now(), this.daySeconds);
    const state = this.ledger.read(account);

    if (state.lastActionDay !== null && currentDay <= state.lastActionDay) {
      throw new ReputationError(
        "AlreadyActioned",
        `${account} already checked in on day ${state.lastActionDay}`
      );
    }

    const continued =
      state.lastActionDay !== null && currentDay === state.lastActionDay + 1;
    const streakDays = continued ? state.streakDays + 1 : 1;
    const reward = checkInReward(streakDays);

    return this.apply((emit) => {
      const entry = this.ledger.entry(account);
      entry.lastActionDay = currentDay;
      entry.streakDays = streakDays;
      this.award(account, reward, "CHECK_IN", emit);
      return reward;
    });
  }

  performAction(account: AccountId, label: string): number {
    requireAccount(account);
    if (!label) {
      throw new ReputationError("InvalidInput", "Action label is required");
    }

    return this.apply((emit) => {
      this.award(account, ACTION_POINTS, "ACTION", emit);
      return ACTION_POINTS;
    });
  }

  /// Records the endorsement and awards the target
  endorseUser(endorser: AccountId, target: AccountId): void {
    requireAccount(endorser);
    requireAccount(target);
    if (endorser === target) {
      throw new ReputationError("SelfEndorsement", "Cannot endorse yourself");
    }
    if (this.endorsements.has(endorser, target)) {
      throw new ReputationError(
        "DuplicateEndorsement",
        `${endorser} already endorsed ${target}`
      );
    }
    const endorserPoints = this.ledger.read(endorser).points;
    if (endorserPoints < MIN_ENDORSER_POINTS) {
      throw new ReputationError(
        "InsufficientReputation",
        `Endorsing requires ${MIN_ENDORSER_POINTS} points, ${endorser} has ${endorserPoints}`
      );
    }

    this.apply((emit) => {
      this.endorsements.record(endorser, target);
      emit({ type: "UserEndorsed", endorser, endorsed: target });
      this.award(target, ENDORSEMENT_POINTS, "ENDORSEMENT", emit);
    });
  }

  mintBadgeNFT(account: AccountId, badgeIndex: number): number {
    requireAccount(account);
    const mintedAt = this.clock.now();
    return this.apply((emit) =>
      this.registry.mint(account, badgeIndex, mintedAt, emit)
    );
  }

  addCustomBadge(caller: AccountId, badge: NewBadge): number {
    return this.apply((emit) => this.catalog.createBadge(caller, badge, emit));
  }

  updateBadgeURI(caller: AccountId, badgeIndex: number, metadataRef: string): void {
    this.apply((emit) =>
      this.catalog.updateMetadataRef(caller, badgeIndex, metadataRef, emit)
    );
  }

  // ─── Queries ───────────────────────────────────────────────

  tokenMetadataRef(tokenId: number): string {
    return this.registry.tokenMetadataRef(tokenId);
  }

  ownerOf(tokenId: number): AccountId {
    return this.registry.ownerOf(tokenId);
  }

  balanceOf(account: AccountId): number {
    return this.registry.balanceOf(account);
  }

  getUserBadgeTokens(account: AccountId): number[] {
    return this.registry.tokensOf(account);
  }

  getUserProfile(account: AccountId): UserProfile {
    const state = this.ledger.read(account);
    return {
      account,
      points: state.points,
      level: state.level,
      streakDays: state.streakDays,
      lastActionDay: state.lastActionDay,
      unlockedCount: state.unlockedBadges.size,
      mintedCount: this.registry.balanceOf(account),
    };
  }

  getBadgeInfo(badgeIndex: number): Badge {
    return this.catalog.get(badgeIndex);
  }

  hasUserUnlockedBadge(account: AccountId, badgeIndex: number): boolean {
    this.catalog.get(badgeIndex);
    return this.ledger.hasUnlocked(account, badgeIndex);
  }

  hasUserMintedBadge(account: AccountId, badgeIndex: number): boolean {
    this.catalog.get(badgeIndex);
    return this.registry.hasMinted(account, badgeIndex);
  }

  getStats(): ReputationStats {
    return {
      totalUsers: this.ledger.totalUsers,
      badgeCount: this.catalog.size,
      tokensMinted: this.registry.totalMinted,
      nextTokenId: this.registry.nextTokenId,
    };
  }

  // ─── Internals ─────────────────────────────────────────────

  /// Runs the mutation, then hands every buffered event to every listener.
  /// A throwing listener does not stop delivery; its errors are rethrown
  /// together once the flush is done, with the mutation already applied.
  private apply<T>(mutation: (emit: Emit) => T): T {
    const pending: ReputationEvent[] = [];
    const result = mutation((event) => pending.push(event));
    const failures: unknown[] = [];
    for (const event of pending) {
      for (const listener of this.listeners) {
        try {
          listener.onEvent(event);
        } catch (error) {
          failures.push(error);
        }
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} event listener call(s) failed`);
    }
    return result;
  }

  /// Shared award path: balance, level, then the unlock pass
  private award(
    account: AccountId,
    amount: number,
    reason: AwardReason,
    emit: Emit
  ): void {
    const entry = this.ledger.entry(account);
    entry.points += amount;
    emit({
      type: "PointsEarned",
      account,
      amount,
      reason,
      totalPoints: entry.points,
    });

    const level = computeLevel(entry.points);
    if (level > entry.level) {
      entry.level = level;
      emit({ type: "LevelUp", account, level });
    }

    for (const badge of this.catalog.list()) {
      if (entry.unlockedBadges.has(badge.index)) continue;
      if (badge.requiredPoints <= entry.points) {
        entry.unlockedBadges.add(badge.index);
        emit({ type: "BadgeUnlocked", account, badgeIndex: badge.index });
      }
    }
  }
}

function requireAccount(account: AccountId): void {
  if (!account) {
    throw new ReputationError("InvalidInput", "Account is required");
  }
}
