import type { AccountId, UserState } from "./types";

function emptyState(): UserState {
  return {
    points: 0,
    level: 0,
    lastActionDay: null,
    streakDays: 0,
    unlockedBadges: new Set<number>(),
  };
}

/// Per-account reputation state; accounts read as zero until first written
export class ReputationLedger {
  private readonly users = new Map<AccountId, UserState>();

  /// Copy of the account's state, zero-valued for unknown accounts
  read(account: AccountId): UserState {
    const state = this.users.get(account);
    if (!state) return emptyState();
    return { ...state, unlockedBadges: new Set(state.unlockedBadges) };
  }

  /// Live state for the account, created on first access
  entry(account: AccountId): UserState {
    let state = this.users.get(account);
    if (!state) {
      state = emptyState();
      this.users.set(account, state);
    }
    return state;
  }

  hasUnlocked(account: AccountId, badgeIndex: number): boolean {
    return this.users.get(account)?.unlockedBadges.has(badgeIndex) ?? false;
  }

  get totalUsers(): number {
    return this.users.size;
  }

  accounts(): AccountId[] {
    return [...this.users.keys()];
  }
}
