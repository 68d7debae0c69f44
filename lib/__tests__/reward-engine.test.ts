import { describe, it, expect, beforeEach } from "vitest";
import { RewardEngine } from "../reward-engine";
import { HostClock } from "../clock";
import { EventLog } from "../events";
import { ReputationLedger } from "../reputation-ledger";
import { SECONDS_PER_DAY } from "../scores";

const ADMIN = "admin";
const ALICE = "alice";
const BOB = "bob";

let clock: HostClock;
let log: EventLog;
let engine: RewardEngine;

function onDay(day: number, offsetSeconds = 0): void {
  clock.set(day * SECONDS_PER_DAY + offsetSeconds);
}

function giveActions(account: string, count: number): void {
  for (let i = 0; i < count; i++) {
    engine.performAction(account, `task-${i}`);
  }
}

beforeEach(() => {
  clock = new HostClock(0);
  log = new EventLog();
  engine = new RewardEngine({ admin: ADMIN, clock, listeners: [log] });
});

// ─── Check-in ─────────────────────────────────────────────

describe("checkIn", () => {
  it("awards 10 points and starts a streak on the first check-in", () => {
    onDay(1);
    expect(engine.checkIn(ALICE)).toBe(10);

    const profile = engine.getUserProfile(ALICE);
    expect(profile.points).toBe(10);
    expect(profile.streakDays).toBe(1);
    expect(profile.lastActionDay).toBe(1);
  });

  it("adds a streak bonus on consecutive days", () => {
    onDay(1);
    engine.checkIn(ALICE);
    onDay(2, 3600);
    expect(engine.checkIn(ALICE)).toBe(14);

    const profile = engine.getUserProfile(ALICE);
    expect(profile.points).toBe(24);
    expect(profile.streakDays).toBe(2);
  });

  it("resets the streak after a missed day", () => {
    onDay(1);
    engine.checkIn(ALICE);
    onDay(2);
    engine.checkIn(ALICE);
    onDay(4);
    expect(engine.checkIn(ALICE)).toBe(10);

    const profile = engine.getUserProfile(ALICE);
    expect(profile.points).toBe(34);
    expect(profile.streakDays).toBe(1);
    expect(profile.lastActionDay).toBe(4);
  });

  it("grows the bonus with every consecutive day", () => {
    const rewards: number[] = [];
    for (let day = 10; day < 14; day++) {
      onDay(day);
      rewards.push(engine.checkIn(ALICE));
    }
    expect(rewards).toEqual([10, 14, 16, 18]);
    expect(engine.getUserProfile(ALICE).streakDays).toBe(4);
  });

  it("rejects a second check-in on the same day without changing state", () => {
    onDay(5);
    engine.checkIn(ALICE);
    const eventsBefore = log.length;

    onDay(5, 7200);
    expect(() => engine.checkIn(ALICE)).toThrow(
      expect.objectContaining({ code: "AlreadyActioned" })
    );
    expect(engine.getUserProfile(ALICE).points).toBe(10);
    expect(log.length).toBe(eventsBefore);
  });

  it("succeeds on the very first check-in even on day 0", () => {
    expect(engine.checkIn(ALICE)).toBe(10);
    expect(engine.getUserProfile(ALICE).lastActionDay).toBe(0);
  });

  it("uses the configured day length", () => {
    const hourly = new RewardEngine({ admin: ADMIN, clock, daySeconds: 3600 });
    clock.set(3600);
    hourly.checkIn(ALICE);
    clock.set(7200);
    expect(hourly.checkIn(ALICE)).toBe(14);
  });
});

// ─── Generic actions ──────────────────────────────────────

describe("performAction", () => {
  it("awards 5 points per action with no rate limit", () => {
    giveActions(ALICE, 5);

    const profile = engine.getUserProfile(ALICE);
    expect(profile.points).toBe(25);
    expect(profile.level).toBe(1);
    expect(engine.hasUserUnlockedBadge(ALICE, 0)).toBe(true);
    expect(engine.hasUserUnlockedBadge(ALICE, 1)).toBe(false);
  });

  it("unlocks the zero-threshold badge on the first award", () => {
    engine.performAction(ALICE, "x");

    expect(log.all()).toEqual([
      { type: "PointsEarned", account: ALICE, amount: 5, reason: "ACTION", totalPoints: 5 },
      { type: "LevelUp", account: ALICE, level: 1 },
      { type: "BadgeUnlocked", account: ALICE, badgeIndex: 0 },
    ]);
  });

  it("rejects an empty label", () => {
    expect(() => engine.performAction(ALICE, "")).toThrow(
      expect.objectContaining({ code: "InvalidInput" })
    );
    expect(engine.getStats().totalUsers).toBe(0);
    expect(log.length).toBe(0);
  });

  it("rejects an empty account", () => {
    expect(() => engine.performAction("", "x")).toThrow(
      expect.objectContaining({ code: "InvalidInput" })
    );
  });
});

// ─── Levels and unlocks ───────────────────────────────────

describe("levels and badge unlocks", () => {
  it("levels up and unlocks Active Member in the action that reaches 100", () => {
    giveActions(ALICE, 19);
    expect(engine.getUserProfile(ALICE).level).toBe(1);
    const offset = log.length;

    engine.performAction(ALICE, "the-hundredth-point");

    expect(engine.getUserProfile(ALICE)).toMatchObject({ points: 100, level: 2 });
    expect(log.since(offset)).toEqual([
      { type: "PointsEarned", account: ALICE, amount: 5, reason: "ACTION", totalPoints: 100 },
      { type: "LevelUp", account: ALICE, level: 2 },
      { type: "BadgeUnlocked", account: ALICE, badgeIndex: 1 },
    ]);
  });

  it("keeps level equal to floor(points / 100) + 1", () => {
    for (let i = 1; i <= 45; i++) {
      engine.performAction(ALICE, "step");
      const { points, level } = engine.getUserProfile(ALICE);
      expect(level).toBe(Math.floor(points / 100) + 1);
    }
    expect(log.ofType("LevelUp").map((e) => e.level)).toEqual([1, 2, 3]);
  });

  it("reports a fresh account as level 0 with nothing unlocked", () => {
    expect(engine.getUserProfile("nobody")).toEqual({
      account: "nobody",
      points: 0,
      level: 0,
      streakDays: 0,
      lastActionDay: null,
      unlockedCount: 0,
      mintedCount: 0,
    });
  });

  it("unlocks several badges crossed by a single award", () => {
    const engineWithTiers = new RewardEngine({
      admin: ADMIN,
      clock,
      listeners: [log],
      badges: [
        { name: "A", description: "", requiredPoints: 0, metadataRef: "a" },
        { name: "B", description: "", requiredPoints: 3, metadataRef: "b" },
        { name: "C", description: "", requiredPoints: 5, metadataRef: "c" },
        { name: "D", description: "", requiredPoints: 6, metadataRef: "d" },
      ],
    });

    engineWithTiers.performAction(ALICE, "x");

    expect(log.ofType("BadgeUnlocked").map((e) => e.badgeIndex)).toEqual([0, 1, 2]);
    expect(engineWithTiers.getUserProfile(ALICE).unlockedCount).toBe(3);
  });

  it("evaluates badges added after the account's first award", () => {
    engine.performAction(ALICE, "x");
    const index = engine.addCustomBadge(ADMIN, {
      name: "Early Bird",
      description: "Ten points",
      requiredPoints: 10,
      metadataRef: "ipfs://early",
    });
    expect(engine.hasUserUnlockedBadge(ALICE, index)).toBe(false);

    engine.performAction(ALICE, "y");

    expect(engine.hasUserUnlockedBadge(ALICE, index)).toBe(true);
  });

  it("never reports an unlocked badge twice", () => {
    giveActions(ALICE, 30);
    const unlocked = log.ofType("BadgeUnlocked").map((e) => e.badgeIndex);
    expect(unlocked).toEqual([0, 1]);
  });

  it("fails unlock queries for unknown badges", () => {
    expect(() => engine.hasUserUnlockedBadge(ALICE, 5)).toThrow(
      expect.objectContaining({ code: "NotFound" })
    );
    expect(() => engine.hasUserMintedBadge(ALICE, 5)).toThrow(
      expect.objectContaining({ code: "NotFound" })
    );
  });
});

// ─── Endorsements ─────────────────────────────────────────

describe("endorseUser", () => {
  it("lets an account with exactly 50 points endorse another", () => {
    giveActions(ALICE, 10);
    const offset = log.length;

    engine.endorseUser(ALICE, BOB);

    expect(engine.getUserProfile(BOB).points).toBe(25);
    expect(engine.getUserProfile(ALICE).points).toBe(50);
    expect(engine.endorsements.has(ALICE, BOB)).toBe(true);
    expect(log.since(offset)).toEqual([
      { type: "UserEndorsed", endorser: ALICE, endorsed: BOB },
      { type: "PointsEarned", account: BOB, amount: 25, reason: "ENDORSEMENT", totalPoints: 25 },
      { type: "LevelUp", account: BOB, level: 1 },
      { type: "BadgeUnlocked", account: BOB, badgeIndex: 0 },
    ]);
  });

  it("rejects an endorser with 49 points", () => {
    onDay(1);
    engine.checkIn(ALICE);
    onDay(2);
    engine.checkIn(ALICE);
    giveActions(ALICE, 5);
    expect(engine.getUserProfile(ALICE).points).toBe(49);
    const offset = log.length;

    expect(() => engine.endorseUser(ALICE, BOB)).toThrow(
      expect.objectContaining({ code: "InsufficientReputation" })
    );
    expect(engine.getUserProfile(BOB).points).toBe(0);
    expect(engine.endorsements.has(ALICE, BOB)).toBe(false);
    expect(log.length).toBe(offset);

    engine.performAction(ALICE, "one-more");
    engine.endorseUser(ALICE, BOB);
    expect(engine.getUserProfile(BOB).points).toBe(25);
  });

  it("rejects self-endorsement", () => {
    giveActions(ALICE, 10);
    expect(() => engine.endorseUser(ALICE, ALICE)).toThrow(
      expect.objectContaining({ code: "SelfEndorsement" })
    );
  });

  it("rejects self-endorsement even without reputation", () => {
    expect(() => engine.endorseUser(BOB, BOB)).toThrow(
      expect.objectContaining({ code: "SelfEndorsement" })
    );
  });

  it("rejects a repeated endorsement of the same target", () => {
    giveActions(ALICE, 10);
    engine.endorseUser(ALICE, BOB);
    const offset = log.length;

    expect(() => engine.endorseUser(ALICE, BOB)).toThrow(
      expect.objectContaining({ code: "DuplicateEndorsement" })
    );
    expect(engine.getUserProfile(BOB).points).toBe(25);
    expect(log.length).toBe(offset);
  });

  it("treats endorsement pairs as ordered", () => {
    giveActions(ALICE, 10);
    giveActions(BOB, 10);
    engine.endorseUser(ALICE, BOB);
    engine.endorseUser(BOB, ALICE);

    expect(engine.getUserProfile(ALICE).points).toBe(75);
    expect(engine.getUserProfile(BOB).points).toBe(75);
  });
});

// ─── Admin operations ─────────────────────────────────────

describe("catalog administration", () => {
  it("rejects non-admin callers", () => {
    expect(() =>
      engine.addCustomBadge(ALICE, { name: "X", description: "", requiredPoints: 1, metadataRef: "x" })
    ).toThrow(expect.objectContaining({ code: "Unauthorized" }));
    expect(() => engine.updateBadgeURI(ALICE, 0, "x")).toThrow(
      expect.objectContaining({ code: "Unauthorized" })
    );
    expect(engine.getStats().badgeCount).toBe(5);
  });

  it("exposes badge details", () => {
    engine.updateBadgeURI(ADMIN, 4, "ipfs://legend");
    expect(engine.getBadgeInfo(4)).toEqual({
      index: 4,
      name: "Legend",
      description: "Reached 5000 reputation points",
      requiredPoints: 5000,
      metadataRef: "ipfs://legend",
    });
  });
});

// ─── Listeners and stats ──────────────────────────────────

describe("listeners and stats", () => {
  it("stops notifying after unsubscribe", () => {
    const extra = new EventLog();
    const unsubscribe = engine.subscribe(extra);
    engine.performAction(ALICE, "x");
    unsubscribe();
    engine.performAction(ALICE, "y");

    expect(extra.length).toBe(3);
    expect(log.length).toBe(4);
  });

  it("delivers every event to later listeners when one throws", () => {
    const received = new EventLog();
    const failing = {
      onEvent: () => {
        throw new Error("listener down");
      },
    };
    const guarded = new RewardEngine({ admin: ADMIN, clock, listeners: [failing, received] });

    let thrown: unknown;
    try {
      guarded.performAction(ALICE, "x");
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(AggregateError);
    expect(thrown instanceof AggregateError ? thrown.errors.length : 0).toBe(3);
    expect(received.all().map((e) => e.type)).toEqual([
      "PointsEarned",
      "LevelUp",
      "BadgeUnlocked",
    ]);
    expect(guarded.getUserProfile(ALICE).points).toBe(5);
  });

  it("counts users once they earn points", () => {
    engine.getUserProfile(ALICE);
    expect(engine.getStats().totalUsers).toBe(0);

    engine.performAction(ALICE, "x");
    engine.performAction(BOB, "x");
    engine.performAction(ALICE, "y");

    expect(engine.getStats()).toEqual({
      totalUsers: 2,
      badgeCount: 5,
      tokensMinted: 0,
      nextTokenId: 1,
    });
  });

  it("works on an injected ledger", () => {
    const ledger = new ReputationLedger();
    const shared = new RewardEngine({ admin: ADMIN, clock, ledger });
    shared.performAction(ALICE, "x");
    expect(ledger.read(ALICE).points).toBe(5);
  });
});
