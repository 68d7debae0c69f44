import type { AccountId, Badge, NewBadge, ReputationEvent } from "./types";
import { ReputationError } from "./errors";
import { encodeBadgeSVG, generateBadgeSVG } from "./badge-art";

const DEFAULT_BADGES: Array<Omit<NewBadge, "metadataRef">> = [
  {
    name: "Newcomer",
    description: "Earned your first reputation points",
    requiredPoints: 0,
  },
  {
    name: "Active Member",
    description: "Reached 100 reputation points",
    requiredPoints: 100,
  },
  {
    name: "Contributor",
    description: "Reached 500 reputation points",
    requiredPoints: 500,
  },
  {
    name: "Expert",
    description: "Reached 1000 reputation points",
    requiredPoints: 1000,
  },
  {
    name: "Legend",
    description: "Reached 5000 reputation points",
    requiredPoints: 5000,
  },
];

export function defaultBadges(): NewBadge[] {
  return DEFAULT_BADGES.map((badge, position) => ({
    ...badge,
    metadataRef: encodeBadgeSVG(
      generateBadgeSVG(badge.name, badge.requiredPoints, position)
    ),
  }));
}

/**
 * Ordered, append-only badge registry. Mutations take the calling account
 * and are accepted only from the administrator the catalog was built with.
 */
export class BadgeCatalog {
  private readonly badges: Badge[] = [];

  constructor(
    private readonly admin: AccountId,
    seed: NewBadge[] = defaultBadges()
  ) {
    for (const badge of seed) {
      validateBadge(badge);
      this.append(badge);
    }
  }

  get size(): number {
    return this.badges.length;
  }

  isAdmin(caller: AccountId): boolean {
    return caller === this.admin;
  }

  has(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.badges.length;
  }

  get(index: number): Badge {
    if (!this.has(index)) {
      throw new ReputationError("NotFound", `Badge ${index} does not exist`);
    }
    return { ...this.badges[index] };
  }

  list(): Badge[] {
    return this.badges.map((badge) => ({ ...badge }));
  }

  createBadge(
    caller: AccountId,
    badge: NewBadge,
    emit: (event: ReputationEvent) => void
  ): number {
    this.requireAdmin(caller);
    validateBadge(badge);

    const index = this.append(badge);
    emit({
      type: "BadgeCreated",
      badgeIndex: index,
      name: badge.name,
      requiredPoints: badge.requiredPoints,
    });
    return index;
  }

  updateMetadataRef(
    caller: AccountId,
    index: number,
    metadataRef: string,
    emit: (event: ReputationEvent) => void
  ): void {
    this.requireAdmin(caller);
    if (!this.has(index)) {
      throw new ReputationError("NotFound", `Badge ${index} does not exist`);
    }
    if (!metadataRef) {
      throw new ReputationError("InvalidInput", "Metadata reference is required");
    }

    this.badges[index].metadataRef = metadataRef;
    emit({ type: "BadgeMetadataUpdated", badgeIndex: index, metadataRef });
  }

  private append(badge: NewBadge): number {
    const index = this.badges.length;
    this.badges.push({
      index,
      name: badge.name,
      description: badge.description,
      requiredPoints: badge.requiredPoints,
      metadataRef: badge.metadataRef,
    });
    return index;
  }

  private requireAdmin(caller: AccountId): void {
    if (!this.isAdmin(caller)) {
      throw new ReputationError(
        "Unauthorized",
        `${caller} is not allowed to manage badges`
      );
    }
  }
}

function validateBadge(badge: NewBadge): void {
  if (!badge.name) {
    throw new ReputationError("InvalidInput", "Badge name is required");
  }
  if (!badge.metadataRef) {
    throw new ReputationError("InvalidInput", "Metadata reference is required");
  }
  if (!Number.isInteger(badge.requiredPoints) || badge.requiredPoints < 0) {
    throw new ReputationError(
      "InvalidInput",
      `Invalid point threshold: ${badge.requiredPoints}`
    );
  }
}
