import type { AccountId, MintedToken, ReputationEvent } from "./types";
import type { BadgeCatalog } from "./badge-catalog";
import type { ReputationLedger } from "./reputation-ledger";
import { ReputationError } from "./errors";

function pairKey(account: AccountId, badgeIndex: number): string {
  return `${account}#${badgeIndex}`;
}

/**
 * Soulbound token registry.
 *
 * Token ids start at 1 and are never reused; 0 means "not minted".
 * Ownership is written once, at mint time, and there is no operation
 * that changes it.
 */
export class BadgeMintRegistry {
  private readonly tokens = new Map<number, MintedToken>();
  private readonly tokenByPair = new Map<string, number>();
  private readonly tokensByOwner = new Map<AccountId, number[]>();
  private nextId = 1;

  constructor(
    private readonly catalog: BadgeCatalog,
    private readonly ledger: ReputationLedger
  ) {}

  get nextTokenId(): number {
    return this.nextId;
  }

  get totalMinted(): number {
    return this.nextId - 1;
  }

  mint(
    account: AccountId,
    badgeIndex: number,
    mintedAt: number,
    emit: (event: ReputationEvent) => void
  ): number {
    if (!this.catalog.has(badgeIndex)) {
      throw new ReputationError(
        "OutOfRange",
        `Badge index ${badgeIndex} is outside the catalog (size ${this.catalog.size})`
      );
    }
    if (!this.ledger.hasUnlocked(account, badgeIndex)) {
      throw new ReputationError(
        "BadgeLocked",
        `Badge ${badgeIndex} is not unlocked for ${account}`
      );
    }
    if (this.tokenByPair.has(pairKey(account, badgeIndex))) {
      throw new ReputationError(
        "AlreadyMinted",
        `Badge ${badgeIndex} already minted for ${account}`
      );
    }

    const tokenId = this.nextId++;
    this.tokens.set(tokenId, { tokenId, badgeIndex, owner: account, mintedAt });
    this.tokenByPair.set(pairKey(account, badgeIndex), tokenId);

    const owned = this.tokensByOwner.get(account);
    if (owned) {
      owned.push(tokenId);
    } else {
      this.tokensByOwner.set(account, [tokenId]);
    }

    emit({ type: "Transfer", from: null, to: account, tokenId });
    emit({ type: "BadgeMinted", account, badgeIndex, tokenId });
    return tokenId;
  }

  getToken(tokenId: number): MintedToken {
    const token = this.tokens.get(tokenId);
    if (!token) {
      throw new ReputationError("NotFound", `Token ${tokenId} does not exist`);
    }
    return { ...token };
  }

  ownerOf(tokenId: number): AccountId {
    return this.getToken(tokenId).owner;
  }

  /// Resolves through the badge's current reference
  tokenMetadataRef(tokenId: number): string {
    return this.catalog.get(this.getToken(tokenId).badgeIndex).metadataRef;
  }

  /// Token id for the pair, or 0 when nothing has been minted
  tokenFor(account: AccountId, badgeIndex: number): number {
    return this.tokenByPair.get(pairKey(account, badgeIndex)) ?? 0;
  }

  hasMinted(account: AccountId, badgeIndex: number): boolean {
    return this.tokenFor(account, badgeIndex) !== 0;
  }

  /// Owned token ids in ascending order
  tokensOf(account: AccountId): number[] {
    return [...(this.tokensByOwner.get(account) ?? [])];
  }

  balanceOf(account: AccountId): number {
    return this.tokensByOwner.get(account)?.length ?? 0;
  }
}
