import type { AccountId } from "./types";

/// Permanent record of (endorser, endorsed) pairs
export class EndorsementGraph {
  private readonly edges = new Map<AccountId, Set<AccountId>>();

  has(endorser: AccountId, endorsed: AccountId): boolean {
    return this.edges.get(endorser)?.has(endorsed) ?? false;
  }

  record(endorser: AccountId, endorsed: AccountId): void {
    let targets = this.edges.get(endorser);
    if (!targets) {
      targets = new Set<AccountId>();
      this.edges.set(endorser, targets);
    }
    targets.add(endorsed);
  }
}
