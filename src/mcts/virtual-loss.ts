import type { NodeStats } from './types.js';

/**
 * Virtual loss for in-flight simulations.
 *
 * While a step is between selection and backpropagation, every node on its
 * path counts `amount` extra visits that each scored the worst reward. The
 * adjustment lives only in this ledger, never in the store, and is removed
 * by releasing the guard.
 */
export class VirtualLossLedger {
  private inflight = new Map<string, number>();

  constructor(
    private readonly amount: number,
    private readonly lossReward: number,
  ) {}

  apply(nodeIds: readonly string[]): VirtualLossGuard {
    const guard = new VirtualLossGuard(this);
    guard.extend(nodeIds);
    return guard;
  }

  /** Stats as selection should see them, with pending virtual losses added. */
  effective(nodeId: string, stats: NodeStats): NodeStats {
    const pending = (this.inflight.get(nodeId) ?? 0) * this.amount;
    if (pending === 0) return stats;
    return {
      visitCount: stats.visitCount + pending,
      totalValue: stats.totalValue + pending * this.lossReward,
    };
  }

  pending(nodeId: string): number {
    return this.inflight.get(nodeId) ?? 0;
  }

  get size(): number {
    return this.inflight.size;
  }

  /** @internal */
  add(nodeId: string): void {
    this.inflight.set(nodeId, (this.inflight.get(nodeId) ?? 0) + 1);
  }

  /** @internal */
  remove(nodeId: string): void {
    const count = (this.inflight.get(nodeId) ?? 0) - 1;
    if (count > 0) this.inflight.set(nodeId, count);
    else this.inflight.delete(nodeId);
  }
}

/**
 * Scoped handle on the losses one step applied. `release()` is idempotent
 * and belongs in a `finally`.
 */
export class VirtualLossGuard {
  private held: string[] = [];
  private released = false;

  constructor(private readonly ledger: VirtualLossLedger) {}

  extend(nodeIds: readonly string[]): void {
    if (this.released) return;
    for (const id of nodeIds) {
      this.ledger.add(id);
      this.held.push(id);
    }
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    for (const id of this.held) this.ledger.remove(id);
    this.held = [];
  }
}
