import { EmptyFrontierError } from "../../errors/errors";
import type { FrontierView, SearchNode } from "../../interfaces/interfaces";
import type { Cell, RemovalPolicy } from "../../types/types";
import { keyOf } from "../utils";

// Array with a moving head, so both ends pop in O(1) (amortised).
export class NodeQueue {
  private a: SearchNode[] = [];
  private head = 0;
  size() { return this.a.length - this.head; }
  push(node: SearchNode) { this.a.push(node); }
  popBack(): SearchNode | undefined {
    if (this.size() === 0) return undefined;
    return this.a.pop();
  }
  popFront(): SearchNode | undefined {
    if (this.size() === 0) return undefined;
    const node = this.a[this.head++];
    if (this.head > 1024 && this.head * 2 > this.a.length) {
      this.a = this.a.slice(this.head);
      this.head = 0;
    }
    return node;
  }
  toArray(): SearchNode[] { return this.a.slice(this.head); }
}

export interface RemovalStrategy {
  readonly policy: RemovalPolicy;
  take(queue: NodeQueue): SearchNode | undefined;
}

export const STRATEGIES: Record<RemovalPolicy, RemovalStrategy> = {
  LIFO: { policy: "LIFO", take: (q) => q.popBack() },
  FIFO: { policy: "FIFO", take: (q) => q.popFront() },
};

/**
 * Pending search nodes. The removal policy is the only thing that differs
 * between depth-first (LIFO) and breadth-first (FIFO) search.
 */
export class Frontier implements FrontierView {
  private queue = new NodeQueue();
  private held = new Map<string, number>(); // cell key -> nodes holding it
  private strategy: RemovalStrategy;

  constructor(policy: RemovalPolicy = "LIFO") {
    this.strategy = STRATEGIES[policy];
  }

  get policy(): RemovalPolicy {
    return this.strategy.policy;
  }

  get size(): number {
    return this.queue.size();
  }

  add(node: SearchNode): void {
    this.queue.push(node);
    const k = keyOf(node.state);
    this.held.set(k, (this.held.get(k) ?? 0) + 1);
  }

  containsState(state: Cell): boolean {
    return this.held.has(keyOf(state));
  }

  isEmpty(): boolean {
    return this.queue.size() === 0;
  }

  remove(): SearchNode {
    const node = this.strategy.take(this.queue);
    if (!node) throw new EmptyFrontierError();
    const k = keyOf(node.state);
    const left = (this.held.get(k) ?? 1) - 1;
    if (left > 0) this.held.set(k, left);
    else this.held.delete(k);
    return node;
  }

  // insertion order
  states(): Cell[] {
    return this.queue.toArray().map((n) => n.state);
  }
}
