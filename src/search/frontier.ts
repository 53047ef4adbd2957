import type { AlgoKey } from "../types/types";
import { MinHeap } from "../utils/MinHeap/MinHeap";
import { InvalidConfigurationError } from "../utils/errors/errors";

/**
 * Open set of node indices. The ordering is the only thing that
 * distinguishes the algorithms; `pushAll` receives children in the
 * problem's enumeration order with their priorities.
 */
export interface Frontier {
  readonly size: number;
  pushAll(nodes: readonly number[], priorities: readonly number[]): void;
  pop(): number | undefined;
  values(): number[];
}

// Queue with a moving head so popping stays O(1)
export class FifoFrontier implements Frontier {
  private q: number[] = [];
  private head = 0;

  get size() {
    return this.q.length - this.head;
  }
  pushAll(nodes: readonly number[]) {
    for (const n of nodes) this.q.push(n);
  }
  pop() {
    if (this.head >= this.q.length) return undefined;
    const n = this.q[this.head++];
    if (this.head > 1024 && this.head * 2 > this.q.length) {
      this.q = this.q.slice(this.head);
      this.head = 0;
    }
    return n;
  }
  values() {
    return this.q.slice(this.head);
  }
}

// Children go on in reverse so the first enumerated action is popped first
export class LifoFrontier implements Frontier {
  private stack: number[] = [];

  get size() {
    return this.stack.length;
  }
  pushAll(nodes: readonly number[]) {
    for (let i = nodes.length - 1; i >= 0; i--) this.stack.push(nodes[i]);
  }
  pop() {
    return this.stack.pop();
  }
  values() {
    return this.stack.slice();
  }
}

export class PriorityFrontier implements Frontier {
  private heap = new MinHeap<number>();

  get size() {
    return this.heap.size();
  }
  pushAll(nodes: readonly number[], priorities: readonly number[]) {
    nodes.forEach((n, i) => this.heap.push(priorities[i], n));
  }
  pop() {
    return this.heap.pop();
  }
  values() {
    return this.heap.values();
  }
}

export function makeFrontier(algorithm: AlgoKey): Frontier {
  switch (algorithm) {
    case "BFS":
      return new FifoFrontier();
    case "DFS":
      return new LifoFrontier();
    case "UCS":
    case "A*":
      return new PriorityFrontier();
    default:
      throw new InvalidConfigurationError(`unknown algorithm "${algorithm}"`);
  }
}
