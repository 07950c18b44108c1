import type { Delivery, ScheduledDelivery } from './InternalTypes.js';

function before(a: ScheduledDelivery, b: ScheduledDelivery): boolean {
  return a.deliverAt < b.deliverAt || (a.deliverAt === b.deliverAt && a.seq < b.seq);
}

// Binary min-heap ordered by delivery time, FIFO among equal times.
export class EventQueue {
  private readonly heap: ScheduledDelivery[] = [];

  private nextSeq = 0;

  get size(): number {
    return this.heap.length;
  }

  push(delivery: Delivery): ScheduledDelivery {
    const scheduled: ScheduledDelivery = { ...delivery, seq: this.nextSeq };
    this.nextSeq += 1;
    this.heap.push(scheduled);
    this.siftUp(this.heap.length - 1);
    return scheduled;
  }

  pop(): ScheduledDelivery | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) {
      return undefined;
    }
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }


  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      const node = this.heap[i];
      const parentNode = this.heap[parent];
      if (!node || !parentNode || !before(node, parentNode)) {
        return;
      }
      this.heap[i] = parentNode;
      this.heap[parent] = node;
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    const n = this.heap.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      const leftNode = this.heap[left];
      const rightNode = this.heap[right];
      const smallestNode = this.heap[smallest];
      if (left < n && leftNode && smallestNode && before(leftNode, smallestNode)) {
        smallest = left;
      }
      const current = this.heap[smallest];
      if (right < n && rightNode && current && before(rightNode, current)) {
        smallest = right;
      }
      if (smallest === i) {
        return;
      }
      const a = this.heap[i];
      const b = this.heap[smallest];
      if (!a || !b) {
        return;
      }
      this.heap[i] = b;
      this.heap[smallest] = a;
      i = smallest;
    }
  }
}
