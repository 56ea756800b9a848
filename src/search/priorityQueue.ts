export interface QueueEntry {
  readonly id: number;
  readonly score: number;
}

/**
 * Capacity-bounded binary min-heap keyed by score, used as the A* open set.
 *
 * Entries live in a flat array; a companion map from id to heap index keeps
 * {@link decreaseOrInsert} at O(log n) instead of a linear scan. Ties between
 * equal scores come out in heap order, which callers must not rely on.
 */
export class PriorityQueue {
  private readonly ids: number[] = [];
  private readonly scores: number[] = [];
  private readonly positions = new Map<number, number>();

  constructor(readonly capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity < 0) {
      throw new RangeError(`Queue capacity must be a non-negative integer, received ${capacity}`);
    }
  }

  get size(): number {
    return this.ids.length;
  }

  isEmpty(): boolean {
    return this.ids.length === 0;
  }

  has(id: number): boolean {
    return this.positions.has(id);
  }

  /** Stored score for {@link id}, if queued. */
  scoreOf(id: number): number | undefined {
    const index = this.positions.get(id);
    return index === undefined ? undefined : this.scores[index];
  }

  peek(): QueueEntry | undefined {
    if (this.ids.length === 0) {
      return undefined;
    }
    return { id: this.ids[0], score: this.scores[0] };
  }

  /**
   * Inserts a new entry. Returns false when the queue is full or the id is
   * already queued; the caller decides whether that frontier branch matters.
   */
  push(id: number, score: number): boolean {
    if (this.ids.length >= this.capacity || this.positions.has(id)) {
      return false;
    }
    const index = this.ids.length;
    this.ids.push(id);
    this.scores.push(score);
    this.positions.set(id, index);
    this.bubbleUp(index);
    return true;
  }

  /** Removes and returns the minimum-score entry, or `undefined` when empty. */
  pop(): QueueEntry | undefined {
    if (this.ids.length === 0) {
      return undefined;
    }
    const min: QueueEntry = { id: this.ids[0], score: this.scores[0] };
    this.positions.delete(min.id);

    const lastId = this.ids.pop();
    const lastScore = this.scores.pop();
    if (this.ids.length > 0 && lastId !== undefined && lastScore !== undefined) {
      this.ids[0] = lastId;
      this.scores[0] = lastScore;
      this.positions.set(lastId, 0);
      this.bubbleDown(0);
    }
    return min;
  }

  /**
   * Lowers the score of a queued id when {@link score} is strictly smaller,
   * leaving higher scores untouched. Absent ids are inserted. Returns false
   * only when an insertion is refused because the queue is full.
   */
  decreaseOrInsert(id: number, score: number): boolean {
    const index = this.positions.get(id);
    if (index === undefined) {
      return this.push(id, score);
    }
    if (score < this.scores[index]) {
      this.scores[index] = score;
      this.bubbleUp(index);
    }
    return true;
  }

  clear(): void {
    this.ids.length = 0;
    this.scores.length = 0;
    this.positions.clear();
  }

  private bubbleUp(startIndex: number): void {
    const id = this.ids[startIndex];
    const score = this.scores[startIndex];
    let index = startIndex;

    while (index > 0) {
      const parent = (index - 1) >> 1;
      if (this.scores[parent] <= score) {
        break;
      }
      this.ids[index] = this.ids[parent];
      this.scores[index] = this.scores[parent];
      this.positions.set(this.ids[index], index);
      index = parent;
    }

    this.ids[index] = id;
    this.scores[index] = score;
    this.positions.set(id, index);
  }

  private bubbleDown(startIndex: number): void {
    const length = this.ids.length;
    const id = this.ids[startIndex];
    const score = this.scores[startIndex];
    let index = startIndex;

    while (true) {
      const left = 2 * index + 1;
      const right = left + 1;
      let smallest = index;
      let smallestScore = score;

      if (left < length && this.scores[left] < smallestScore) {
        smallest = left;
        smallestScore = this.scores[left];
      }
      if (right < length && this.scores[right] < smallestScore) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      this.ids[index] = this.ids[smallest];
      this.scores[index] = this.scores[smallest];
      this.positions.set(this.ids[index], index);
      index = smallest;
    }

    this.ids[index] = id;
    this.scores[index] = score;
    this.positions.set(id, index);
  }
}
