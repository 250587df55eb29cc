// Binary min-heap ordered by numeric key. Equal keys pop in no particular order,
// so callers that need a stable order must fold a tiebreaker into the key.
export class MinHeap<T> {
    private readonly keys: number[] = [];
    private readonly values: T[] = [];

    size(): number {
        return this.keys.length;
    }

    push(key: number, value: T): void {
        // Walk a hole up from the end until the parent is not larger
        let hole = this.keys.length;
        while (hole > 0) {
            const parent = (hole - 1) >> 1;
            if (this.keys[parent] <= key) break;
            this.keys[hole] = this.keys[parent];
            this.values[hole] = this.values[parent];
            hole = parent;
        }
        this.keys[hole] = key;
        this.values[hole] = value;
    }

    pop(): T | undefined {
        if (this.keys.length === 0) return undefined;
        const top = this.values[0];
        const lastKey = this.keys.pop();
        const lastValue = this.values.pop();
        if (this.keys.length > 0 && lastKey !== undefined && lastValue !== undefined) {
            this.sinkFromRoot(lastKey, lastValue);
        }
        return top;
    }

    // Re-seats `key`/`value` starting at the empty root slot
    private sinkFromRoot(key: number, value: T): void {
        const n = this.keys.length;
        let hole = 0;
        while (true) {
            let child = hole * 2 + 1;
            if (child >= n) break;
            if (child + 1 < n && this.keys[child + 1] < this.keys[child]) child++;
            if (this.keys[child] >= key) break;
            this.keys[hole] = this.keys[child];
            this.values[hole] = this.values[child];
            hole = child;
        }
        this.keys[hole] = key;
        this.values[hole] = value;
    }
}
