import type { Cell, DistanceEntry, DistanceField, GridView, PathResult } from '../types';
import type { GridModel } from '../model/gridModel';
import { MinHeap } from '../utils/minHeap';

export const cellKey = ({ x, y }: Cell): string => `${x},${y}`;

export const manhattan = (a: Cell, b: Cell): number =>
    Math.abs(a.x - b.x) + Math.abs(a.y - b.y);

const NEIGHBOR_OFFSETS: readonly Cell[] = [
    { x: 1, y: 0 },
    { x: -1, y: 0 },
    { x: 0, y: 1 },
    { x: 0, y: -1 },
];

/**
 * Shortest step counts from `start` to every open cell reachable within `budget`
 * unit moves (N/S/E/W).
 *
 * Only open cells whose Manhattan distance from the start is within budget are
 * searched at all. Cells are enumerated column by column (x, then y) and, among
 * cells at equal distance, the one enumerated first is settled first, so each
 * predecessor is the earliest-enumerated neighbour one step closer to the start.
 *
 * Returns `null` when there is no start or the start is not an open cell.
 */
export function generate(grid: GridView, start: Cell | null, budget: number): DistanceField | null {
    if (!start) return null;

    const candidates: Cell[] = [];
    const indexOf = new Map<string, number>();
    for (let x = 0; x < grid.size; x++) {
        for (let y = 0; y < grid.size; y++) {
            const cell = { x, y };
            if (grid.getKind(cell) !== 'open' || manhattan(start, cell) > budget) continue;
            indexOf.set(cellKey(cell), candidates.length);
            candidates.push(cell);
        }
    }

    const startIndex = indexOf.get(cellKey(start));
    if (startIndex === undefined) return null;

    const count = candidates.length;
    const distance = new Float64Array(count).fill(Infinity);
    const previous = new Int32Array(count).fill(-1);
    const settled = new Uint8Array(count);
    // Lexicographic (distance, enumeration index) packed into one key
    const priority = (i: number) => distance[i] * count + i;

    const heap = new MinHeap<number>();
    distance[startIndex] = 0;
    heap.push(priority(startIndex), startIndex);

    // Stops once no unsettled candidate has a finite distance; walled-off
    // candidates never enter the heap.
    while (heap.size() > 0) {
        const node = heap.pop();
        if (node === undefined) break;
        if (settled[node]) continue;
        settled[node] = 1;

        const { x, y } = candidates[node];
        for (const offset of NEIGHBOR_OFFSETS) {
            const neighbor = indexOf.get(cellKey({ x: x + offset.x, y: y + offset.y }));
            if (neighbor === undefined || settled[neighbor]) continue;
            const total = distance[node] + 1;
            if (total < distance[neighbor]) {
                distance[neighbor] = total;
                previous[neighbor] = node;
                heap.push(priority(neighbor), neighbor);
            }
        }
    }

    const entries = new Map<string, DistanceEntry>();
    candidates.forEach((cell, i) => {
        if (distance[i] > budget) return;
        const prev = previous[i];
        entries.set(cellKey(cell), {
            cell,
            distance: distance[i],
            previous: prev >= 0 ? { ...candidates[prev] } : null,
        });
    });

    return { start: { x: start.x, y: start.y }, budget, entries };
}

/**
 * Ordered cells from the field's start to `target` (both inclusive).
 */
export function reconstructPath(field: DistanceField, target: Cell): PathResult {
    const entry = field.entries.get(cellKey(target));
    if (!entry) return { reachable: false };

    const path: Cell[] = [];
    let current = entry;
    while (true) {
        path.push({ ...current.cell });
        if (current.previous === null) break;
        const next = field.entries.get(cellKey(current.previous));
        if (!next || path.length > entry.distance) {
            throw new Error(`Broken predecessor chain at ${cellKey(current.cell)}`);
        }
        current = next;
    }

    return { reachable: true, path: path.reverse(), cost: entry.distance };
}

/**
 * Keeps the most recent distance field for a grid until it is cleared or
 * regenerated. Grid edits never invalidate it on their own.
 */
export class PathEngine {
    private current: DistanceField | null = null;

    get field(): DistanceField | null {
        return this.current;
    }

    generate(grid: GridModel, budget: number): DistanceField | null {
        this.current = generate(grid, grid.start, budget);
        return this.current;
    }

    reconstructPath(target: Cell): PathResult {
        return this.current ? reconstructPath(this.current, target) : { reachable: false };
    }

    clear(): void {
        this.current = null;
    }
}
