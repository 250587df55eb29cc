export const CELL_OPEN = 0;
export const CELL_WALL = 100;

export type CellValue = typeof CELL_OPEN | typeof CELL_WALL;

export type CellKind = 'open' | 'wall' | 'out-of-bounds';

// Kinds a caller may write into the grid
export type PlaceableKind = Exclude<CellKind, 'out-of-bounds'>;

export interface Cell {
    x: number;
    y: number;
}

export type GridData = Int8Array; // Flattened 1D array, row-major (y * size + x)

/**
 * Read-only view of a grid that the path engine consumes.
 * `getKind` must be total over `0 <= x, y < size`.
 */
export interface GridView {
    readonly size: number;
    getKind(cell: Cell): CellKind;
}

export interface DistanceEntry {
    cell: Cell;
    distance: number;
    previous: Cell | null;
}

export interface DistanceField {
    start: Cell;
    budget: number;
    entries: ReadonlyMap<string, DistanceEntry>;
}

export type PathResult =
    | { reachable: true; path: Cell[]; cost: number }
    | { reachable: false };

export type EditorMode = 'placing-walls' | 'placing-start' | 'evaluating-paths';
