import {
    CELL_OPEN,
    CELL_WALL,
    type Cell,
    type CellKind,
    type GridData,
    type GridView,
    type PlaceableKind
} from '../types';

export const sameCell = (a: Cell | null, b: Cell | null): boolean =>
    a !== null && b !== null && a.x === b.x && a.y === b.y;

/**
 * Square grid of open and wall cells with at most one start cell.
 * The start cell is always open.
 */
export class GridModel implements GridView {
    readonly size: number;
    private readonly data: GridData;
    private startCell: Cell | null = null;

    constructor(size: number, data?: GridData) {
        if (!Number.isInteger(size) || size <= 0) {
            throw new Error(`Grid size must be a positive integer, got ${size}`);
        }
        if (data && data.length !== size * size) {
            throw new Error(`Grid data has ${data.length} cells, expected ${size * size}`);
        }
        this.size = size;
        this.data = data ? new Int8Array(data) : new Int8Array(size * size).fill(CELL_OPEN);
    }

    get start(): Cell | null {
        return this.startCell ? { ...this.startCell } : null;
    }

    inBounds({ x, y }: Cell): boolean {
        return Number.isInteger(x) && Number.isInteger(y)
            && x >= 0 && x < this.size && y >= 0 && y < this.size;
    }

    getKind(cell: Cell): CellKind {
        if (!this.inBounds(cell)) return 'out-of-bounds';
        return this.data[cell.y * this.size + cell.x] === CELL_WALL ? 'wall' : 'open';
    }

    setCell(cell: Cell, kind: PlaceableKind): void {
        if (!this.inBounds(cell)) return;
        if (kind === 'wall' && sameCell(this.startCell, cell)) {
            this.startCell = null;
        }
        this.data[cell.y * this.size + cell.x] = kind === 'wall' ? CELL_WALL : CELL_OPEN;
    }

    /**
     * Moves the start marker onto an open cell. Walls, out-of-bounds cells and
     * the current start are left alone; returns whether the start moved.
     */
    setStart(cell: Cell): boolean {
        if (this.getKind(cell) !== 'open' || sameCell(this.startCell, cell)) {
            return false;
        }
        this.startCell = { x: cell.x, y: cell.y };
        return true;
    }

    clearStart(): void {
        this.startCell = null;
    }

    clone(): GridModel {
        const copy = new GridModel(this.size, this.data);
        copy.startCell = this.start;
        return copy;
    }
}
