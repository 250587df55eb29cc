import { GridModel } from '../model/gridModel';
import type { Cell } from '../types';

export const LAYOUT_OPEN = '.';
export const LAYOUT_WALL = '#';
export const LAYOUT_START = 'S';

/**
 * Parses a square grid layout, one text row per grid row (y = 0 first):
 *   .  open cell
 *   #  wall
 *   S  start (open, at most one)
 * Blank lines and surrounding whitespace are ignored.
 */
export function parseGridLayout(layout: string | readonly string[]): GridModel {
    const lines = typeof layout === 'string' ? layout.split('\n') : layout;
    const rows = lines.map(line => line.trim()).filter(line => line.length > 0);

    if (rows.length === 0) {
        throw new Error('Layout contains no rows');
    }

    const size = rows.length;
    const grid = new GridModel(size);
    let start: Cell | undefined;

    for (let y = 0; y < size; y++) {
        const row = rows[y];
        if (row.length !== size) {
            throw new Error(`Row ${y + 1} has ${row.length} columns, expected ${size}`);
        }

        for (let x = 0; x < size; x++) {
            const ch = row[x];
            if (ch === LAYOUT_WALL) {
                grid.setCell({ x, y }, 'wall');
            } else if (ch === LAYOUT_START) {
                if (start) {
                    throw new Error(`Second start at row ${y + 1}, column ${x + 1}`);
                }
                start = { x, y };
            } else if (ch !== LAYOUT_OPEN) {
                throw new Error(`Invalid cell at row ${y + 1}, column ${x + 1}: "${ch}"`);
            }
        }
    }

    if (start) grid.setStart(start);
    return grid;
}
