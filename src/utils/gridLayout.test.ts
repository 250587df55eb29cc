import { describe, it, expect } from 'vitest';
import { parseGridLayout } from './gridLayout';

describe('parseGridLayout', () => {
    it('reads walls and the start cell', () => {
        const grid = parseGridLayout(['.#.', '.S.', '#..']);
        expect(grid.size).toBe(3);
        expect(grid.getKind({ x: 1, y: 0 })).toBe('wall');
        expect(grid.getKind({ x: 0, y: 2 })).toBe('wall');
        expect(grid.getKind({ x: 1, y: 1 })).toBe('open');
        expect(grid.start).toEqual({ x: 1, y: 1 });
    });

    it('accepts a single string with blank lines and indentation', () => {
        const grid = parseGridLayout(`
            S.
            .#
        `);
        expect(grid.size).toBe(2);
        expect(grid.start).toEqual({ x: 0, y: 0 });
        expect(grid.getKind({ x: 1, y: 1 })).toBe('wall');
    });

    it('leaves the start unset when no S is present', () => {
        expect(parseGridLayout(['..', '..']).start).toBeNull();
    });

    it('rejects empty layouts', () => {
        expect(() => parseGridLayout('\n  \n')).toThrow('Layout contains no rows');
    });

    it('rejects rows that do not match the grid size', () => {
        expect(() => parseGridLayout(['...', '..', '...'])).toThrow('Row 2 has 2 columns, expected 3');
    });

    it('rejects unknown characters', () => {
        expect(() => parseGridLayout(['.x', '..'])).toThrow('Invalid cell at row 1, column 2: "x"');
    });

    it('rejects a second start', () => {
        expect(() => parseGridLayout(['S.', '.S'])).toThrow('Second start at row 2, column 2');
    });
});
