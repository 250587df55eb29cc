import type { Cell, EditorMode } from '../types';

export const MISSING_START_INSTRUCTIONS = 'Please select a starting point before generating paths.';

const MODE_INSTRUCTIONS: Record<EditorMode, string> = {
    'placing-walls': 'Hold the Left Mouse Button and drag your mouse on the grid to draw walls your map. Hold the Right Mouse Button to erase.',
    'placing-start': 'Click on the grid to place your starting position. Hold the Right Mouse Button to erase.',
    'evaluating-paths': 'Click on a blue tile to see the generated path and path information.',
};

export const modeInstructions = (mode: EditorMode): string => MODE_INSTRUCTIONS[mode];

export const formatCell = ({ x, y }: Cell): string => `(${x}, ${y})`;

/**
 * Summary shown for a selected path:
 *   Cost from (sx, sy) to (tx, ty): N
 *   Path:
 *   (sx, sy)
 *   ...
 *   (tx, ty)
 */
export function formatPathInfo({ path, cost }: { path: readonly Cell[]; cost: number }): string {
    if (path.length === 0) {
        throw new Error('Cannot describe an empty path');
    }
    const from = path[0];
    const to = path[path.length - 1];
    const steps = path.map(cell => `${formatCell(cell)}\n`).join('');
    return `Cost from ${formatCell(from)} to ${formatCell(to)}: ${cost}\nPath:\n${steps}`;
}
