import { useState, useCallback } from 'react';
import { GridModel, sameCell } from '../model/gridModel';
import { generate, reconstructPath } from '../engine/pathEngine';
import { parseGridLayout } from '../utils/gridLayout';
import { MISSING_START_INSTRUCTIONS, formatPathInfo, modeInstructions } from '../utils/pathInfo';
import {
    GRID_SIZE_DEFAULT,
    MOVEMENT_BUDGET_DEFAULT,
    parseGridSize,
    parseMovementBudget
} from '../utils/validators';
import type { Cell, CellKind, DistanceField, EditorMode } from '../types';

interface UsePathPlannerOptions {
    initialSize?: number | string;
    initialBudget?: number | string;
    layout?: string | readonly string[];
}

export function usePathPlanner({
    initialSize = GRID_SIZE_DEFAULT,
    initialBudget = MOVEMENT_BUDGET_DEFAULT,
    layout
}: UsePathPlannerOptions = {}) {
    const [grid, setGrid] = useState<GridModel>(() => {
        if (layout) {
            try {
                return parseGridLayout(layout);
            } catch (err) {
                console.error('Layout import failed:', err);
            }
        }
        return new GridModel(parseGridSize(initialSize));
    });
    const [budget, setBudget] = useState(() => parseMovementBudget(initialBudget));

    const [mode, setModeState] = useState<EditorMode>('placing-walls');
    const [infoText, setInfoText] = useState(() => modeInstructions('placing-walls'));

    // Most recent distance field and the target picked from it
    const [field, setField] = useState<DistanceField | null>(null);
    const [selected, setSelected] = useState<Cell | null>(null);

    const clearPaths = useCallback(() => {
        setField(null);
        setSelected(null);
    }, []);

    // Edits go to a copy so every edit yields a new grid; they also invalidate paths
    const editGrid = useCallback((edit: (target: GridModel) => void) => {
        const next = grid.clone();
        edit(next);
        setGrid(next);
        clearPaths();
    }, [grid, clearPaths]);

    const paintWall = useCallback((cell: Cell) => {
        editGrid(target => target.setCell(cell, 'wall'));
    }, [editGrid]);

    const eraseCell = useCallback((cell: Cell) => {
        editGrid(target => {
            if (sameCell(target.start, cell)) target.clearStart();
            target.setCell(cell, 'open');
        });
    }, [editGrid]);

    const placeStart = useCallback((cell: Cell) => {
        editGrid(target => target.setStart(cell));
    }, [editGrid]);

    const generatePaths = useCallback((): DistanceField | null => {
        const next = generate(grid, grid.start, budget);
        setField(next);
        setSelected(null);
        return next;
    }, [grid, budget]);

    const setMode = useCallback((next: EditorMode) => {
        if (next !== 'evaluating-paths') {
            clearPaths();
            setModeState(next);
            setInfoText(modeInstructions(next));
            return;
        }

        if (generatePaths() === null) {
            setModeState('placing-start');
            setInfoText(MISSING_START_INSTRUCTIONS);
            return;
        }
        setModeState(next);
        setInfoText(modeInstructions(next));
    }, [clearPaths, generatePaths]);

    const selectTarget = useCallback((cell: Cell) => {
        if (!field || sameCell(selected, cell)) return;
        const result = reconstructPath(field, cell);
        if (!result.reachable) return;
        setSelected({ x: cell.x, y: cell.y });
        setInfoText(formatPathInfo(result));
    }, [field, selected]);

    const replaceGrid = useCallback((next: GridModel) => {
        setGrid(next);
        clearPaths();
        setModeState('placing-walls');
        setInfoText(modeInstructions('placing-walls'));
    }, [clearPaths]);

    const setGridSize = useCallback((raw: number | string): number => {
        const size = parseGridSize(raw);
        replaceGrid(new GridModel(size));
        return size;
    }, [replaceGrid]);

    const setMovementBudget = useCallback((raw: number | string): number => {
        const value = parseMovementBudget(raw);
        setBudget(value);
        if (mode === 'evaluating-paths') {
            setField(generate(grid, grid.start, value));
            setSelected(null);
        } else {
            clearPaths();
        }
        return value;
    }, [mode, grid, clearPaths]);

    const loadLayout = useCallback((text: string): boolean => {
        try {
            replaceGrid(parseGridLayout(text));
            return true;
        } catch (err) {
            console.error('Layout import failed:', err);
            return false;
        }
    }, [replaceGrid]);

    const reset = useCallback(() => {
        replaceGrid(new GridModel(grid.size));
    }, [grid, replaceGrid]);

    const getKind = useCallback((cell: Cell): CellKind => grid.getKind(cell), [grid]);

    const selectedResult = field && selected ? reconstructPath(field, selected) : null;

    return {
        size: grid.size,
        budget,
        start: grid.start,
        getKind,
        mode,
        infoText,
        field,
        selected,
        selectedPath: selectedResult && selectedResult.reachable ? selectedResult.path : null,
        setMode,
        paintWall,
        eraseCell,
        placeStart,
        selectTarget,
        generatePaths,
        clearPaths,
        setGridSize,
        setMovementBudget,
        loadLayout,
        reset
    };
}
