export * from './types';
export { GridModel, sameCell } from './model/gridModel';
export {
    PathEngine,
    cellKey,
    generate,
    manhattan,
    reconstructPath
} from './engine/pathEngine';
export { parseGridLayout } from './utils/gridLayout';
export { formatCell, formatPathInfo, modeInstructions, MISSING_START_INSTRUCTIONS } from './utils/pathInfo';
export * from './utils/validators';
export { usePathPlanner } from './hooks/usePathPlanner';
