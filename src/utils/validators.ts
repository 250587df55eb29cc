import { z } from 'zod';

export const GRID_SIZE_MIN = 2;
export const GRID_SIZE_MAX = 50;
export const GRID_SIZE_DEFAULT = 10;

export const MOVEMENT_BUDGET_MIN = 1;
export const MOVEMENT_BUDGET_MAX = 500;
export const MOVEMENT_BUDGET_DEFAULT = 6;

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

// 32-bit integer, given as a number or as text such as " +12 "
const IntegerInput = z
    .union([
        z.number(),
        z.string().trim().regex(/^[+-]?\d+$/).transform(Number),
    ])
    .pipe(z.number().int().min(-2147483648).max(2147483647));

export const GridSizeSchema = IntegerInput
    .transform(value => clamp(value, GRID_SIZE_MIN, GRID_SIZE_MAX))
    .catch(GRID_SIZE_DEFAULT);

export const MovementBudgetSchema = IntegerInput
    .transform(value => clamp(value, MOVEMENT_BUDGET_MIN, MOVEMENT_BUDGET_MAX))
    .catch(MOVEMENT_BUDGET_DEFAULT);

export const EditorSettingsSchema = z.object({
    gridSize: GridSizeSchema,
    movementBudget: MovementBudgetSchema,
});

export type EditorSettings = z.infer<typeof EditorSettingsSchema>;

export const parseGridSize = (raw: unknown): number => GridSizeSchema.parse(raw);

export const parseMovementBudget = (raw: unknown): number => MovementBudgetSchema.parse(raw);
