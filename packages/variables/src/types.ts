import { z } from "zod";

export type VariableScalar = string | number | boolean | null;
export type VariableValue = VariableScalar | VariableValue[] | VariableTree;
export interface VariableTree {
  [key: string]: VariableValue;
}

export const variableValueSchema: z.ZodType<VariableValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(variableValueSchema),
    z.record(variableValueSchema)
  ])
);

export const variableTreeSchema: z.ZodType<VariableTree> = z.record(variableValueSchema);

export function isVariableTree(value: VariableValue | undefined): value is VariableTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
