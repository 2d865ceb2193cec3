import { chart } from "./functions/chart";
import { math } from "./functions/math";
import { ta } from "./functions/ta";
import { FunctionTable } from "./types";

export * from "./types";
export * from "./errors";
export * from "./series";
export * from "./market";
export * from "./values";
export { unify } from "./utils/unify";
export { expandArgs, Arguments } from "./utils/args";
export type { ArgSpec, ArgKind } from "./utils/args";
export { parseInputArgs, inferInputType, INPUT_TYPES } from "./functions/input";
export type { InputArgs } from "./functions/input";
export { variables, PLOT_STYLES, HLINE_STYLES } from "./variables";

export const functions: FunctionTable = {
    ...math,
    ...ta,
    ...chart,
};
