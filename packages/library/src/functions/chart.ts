import { FunctionTable } from "../types";
import { expandArgs } from "../utils/args";
import { NIL } from "../values";
import { parseInputArgs } from "./input";

/**
 * Script-level declarations. Drawing calls do nothing here; an execution
 * mode that draws installs its own handlers.
 */
export const chart: FunctionTable = {
    study: (runtime, args, kwargs) => {
        const a = expandArgs(args, kwargs, [
            { name: "title", required: true },
            { name: "shorttitle" },
            { name: "overlay" },
            { name: "precision" },
        ]);
        runtime.title = a.need("title", "string");
        return NIL;
    },

    input: (_runtime, args, kwargs) => parseInputArgs(args, kwargs).defval,

    plot: () => NIL,
    hline: () => NIL,
    fill: () => NIL,
};
