import { ArgumentError } from "../errors";
import { InputType, NamedArgs, RuntimeValue } from "../types";
import { expandArgs } from "../utils/args";

export const INPUT_TYPES: readonly InputType[] = [
    "bool",
    "integer",
    "float",
    "string",
    "symbol",
    "resolution",
    "session",
    "source",
];

export interface InputArgs {
    defval: RuntimeValue;
    title?: string;
    type?: InputType;
    minval?: number;
    maxval?: number;
    confirm?: boolean;
    step?: number;
    options?: RuntimeValue[];
}

/**
 * Parses `input(defval, title, type, minval, maxval, confirm, step, options)`.
 */
export function parseInputArgs(
    args: RuntimeValue[],
    kwargs: NamedArgs,
): InputArgs {
    const a = expandArgs(args, kwargs, [
        { name: "defval", required: true },
        { name: "title" },
        { name: "type" },
        { name: "minval" },
        { name: "maxval" },
        { name: "confirm" },
        { name: "step" },
        { name: "options" },
    ]);

    const type = a.get("type", "string");
    const inputType = INPUT_TYPES.find((t) => t === type);
    if (type !== undefined && inputType === undefined) {
        throw new ArgumentError(`unknown input type '${type}'`);
    }

    return {
        defval: a.need("defval", "any"),
        title: a.get("title", "string"),
        type: inputType,
        minval: a.get("minval", "number"),
        maxval: a.get("maxval", "number"),
        confirm: a.get("confirm", "bool"),
        step: a.get("step", "number"),
        options: a.get("options", "array"),
    };
}

/**
 * Input type implied by a default value when none is given.
 */
export function inferInputType(defval: RuntimeValue): InputType {
    switch (defval.type) {
        case "bool":
            return "bool";
        case "int":
            return "integer";
        case "float":
            return "float";
        case "source":
            return "source";
        default:
            return "string";
    }
}
