import {
    ArgumentError,
    InputDescriptor,
    InputType,
    RuntimeValue,
    ScriptRuntime,
    StoredInput,
    ValueType,
    isMarketField,
} from "@chartscript/library";

export type InputValues = Record<string, StoredInput>;

/**
 * Plain form of an input default, as a host UI would store it. A market
 * series is stored by the name of its field.
 */
export function storedValue(val: RuntimeValue): StoredInput {
    switch (val.type) {
        case "bool":
        case "int":
        case "float":
        case "str":
        case "color":
            return val.value;
        case "source":
            return val.value.field;
        default:
            throw new ArgumentError(`cannot use ${val.type} as an input value`);
    }
}

/**
 * Stored values keyed by title, taken from scanned descriptors.
 */
export function defaultsOf(inputs: readonly InputDescriptor[]): InputValues {
    const out: InputValues = {};
    for (const input of inputs) {
        out[input.title] = input.default;
    }
    return out;
}

function toBool(title: string, val: StoredInput): boolean {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    if (val === "true") return true;
    if (val === "false") return false;
    throw new ArgumentError(`input '${title}' expects a bool, got "${val}"`);
}

function toNumber(title: string, val: StoredInput, type: InputType): number {
    if (typeof val === "number") return val;
    const num = typeof val === "string" && val.trim() !== "" ? Number(val) : NaN;
    if (Number.isNaN(num)) {
        throw new ArgumentError(`input '${title}' expects ${type}, got ${JSON.stringify(val)}`);
    }
    return num;
}

/**
 * Turns a stored value back into a runtime value of the input's type.
 * Sources resolve to the live series of the stored name; other text inputs
 * keep the kind of their declared default.
 */
export function coerceInput(
    runtime: ScriptRuntime,
    title: string,
    type: InputType,
    val: StoredInput,
    declared: ValueType,
): RuntimeValue {
    switch (type) {
        case "bool":
            return { type: "bool", value: toBool(title, val) };
        case "integer":
            return { type: "int", value: Math.trunc(toNumber(title, val, type)) };
        case "float":
            return { type: "float", value: toNumber(title, val, type) };
        case "source": {
            const name = String(val);
            if (!isMarketField(name)) {
                throw new ArgumentError(
                    `input '${title}' expects a market series, got "${name}"`,
                );
            }
            return runtime.lookup(name);
        }
        default:
            return declared === "color"
                ? { type: "color", value: String(val) }
                : { type: "str", value: String(val) };
    }
}
