import { Binding } from "../types";

/**
 * Renders a value for error messages and trace output.
 * @param val
 */
export function unify(val: Binding): string {
    switch (val.type) {
        case "str":
            return `"${val.value}"`;
        case "int":
        case "float":
            return String(val.value);
        case "bool":
            return val.value ? "true" : "false";
        case "color":
            return val.value;
        case "nil":
            return "na";
        case "array":
            return `[${val.value.map(unify).join(", ")}]`;
        case "series":
            return `series(${val.value.length})`;
        case "source":
            return `${val.value.field}(${val.value.length})`;
        case "plot":
            return `plot(${val.value.type}${val.value.title ? ` "${val.value.title}"` : ""})`;
        case "accessor":
            return "<builtin>";
    }
}
