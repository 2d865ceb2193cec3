import chalk from "chalk";

export type ErrorKind =
    | "UnboundVariable"
    | "UnknownFunction"
    | "TypeMismatch"
    | "MissingArgument"
    | "ArgumentShapeError"
    | "UnimplementedVariable"
    | "UnimplementedFunction";

export class ScriptError extends Error {
    public rawMessage: string;
    public kind: ErrorKind;
    /** Variable or function name the error is about. */
    public subject: string;
    public hint?: string;

    constructor(
        kind: ErrorKind,
        subject: string,
        message: string,
        hint?: string,
        cause?: unknown,
    ) {
        const errorHeader = `${chalk.red.bold("Error:")} ${chalk.bold(message)}`;
        const kindLine = `  ${chalk.blue("-->")} ${kind} '${subject}'`;

        const output = [errorHeader, kindLine];
        if (hint) {
            output.push(`  ${chalk.blue("=")} ${hint}`);
        }

        super("\n" + output.join("\n"), { cause });
        this.name = "ScriptError";
        this.rawMessage = message;
        this.kind = kind;
        this.subject = subject;
        this.hint = hint;
    }
}

export function unboundVariable(name: string): ScriptError {
    return new ScriptError(
        "UnboundVariable",
        name,
        `Variable '${name}' is not defined.`,
    );
}

export function unknownFunction(name: string): ScriptError {
    return new ScriptError(
        "UnknownFunction",
        name,
        `Function '${name}' is not defined.`,
    );
}
