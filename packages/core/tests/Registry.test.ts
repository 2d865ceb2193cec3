import { HostFunction, NIL } from "@chartscript/library";
import { Runtime, builtinName, loadFunctions, loadVariables } from "../src";
import { market, thrown } from "./helpers";

describe("Builtin registration", () => {
    test("double underscores become namespace dots", () => {
        expect(builtinName("math__max")).toBe("math.max");
        expect(builtinName("plot__style_line")).toBe("plot.style_line");
        expect(builtinName("sma")).toBe("sma");
    });

    test("underscore-prefixed names are private", () => {
        expect(builtinName("_helper")).toBeNull();
        expect(builtinName("__dunder")).toBeNull();
    });

    test("function tables become host entries", () => {
        const noop: HostFunction = () => NIL;
        const table = loadFunctions({ ta__rsi: noop, _hidden: noop });
        expect([...table.keys()]).toEqual(["ta.rsi"]);
        expect(table.get("ta.rsi")).toEqual({ kind: "host", fn: noop });
    });

    test("variable tables keep values and accessors", () => {
        const table = loadVariables({
            answer: { type: "int", value: 42 },
            _secret: { type: "int", value: 0 },
            color__teal: { type: "color", value: "#089981" },
        });
        expect([...table.keys()]).toEqual(["answer", "color.teal"]);
    });

    test("a runtime exposes the standard library", () => {
        const rt = new Runtime(market());
        expect(rt.hasFunction("math.max")).toBe(true);
        expect(rt.hasFunction("math__max")).toBe(false);
        expect(rt.lookup("plot.style_histogram")).toEqual({ type: "int", value: 3 });
        expect(rt.lookup("color.red")).toEqual({ type: "color", value: "#f23645" });
        expect(rt.lookup("input.integer")).toEqual({ type: "str", value: "integer" });
    });

    test("custom tables replace the standard library", () => {
        const rt = new Runtime(market(), {
            functions: { twice: (_rt, args) => args[0] },
            variables: { answer: { type: "int", value: 42 } },
        });
        expect(rt.call("twice", [{ type: "str", value: "x" }])).toEqual({
            type: "str",
            value: "x",
        });
        expect(rt.lookup("answer")).toEqual({ type: "int", value: 42 });
        expect(thrown(() => rt.lookup("close")).kind).toBe("UnboundVariable");
        expect(thrown(() => rt.call("sma")).kind).toBe("UnknownFunction");
    });

    test("runtimes do not share state", () => {
        const a = new Runtime(market());
        const b = new Runtime(market());
        a.define("x", { type: "int", value: 1 });
        a.defineFunction("f", [], { evaluate: () => NIL });
        expect(thrown(() => b.lookup("x")).kind).toBe("UnboundVariable");
        expect(b.hasFunction("f")).toBe(false);
    });
});
