// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { describe, expect, test } from "@rstest/core";
import { StepSyntaxError } from "stepmesh-core";
import { EntityScanner, findDataSection, findStatementEnd, scanEntities } from "../src/entityScanner";

const SAMPLE = `ISO-10303-21;
HEADER;
FILE_SCHEMA(('IFC4'));
ENDSEC;
DATA;
#1=IFCCARTESIANPOINT((0.,0.,0.));
/* comment ; with a semicolon */
#2 = IFCDIRECTION ((0.,0.,1.));
#3=ifclabel('a;b');
ENDSEC;
END-ISO-10303-21;`;

const MALFORMED = `DATA;
#4=IFCWALL('w');
#5 BADSYNTAX;
#6=IFCSLAB('s');
ENDSEC;`;

const UNTERMINATED = `DATA;
#4=IFCWALL('w');
#5 BADSYNTAX
#6=IFCSLAB('s');
#7=IFCBEAM('b');
ENDSEC;`;

function syntaxErrorOf(fn: () => unknown): StepSyntaxError {
    try {
        fn();
    } catch (error) {
        if (error instanceof StepSyntaxError) return error;
        throw error;
    }
    throw new Error("Expected a StepSyntaxError");
}

describe("EntityScanner", () => {
    test("should locate records without tokenizing arguments", () => {
        const entities = [...scanEntities(SAMPLE)];

        expect(entities.map((x) => x.id)).toEqual([1, 2, 3]);
        expect(entities.map((x) => x.type)).toEqual(["IFCCARTESIANPOINT", "IFCDIRECTION", "IFCLABEL"]);
        expect(entities[0].offset).toBe(SAMPLE.indexOf("#1="));
        expect(SAMPLE.slice(entities[1].argsStart, entities[1].argsEnd)).toBe("((0.,0.,1.))");
        expect(SAMPLE.slice(entities[2].argsStart, entities[2].argsEnd)).toBe("('a;b')");
    });

    test("should report a malformed record and keep scanning", () => {
        const scanner = new EntityScanner(MALFORMED);

        expect(scanner.next()?.id).toBe(4);
        const error = syntaxErrorOf(() => scanner.next());
        expect(error.offset).toBe(MALFORMED.indexOf("#5"));
        expect(error.message).toBe(`Expected '=' after #5 at offset ${MALFORMED.indexOf("#5")}`);
        expect(scanner.next()?.id).toBe(6);
        expect(scanner.next()).toBeUndefined();
    });

    test("should resume at the next record line after an unterminated malformed record", () => {
        const scanner = new EntityScanner(UNTERMINATED);

        expect(scanner.next()?.id).toBe(4);
        expect(syntaxErrorOf(() => scanner.next()).message).toBe(
            `Expected '=' after #5 at offset ${UNTERMINATED.indexOf("#5")}`,
        );
        expect(scanner.next()?.id).toBe(6);
        expect(scanner.next()?.id).toBe(7);
        expect(scanner.next()).toBeUndefined();
    });

    test("should report byte offsets after multibyte text", () => {
        const source = "DATA;\n#1=IFCLABEL('é');\n#2 BAD;\n#3=IFCLABEL('x');";
        const scanner = new EntityScanner(source);

        expect(scanner.next()?.offset).toBe(6);
        const error = syntaxErrorOf(() => scanner.next());
        expect(source.indexOf("#2")).toBe(24);
        expect(error.offset).toBe(25);
        expect(scanner.next()?.id).toBe(3);
    });

    test("should reject duplicate ids, trailing text and missing terminators", () => {
        const duplicate = new EntityScanner("DATA;#1=A(1);#1=B(2);");
        expect(duplicate.next()?.type).toBe("A");
        expect(syntaxErrorOf(() => duplicate.next()).message).toBe("Duplicate entity id #1 at offset 13");

        expect(syntaxErrorOf(() => new EntityScanner("DATA;#1=A(1)x;").next()).message).toBe(
            "Expected ')' before ';' in #1 at offset 5",
        );

        const unterminated = new EntityScanner("DATA;\n#1=IFCX(1)");
        expect(syntaxErrorOf(() => unterminated.next()).offset).toBe(6);
        expect(unterminated.next()).toBeUndefined();
    });

    test("should scan text without a data section marker", () => {
        expect([...scanEntities("#1=IFCA(1);\n#2=IFCB(2);")].map((x) => x.id)).toEqual([1, 2]);
    });

    test("should report monotonic progress ending at one", () => {
        const calls: [string, number][] = [];
        const scanner = new EntityScanner(SAMPLE, {
            progressInterval: 1,
            onProgress: (phase, fraction) => calls.push([phase, fraction]),
        });
        while (scanner.next()) {
            // drain
        }

        expect(calls.length).toBe(4);
        expect(calls.every(([phase]) => phase === "Scanning entities")).toBe(true);
        expect(calls.every(([, fraction], i) => i === 0 || fraction >= calls[i - 1][1])).toBe(true);
        expect(calls[3]).toEqual(["Scanning entities", 1]);
    });

    test("should propagate an exception thrown by the progress callback", () => {
        const scanner = new EntityScanner(SAMPLE, {
            progressInterval: 1,
            onProgress: () => {
                throw new Error("stop");
            },
        });

        expect(() => scanner.next()).toThrow("stop");
    });

    test("should stop when the signal is aborted", () => {
        const controller = new AbortController();
        controller.abort();

        expect(() => new EntityScanner(SAMPLE, { signal: controller.signal }).next()).toThrow();
    });
});

describe("statement helpers", () => {
    test("should find the data section and statement ends", () => {
        expect(findDataSection("HEADER;ENDSEC;DATA;#1")).toBe(19);
        expect(findDataSection("#1=A();")).toBe(0);
        expect(findStatementEnd("#1=A('x;''y');", 0)).toBe(13);
        expect(findStatementEnd("#1=A(/* ; */1);", 0)).toBe(14);
        expect(findStatementEnd("#1=A('x;", 0)).toBe(-1);
    });
});
