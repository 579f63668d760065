// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { describe, expect, test } from "@rstest/core";
import { EntityDecodeError } from "stepmesh-core";
import { decodeStepString, EntityDecoder } from "../src/entityDecoder";
import { scanEntities } from "../src/entityScanner";

const SOURCE = `DATA;
#1=IFCWALL('caf\\X2\\00E9\\X0\\',$,'Wall ''A''',(#2,#3),IFCLABEL('x'));
#2=IFCX(1,@);
ENDSEC;`;

describe("decodeStepString", () => {
    test("should decode quote and backslash escapes", () => {
        expect(decodeStepString("Wall ''A''")).toBe("Wall 'A'");
        expect(decodeStepString("a\\\\b")).toBe("a\\b");
        expect(decodeStepString("plain")).toBe("plain");
    });

    test("should decode extended character encodings", () => {
        expect(decodeStepString("caf\\X2\\00E9\\X0\\")).toBe("café");
        expect(decodeStepString("\\X2\\00E900E8\\X0\\")).toBe("éè");
        expect(decodeStepString("\\X\\E9t\\X\\E9")).toBe("été");
        expect(decodeStepString("\\X4\\0001F600\\X0\\")).toBe("😀");
        expect(decodeStepString("\\S\\A")).toBe("Á");
        expect(decodeStepString("\\PA\\x")).toBe("x");
    });
});

describe("EntityDecoder", () => {
    const records = new Map([...scanEntities(SOURCE)].map((x) => [x.id, x]));

    test("should decode attributes into values", () => {
        const decoder = new EntityDecoder(SOURCE);
        const raw = records.get(1);
        if (!raw) throw new Error("Expected #1");

        const entity = decoder.decode(raw);
        expect(entity.id).toBe(1);
        expect(entity.type).toBe("IFCWALL");
        expect(entity.attributes).toEqual([
            { kind: "string", value: "café" },
            { kind: "null" },
            { kind: "string", value: "Wall 'A'" },
            {
                kind: "list",
                items: [
                    { kind: "ref", id: 2 },
                    { kind: "ref", id: 3 },
                ],
            },
            { kind: "typed", name: "IFCLABEL", args: [{ kind: "string", value: "x" }] },
        ]);
        expect(Object.isFrozen(entity)).toBe(true);
        expect(Object.isFrozen(entity.attributes)).toBe(true);
    });

    test("should decode each record once", () => {
        const decoder = new EntityDecoder(SOURCE);
        const raw = records.get(1);
        if (!raw) throw new Error("Expected #1");

        const first = decoder.decode(raw);
        const second = decoder.decode(raw);
        expect(second).toBe(first);
        expect(decoder.decodedCount).toBe(1);
    });

    test("should attribute syntax errors to the entity", () => {
        const decoder = new EntityDecoder(SOURCE);
        const raw = records.get(2);
        if (!raw) throw new Error("Expected #2");

        let caught: unknown;
        try {
            decoder.decode(raw);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(EntityDecodeError);
        if (!(caught instanceof EntityDecodeError)) return;
        expect(caught.entityId).toBe(2);
        expect(caught.syntaxError.offset).toBe(SOURCE.indexOf("@"));
        expect(decoder.decodedCount).toBe(0);
    });
});
