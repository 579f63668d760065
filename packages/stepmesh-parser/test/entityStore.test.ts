// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { describe, expect, test } from "@rstest/core";
import { EntityNotFoundError, InvalidAttributeError } from "stepmesh-core";
import { scanEntities } from "../src/entityScanner";
import { EntityStore } from "../src/entityStore";
import { asBool, asFloat, asRefList, EntityAttributes } from "../src/stepEntity";

const CYCLIC = `DATA;
#1=IFCA(#2,'one');
#2=IFCB(#1,#99);
#3=IFCA($,.T.,(#1,#2),IFCLENGTHMEASURE(2));
ENDSEC;`;

function createStore(text: string) {
    const store = new EntityStore(text);
    for (const entity of scanEntities(text)) {
        store.add(entity);
    }
    return store;
}

describe("EntityStore", () => {
    test("should index ids by exact type name in file order", () => {
        const store = createStore(CYCLIC);

        expect(store.size).toBe(3);
        expect(store.findByTypeName("IFCA")).toEqual([1, 3]);
        expect(store.findByTypeName("ifca")).toEqual([]);
        expect(store.countByType()).toEqual(
            new Map([
                ["IFCA", 2],
                ["IFCB", 1],
            ]),
        );
    });

    test("should decode one level at a time through reference cycles", () => {
        const store = createStore(CYCLIC);

        const first = store.get(1);
        expect(first?.attributes[0]).toEqual({ kind: "ref", id: 2 });
        expect(store.decodedCount).toBe(1);

        const second = store.resolveRef({ kind: "ref", id: 2 });
        expect(second.type).toBe("IFCB");
        expect(store.resolveRef(1)).toBe(first);
        expect(store.decodedCount).toBe(2);
    });

    test("should return equal values on repeated decoding", () => {
        const store = createStore(CYCLIC);
        const later = createStore(CYCLIC);
        later.get(2);

        expect(store.get(3)).toBe(store.get(3));
        expect(later.get(3)).toEqual(store.get(3));
    });

    test("should fail on dangling references", () => {
        const store = createStore(CYCLIC);
        const dangling = EntityAttributes.getRefs(store.resolveRef(2), 1);

        expect(store.get(42)).toBeUndefined();
        expect(() => store.resolveRef(99)).toThrow(EntityNotFoundError);
        expect(() => store.resolveRef({ kind: "ref", id: 99 })).toThrow("Entity not found: #99");
        expect(dangling).toEqual([]);
        expect(EntityAttributes.getRef(store.resolveRef(2), 1)).toBe(99);
    });

    test("should read attributes through the accessors", () => {
        const store = createStore(CYCLIC);
        const third = store.resolveRef(3);

        expect(EntityAttributes.getBool(third, 1)).toBe(true);
        expect(asRefList(third.attributes[2])).toEqual([1, 2]);
        expect(asFloat(third.attributes[3])).toBe(2);
        expect(asBool({ kind: "enum", value: "U" })).toBeUndefined();
        expect(EntityAttributes.getString(store.resolveRef(1), 1)).toBe("one");
        expect(() => EntityAttributes.requireRef(third, 0)).toThrow(InvalidAttributeError);
        expect(() => EntityAttributes.requireRef(third, 0)).toThrow(
            "Invalid attribute at index 0: IFCA #3 expects an entity reference",
        );
        expect(EntityAttributes.requireFloat(third, 3)).toBe(2);
    });

    test("should return the record text", () => {
        expect(createStore(CYCLIC).rawText(3)).toBe("#3=IFCA($,.T.,(#1,#2),IFCLENGTHMEASURE(2));");
    });
});
