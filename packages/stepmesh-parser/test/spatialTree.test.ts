// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { describe, expect, test } from "@rstest/core";
import { StepParser } from "../src/stepParser";

const BUILDING = `ISO-10303-21;
HEADER;
FILE_SCHEMA(('IFC4X3_ADD2'));
ENDSEC;
DATA;
#43=IFCRELCONTAINEDINSPATIALSTRUCTURE('rd',$,$,$,(#30,#31),#23);
#10=IFCPROJECT('g',$,'Demo',$,$,$,$,(#100),$);
#20=IFCSITE('s',$,'Site',$,$,$,$,$,.ELEMENT.,$,$,$,$,$);
#21=IFCBUILDING('b',$,'Building',$,$,$,$,$,.ELEMENT.,$,$,$);
#22=IFCBUILDINGSTOREY('t1',$,'Level 1',$,$,$,$,$,.ELEMENT.,3.);
#23=IFCBUILDINGSTOREY('t0',$,'Ground',$,$,$,$,$,.ELEMENT.,0.);
#30=IFCWALL('w',$,'Wall A',$,$,$,#4,$,$);
#31=IFCSLAB('sl',$,'Slab',$,$,$,$,$,$);
#40=IFCRELAGGREGATES('ra',$,$,$,#10,(#20));
#41=IFCRELAGGREGATES('rb',$,$,$,#20,(#21));
#42=IFCRELAGGREGATES('rc',$,$,$,#21,(#23,#22));
#44=IFCRELCONTAINEDINSPATIALSTRUCTURE('re',$,$,$,(#30),#22);
#45=IFCRELCONTAINEDINSPATIALSTRUCTURE('rf',$,$,$,(#31),#23);
ENDSEC;
END-ISO-10303-21;`;

const CYCLE = `DATA;
#1=IFCPROJECT('p',$,'P',$,$,$,$,$,$);
#2=IFCSITE('a',$,'A',$,$,$,$,$,$,$,$,$,$,$);
#3=IFCBUILDING('b',$,'B',$,$,$,$,$,$,$,$,$);
#10=IFCRELAGGREGATES('x',$,$,$,#1,(#2));
#11=IFCRELAGGREGATES('y',$,$,$,#2,(#3));
#12=IFCRELAGGREGATES('z',$,$,$,#3,(#1));
ENDSEC;`;

function buildTree(text: string) {
    const tree = StepParser.parse(text).spatialTree;
    if (!tree) throw new Error("Expected a spatial tree");
    return tree;
}

describe("SpatialTreeBuilder", () => {
    test("should build the containment hierarchy from relations in any order", () => {
        const tree = buildTree(BUILDING);

        expect(tree.root).toBe(10);
        expect(tree.children(10)).toEqual([20]);
        expect(tree.children(20)).toEqual([21]);
        expect(tree.children(21)).toEqual([23, 22]);
        expect(tree.children(23)).toEqual([30, 31]);
        expect(tree.children(22)).toEqual([]);
        expect(tree.parent(30)).toBe(23);
    });

    test("should keep the first parent claim and report later ones", () => {
        const tree = buildTree(BUILDING);

        expect(tree.conflicts).toEqual([{ child: 30, keptParent: 23, rejectedParent: 22, relation: 44 }]);
    });

    test("should describe nodes", () => {
        const tree = buildTree(BUILDING);

        expect(tree.node(10)?.kind).toBe("project");
        expect(tree.node(22)?.kind).toBe("storey");
        expect(tree.node(22)?.elevation).toBe(3);
        expect(tree.node(30)).toEqual({
            id: 30,
            kind: "element",
            entityType: "IFCWALL",
            name: "Wall A",
            elevation: undefined,
            hasGeometry: true,
            parent: 23,
            children: [],
        });
        expect(tree.node(31)?.hasGeometry).toBe(false);
    });

    test("should answer storey and search queries", () => {
        const tree = buildTree(BUILDING);

        expect(tree.storeys()).toEqual([
            { id: 23, name: "Ground", elevation: 0, elementCount: 2 },
            { id: 22, name: "Level 1", elevation: 3, elementCount: 0 },
        ]);
        expect(tree.elementsInStorey(23)).toEqual([30, 31]);
        expect(tree.containingStorey(31)).toBe(23);
        expect(tree.containingStorey(20)).toBeUndefined();
        expect(tree.search("wall").map((x) => x.id)).toEqual([30]);
        expect(tree.search(" LEVEL ").map((x) => x.id)).toEqual([22]);
        expect([...tree.descendants(21)].map((x) => x.id)).toEqual([23, 30, 31, 22]);
    });

    test("should reject a relation that closes a cycle", () => {
        const tree = buildTree(CYCLE);

        expect(tree.conflicts).toEqual([{ child: 1, keptParent: undefined, rejectedParent: 3, relation: 12 }]);
        expect(tree.parent(1)).toBeUndefined();
        expect([...tree.descendants(1)].map((x) => x.id)).toEqual([2, 3]);
    });
});
