// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { describe, expect, test } from "@rstest/core";
import { StepParser } from "stepmesh-parser";
import { Vector2, Vector3 } from "three";
import {
    readAxis1Placement,
    readAxis2Placement2D,
    readAxis2Placement3D,
    readCartesianTransformation,
    readDirection,
    readObjectPlacement,
} from "../src/placement";

const PLACEMENTS = `DATA;
#1=IFCCARTESIANPOINT((0.,0.,0.));
#2=IFCDIRECTION((0.,0.,1.));
#3=IFCDIRECTION((0.,1.,0.));
#4=IFCAXIS2PLACEMENT3D(#1,#2,#3);
#5=IFCLOCALPLACEMENT($,#4);
#6=IFCCARTESIANPOINT((1.,0.,0.));
#7=IFCAXIS2PLACEMENT3D(#6,$,$);
#8=IFCLOCALPLACEMENT(#5,#7);
#9=IFCGRIDPLACEMENT($,$);
#10=IFCLOCALPLACEMENT(#9,#7);
#20=IFCCARTESIANPOINT((2.,3.));
#21=IFCDIRECTION((-1.,0.));
#22=IFCAXIS2PLACEMENT2D(#20,#21);
#30=IFCCARTESIANPOINT((0.,0.,5.));
#31=IFCCARTESIANTRANSFORMATIONOPERATOR3DNONUNIFORM($,$,#30,2.,$,3.,4.);
#40=IFCDIRECTION((0.,0.,0.));
#41=IFCDIRECTION((3.,0.,4.));
#42=IFCAXIS1PLACEMENT(#6,#41);
ENDSEC;`;

const model = StepParser.parse(PLACEMENTS, StepParser.geometryOnly());

function rounded(v: { toArray(): number[] }) {
    return v.toArray().map((x) => Math.round(x * 1e6) / 1e6 + 0);
}

describe("placements", () => {
    test("should turn the x axis towards the ref direction", () => {
        const matrix = readAxis2Placement3D(model, 4);

        expect(rounded(new Vector3(1, 0, 0).applyMatrix4(matrix))).toEqual([0, 1, 0]);
        expect(rounded(new Vector3(0, 0, 1).applyMatrix4(matrix))).toEqual([0, 0, 1]);
    });

    test("should apply relative placements inside their parent", () => {
        const world = readObjectPlacement(model, 8);

        expect(rounded(new Vector3().applyMatrix4(world))).toEqual([0, 1, 0]);
        expect(rounded(new Vector3(1, 0, 0).applyMatrix4(world))).toEqual([0, 2, 0]);
    });

    test("should read unknown parent placements as the identity", () => {
        expect(rounded(new Vector3().applyMatrix4(readObjectPlacement(model, 10)))).toEqual([1, 0, 0]);
        expect(readObjectPlacement(model, undefined).equals(readAxis2Placement3D(model, undefined))).toBe(true);
    });

    test("should rotate and move 2D placements", () => {
        const matrix = readAxis2Placement2D(model, 22);

        expect(rounded(new Vector2(1, 0).applyMatrix3(matrix))).toEqual([1, 3]);
        expect(rounded(new Vector2(0, 1).applyMatrix3(matrix))).toEqual([2, 2]);
    });

    test("should scale each axis of a non-uniform transformation", () => {
        const matrix = readCartesianTransformation(model, 31);

        expect(rounded(new Vector3(1, 1, 1).applyMatrix4(matrix))).toEqual([2, 3, 9]);
    });

    test("should normalise directions and reject zero vectors", () => {
        expect(rounded(readDirection(model, 41))).toEqual([0.6, 0, 0.8]);
        expect(() => readDirection(model, 40)).toThrow("Geometry error: Direction #40 has zero length");
        expect(() => readDirection(model, 6)).toThrow("Geometry error: #6 is IFCCARTESIANPOINT, expected IFCDIRECTION");
    });

    test("should read axis placements", () => {
        const axis = readAxis1Placement(model, 42);

        expect(rounded(axis.location)).toEqual([1, 0, 0]);
        expect(rounded(axis.direction)).toEqual([0.6, 0, 0.8]);
    });
});
