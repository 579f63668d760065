// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { describe, expect, test } from "@rstest/core";
import { GeometryError } from "stepmesh-core";
import { Vector2, Vector3 } from "three";
import { extrudeProfile, extrudeProfileWithVoids, type IVoidInfo } from "../src/extrusion";
import { Profile2D } from "../src/profile";

const UP = new Vector3(0, 0, 1);

function voidOf(half: number, start: number, end: number): IVoidInfo {
    return {
        contour: [new Vector2(-half, -half), new Vector2(half, -half), new Vector2(half, half), new Vector2(-half, half)],
        start,
        end,
    };
}

describe("extrudeProfile", () => {
    test("should build a closed box from a rectangle", () => {
        const mesh = extrudeProfile(Profile2D.rectangle(1, 1), 2);

        expect(mesh.triangleCount).toBe(12);
        expect(mesh.vertexCount).toBe(24);
        expect(mesh.signedVolume()).toBeCloseTo(2);
    });

    test("should give caps flat normals along the direction", () => {
        const mesh = extrudeProfile(Profile2D.rectangle(1, 1), 2);

        expect(Array.from(mesh.normals.slice(0, 3))).toEqual([0, 0, -1]);
        expect(Array.from(mesh.normals.slice(12, 15))).toEqual([0, 0, 1]);
    });

    test("should shear along an oblique direction", () => {
        const mesh = extrudeProfile(Profile2D.rectangle(1, 1), 2, new Vector3(0, 1, 1));
        const bounds = mesh.bounds();

        expect(bounds.max.z).toBeCloseTo(Math.SQRT2);
        expect(bounds.max.y).toBeCloseTo(0.5 + Math.SQRT2);
        expect(mesh.signedVolume()).toBeCloseTo(Math.SQRT2);
    });

    test("should stay outward facing when extruded downwards", () => {
        const mesh = extrudeProfile(Profile2D.rectangle(1, 1), 3, new Vector3(0, 0, -1));
        const bounds = mesh.bounds();

        expect(bounds.min.z).toBeCloseTo(-3);
        expect(bounds.max.z).toBeCloseTo(0);
        expect(mesh.signedVolume()).toBeCloseTo(3);
    });

    test("should keep profile holes open", () => {
        const profile = Profile2D.hollowCircle(2, 1);
        const mesh = extrudeProfile(profile, 1);

        expect(mesh.signedVolume()).toBeCloseTo(profile.area());
    });

    test("should reject empty depths and in-plane directions", () => {
        const profile = Profile2D.rectangle(1, 1);

        expect(() => extrudeProfile(profile, 0)).toThrow("Profile error: Extrusion depth must be positive, got 0");
        expect(() => extrudeProfile(profile, 1, new Vector3(1, 0, 0))).toThrow(
            "Profile error: Extrusion direction is parallel to the profile plane",
        );
    });
});

describe("extrudeProfileWithVoids", () => {
    const slab = Profile2D.rectangle(4, 4);

    test("should cut a void through the whole depth", () => {
        const mesh = extrudeProfileWithVoids(slab, 2, UP, [voidOf(1, -1, 3)]);

        expect(mesh.signedVolume()).toBeCloseTo(32 - 8);
    });

    test("should open one cap for a void starting at the bottom", () => {
        const mesh = extrudeProfileWithVoids(slab, 2, UP, [voidOf(1, 0, 1)]);

        expect(mesh.signedVolume()).toBeCloseTo(32 - 4);
    });

    test("should close a void inside the solid at both ends", () => {
        const mesh = extrudeProfileWithVoids(slab, 2, UP, [voidOf(1, 0.5, 1.5)]);

        expect(mesh.signedVolume()).toBeCloseTo(32 - 4);
        expect(mesh.triangleCount).toBe(12 + 8 + 4);
    });

    test("should ignore voids outside the depth", () => {
        const mesh = extrudeProfileWithVoids(slab, 2, UP, [voidOf(1, 3, 4)]);

        expect(mesh.triangleCount).toBe(12);
        expect(mesh.signedVolume()).toBeCloseTo(32);
    });

    test("should reject empty void ranges", () => {
        expect(() => extrudeProfileWithVoids(slab, 2, UP, [voidOf(1, 1, 1)])).toThrow(GeometryError);
        expect(() => extrudeProfileWithVoids(slab, 2, UP, [voidOf(1, 1, 1)])).toThrow(
            "CSG error: Invalid void range [1, 1]",
        );
    });
});
