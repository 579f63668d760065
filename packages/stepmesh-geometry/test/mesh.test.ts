// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { describe, expect, test } from "@rstest/core";
import { GeometryError } from "stepmesh-core";
import { Matrix4, Vector3 } from "three";
import { extrudeProfile } from "../src/extrusion";
import { Mesh, MeshBuilder } from "../src/mesh";
import { Profile2D } from "../src/profile";

function triangle(z: number) {
    const builder = new MeshBuilder();
    builder.addFlatTriangle(new Vector3(0, 0, z), new Vector3(1, 0, z), new Vector3(0, 1, z));
    return builder.build();
}

describe("Mesh", () => {
    test("should offset indices when merging", () => {
        const merged = Mesh.merge([triangle(0), Mesh.empty, triangle(2)]);

        expect(merged.vertexCount).toBe(6);
        expect(merged.triangleCount).toBe(2);
        expect(Array.from(merged.indices)).toEqual([0, 1, 2, 3, 4, 5]);
        expect(merged.positions[11]).toBe(2);
    });

    test("should return the empty mesh when nothing is merged", () => {
        expect(Mesh.merge([])).toBe(Mesh.empty);
        expect(Mesh.merge([Mesh.empty]).isEmpty).toBe(true);
    });

    test("should flip winding under a mirroring transform", () => {
        const mirrored = triangle(0).transformed(new Matrix4().makeScale(-1, 1, 1));

        expect(Array.from(mirrored.indices)).toEqual([0, 2, 1]);
        expect(mirrored.positions[3]).toBe(-1);
        expect(mirrored.normals[2]).toBeCloseTo(1);
    });

    test("should keep winding under a rotation", () => {
        const rotated = triangle(0).transformed(new Matrix4().makeRotationX(Math.PI / 2));

        expect(Array.from(rotated.indices)).toEqual([0, 1, 2]);
        expect(rotated.normals[1]).toBeCloseTo(-1);
        expect(rotated.normals[2]).toBeCloseTo(0);
    });

    test("should return itself for a unit scale", () => {
        const mesh = triangle(0);

        expect(mesh.scaled(1)).toBe(mesh);
        expect(mesh.scaled(0.5).positions[3]).toBeCloseTo(0.5);
    });

    test("should measure the volume and bounds of a closed box", () => {
        const box = extrudeProfile(Profile2D.rectangle(2, 1), 3);
        const bounds = box.bounds();

        expect(box.signedVolume()).toBeCloseTo(6);
        expect(box.flipped().signedVolume()).toBeCloseTo(-6);
        expect(bounds.min.toArray()).toEqual([-1, -0.5, 0]);
        expect(bounds.max.toArray()).toEqual([1, 0.5, 3]);
    });

    test("should copy its arrays into mesh data", () => {
        const mesh = triangle(0);
        const data = mesh.toMeshData();

        expect(data.positions.length).toBe(9);
        expect(data.normals.length).toBe(9);
        expect(data.indices.length).toBe(3);
        data.positions[0] = 42;
        expect(mesh.positions[0]).toBe(0);
    });

    test("should reject indices past the last vertex", () => {
        const create = () => new Mesh(new Float32Array(9), new Float32Array(9), Uint32Array.from([0, 1, 3]));

        expect(create).toThrow(GeometryError);
        expect(create).toThrow("Geometry error: Mesh index 3 is out of range for 3 vertices");
    });

    test("should reject normals that do not match the positions", () => {
        expect(() => new Mesh(new Float32Array(9), new Float32Array(6), new Uint32Array(0))).toThrow(
            "Geometry error: Mesh needs one normal per vertex, got 9 position and 6 normal values",
        );
    });
});

describe("MeshBuilder", () => {
    test("should split a quad into two triangles sharing its first corner", () => {
        const builder = new MeshBuilder();
        const normal = new Vector3(0, 0, 1);
        builder.addQuad(
            new Vector3(0, 0, 0),
            new Vector3(1, 0, 0),
            new Vector3(1, 1, 0),
            new Vector3(0, 1, 0),
            normal,
        );
        const mesh = builder.build();

        expect(mesh.vertexCount).toBe(4);
        expect(Array.from(mesh.indices)).toEqual([0, 1, 2, 0, 2, 3]);
    });

    test("should reverse face triangles on request", () => {
        const builder = new MeshBuilder();
        builder.addFace(
            [new Vector3(0, 0, 0), new Vector3(1, 0, 0), new Vector3(0, 1, 0)],
            [0, 1, 2],
            new Vector3(0, 0, -1),
            true,
        );

        expect(Array.from(builder.build().indices)).toEqual([0, 2, 1]);
    });

    test("should build the empty mesh without triangles", () => {
        expect(new MeshBuilder().build()).toBe(Mesh.empty);
    });
});
