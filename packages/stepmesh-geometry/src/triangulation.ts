// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { GeometryError } from "stepmesh-core";
import { ShapeUtils, Vector2, Vector3 } from "three";

const EPSILON = 1e-10;
const SAME_POINT_TOLERANCE = 1e-9;

/**
 * Plane frame of a projected polygon: `origin + x * u + y * v` maps a 2D point back to 3D.
 * `u`, `v` and `normal` form a right-handed orthonormal basis.
 */
export interface IProjectionBasis {
    readonly origin: Vector3;
    readonly u: Vector3;
    readonly v: Vector3;
    readonly normal: Vector3;
}

export interface IProjection {
    readonly points: Vector2[];
    readonly basis: IProjectionBasis;
}

export interface ITriangulatedFace {
    /** Outer loop then every hole, closing duplicates removed. */
    readonly points: Vector3[];
    /** Counter-clockwise about `normal`, three per triangle. */
    readonly indices: number[];
    readonly normal: Vector3;
}

/**
 * Newell's method. Degenerate polygons get `+Z`.
 */
export function calculatePolygonNormal(points: readonly Vector3[]): Vector3 {
    if (points.length < 3) return new Vector3(0, 0, 1);

    const normal = new Vector3();
    for (let i = 0; i < points.length; i++) {
        const current = points[i];
        const next = points[(i + 1) % points.length];
        normal.x += (current.y - next.y) * (current.z + next.z);
        normal.y += (current.z - next.z) * (current.x + next.x);
        normal.z += (current.x - next.x) * (current.y + next.y);
    }

    const length = normal.length();
    return length <= EPSILON ? new Vector3(0, 0, 1) : normal.divideScalar(length);
}

export function projectTo2D(points: readonly Vector3[], normal: Vector3): IProjection {
    const n = normal.clone().normalize();
    const ax = Math.abs(n.x);
    const ay = Math.abs(n.y);
    const az = Math.abs(n.z);
    const ref = ax <= ay && ax <= az ? new Vector3(1, 0, 0) : ay <= az ? new Vector3(0, 1, 0) : new Vector3(0, 0, 1);

    const u = new Vector3().crossVectors(n, ref).normalize();
    const v = new Vector3().crossVectors(n, u);
    const basis: IProjectionBasis = { origin: points[0]?.clone() ?? new Vector3(), u, v, normal: n };

    return { points: projectTo2DWithBasis(points, basis), basis };
}

export function projectTo2DWithBasis(points: readonly Vector3[], basis: IProjectionBasis): Vector2[] {
    const offset = new Vector3();
    return points.map((p) => {
        offset.subVectors(p, basis.origin);
        return new Vector2(offset.dot(basis.u), offset.dot(basis.v));
    });
}

export function triangulatePolygon(points: readonly Vector2[]): number[] {
    return triangulatePolygonWithHoles(points, []);
}

/**
 * Ear clipping with holes bridged into the outer loop. Indices refer to the concatenation of
 * the outer loop and the holes, each without its closing duplicate; every triangle is
 * counter-clockwise.
 */
export function triangulatePolygonWithHoles(
    outer: readonly Vector2[],
    holes: readonly (readonly Vector2[])[],
): number[] {
    const contour = stripClosingPoint(outer);
    const holeLoops = holes.map(stripClosingPoint);

    if (contour.length < 3) {
        throw GeometryError.triangulation(`Polygon needs at least 3 points, got ${contour.length}`);
    }
    if (Math.abs(ShapeUtils.area(contour)) <= EPSILON) {
        throw GeometryError.triangulation("Polygon has zero area");
    }
    for (const hole of holeLoops) {
        if (hole.length < 3) {
            throw GeometryError.triangulation(`Hole needs at least 3 points, got ${hole.length}`);
        }
    }

    const expected = contour.length + holeLoops.reduce((sum, x) => sum + x.length, 0);
    const faces = ShapeUtils.triangulateShape(contour, holeLoops);
    const actual = contour.length + holeLoops.reduce((sum, x) => sum + x.length, 0);
    if (actual !== expected) {
        throw GeometryError.triangulation("Polygon loops changed while triangulating");
    }
    if (faces.length === 0) {
        throw GeometryError.triangulation("Polygon produced no triangles");
    }

    const all = [...contour, ...holeLoops.flat()];
    const indices: number[] = [];
    for (const [a, b, c] of faces) {
        if (cross2D(all[a], all[b], all[c]) < 0) {
            indices.push(a, c, b);
        } else {
            indices.push(a, b, c);
        }
    }
    return indices;
}

/**
 * Triangulates a planar 3D polygon with holes in its own plane.
 */
export function triangulateFace(outer: readonly Vector3[], holes: readonly (readonly Vector3[])[] = []): ITriangulatedFace {
    const contour = stripClosingPoint(outer);
    const holeLoops = holes.map(stripClosingPoint);
    if (contour.length < 3) {
        throw GeometryError.triangulation(`Face needs at least 3 points, got ${contour.length}`);
    }

    const normal = calculatePolygonNormal(contour);
    const { points, basis } = projectTo2D(contour, normal);
    const holes2D = holeLoops.map((x) => projectTo2DWithBasis(x, basis));
    const indices = triangulatePolygonWithHoles(points, holes2D);

    return { points: [...contour, ...holeLoops.flat()], indices, normal };
}

export function calculateCircleSegments(radius: number): number {
    return Math.min(32, Math.max(8, Math.ceil(Math.sqrt(Math.abs(radius)) * 8)));
}

export function triangleNormal(a: Vector3, b: Vector3, c: Vector3): Vector3 {
    return new Vector3().subVectors(b, a).cross(new Vector3().subVectors(c, a)).normalize();
}

/**
 * Area-weighted vertex normals. Vertices on no triangle get `+Z`.
 */
export function computeVertexNormals(positions: ArrayLike<number>, indices: ArrayLike<number>): Float32Array {
    const normals = new Float32Array(positions.length);
    const a = new Vector3();
    const b = new Vector3();
    const c = new Vector3();
    const face = new Vector3();

    for (let i = 0; i + 2 < indices.length; i += 3) {
        const ia = indices[i] * 3;
        const ib = indices[i + 1] * 3;
        const ic = indices[i + 2] * 3;
        a.fromArray(positions, ia);
        b.fromArray(positions, ib);
        c.fromArray(positions, ic);
        face.subVectors(c, b).cross(a.sub(b));
        for (const offset of [ia, ib, ic]) {
            normals[offset] += face.x;
            normals[offset + 1] += face.y;
            normals[offset + 2] += face.z;
        }
    }

    const n = new Vector3();
    for (let i = 0; i < normals.length; i += 3) {
        n.fromArray(normals, i);
        if (n.lengthSq() <= EPSILON * EPSILON) n.set(0, 0, 1);
        n.normalize().toArray(normals, i);
    }
    return normals;
}

export function signedArea2D(points: readonly Vector2[]): number {
    return ShapeUtils.area(stripClosingPoint(points));
}

export function stripClosingPoint<T extends Vector2 | Vector3>(points: readonly T[]): T[] {
    const result = [...points];
    while (result.length > 1 && distance(result[0], result[result.length - 1]) <= SAME_POINT_TOLERANCE) {
        result.pop();
    }
    return result;
}

function distance(a: Vector2 | Vector3, b: Vector2 | Vector3) {
    const dz = (a instanceof Vector3 ? a.z : 0) - (b instanceof Vector3 ? b.z : 0);
    return Math.hypot(a.x - b.x, a.y - b.y, dz);
}

function cross2D(a: Vector2, b: Vector2, c: Vector2) {
    return (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x);
}
