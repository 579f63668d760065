// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { GeometryError, Logger } from "stepmesh-core";
import { Vector3, type Vector2 } from "three";
import { MeshBuilder, type Mesh } from "./mesh";
import type { Profile2D } from "./profile";
import { signedArea2D, stripClosingPoint, triangulatePolygonWithHoles } from "./triangulation";

const RANGE_TOLERANCE = 1e-9;

/**
 * A prismatic void inside an extrusion: `contour` in profile coordinates, cut from distance
 * `start` to `end` along the extrusion direction.
 */
export interface IVoidInfo {
    readonly contour: readonly Vector2[];
    readonly start: number;
    readonly end: number;
}

interface ISweep {
    readonly direction: Vector3;
    /** +1 when the sweep leaves the profile plane towards +Z. */
    readonly sign: 1 | -1;
}

/**
 * Sweeps `profile` by `depth` along `direction`: a bottom cap in the profile plane, a top cap at
 * `direction * depth`, and one flat quad per loop edge. Caps face away from the solid, walls out
 * of it; hole walls face into the hole.
 */
export function extrudeProfile(profile: Profile2D, depth: number, direction = new Vector3(0, 0, 1)): Mesh {
    return extrudeProfileWithVoids(profile, depth, direction, []);
}

/**
 * Extrusion with prismatic voids. A void spanning the whole depth becomes a hole through both
 * caps; one touching a single cap opens that cap and is closed by a face at its far end; one
 * inside the solid is closed at both ends. Voids outside `[0, depth]` are ignored.
 */
export function extrudeProfileWithVoids(
    profile: Profile2D,
    depth: number,
    direction: Vector3,
    voids: readonly IVoidInfo[],
): Mesh {
    const sweep = createSweep(depth, direction);
    const builder = new MeshBuilder();

    const bottomHoles = [...profile.holes];
    const topHoles = [...profile.holes];
    const fullWalls = [profile.outer, ...profile.holes];

    for (const info of voids) {
        const clipped = clipVoid(info, depth);
        if (!clipped) continue;

        const contour = holeLoop(clipped.contour);
        const opensBottom = clipped.start <= RANGE_TOLERANCE;
        const opensTop = clipped.end >= depth - RANGE_TOLERANCE;

        if (opensBottom) bottomHoles.push(contour);
        if (opensTop) topHoles.push(contour);
        if (opensBottom && opensTop) {
            fullWalls.push(contour);
            continue;
        }

        addWalls(builder, contour, clipped.start, clipped.end, sweep);
        if (!opensBottom) addCap(builder, [contour], clipped.start, sweep, sweep.sign);
        if (!opensTop) addCap(builder, [contour], clipped.end, sweep, -sweep.sign);
    }

    addCap(builder, [profile.outer, ...bottomHoles], 0, sweep, -sweep.sign);
    addCap(builder, [profile.outer, ...topHoles], depth, sweep, sweep.sign);
    for (const loop of fullWalls) {
        addWalls(builder, loop, 0, depth, sweep);
    }

    return builder.build();
}

function createSweep(depth: number, direction: Vector3): ISweep {
    if (!(depth > 0) || !Number.isFinite(depth)) {
        throw GeometryError.profile(`Extrusion depth must be positive, got ${depth}`);
    }
    const unit = direction.clone().normalize();
    if (Math.abs(unit.z) < 1e-9) {
        throw GeometryError.profile("Extrusion direction is parallel to the profile plane");
    }
    return { direction: unit, sign: unit.z > 0 ? 1 : -1 };
}

function clipVoid(info: IVoidInfo, depth: number): IVoidInfo | undefined {
    if (!Number.isFinite(info.start) || !Number.isFinite(info.end) || info.start >= info.end) {
        throw GeometryError.csg(`Invalid void range [${info.start}, ${info.end}]`);
    }
    if (info.contour.length < 3) {
        throw GeometryError.csg(`Void contour needs at least 3 points, got ${info.contour.length}`);
    }

    const start = Math.max(0, info.start);
    const end = Math.min(depth, info.end);
    if (end - start <= RANGE_TOLERANCE) {
        Logger.debug(`Ignoring void [${info.start}, ${info.end}] outside extrusion depth ${depth}`);
        return undefined;
    }
    return { contour: info.contour, start, end };
}

function holeLoop(contour: readonly Vector2[]): readonly Vector2[] {
    const loop = stripClosingPoint(contour);
    return signedArea2D(loop) > 0 ? loop.reverse() : loop;
}

function at(point: Vector2, distance: number, sweep: ISweep): Vector3 {
    const d = sweep.direction;
    return new Vector3(point.x + d.x * distance, point.y + d.y * distance, d.z * distance);
}

/**
 * Planar face at `distance`, its normal `facing` along Z.
 */
function addCap(
    builder: MeshBuilder,
    loops: readonly (readonly Vector2[])[],
    distance: number,
    sweep: ISweep,
    facing: number,
) {
    const [outer, ...holes] = loops;
    const indices = triangulatePolygonWithHoles(outer, holes);
    const points = loops.flat().map((p) => at(p, distance, sweep));
    builder.addFace(points, indices, new Vector3(0, 0, facing), facing < 0);
}

function addWalls(builder: MeshBuilder, loop: readonly Vector2[], from: number, to: number, sweep: ISweep) {
    for (let i = 0; i < loop.length; i++) {
        const p0 = loop[i];
        const p1 = loop[(i + 1) % loop.length];
        const b0 = at(p0, from, sweep);
        const b1 = at(p1, from, sweep);
        const t0 = at(p0, to, sweep);
        const t1 = at(p1, to, sweep);

        const edge = new Vector3().subVectors(b1, b0);
        const normal = edge.cross(sweep.direction).normalize().multiplyScalar(sweep.sign);
        if (sweep.sign > 0) {
            builder.addQuad(b0, b1, t1, t0, normal);
        } else {
            builder.addQuad(b0, t0, t1, b1, normal);
        }
    }
}
