// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { GeometryError } from "stepmesh-core";
import { EntityAttributes, type IDecodedEntity } from "stepmesh-parser";
import { Vector3 } from "three";
import { readCurvePoints } from "../curves";
import { MeshBuilder, type Mesh } from "../mesh";
import { calculateCircleSegments } from "../triangulation";
import type { IGeometryProcessor, IProcessorContext } from "./processor";

interface IFrame {
    readonly origin: Vector3;
    readonly tangent: Vector3;
    readonly normal: Vector3;
    readonly binormal: Vector3;
}

export const SweptDiskSolidProcessor = {
    type: "IFCSWEPTDISKSOLID",

    /**
     * Directrix 0, radius 1, optional inner radius 2.
     */
    process(context: IProcessorContext, entity: IDecodedEntity): Mesh {
        const path = readCurvePoints(context.resolver, EntityAttributes.requireRef(entity, 0));
        const radius = EntityAttributes.requireFloat(entity, 1);
        const innerRadius = EntityAttributes.getFloat(entity, 2);
        return sweepDisk(path, radius, innerRadius);
    },
} satisfies IGeometryProcessor;

/**
 * Tube of `radius` around a polyline, oriented by rotation-minimising frames and closed at
 * both ends. A positive `innerRadius` hollows it out.
 */
export function sweepDisk(path: readonly Vector3[], radius: number, innerRadius?: number): Mesh {
    if (!(radius > 0) || !Number.isFinite(radius)) {
        throw GeometryError.geometry(`Disk radius must be positive, got ${radius}`);
    }
    const hole = innerRadius !== undefined && innerRadius > 0 ? innerRadius : undefined;
    if (hole !== undefined && hole >= radius) {
        throw GeometryError.geometry(`Inner radius ${hole} must be smaller than radius ${radius}`);
    }

    const points = path.filter((p, i) => i === 0 || p.distanceTo(path[i - 1]) > 1e-9);
    if (points.length < 2) {
        throw GeometryError.geometry(`Directrix needs at least 2 distinct points, got ${points.length}`);
    }

    const frames = rotationMinimizingFrames(points);
    const segments = calculateCircleSegments(radius);
    const builder = new MeshBuilder();

    const outer = addTube(builder, frames, radius, segments, false);
    if (hole === undefined) {
        addDiskCap(builder, frames[0], radius, segments, false);
        addDiskCap(builder, frames[frames.length - 1], radius, segments, true);
        return builder.build();
    }

    const inner = addTube(builder, frames, hole, segments, true);
    addRingCap(builder, frames[0], outer[0], inner[0], false);
    addRingCap(builder, frames[frames.length - 1], outer[outer.length - 1], inner[inner.length - 1], true);
    return builder.build();
}

/**
 * Double reflection frames along the polyline; interior tangents bisect the adjacent segments.
 */
export function rotationMinimizingFrames(points: readonly Vector3[]): IFrame[] {
    const tangents = points.map((p, i) => {
        const incoming = i > 0 ? new Vector3().subVectors(p, points[i - 1]).normalize() : undefined;
        const outgoing = i < points.length - 1 ? new Vector3().subVectors(points[i + 1], p).normalize() : undefined;
        if (!incoming) return outgoing ?? new Vector3(0, 0, 1);
        if (!outgoing) return incoming;
        const bisector = incoming.clone().add(outgoing);
        return bisector.lengthSq() < 1e-12 ? incoming : bisector.normalize();
    });

    const frames: IFrame[] = [];
    let normal = perpendicular(tangents[0]);
    for (let i = 0; i < points.length; i++) {
        if (i > 0) {
            const v1 = new Vector3().subVectors(points[i], points[i - 1]);
            const c1 = v1.lengthSq();
            const reflectedNormal = reflect(normal, v1, c1);
            const reflectedTangent = reflect(tangents[i - 1], v1, c1);
            const v2 = new Vector3().subVectors(tangents[i], reflectedTangent);
            const c2 = v2.lengthSq();
            normal = c2 < 1e-20 ? reflectedNormal : reflect(reflectedNormal, v2, c2);
            normal.sub(tangents[i].clone().multiplyScalar(normal.dot(tangents[i]))).normalize();
        }
        frames.push({
            origin: points[i],
            tangent: tangents[i],
            normal,
            binormal: new Vector3().crossVectors(tangents[i], normal),
        });
    }
    return frames;
}

function reflect(vector: Vector3, axis: Vector3, axisLengthSq: number): Vector3 {
    return vector.clone().sub(axis.clone().multiplyScalar((2 / axisLengthSq) * axis.dot(vector)));
}

function perpendicular(tangent: Vector3): Vector3 {
    const ax = Math.abs(tangent.x);
    const ay = Math.abs(tangent.y);
    const az = Math.abs(tangent.z);
    const ref = ax <= ay && ax <= az ? new Vector3(1, 0, 0) : ay <= az ? new Vector3(0, 1, 0) : new Vector3(0, 0, 1);
    return new Vector3().crossVectors(tangent, ref).normalize();
}

function ringDirection(frame: IFrame, angle: number): Vector3 {
    return frame.normal
        .clone()
        .multiplyScalar(Math.cos(angle))
        .add(frame.binormal.clone().multiplyScalar(Math.sin(angle)));
}

function ringPoints(frame: IFrame, radius: number, segments: number): Vector3[] {
    const points: Vector3[] = [];
    for (let j = 0; j < segments; j++) {
        points.push(ringDirection(frame, (2 * Math.PI * j) / segments).multiplyScalar(radius).add(frame.origin));
    }
    return points;
}

/**
 * Smooth-shaded tube; returns the ring points per frame. Inner tubes face the axis.
 */
function addTube(builder: MeshBuilder, frames: readonly IFrame[], radius: number, segments: number, inward: boolean) {
    const rings: Vector3[][] = [];
    const starts: number[] = [];

    for (const frame of frames) {
        const ring = ringPoints(frame, radius, segments);
        starts.push(builder.vertexCount);
        ring.forEach((point, j) => {
            const normal = ringDirection(frame, (2 * Math.PI * j) / segments);
            builder.addVertex(point, inward ? normal.negate() : normal);
        });
        rings.push(ring);
    }

    for (let i = 0; i + 1 < frames.length; i++) {
        for (let j = 0; j < segments; j++) {
            const next = (j + 1) % segments;
            const a = starts[i] + j;
            const b = starts[i] + next;
            const c = starts[i + 1] + next;
            const d = starts[i + 1] + j;
            if (inward) {
                builder.addTriangle(a, c, b);
                builder.addTriangle(a, d, c);
            } else {
                builder.addTriangle(a, b, c);
                builder.addTriangle(a, c, d);
            }
        }
    }

    return rings;
}

function addDiskCap(builder: MeshBuilder, frame: IFrame, radius: number, segments: number, atEnd: boolean) {
    const ring = ringPoints(frame, radius, segments);
    const triangles: number[] = [];
    for (let j = 0; j < segments; j++) {
        const a = j + 1;
        const b = ((j + 1) % segments) + 1;
        triangles.push(...(atEnd ? [0, a, b] : [0, b, a]));
    }
    const normal = atEnd ? frame.tangent.clone() : frame.tangent.clone().negate();
    builder.addFace([frame.origin, ...ring], triangles, normal);
}

function addRingCap(builder: MeshBuilder, frame: IFrame, outer: readonly Vector3[], inner: readonly Vector3[], atEnd: boolean) {
    const count = outer.length;
    const triangles: number[] = [];
    for (let j = 0; j < count; j++) {
        const next = (j + 1) % count;
        const o0 = j;
        const o1 = next;
        const i0 = count + j;
        const i1 = count + next;
        if (atEnd) {
            triangles.push(o1, i0, o0, o1, i1, i0);
        } else {
            triangles.push(o1, o0, i0, o1, i0, i1);
        }
    }
    const normal = atEnd ? frame.tangent.clone() : frame.tangent.clone().negate();
    builder.addFace([...outer, ...inner], triangles, normal);
}
