// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { GeometryError, InvalidAttributeError, type EntityId } from "stepmesh-core";
import { asFloatList, asInteger, asList, EntityAttributes, type IEntityResolver } from "stepmesh-parser";
import { Vector2, Vector3 } from "three";
import { readCartesianPoint } from "./placement";

/**
 * Vertices of a polyline-like curve: `IFCPOLYLINE` or `IFCINDEXEDPOLYCURVE` over a point list.
 * Arc segments of an indexed curve are kept as their three control points. 2D curves get
 * `z = 0`; consecutive duplicates are dropped.
 */
export function readCurvePoints(resolver: IEntityResolver, id: EntityId): Vector3[] {
    const curve = resolver.resolveRef(id);

    switch (curve.type) {
        case "IFCPOLYLINE":
            return dropRepeats(
                EntityAttributes.getRefs(curve, 0).map((ref) => readCartesianPoint(resolver, ref)),
            );
        case "IFCINDEXEDPOLYCURVE":
            return dropRepeats(readIndexedPolyCurve(resolver, curve.id));
        default:
            throw GeometryError.profile(`Unsupported curve type ${curve.type}`);
    }
}

export function readCurvePoints2D(resolver: IEntityResolver, id: EntityId): Vector2[] {
    return readCurvePoints(resolver, id).map((p) => new Vector2(p.x, p.y));
}

/**
 * Coordinates of an `IFCCARTESIANPOINTLIST2D` or `IFCCARTESIANPOINTLIST3D`.
 */
export function readPointList(resolver: IEntityResolver, id: EntityId): Vector3[] {
    const list = resolver.resolveRef(id);
    if (list.type !== "IFCCARTESIANPOINTLIST2D" && list.type !== "IFCCARTESIANPOINTLIST3D") {
        throw GeometryError.geometry(`#${id} is ${list.type}, expected a cartesian point list`);
    }
    return EntityAttributes.requireList(list, 0).map((item) => {
        const [x = 0, y = 0, z = 0] = asFloatList(item);
        return new Vector3(x, y, z);
    });
}

function readIndexedPolyCurve(resolver: IEntityResolver, id: EntityId): Vector3[] {
    const curve = resolver.resolveRef(id);
    const points = readPointList(resolver, EntityAttributes.requireRef(curve, 0));
    const segments = EntityAttributes.getList(curve, 1);
    if (segments === undefined) return points;

    const result: Vector3[] = [];
    for (const segment of segments) {
        // IFCLINEINDEX((1,2,3)) and IFCARCINDEX((3,4,5)) decode as typed values over a list.
        const indices = segment.kind === "typed" ? asList(segment.args[0]) : asList(segment);
        for (const index of indices ?? []) {
            const position = asInteger(index);
            const point = position === undefined ? undefined : points[position - 1];
            if (!point) {
                throw new InvalidAttributeError(1, `IFCINDEXEDPOLYCURVE #${id} has an invalid point index`);
            }
            result.push(point);
        }
    }
    return result;
}

function dropRepeats(points: Vector3[]): Vector3[] {
    return points.filter((p, i) => i === 0 || p.distanceTo(points[i - 1]) > 1e-9);
}
