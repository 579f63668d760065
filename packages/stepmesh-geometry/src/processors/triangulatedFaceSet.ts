// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { InvalidAttributeError, Logger } from "stepmesh-core";
import { asFloatList, asInteger, asList, EntityAttributes, type IDecodedEntity } from "stepmesh-parser";
import { Vector3 } from "three";
import { readPointList } from "../curves";
import { Mesh } from "../mesh";
import { computeVertexNormals } from "../triangulation";
import type { IGeometryProcessor, IProcessorContext } from "./processor";

export const TriangulatedFaceSetProcessor = {
    type: "IFCTRIANGULATEDFACESET",

    /**
     * Coordinates 0, normals 1, coord index 3 and point index 4. Indices are 1-based; with a
     * point index, coord index entries address it instead of the coordinates.
     */
    process(context: IProcessorContext, entity: IDecodedEntity): Mesh {
        const coordinates = readPointList(context.resolver, EntityAttributes.requireRef(entity, 0));
        const pointIndex = EntityAttributes.getList(entity, 4);
        const vertices = pointIndex
            ? pointIndex.map((value) => coordinates[toOffset(asInteger(value), coordinates.length, 4, entity)])
            : coordinates;

        const indices: number[] = [];
        for (const triangle of EntityAttributes.requireList(entity, 3)) {
            const corners = (asList(triangle) ?? []).map(asInteger);
            if (corners.length !== 3) {
                throw new InvalidAttributeError(3, `${entity.type} #${entity.id} expects index triples`);
            }
            for (const corner of corners) {
                indices.push(toOffset(corner, vertices.length, 3, entity));
            }
        }

        const positions = new Float32Array(vertices.length * 3);
        vertices.forEach((v, i) => v.toArray(positions, i * 3));
        const normals = readNormals(entity, vertices.length) ?? computeVertexNormals(positions, indices);
        return new Mesh(positions, normals, Uint32Array.from(indices));
    },
} satisfies IGeometryProcessor;

/**
 * Zero-based offset of a 1-based index into a list of `count` points.
 */
function toOffset(index: number | undefined, count: number, attribute: number, entity: IDecodedEntity): number {
    if (index === undefined || index < 1 || index > count) {
        throw new InvalidAttributeError(
            attribute,
            `${entity.type} #${entity.id} index ${index ?? "$"} is out of range for ${count} points`,
        );
    }
    return index - 1;
}

function readNormals(entity: IDecodedEntity, vertexCount: number): Float32Array | undefined {
    const list = EntityAttributes.getList(entity, 1);
    if (!list) return undefined;
    if (list.length !== vertexCount) {
        Logger.debug(`Ignoring ${list.length} normals of #${entity.id} for ${vertexCount} vertices`);
        return undefined;
    }

    const normals = new Float32Array(vertexCount * 3);
    list.forEach((item, i) => {
        const [x = 0, y = 0, z = 1] = asFloatList(item);
        new Vector3(x, y, z).normalize().toArray(normals, i * 3);
    });
    return normals;
}
