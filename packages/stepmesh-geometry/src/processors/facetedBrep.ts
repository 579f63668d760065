// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { GeometryError, Logger, type EntityId } from "stepmesh-core";
import { EntityAttributes, type IDecodedEntity, type IEntityResolver } from "stepmesh-parser";
import type { Vector3 } from "three";
import { MeshBuilder, type Mesh } from "../mesh";
import { readCartesianPoint } from "../placement";
import { triangulateFace } from "../triangulation";
import type { IGeometryProcessor, IProcessorContext } from "./processor";

interface IFaceBound {
    readonly outer: boolean;
    readonly points: Vector3[];
}

export const FacetedBrepProcessor = {
    type: "IFCFACETEDBREP",

    /**
     * Outer shell 0. Each face is triangulated in its own plane with flat normals; degenerate
     * faces are left out.
     */
    process(context: IProcessorContext, entity: IDecodedEntity): Mesh {
        const { resolver } = context;
        const shell = resolver.resolveRef(EntityAttributes.requireRef(entity, 0));
        const builder = new MeshBuilder();
        let skipped = 0;

        for (const faceId of EntityAttributes.getRefs(shell, 0)) {
            try {
                addFace(resolver, builder, faceId);
            } catch (error) {
                if (!(error instanceof GeometryError) || error.kind !== "triangulation") throw error;
                Logger.debug(`Skipping face #${faceId} of #${entity.id}: ${error.message}`);
                skipped++;
            }
        }

        if (builder.triangleCount === 0) {
            throw GeometryError.triangulation(`Faceted brep #${entity.id} has no valid face`);
        }
        if (skipped > 0) {
            Logger.warn(`Skipped ${skipped} degenerate faces of faceted brep #${entity.id}`);
        }
        return builder.build();
    },
} satisfies IGeometryProcessor;

function addFace(resolver: IEntityResolver, builder: MeshBuilder, faceId: EntityId) {
    const face = resolver.resolveRef(faceId);
    const bounds = EntityAttributes.getRefs(face, 0).map((ref) => readBound(resolver, ref));
    const outer = bounds.find((x) => x.outer) ?? bounds[0];
    if (!outer) {
        throw GeometryError.triangulation(`Face #${faceId} has no bounds`);
    }

    const holes = bounds.filter((x) => x !== outer).map((x) => x.points);
    const { points, indices, normal } = triangulateFace(outer.points, holes);
    builder.addFace(points, indices, normal);
}

/**
 * `IFCFACEOUTERBOUND` or `IFCFACEBOUND`: loop 0, orientation 1. `.F.` reverses the loop.
 */
function readBound(resolver: IEntityResolver, id: EntityId): IFaceBound {
    const bound = resolver.resolveRef(id);
    if (bound.type !== "IFCFACEOUTERBOUND" && bound.type !== "IFCFACEBOUND") {
        throw GeometryError.geometry(`#${id} is ${bound.type}, expected a face bound`);
    }

    const loop = resolver.resolveRef(EntityAttributes.requireRef(bound, 0));
    if (loop.type !== "IFCPOLYLOOP") {
        throw GeometryError.geometry(`Face bound #${id} uses ${loop.type}, expected IFCPOLYLOOP`);
    }

    const points = EntityAttributes.getRefs(loop, 0).map((ref) => readCartesianPoint(resolver, ref));
    if (EntityAttributes.getBool(bound, 1) === false) points.reverse();
    return { outer: bound.type === "IFCFACEOUTERBOUND", points };
}
