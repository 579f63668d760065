// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { EntityAttributes, type IDecodedEntity } from "stepmesh-parser";
import type { Matrix4, Vector3 } from "three";
import { extrudeProfileWithVoids, type IVoidInfo } from "../extrusion";
import type { Mesh } from "../mesh";
import { readAxis2Placement3D, readDirection } from "../placement";
import type { Profile2D } from "../profile";
import { ProfileReader } from "../profileReader";
import type { IGeometryProcessor, IProcessorContext } from "./processor";

export interface IExtrusion {
    readonly profile: Profile2D;
    /** Solid coordinates to item coordinates. */
    readonly position: Matrix4;
    /** Unit direction in solid coordinates. */
    readonly direction: Vector3;
    readonly depth: number;
}

export const ExtrudedAreaSolidProcessor = {
    type: "IFCEXTRUDEDAREASOLID",

    process(context: IProcessorContext, entity: IDecodedEntity): Mesh {
        return buildExtrusion(readExtrusion(context, entity));
    },
} satisfies IGeometryProcessor;

/**
 * Swept area 0, position 1, extruded direction 2, depth 3.
 */
export function readExtrusion(context: IProcessorContext, entity: IDecodedEntity): IExtrusion {
    const { resolver } = context;
    return {
        profile: ProfileReader.read(resolver, EntityAttributes.requireRef(entity, 0)),
        position: readAxis2Placement3D(resolver, EntityAttributes.getRef(entity, 1)),
        direction: readDirection(resolver, EntityAttributes.requireRef(entity, 2)),
        depth: EntityAttributes.requireFloat(entity, 3),
    };
}

export function buildExtrusion(extrusion: IExtrusion, voids: readonly IVoidInfo[] = []): Mesh {
    return extrudeProfileWithVoids(extrusion.profile, extrusion.depth, extrusion.direction, voids).transformed(
        extrusion.position,
    );
}
