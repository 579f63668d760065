// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import type { IDecodedEntity, IEntityResolver } from "stepmesh-parser";
import type { Mesh } from "../mesh";

export interface IProcessorContext {
    readonly resolver: IEntityResolver;
    /** Factor converting file plane angles to radians. */
    readonly angleScale: number;
}

/**
 * Builds the mesh of one representation item in its own coordinates and file units.
 */
export interface IGeometryProcessor {
    readonly type: string;
    process(context: IProcessorContext, entity: IDecodedEntity): Mesh;
}
