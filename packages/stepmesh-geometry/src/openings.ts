// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { Logger, StepError, type EntityId } from "stepmesh-core";
import { EntityAttributes, type IDecodedEntity, type StepModel } from "stepmesh-parser";
import { Matrix4, Vector2, Vector3 } from "three";
import type { IVoidInfo } from "./extrusion";
import type { IResolvedItem } from "./geometryRouter";
import { readObjectPlacement } from "./placement";
import { readExtrusion, type IExtrusion } from "./processors/extrudedAreaSolid";
import type { IProcessorContext } from "./processors/processor";

const PARALLEL_TOLERANCE = 1e-6;

export interface IHostVoids {
    readonly voids: IVoidInfo[];
    readonly openings: EntityId[];
}

/**
 * Openings attached to their hosts by `IFCRELVOIDSELEMENT` (relating element 4, related
 * opening 5), with their extruded bodies expressed as voids of a host extrusion.
 */
export class OpeningIndex {
    private readonly byHost = new Map<EntityId, EntityId[]>();

    constructor(
        readonly model: StepModel,
        private readonly context: IProcessorContext,
        private readonly itemsOf: (element: IDecodedEntity) => IResolvedItem[],
    ) {
        for (const id of model.findByTypeName("IFCRELVOIDSELEMENT")) {
            const relation = tryDecode(model, id);
            if (!relation) continue;

            const host = EntityAttributes.getRef(relation, 4);
            const opening = EntityAttributes.getRef(relation, 5);
            if (host === undefined || opening === undefined) continue;

            const openings = this.byHost.get(host) ?? [];
            openings.push(opening);
            this.byHost.set(host, openings);
        }
    }

    openingsOf(host: EntityId): readonly EntityId[] {
        return this.byHost.get(host) ?? [];
    }

    /**
     * Voids cut into `host` by its openings, in the solid coordinates of `extrusion`, which
     * `hostToWorld` places in the world. Opening extrusions that do not run parallel to the
     * host are left out.
     */
    voidsFor(host: EntityId, hostToWorld: Matrix4, extrusion: IExtrusion): IHostVoids {
        const result: IHostVoids = { voids: [], openings: [] };
        const worldToHost = hostToWorld.clone().invert();

        for (const openingId of this.openingsOf(host)) {
            try {
                const found = this.openingVoids(openingId, worldToHost, extrusion);
                if (found.length > 0) {
                    result.voids.push(...found);
                    result.openings.push(openingId);
                }
            } catch (error) {
                if (!(error instanceof StepError)) throw error;
                Logger.warn(`Skipping opening #${openingId} of #${host}: ${error.message}`);
            }
        }
        return result;
    }

    private openingVoids(openingId: EntityId, worldToHost: Matrix4, host: IExtrusion): IVoidInfo[] {
        const opening = this.model.resolveRef(openingId);
        const placement = readObjectPlacement(this.model, EntityAttributes.getRef(opening, 5));
        const voids: IVoidInfo[] = [];

        for (const item of this.itemsOf(opening)) {
            if (item.entity.type !== "IFCEXTRUDEDAREASOLID") {
                Logger.debug(`Opening #${openingId} item ${item.entity.type} #${item.entity.id} is not subtracted`);
                continue;
            }
            const solid = readExtrusion(this.context, item.entity);
            const toHost = worldToHost.clone().multiply(placement).multiply(item.transform).multiply(solid.position);
            const info = projectVoid(solid, toHost, host.direction);
            if (info) {
                voids.push(info);
            } else {
                Logger.debug(`Opening #${openingId} is not parallel to its host extrusion`);
            }
        }
        return voids;
    }
}

function tryDecode(model: StepModel, id: EntityId): IDecodedEntity | undefined {
    try {
        return model.resolveRef(id);
    } catch (error) {
        if (!(error instanceof StepError)) throw error;
        Logger.warn(`Skipping void relation #${id}: ${error.message}`);
        return undefined;
    }
}

/**
 * Projects an opening extrusion into host solid coordinates along the host direction `D`.
 * A host point at distance `t` over profile point `p` is `(p.x + D.x t, p.y + D.y t, D.z t)`.
 */
export function projectVoid(opening: IExtrusion, toHost: Matrix4, direction: Vector3): IVoidInfo | undefined {
    const sweep = opening.direction.clone().transformDirection(toHost);
    if (Math.abs(Math.abs(sweep.dot(direction)) - 1) > PARALLEL_TOLERANCE) return undefined;

    const offset = opening.direction.clone().multiplyScalar(opening.depth);
    const contour: Vector2[] = [];
    let startSum = 0;
    let endSum = 0;
    for (const p of opening.profile.outer) {
        const start = new Vector3(p.x, p.y, 0).applyMatrix4(toHost);
        const end = new Vector3(p.x, p.y, 0).add(offset).applyMatrix4(toHost);
        const t = start.z / direction.z;
        contour.push(new Vector2(start.x - direction.x * t, start.y - direction.y * t));
        startSum += t;
        endSum += end.z / direction.z;
    }

    const count = opening.profile.outer.length;
    const a = startSum / count;
    const b = endSum / count;
    return { contour, start: Math.min(a, b), end: Math.max(a, b) };
}
