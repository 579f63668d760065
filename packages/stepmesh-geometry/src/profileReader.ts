// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { GeometryError, InvalidAttributeError, Logger, StepError, type EntityId } from "stepmesh-core";
import { EntityAttributes, type IDecodedEntity, type IEntityResolver } from "stepmesh-parser";
import { Vector2 } from "three";
import { readCurvePoints2D } from "./curves";
import { readAxis2Placement2D } from "./placement";
import { Profile2D } from "./profile";

export class ProfileReader {
    /**
     * Reads a profile definition with its optional `IFCAXIS2PLACEMENT2D` position applied.
     */
    static read(resolver: IEntityResolver, id: EntityId): Profile2D {
        const entity = resolver.resolveRef(id);

        switch (entity.type) {
            case "IFCRECTANGLEPROFILEDEF":
                return positioned(
                    resolver,
                    entity,
                    Profile2D.rectangle(
                        EntityAttributes.requireFloat(entity, 3),
                        EntityAttributes.requireFloat(entity, 4),
                    ),
                );
            case "IFCCIRCLEPROFILEDEF":
                return positioned(resolver, entity, Profile2D.circle(EntityAttributes.requireFloat(entity, 3)));
            case "IFCCIRCLEHOLLOWPROFILEDEF": {
                const radius = EntityAttributes.requireFloat(entity, 3);
                const wallThickness = EntityAttributes.requireFloat(entity, 4);
                return positioned(resolver, entity, Profile2D.hollowCircle(radius, radius - wallThickness));
            }
            case "IFCISHAPEPROFILEDEF":
                return positioned(resolver, entity, iShape(entity));
            case "IFCLSHAPEPROFILEDEF":
                return positioned(resolver, entity, lShape(entity));
            case "IFCTSHAPEPROFILEDEF":
                return positioned(resolver, entity, tShape(entity));
            case "IFCARBITRARYCLOSEDPROFILEDEF":
                return Profile2D.arbitrary(readCurvePoints2D(resolver, EntityAttributes.requireRef(entity, 2)));
            case "IFCARBITRARYPROFILEDEFWITHVOIDS":
                return Profile2D.arbitrary(
                    readCurvePoints2D(resolver, EntityAttributes.requireRef(entity, 2)),
                    readInnerCurves(resolver, entity),
                );
            default:
                throw GeometryError.profile(`Unsupported profile type ${entity.type}`);
        }
    }
}

function positioned(resolver: IEntityResolver, entity: IDecodedEntity, profile: Profile2D): Profile2D {
    const position = EntityAttributes.getRef(entity, 2);
    return position === undefined ? profile : profile.transformed(readAxis2Placement2D(resolver, position));
}

function readInnerCurves(resolver: IEntityResolver, entity: IDecodedEntity): Vector2[][] {
    const holes: Vector2[][] = [];
    for (const ref of EntityAttributes.getRefs(entity, 3)) {
        try {
            holes.push(readCurvePoints2D(resolver, ref));
        } catch (error) {
            if (!(error instanceof StepError)) throw error;
            Logger.warn(`Skipping inner curve #${ref} of #${entity.id}: ${error.message}`);
        }
    }
    return holes.filter((x) => x.length >= 3);
}

function iShape(entity: IDecodedEntity): Profile2D {
    const hw = EntityAttributes.requireFloat(entity, 3) / 2;
    const hd = EntityAttributes.requireFloat(entity, 4) / 2;
    const hwt = EntityAttributes.requireFloat(entity, 5) / 2;
    const ft = EntityAttributes.requireFloat(entity, 6);
    requireThinner(entity, hwt * 2, hw * 2, 5);
    requireThinner(entity, ft * 2, hd * 2, 6);

    return Profile2D.arbitrary(
        points([
            [-hw, -hd],
            [hw, -hd],
            [hw, -hd + ft],
            [hwt, -hd + ft],
            [hwt, hd - ft],
            [hw, hd - ft],
            [hw, hd],
            [-hw, hd],
            [-hw, hd - ft],
            [-hwt, hd - ft],
            [-hwt, -hd + ft],
            [-hw, -hd + ft],
        ]),
    );
}

function lShape(entity: IDecodedEntity): Profile2D {
    const depth = EntityAttributes.requireFloat(entity, 3);
    const width = EntityAttributes.getFloat(entity, 4) ?? depth;
    const t = EntityAttributes.requireFloat(entity, 5);
    requireThinner(entity, t, Math.min(depth, width), 5);

    return Profile2D.arbitrary(
        points([
            [0, 0],
            [width, 0],
            [width, t],
            [t, t],
            [t, depth],
            [0, depth],
        ]),
    );
}

function tShape(entity: IDecodedEntity): Profile2D {
    const depth = EntityAttributes.requireFloat(entity, 3);
    const hfw = EntityAttributes.requireFloat(entity, 4) / 2;
    const hwt = EntityAttributes.requireFloat(entity, 5) / 2;
    const ft = EntityAttributes.requireFloat(entity, 6);
    requireThinner(entity, hwt * 2, hfw * 2, 5);
    requireThinner(entity, ft, depth, 6);

    return Profile2D.arbitrary(
        points([
            [-hfw, 0],
            [hfw, 0],
            [hfw, ft],
            [hwt, ft],
            [hwt, depth],
            [-hwt, depth],
            [-hwt, ft],
            [-hfw, ft],
        ]),
    );
}

function requireThinner(entity: IDecodedEntity, thickness: number, size: number, index: number) {
    if (!(thickness > 0 && thickness < size)) {
        throw new InvalidAttributeError(
            index,
            `${entity.type} #${entity.id} thickness ${thickness} must lie between 0 and ${size}`,
        );
    }
}

function points(coordinates: readonly (readonly [number, number])[]): Vector2[] {
    return coordinates.map(([x, y]) => new Vector2(x, y));
}
