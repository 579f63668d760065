// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { GeometryError } from "stepmesh-core";
import { EntityAttributes, type IDecodedEntity } from "stepmesh-parser";
import { Matrix4, Vector3 } from "three";
import { MeshBuilder, type Mesh } from "../mesh";
import { readAxis1Placement, readAxis2Placement3D, type IAxis1Placement } from "../placement";
import type { Profile2D } from "../profile";
import { ProfileReader } from "../profileReader";
import { triangulatePolygonWithHoles } from "../triangulation";
import type { IGeometryProcessor, IProcessorContext } from "./processor";

const FULL_TURN_SEGMENTS = 24;

export const RevolvedAreaSolidProcessor = {
    type: "IFCREVOLVEDAREASOLID",

    /**
     * Swept area 0, position 1, axis 2, angle 3 in file angle units.
     */
    process(context: IProcessorContext, entity: IDecodedEntity): Mesh {
        const { resolver } = context;
        const profile = ProfileReader.read(resolver, EntityAttributes.requireRef(entity, 0));
        const position = readAxis2Placement3D(resolver, EntityAttributes.getRef(entity, 1));
        const axis = readAxis1Placement(resolver, EntityAttributes.requireRef(entity, 2));
        const angle = EntityAttributes.requireFloat(entity, 3) * context.angleScale;

        return revolveProfile(profile, axis, angle).transformed(position);
    },
} satisfies IGeometryProcessor;

export function revolutionSegments(angle: number): number {
    return isFullTurn(angle) ? FULL_TURN_SEGMENTS : Math.max(4, Math.ceil((Math.abs(angle) / Math.PI) * 12));
}

/**
 * Rotates the profile (in the XY plane) about `axis` by `angle` radians. Partial turns are
 * closed by the profile at both ends. Flat normals, faces outwards.
 */
export function revolveProfile(profile: Profile2D, axis: IAxis1Placement, angle: number): Mesh {
    if (!Number.isFinite(angle) || Math.abs(angle) < 1e-9) {
        throw GeometryError.geometry(`Revolution angle must be non-zero, got ${angle}`);
    }

    const fullTurn = isFullTurn(angle);
    const sweepAngle = fullTurn ? 2 * Math.PI * Math.sign(angle) : angle;
    const segments = revolutionSegments(angle);
    const direction = axis.direction.clone().normalize();
    const sign = sweepSign(profile, axis.location, direction, angle);

    const rotations: Matrix4[] = [];
    for (let i = 0; i <= segments; i++) {
        const t = fullTurn && i === segments ? 0 : (sweepAngle * i) / segments;
        rotations.push(rotationAbout(axis.location, direction, t));
    }

    const builder = new MeshBuilder();
    for (const loop of profile.loops) {
        const rings = rotations.map((m) => loop.map((p) => new Vector3(p.x, p.y, 0).applyMatrix4(m)));
        for (let i = 0; i < segments; i++) {
            for (let j = 0; j < loop.length; j++) {
                const k = (j + 1) % loop.length;
                const b0 = rings[i][j];
                const b1 = rings[i][k];
                const t0 = rings[i + 1][j];
                const t1 = rings[i + 1][k];
                if (sign > 0) {
                    addTriangle(builder, b0, b1, t1);
                    addTriangle(builder, b0, t1, t0);
                } else {
                    addTriangle(builder, b0, t1, b1);
                    addTriangle(builder, b0, t0, t1);
                }
            }
        }
    }

    if (!fullTurn) {
        const indices = triangulatePolygonWithHoles(profile.outer, profile.holes);
        const flat = profile.loops.flat();
        const start = rotations[0];
        const end = rotations[segments];
        builder.addFace(
            flat.map((p) => new Vector3(p.x, p.y, 0).applyMatrix4(start)),
            indices,
            new Vector3(0, 0, -sign),
            sign > 0,
        );
        builder.addFace(
            flat.map((p) => new Vector3(p.x, p.y, 0).applyMatrix4(end)),
            indices,
            new Vector3(0, 0, sign).transformDirection(end),
            sign < 0,
        );
    }

    const mesh = builder.build();
    return mesh.signedVolume() < 0 ? mesh.flipped() : mesh;
}

function isFullTurn(angle: number) {
    return Math.abs(angle) >= Math.PI * 1.99;
}

function rotationAbout(location: Vector3, direction: Vector3, angle: number): Matrix4 {
    return new Matrix4()
        .makeTranslation(location.x, location.y, location.z)
        .multiply(new Matrix4().makeRotationAxis(direction, angle))
        .multiply(new Matrix4().makeTranslation(-location.x, -location.y, -location.z));
}

/**
 * +1 when the profile starts moving towards +Z of its plane.
 */
function sweepSign(profile: Profile2D, location: Vector3, direction: Vector3, angle: number): 1 | -1 {
    const centroid = new Vector3();
    for (const p of profile.outer) {
        centroid.x += p.x / profile.outer.length;
        centroid.y += p.y / profile.outer.length;
    }
    const velocity = new Vector3().crossVectors(direction, centroid.sub(location)).multiplyScalar(Math.sign(angle));
    if (Math.abs(velocity.z) < 1e-9) {
        throw GeometryError.geometry("Revolution axis keeps the profile in its own plane");
    }
    return velocity.z > 0 ? 1 : -1;
}

function addTriangle(builder: MeshBuilder, a: Vector3, b: Vector3, c: Vector3) {
    const area = new Vector3().subVectors(b, a).cross(new Vector3().subVectors(c, a)).lengthSq();
    if (area > 1e-24) builder.addFlatTriangle(a, b, c);
}
