// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { GeometryError, Logger, type EntityId } from "stepmesh-core";
import { asFloat, EntityAttributes, type IEntityResolver } from "stepmesh-parser";
import { Matrix3, Matrix4, Vector2, Vector3 } from "three";

export interface IAxis1Placement {
    readonly location: Vector3;
    readonly direction: Vector3;
}

export function readCartesianPoint(resolver: IEntityResolver, id: EntityId): Vector3 {
    const point = resolver.resolveRef(id);
    if (point.type !== "IFCCARTESIANPOINT") {
        throw GeometryError.geometry(`#${id} is ${point.type}, expected IFCCARTESIANPOINT`);
    }
    const [x = 0, y = 0, z = 0] = EntityAttributes.requireList(point, 0).map(asFloat);
    return new Vector3(x, y, z);
}

export function readDirection(resolver: IEntityResolver, id: EntityId): Vector3 {
    const direction = resolver.resolveRef(id);
    if (direction.type !== "IFCDIRECTION") {
        throw GeometryError.geometry(`#${id} is ${direction.type}, expected IFCDIRECTION`);
    }
    const [x = 0, y = 0, z = 0] = EntityAttributes.requireList(direction, 0).map(asFloat);
    const vector = new Vector3(x, y, z);
    if (vector.lengthSq() === 0) {
        throw GeometryError.geometry(`Direction #${id} has zero length`);
    }
    return vector.normalize();
}

/**
 * Right-handed orthonormal basis with `z` along `axis` and `x` as close to `refDirection` as
 * the axis allows.
 */
export function orthonormalBasis(axis: Vector3, refDirection: Vector3) {
    const z = axis.clone().normalize();
    let x = refDirection.clone().sub(z.clone().multiplyScalar(refDirection.dot(z)));
    if (x.lengthSq() < 1e-20) {
        x = Math.abs(z.x) < 0.9 ? new Vector3(1, 0, 0) : new Vector3(0, 1, 0);
        x.sub(z.clone().multiplyScalar(x.dot(z)));
    }
    x.normalize();
    const y = new Vector3().crossVectors(z, x);
    return { x, y, z };
}

/**
 * Local-to-parent matrix of an `IFCAXIS2PLACEMENT3D`: location 0, axis 1, ref direction 2.
 * An `IFCAXIS2PLACEMENT2D` is read as a placement in the XY plane.
 */
export function readAxis2Placement3D(resolver: IEntityResolver, id: EntityId | undefined): Matrix4 {
    if (id === undefined) return new Matrix4();

    const placement = resolver.resolveRef(id);
    if (placement.type === "IFCAXIS2PLACEMENT2D") {
        return matrix4From2D(readAxis2Placement2D(resolver, id));
    }
    if (placement.type !== "IFCAXIS2PLACEMENT3D") {
        throw GeometryError.geometry(`#${id} is ${placement.type}, expected IFCAXIS2PLACEMENT3D`);
    }

    const location = readCartesianPoint(resolver, EntityAttributes.requireRef(placement, 0));
    const axisRef = EntityAttributes.getRef(placement, 1);
    const refDirectionRef = EntityAttributes.getRef(placement, 2);
    const axis = axisRef === undefined ? new Vector3(0, 0, 1) : readDirection(resolver, axisRef);
    const refDirection = refDirectionRef === undefined ? new Vector3(1, 0, 0) : readDirection(resolver, refDirectionRef);

    const { x, y, z } = orthonormalBasis(axis, refDirection);
    return new Matrix4().makeBasis(x, y, z).setPosition(location);
}

/**
 * Homogeneous 2D matrix of an `IFCAXIS2PLACEMENT2D`: location 0, ref direction 1.
 */
export function readAxis2Placement2D(resolver: IEntityResolver, id: EntityId | undefined): Matrix3 {
    if (id === undefined) return new Matrix3();

    const placement = resolver.resolveRef(id);
    if (placement.type !== "IFCAXIS2PLACEMENT2D") {
        throw GeometryError.geometry(`#${id} is ${placement.type}, expected IFCAXIS2PLACEMENT2D`);
    }

    const location = readCartesianPoint(resolver, EntityAttributes.requireRef(placement, 0));
    const refDirectionRef = EntityAttributes.getRef(placement, 1);
    const direction = refDirectionRef === undefined ? new Vector3(1, 0, 0) : readDirection(resolver, refDirectionRef);
    const x = new Vector2(direction.x, direction.y);
    if (x.lengthSq() === 0) {
        throw GeometryError.geometry(`Ref direction of #${id} has no XY component`);
    }
    x.normalize();

    return new Matrix3().set(x.x, -x.y, location.x, x.y, x.x, location.y, 0, 0, 1);
}

export function readAxis1Placement(resolver: IEntityResolver, id: EntityId): IAxis1Placement {
    const placement = resolver.resolveRef(id);
    if (placement.type !== "IFCAXIS1PLACEMENT") {
        throw GeometryError.geometry(`#${id} is ${placement.type}, expected IFCAXIS1PLACEMENT`);
    }

    const axisRef = EntityAttributes.getRef(placement, 1);
    return {
        location: readCartesianPoint(resolver, EntityAttributes.requireRef(placement, 0)),
        direction: axisRef === undefined ? new Vector3(0, 0, 1) : readDirection(resolver, axisRef),
    };
}

/**
 * World matrix of an `IFCLOCALPLACEMENT` chain: each relative placement applies inside its
 * parent (placement rel to 0, relative placement 1). Other placement kinds are read as the
 * identity.
 */
export function readObjectPlacement(resolver: IEntityResolver, id: EntityId | undefined): Matrix4 {
    const chain: Matrix4[] = [];
    const visited = new Set<EntityId>();

    for (let current = id; current !== undefined; ) {
        if (visited.has(current)) {
            throw GeometryError.geometry(`Placement #${current} is its own ancestor`);
        }
        visited.add(current);

        const placement = resolver.resolveRef(current);
        if (placement.type !== "IFCLOCALPLACEMENT") {
            Logger.debug(`Reading ${placement.type} #${current} as the identity placement`);
            break;
        }
        chain.push(readAxis2Placement3D(resolver, EntityAttributes.getRef(placement, 1)));
        current = EntityAttributes.getRef(placement, 0);
    }

    return chain.reduceRight((world, local) => world.multiply(local), new Matrix4());
}

/**
 * Matrix of an `IFCCARTESIANTRANSFORMATIONOPERATOR3D` (axis1 0, axis2 1, local origin 2,
 * scale 3, axis3 4) or its non-uniform variant (scale2 5, scale3 6).
 */
export function readCartesianTransformation(resolver: IEntityResolver, id: EntityId | undefined): Matrix4 {
    if (id === undefined) return new Matrix4();

    const operator = resolver.resolveRef(id);
    const nonUniform = operator.type === "IFCCARTESIANTRANSFORMATIONOPERATOR3DNONUNIFORM";
    if (operator.type !== "IFCCARTESIANTRANSFORMATIONOPERATOR3D" && !nonUniform) {
        throw GeometryError.geometry(`#${id} is ${operator.type}, expected IFCCARTESIANTRANSFORMATIONOPERATOR3D`);
    }

    const readOptional = (index: number) => {
        const ref = EntityAttributes.getRef(operator, index);
        return ref === undefined ? undefined : readDirection(resolver, ref);
    };
    const axis1 = readOptional(0);
    const axis2 = readOptional(1);
    const axis3 = readOptional(4) ?? new Vector3(0, 0, 1);
    const origin = readCartesianPoint(resolver, EntityAttributes.requireRef(operator, 2));

    const seed = axis1 ?? (axis2 ? new Vector3().crossVectors(axis2, axis3) : new Vector3(1, 0, 0));
    const { x, y, z } = orthonormalBasis(axis3, seed);

    const scale = EntityAttributes.getFloat(operator, 3) ?? 1;
    const scale2 = nonUniform ? (EntityAttributes.getFloat(operator, 5) ?? scale) : scale;
    const scale3 = nonUniform ? (EntityAttributes.getFloat(operator, 6) ?? scale) : scale;

    return new Matrix4()
        .makeBasis(x.multiplyScalar(scale), y.multiplyScalar(scale2), z.multiplyScalar(scale3))
        .setPosition(origin);
}

export function matrix4From2D(matrix: Matrix3): Matrix4 {
    const e = matrix.elements;
    return new Matrix4().set(e[0], e[3], 0, e[6], e[1], e[4], 0, e[7], 0, 0, 1, 0, 0, 0, 0, 1);
}
