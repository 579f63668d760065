// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { GeometryError } from "stepmesh-core";
import { ShapeUtils, Vector2, type Matrix3 } from "three";
import { calculateCircleSegments, stripClosingPoint } from "./triangulation";

export type ProfileKind = "rectangle" | "circle" | "arbitrary";

/**
 * Closed planar cross-section in the XY plane. The outer loop runs counter-clockwise and every
 * hole clockwise, without closing duplicates.
 */
export class Profile2D {
    readonly outer: readonly Vector2[];
    readonly holes: readonly (readonly Vector2[])[];

    private constructor(
        readonly kind: ProfileKind,
        outer: readonly Vector2[],
        holes: readonly (readonly Vector2[])[],
    ) {
        this.outer = orient(stripClosingPoint(outer), false);
        if (this.outer.length < 3) {
            throw GeometryError.profile(`Profile needs at least 3 points, got ${this.outer.length}`);
        }
        this.holes = holes.map((x) => {
            const hole = orient(stripClosingPoint(x), true);
            if (hole.length < 3) {
                throw GeometryError.profile(`Profile hole needs at least 3 points, got ${hole.length}`);
            }
            return hole;
        });
    }

    get loops(): readonly (readonly Vector2[])[] {
        return [this.outer, ...this.holes];
    }

    static rectangle(width: number, height: number): Profile2D {
        requirePositive(width, "Rectangle width");
        requirePositive(height, "Rectangle height");
        const hw = width / 2;
        const hh = height / 2;
        return new Profile2D(
            "rectangle",
            [new Vector2(-hw, -hh), new Vector2(hw, -hh), new Vector2(hw, hh), new Vector2(-hw, hh)],
            [],
        );
    }

    static circle(radius: number, segments = calculateCircleSegments(radius)): Profile2D {
        requirePositive(radius, "Circle radius");
        return new Profile2D("circle", circlePoints(radius, segments), []);
    }

    static hollowCircle(radius: number, innerRadius: number): Profile2D {
        requirePositive(radius, "Circle radius");
        if (!(innerRadius > 0 && innerRadius < radius)) {
            throw GeometryError.profile(`Inner radius ${innerRadius} must lie between 0 and ${radius}`);
        }
        return new Profile2D("circle", circlePoints(radius, calculateCircleSegments(radius)), [
            circlePoints(innerRadius, calculateCircleSegments(innerRadius)),
        ]);
    }

    static arbitrary(points: readonly Vector2[], holes: readonly (readonly Vector2[])[] = []): Profile2D {
        return new Profile2D("arbitrary", points, holes);
    }

    withHoles(holes: readonly (readonly Vector2[])[]): Profile2D {
        return new Profile2D(this.kind, this.outer, [...this.holes, ...holes]);
    }

    transformed(matrix: Matrix3): Profile2D {
        const apply = (loop: readonly Vector2[]) => loop.map((p) => p.clone().applyMatrix3(matrix));
        return new Profile2D(this.kind, apply(this.outer), this.holes.map(apply));
    }

    area(): number {
        const holes = this.holes.reduce((sum, x) => sum + Math.abs(ShapeUtils.area([...x])), 0);
        return Math.abs(ShapeUtils.area([...this.outer])) - holes;
    }
}

function orient(points: Vector2[], clockwise: boolean): Vector2[] {
    return ShapeUtils.isClockWise(points) === clockwise ? points : points.reverse();
}

function circlePoints(radius: number, segments: number): Vector2[] {
    const count = Math.max(3, Math.floor(segments));
    const points: Vector2[] = [];
    for (let i = 0; i < count; i++) {
        const angle = (2 * Math.PI * i) / count;
        points.push(new Vector2(radius * Math.cos(angle), radius * Math.sin(angle)));
    }
    return points;
}

function requirePositive(value: number, label: string) {
    if (!(value > 0) || !Number.isFinite(value)) {
        throw GeometryError.profile(`${label} must be positive, got ${value}`);
    }
}
