// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { GeometryError } from "stepmesh-core";
import { Box3, Matrix3, Matrix4, Vector3 } from "three";

export interface IMeshData {
    positions: Float32Array;
    normals: Float32Array;
    indices: Uint32Array;
}

/**
 * Indexed triangle mesh. Triangles wind counter-clockwise seen from outside; `normals` holds one
 * normal per vertex. Operations return new meshes and never touch the arrays of this one.
 */
export class Mesh {
    static readonly empty = new Mesh(new Float32Array(0), new Float32Array(0), new Uint32Array(0));

    constructor(
        readonly positions: Float32Array,
        readonly normals: Float32Array,
        readonly indices: Uint32Array,
    ) {
        if (positions.length % 3 !== 0 || normals.length !== positions.length) {
            throw GeometryError.geometry(
                `Mesh needs one normal per vertex, got ${positions.length} position and ${normals.length} normal values`,
            );
        }
        if (indices.length % 3 !== 0) {
            throw GeometryError.geometry(`Mesh index count ${indices.length} is not a multiple of 3`);
        }
        const vertexCount = positions.length / 3;
        for (const index of indices) {
            if (index >= vertexCount) {
                throw GeometryError.geometry(`Mesh index ${index} is out of range for ${vertexCount} vertices`);
            }
        }
    }

    get vertexCount() {
        return this.positions.length / 3;
    }

    get triangleCount() {
        return this.indices.length / 3;
    }

    get isEmpty() {
        return this.indices.length === 0;
    }

    /**
     * Positions by `matrix`, normals by its normal matrix. Mirroring transforms flip the winding
     * so triangles keep facing outwards.
     */
    transformed(matrix: Matrix4): Mesh {
        const normalMatrix = new Matrix3().getNormalMatrix(matrix);
        const positions = new Float32Array(this.positions.length);
        const normals = new Float32Array(this.normals.length);
        const v = new Vector3();

        for (let i = 0; i < this.positions.length; i += 3) {
            v.fromArray(this.positions, i).applyMatrix4(matrix).toArray(positions, i);
            v.fromArray(this.normals, i).applyMatrix3(normalMatrix).normalize().toArray(normals, i);
        }

        const indices = matrix.determinant() < 0 ? flipWinding(this.indices) : this.indices.slice();
        return new Mesh(positions, normals, indices);
    }

    scaled(factor: number): Mesh {
        if (factor === 1) return this;
        return this.transformed(new Matrix4().makeScale(factor, factor, factor));
    }

    flipped(): Mesh {
        return new Mesh(this.positions.slice(), this.normals.map((x) => -x), flipWinding(this.indices));
    }

    bounds(): Box3 {
        return new Box3().setFromArray(this.positions);
    }

    /**
     * Divergence-theorem volume; positive for a closed mesh facing outwards.
     */
    signedVolume(): number {
        const a = new Vector3();
        const b = new Vector3();
        const c = new Vector3();
        let volume = 0;
        for (let i = 0; i < this.indices.length; i += 3) {
            a.fromArray(this.positions, this.indices[i] * 3);
            b.fromArray(this.positions, this.indices[i + 1] * 3);
            c.fromArray(this.positions, this.indices[i + 2] * 3);
            volume += a.dot(b.cross(c));
        }
        return volume / 6;
    }

    toMeshData(): IMeshData {
        return {
            positions: this.positions.slice(),
            normals: this.normals.slice(),
            indices: this.indices.slice(),
        };
    }

    static merge(meshes: readonly Mesh[]): Mesh {
        const parts = meshes.filter((x) => !x.isEmpty);
        if (parts.length === 0) return Mesh.empty;
        if (parts.length === 1) return parts[0];

        const vertexValues = parts.reduce((sum, x) => sum + x.positions.length, 0);
        const indexCount = parts.reduce((sum, x) => sum + x.indices.length, 0);
        const positions = new Float32Array(vertexValues);
        const normals = new Float32Array(vertexValues);
        const indices = new Uint32Array(indexCount);

        let vertexOffset = 0;
        let indexOffset = 0;
        for (const part of parts) {
            positions.set(part.positions, vertexOffset * 3);
            normals.set(part.normals, vertexOffset * 3);
            for (let i = 0; i < part.indices.length; i++) {
                indices[indexOffset + i] = part.indices[i] + vertexOffset;
            }
            vertexOffset += part.vertexCount;
            indexOffset += part.indices.length;
        }

        return new Mesh(positions, normals, indices);
    }
}

function flipWinding(indices: Uint32Array): Uint32Array {
    const flipped = indices.slice();
    for (let i = 0; i < flipped.length; i += 3) {
        flipped[i + 1] = indices[i + 2];
        flipped[i + 2] = indices[i + 1];
    }
    return flipped;
}

export class MeshBuilder {
    private readonly positions: number[] = [];
    private readonly normals: number[] = [];
    private readonly indices: number[] = [];

    get vertexCount() {
        return this.positions.length / 3;
    }

    get triangleCount() {
        return this.indices.length / 3;
    }

    addVertex(position: Vector3, normal: Vector3): number {
        this.positions.push(position.x, position.y, position.z);
        this.normals.push(normal.x, normal.y, normal.z);
        return this.vertexCount - 1;
    }

    addTriangle(a: number, b: number, c: number) {
        this.indices.push(a, b, c);
    }

    /**
     * Polygon sharing one flat normal. `triangles` index into `points`.
     */
    addFace(points: readonly Vector3[], triangles: readonly number[], normal: Vector3, reverse = false) {
        const base = this.vertexCount;
        for (const point of points) {
            this.addVertex(point, normal);
        }
        for (let i = 0; i < triangles.length; i += 3) {
            if (reverse) {
                this.addTriangle(base + triangles[i], base + triangles[i + 2], base + triangles[i + 1]);
            } else {
                this.addTriangle(base + triangles[i], base + triangles[i + 1], base + triangles[i + 2]);
            }
        }
    }

    addFlatTriangle(a: Vector3, b: Vector3, c: Vector3) {
        const normal = new Vector3().subVectors(b, a).cross(new Vector3().subVectors(c, a)).normalize();
        this.addFace([a, b, c], [0, 1, 2], normal);
    }

    addQuad(a: Vector3, b: Vector3, c: Vector3, d: Vector3, normal: Vector3) {
        this.addFace([a, b, c, d], [0, 1, 2, 0, 2, 3], normal);
    }

    build(): Mesh {
        if (this.indices.length === 0) return Mesh.empty;
        return new Mesh(
            new Float32Array(this.positions),
            new Float32Array(this.normals),
            new Uint32Array(this.indices),
        );
    }
}
