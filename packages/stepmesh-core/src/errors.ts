// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

export type EntityId = number;

export class StepError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Structural failure in the STEP text: a malformed record prefix or an unrecognised token.
 * `offset` is the UTF-8 byte offset in the file where the offending construct starts.
 */
export class StepSyntaxError extends StepError {
    constructor(
        message: string,
        readonly offset: number,
    ) {
        super(`${message} at offset ${offset}`);
    }

    /**
     * Error at string index `index` of `source`, reported with its byte offset.
     */
    static at(message: string, source: string, index: number) {
        return new StepSyntaxError(message, byteOffset(source, index));
    }
}

const utf8 = new TextEncoder();

export function byteOffset(source: string, index: number) {
    return utf8.encode(source.slice(0, index)).length;
}

export class EntityDecodeError extends StepError {
    constructor(
        readonly entityId: EntityId,
        readonly syntaxError: StepSyntaxError,
    ) {
        super(`Failed to decode #${entityId}: ${syntaxError.message}`, { cause: syntaxError });
    }
}

export class EntityNotFoundError extends StepError {
    constructor(readonly entityId: EntityId) {
        super(`Entity not found: #${entityId}`);
    }
}

export class InvalidAttributeError extends StepError {
    constructor(
        readonly index: number,
        readonly detail: string,
    ) {
        super(`Invalid attribute at index ${index}: ${detail}`);
    }
}

export type GeometryErrorKind = "geometry" | "profile" | "triangulation" | "csg" | "unsupportedType";

export class GeometryError extends StepError {
    constructor(
        readonly kind: GeometryErrorKind,
        message: string,
    ) {
        super(message);
    }

    static geometry(message: string) {
        return new GeometryError("geometry", `Geometry error: ${message}`);
    }

    static profile(message: string) {
        return new GeometryError("profile", `Profile error: ${message}`);
    }

    static triangulation(message: string) {
        return new GeometryError("triangulation", `Triangulation error: ${message}`);
    }

    static csg(message: string) {
        return new GeometryError("csg", `CSG error: ${message}`);
    }

    static unsupportedType(typeName: string) {
        return new UnsupportedTypeError(typeName);
    }
}

export class UnsupportedTypeError extends GeometryError {
    constructor(readonly typeName: string) {
        super("unsupportedType", `Unsupported geometry type: ${typeName}`);
    }
}
