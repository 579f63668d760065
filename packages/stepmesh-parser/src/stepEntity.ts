// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { InvalidAttributeError, type EntityId } from "stepmesh-core";

/**
 * Location of one `#id=TYPE(...);` record in the source text. The argument list is kept as an
 * undecoded span, parentheses included. Offsets are string indices into the source.
 */
export interface IRawEntity {
    readonly id: EntityId;
    readonly type: string;
    readonly offset: number;
    readonly argsStart: number;
    readonly argsEnd: number;
}

export type RefValue = { readonly kind: "ref"; readonly id: EntityId };
export type StringValue = { readonly kind: "string"; readonly value: string };
export type IntegerValue = { readonly kind: "integer"; readonly value: number };
export type FloatValue = { readonly kind: "float"; readonly value: number };
export type EnumValue = { readonly kind: "enum"; readonly value: string };
export type ListValue = { readonly kind: "list"; readonly items: readonly AttributeValue[] };
export type TypedValue = { readonly kind: "typed"; readonly name: string; readonly args: readonly AttributeValue[] };
export type NullValue = { readonly kind: "null" };
export type DerivedValue = { readonly kind: "derived" };

/**
 * A decoded attribute. References stay as ids; nothing here ever points at another decoded
 * entity.
 */
export type AttributeValue =
    | RefValue
    | StringValue
    | IntegerValue
    | FloatValue
    | EnumValue
    | ListValue
    | TypedValue
    | NullValue
    | DerivedValue;

export interface IDecodedEntity {
    readonly id: EntityId;
    readonly type: string;
    readonly attributes: readonly AttributeValue[];
}

export function asRef(value: AttributeValue | undefined): EntityId | undefined {
    return value?.kind === "ref" ? value.id : undefined;
}

export function asString(value: AttributeValue | undefined): string | undefined {
    if (value?.kind === "string") return value.value;
    if (value?.kind === "typed" && value.args.length === 1) return asString(value.args[0]);
    return undefined;
}

export function asFloat(value: AttributeValue | undefined): number | undefined {
    if (value?.kind === "float" || value?.kind === "integer") return value.value;
    if (value?.kind === "typed" && value.args.length === 1) return asFloat(value.args[0]);
    return undefined;
}

export function asInteger(value: AttributeValue | undefined): number | undefined {
    if (value?.kind === "integer") return value.value;
    if (value?.kind === "typed" && value.args.length === 1) return asInteger(value.args[0]);
    return undefined;
}

export function asEnum(value: AttributeValue | undefined): string | undefined {
    return value?.kind === "enum" ? value.value : undefined;
}

export function asBool(value: AttributeValue | undefined): boolean | undefined {
    if (value?.kind === "typed" && value.args.length === 1) return asBool(value.args[0]);
    switch (asEnum(value)) {
        case "T":
        case "TRUE":
            return true;
        case "F":
        case "FALSE":
            return false;
        default:
            return undefined;
    }
}

export function asList(value: AttributeValue | undefined): readonly AttributeValue[] | undefined {
    return value?.kind === "list" ? value.items : undefined;
}

export function asRefList(value: AttributeValue | undefined): EntityId[] {
    return (asList(value) ?? []).map(asRef).filter((x): x is EntityId => x !== undefined);
}

export function asFloatList(value: AttributeValue | undefined): number[] {
    return (asList(value) ?? []).map(asFloat).filter((x): x is number => x !== undefined);
}

export function isNull(value: AttributeValue | undefined) {
    return value === undefined || value.kind === "null" || value.kind === "derived";
}

/**
 * Positional accessors over a decoded entity. The `require*` variants throw
 * {@link InvalidAttributeError} tagged with the attribute index.
 */
export class EntityAttributes {
    static get(entity: IDecodedEntity, index: number): AttributeValue | undefined {
        return entity.attributes[index];
    }

    static getRef(entity: IDecodedEntity, index: number) {
        return asRef(entity.attributes[index]);
    }

    static getRefs(entity: IDecodedEntity, index: number) {
        return asRefList(entity.attributes[index]);
    }

    static getString(entity: IDecodedEntity, index: number) {
        return asString(entity.attributes[index]);
    }

    static getFloat(entity: IDecodedEntity, index: number) {
        return asFloat(entity.attributes[index]);
    }

    static getInteger(entity: IDecodedEntity, index: number) {
        return asInteger(entity.attributes[index]);
    }

    static getBool(entity: IDecodedEntity, index: number) {
        return asBool(entity.attributes[index]);
    }

    static getEnum(entity: IDecodedEntity, index: number) {
        return asEnum(entity.attributes[index]);
    }

    static getList(entity: IDecodedEntity, index: number) {
        return asList(entity.attributes[index]);
    }

    static requireRef(entity: IDecodedEntity, index: number): EntityId {
        const ref = asRef(entity.attributes[index]);
        if (ref === undefined) {
            throw new InvalidAttributeError(index, `${entity.type} #${entity.id} expects an entity reference`);
        }
        return ref;
    }

    static requireFloat(entity: IDecodedEntity, index: number): number {
        const value = asFloat(entity.attributes[index]);
        if (value === undefined || !Number.isFinite(value)) {
            throw new InvalidAttributeError(index, `${entity.type} #${entity.id} expects a number`);
        }
        return value;
    }

    static requireList(entity: IDecodedEntity, index: number): readonly AttributeValue[] {
        const list = asList(entity.attributes[index]);
        if (list === undefined) {
            throw new InvalidAttributeError(index, `${entity.type} #${entity.id} expects a list`);
        }
        return list;
    }
}
