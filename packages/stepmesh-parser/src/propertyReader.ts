// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { Logger, StepError, type EntityId } from "stepmesh-core";
import type { IEntityResolver } from "./entityStore";
import { asList, asRef, asRefList, EntityAttributes, type AttributeValue, type IDecodedEntity } from "./stepEntity";
import { DEFAULT_UNITS, formatUnit, type IUnitContext } from "./units";

const IFC_REL_DEFINES_BY_PROPERTIES = "IFCRELDEFINESBYPROPERTIES";

export type PropertyScalar = string | number | boolean | null;

export interface IProperty {
    readonly name: string;
    readonly value: PropertyScalar;
    /** Measure or value type, e.g. `IFCLENGTHMEASURE` or `IFCLABEL`. */
    readonly valueType: string | undefined;
    readonly unit: string | undefined;
}

export type QuantityKind = "length" | "area" | "volume" | "count" | "weight" | "time";

export type Quantity =
    | {
          readonly kind: QuantityKind;
          readonly name: string;
          readonly value: number;
          readonly unit: string;
          readonly entityType: string;
      }
    | {
          readonly kind: "untyped";
          readonly name: string;
          readonly value: PropertyScalar;
          readonly entityType: string;
      };

export type PropertySet =
    | { readonly kind: "properties"; readonly id: EntityId; readonly name: string; readonly properties: readonly IProperty[] }
    | { readonly kind: "quantities"; readonly id: EntityId; readonly name: string; readonly quantities: readonly Quantity[] };

export interface IElementAttributes {
    readonly id: EntityId;
    readonly entityType: string;
    readonly globalId: string | undefined;
    readonly name: string | undefined;
    readonly description: string | undefined;
    readonly objectType: string | undefined;
    readonly tag: string | undefined;
}

const QUANTITY_KINDS: Readonly<Record<string, { kind: QuantityKind; unitType?: string; fallbackUnit: string }>> = {
    IFCQUANTITYLENGTH: { kind: "length", unitType: "LENGTHUNIT", fallbackUnit: "m" },
    IFCQUANTITYAREA: { kind: "area", unitType: "AREAUNIT", fallbackUnit: "m²" },
    IFCQUANTITYVOLUME: { kind: "volume", unitType: "VOLUMEUNIT", fallbackUnit: "m³" },
    IFCQUANTITYCOUNT: { kind: "count", fallbackUnit: "" },
    IFCQUANTITYWEIGHT: { kind: "weight", unitType: "MASSUNIT", fallbackUnit: "kg" },
    IFCQUANTITYTIME: { kind: "time", unitType: "TIMEUNIT", fallbackUnit: "s" },
};

const MEASURE_UNIT_TYPES: Readonly<Record<string, string>> = {
    IFCLENGTHMEASURE: "LENGTHUNIT",
    IFCPOSITIVELENGTHMEASURE: "LENGTHUNIT",
    IFCNONNEGATIVELENGTHMEASURE: "LENGTHUNIT",
    IFCAREAMEASURE: "AREAUNIT",
    IFCVOLUMEMEASURE: "VOLUMEUNIT",
    IFCPLANEANGLEMEASURE: "PLANEANGLEUNIT",
    IFCPOSITIVEPLANEANGLEMEASURE: "PLANEANGLEUNIT",
    IFCMASSMEASURE: "MASSUNIT",
    IFCTIMEMEASURE: "TIMEUNIT",
    IFCTHERMODYNAMICTEMPERATUREMEASURE: "THERMODYNAMICTEMPERATUREUNIT",
};

export class PropertyIndex {
    constructor(private readonly byElement: ReadonlyMap<EntityId, readonly PropertySet[]>) {}

    get size() {
        return this.byElement.size;
    }

    get(elementId: EntityId): readonly PropertySet[] {
        return this.byElement.get(elementId) ?? [];
    }

    elementIds(): EntityId[] {
        return [...this.byElement.keys()];
    }

    find(elementId: EntityId, setName: string, name: string): IProperty | Quantity | undefined {
        for (const set of this.get(elementId)) {
            if (set.name !== setName) continue;
            const values: readonly (IProperty | Quantity)[] = set.kind === "properties" ? set.properties : set.quantities;
            const found = values.find((x) => x.name === name);
            if (found) return found;
        }
        return undefined;
    }
}

export class PropertyReader {
    /**
     * Attaches every property set and element quantity reachable through defines-by-properties
     * relations, in relation order. Sets that fail to decode are logged and left out.
     */
    static read(resolver: IEntityResolver, units: IUnitContext = DEFAULT_UNITS): PropertyIndex {
        const byElement = new Map<EntityId, PropertySet[]>();
        const cache = new Map<EntityId, PropertySet | undefined>();

        for (const relationId of resolver.findByTypeName(IFC_REL_DEFINES_BY_PROPERTIES)) {
            const relation = tryRead(() => resolver.resolveRef(relationId), relationId);
            if (!relation) continue;

            const definition = relation.attributes[5];
            const single = asRef(definition);
            const setIds = single !== undefined ? [single] : asRefList(definition);

            for (const setId of setIds) {
                if (!cache.has(setId)) {
                    cache.set(
                        setId,
                        tryRead(() => readPropertySet(resolver, resolver.resolveRef(setId), units), setId),
                    );
                }
                const set = cache.get(setId);
                if (!set) continue;

                for (const elementId of EntityAttributes.getRefs(relation, 4)) {
                    const sets = byElement.get(elementId);
                    if (sets) {
                        sets.push(set);
                    } else {
                        byElement.set(elementId, [set]);
                    }
                }
            }
        }

        return new PropertyIndex(byElement);
    }
}

export function readPropertySet(
    resolver: IEntityResolver,
    entity: IDecodedEntity,
    units: IUnitContext = DEFAULT_UNITS,
): PropertySet | undefined {
    const name = EntityAttributes.getString(entity, 2) ?? "";

    if (entity.type === "IFCPROPERTYSET") {
        const properties = EntityAttributes.getRefs(entity, 4).map((ref) =>
            readProperty(resolver, resolver.resolveRef(ref), units),
        );
        return { kind: "properties", id: entity.id, name, properties };
    }

    if (entity.type === "IFCELEMENTQUANTITY") {
        const quantities = EntityAttributes.getRefs(entity, 5).map((ref) =>
            readQuantity(resolver, resolver.resolveRef(ref), units),
        );
        return { kind: "quantities", id: entity.id, name, quantities };
    }

    return undefined;
}

export function readProperty(resolver: IEntityResolver, entity: IDecodedEntity, units: IUnitContext): IProperty {
    const name = EntityAttributes.getString(entity, 0) ?? "";

    switch (entity.type) {
        case "IFCPROPERTYSINGLEVALUE": {
            const nominal = entity.attributes[2];
            const valueType = nominal?.kind === "typed" ? nominal.name : undefined;
            return { name, value: toScalar(nominal), valueType, unit: propertyUnit(resolver, entity, 3, valueType, units) };
        }
        case "IFCPROPERTYENUMERATEDVALUE":
            return { name, value: joinScalars(asList(entity.attributes[2])), valueType: undefined, unit: undefined };
        case "IFCPROPERTYBOUNDEDVALUE": {
            const upper = entity.attributes[2];
            const valueType = upper?.kind === "typed" ? upper.name : undefined;
            const lower = toScalar(entity.attributes[3]);
            return {
                name,
                value: `${lower ?? ""} - ${toScalar(upper) ?? ""}`,
                valueType,
                unit: propertyUnit(resolver, entity, 4, valueType, units),
            };
        }
        case "IFCPROPERTYLISTVALUE": {
            const values = asList(entity.attributes[2]);
            const first = values?.[0];
            const valueType = first?.kind === "typed" ? first.name : undefined;
            return {
                name,
                value: joinScalars(values),
                valueType,
                unit: propertyUnit(resolver, entity, 3, valueType, units),
            };
        }
        default:
            return { name, value: null, valueType: entity.type, unit: undefined };
    }
}

export function readQuantity(resolver: IEntityResolver, entity: IDecodedEntity, units: IUnitContext): Quantity {
    const name = EntityAttributes.getString(entity, 0) ?? "";
    const known = QUANTITY_KINDS[entity.type];
    const value = EntityAttributes.getFloat(entity, 3);

    if (!known || value === undefined) {
        return { kind: "untyped", name, value: toScalar(entity.attributes[3]), entityType: entity.type };
    }

    const unitRef = EntityAttributes.getRef(entity, 2);
    const unit =
        unitRef !== undefined
            ? formatUnit(resolver, unitRef)
            : ((known.unitType && units.labels.get(known.unitType)) ?? known.fallbackUnit);

    return { kind: known.kind, name, value, unit, entityType: entity.type };
}

export function readElementAttributes(resolver: IEntityResolver, id: EntityId): IElementAttributes {
    const entity = resolver.resolveRef(id);
    return {
        id,
        entityType: entity.type,
        globalId: EntityAttributes.getString(entity, 0),
        name: EntityAttributes.getString(entity, 2),
        description: EntityAttributes.getString(entity, 3),
        objectType: EntityAttributes.getString(entity, 4),
        tag: EntityAttributes.getString(entity, 7),
    };
}

/**
 * Scalar view of an attribute: typed values unwrap, logical enums become booleans (unknown is
 * null) and lists join with `, `.
 */
export function toScalar(value: AttributeValue | undefined): PropertyScalar {
    if (value === undefined) return null;

    switch (value.kind) {
        case "typed":
            return value.args.length === 1 ? toScalar(value.args[0]) : joinScalars(value.args);
        case "string":
            return value.value;
        case "integer":
        case "float":
            return value.value;
        case "enum":
            if (value.value === "T" || value.value === "TRUE") return true;
            if (value.value === "F" || value.value === "FALSE") return false;
            if (value.value === "U" || value.value === "UNKNOWN") return null;
            return value.value;
        case "list":
            return joinScalars(value.items);
        case "ref":
            return `#${value.id}`;
        case "null":
        case "derived":
            return null;
    }
}

function joinScalars(values: readonly AttributeValue[] | undefined): string {
    return (values ?? [])
        .map(toScalar)
        .filter((x) => x !== null)
        .map(String)
        .join(", ");
}

function propertyUnit(
    resolver: IEntityResolver,
    entity: IDecodedEntity,
    index: number,
    valueType: string | undefined,
    units: IUnitContext,
): string | undefined {
    const unitRef = EntityAttributes.getRef(entity, index);
    if (unitRef !== undefined) return formatUnit(resolver, unitRef);

    const unitType = valueType === undefined ? undefined : MEASURE_UNIT_TYPES[valueType];
    return unitType === undefined ? undefined : units.labels.get(unitType);
}

function tryRead<T>(read: () => T, id: EntityId): T | undefined {
    try {
        return read();
    } catch (error) {
        if (!(error instanceof StepError)) throw error;
        Logger.warn(`Skipping property definition #${id}: ${error.message}`);
        return undefined;
    }
}
