// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import type { EntityId, StepSyntaxError } from "stepmesh-core";
import type { EntityStore, IEntityResolver } from "./entityStore";
import type { PropertyIndex, PropertySet } from "./propertyReader";
import type { SpatialTree } from "./spatialTree";
import type { IDecodedEntity, IRawEntity, RefValue } from "./stepEntity";
import type { IStepHeader } from "./stepHeader";
import type { IUnitContext } from "./units";

export interface IStepModelParts {
    header: IStepHeader;
    units: IUnitContext;
    errors: readonly StepSyntaxError[];
    spatialTree?: SpatialTree;
    properties?: PropertyIndex;
}

/**
 * Parse result: entity lookup, the spatial tree and the property index of one file. Entities
 * decode on first access.
 */
export class StepModel implements IEntityResolver {
    readonly header: IStepHeader;
    readonly units: IUnitContext;
    /** Malformed records skipped while scanning. */
    readonly errors: readonly StepSyntaxError[];
    readonly spatialTree: SpatialTree | undefined;
    readonly properties: PropertyIndex | undefined;

    constructor(
        readonly store: EntityStore,
        parts: IStepModelParts,
    ) {
        this.header = parts.header;
        this.units = parts.units;
        this.errors = parts.errors;
        this.spatialTree = parts.spatialTree;
        this.properties = parts.properties;
    }

    get size() {
        return this.store.size;
    }

    get schemas() {
        return this.header.schemas;
    }

    get unitScale() {
        return this.units.lengthScale;
    }

    get(id: EntityId): IDecodedEntity | undefined {
        return this.store.get(id);
    }

    has(id: EntityId) {
        return this.store.has(id);
    }

    getRaw(id: EntityId): IRawEntity | undefined {
        return this.store.getRaw(id);
    }

    ids() {
        return this.store.ids();
    }

    findByTypeName(type: string): readonly EntityId[] {
        return this.store.findByTypeName(type);
    }

    typeNames() {
        return this.store.typeNames();
    }

    countByType() {
        return this.store.countByType();
    }

    resolveRef(ref: EntityId | RefValue): IDecodedEntity {
        return this.store.resolveRef(ref);
    }

    resolveRefs(refs: readonly (EntityId | RefValue)[]): IDecodedEntity[] {
        return this.store.resolveRefs(refs);
    }

    rawText(id: EntityId) {
        return this.store.rawText(id);
    }

    propertySets(elementId: EntityId): readonly PropertySet[] {
        return this.properties?.get(elementId) ?? [];
    }
}
