// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { EntityNotFoundError, type EntityId } from "stepmesh-core";
import { EntityDecoder } from "./entityDecoder";
import type { IDecodedEntity, IRawEntity, RefValue } from "./stepEntity";

/**
 * Read access to entities by id and type. Every cross-entity reference is followed through
 * {@link IEntityResolver.resolveRef}, one level at a time.
 */
export interface IEntityResolver {
    get(id: EntityId): IDecodedEntity | undefined;
    has(id: EntityId): boolean;
    findByTypeName(type: string): readonly EntityId[];
    resolveRef(ref: EntityId | RefValue): IDecodedEntity;
}

export class EntityStore implements IEntityResolver {
    private readonly entities = new Map<EntityId, IRawEntity>();
    private readonly typeIndex = new Map<string, EntityId[]>();
    private readonly decoder: EntityDecoder;

    constructor(readonly source: string) {
        this.decoder = new EntityDecoder(source);
    }

    add(raw: IRawEntity) {
        this.entities.set(raw.id, raw);
        const ids = this.typeIndex.get(raw.type);
        if (ids) {
            ids.push(raw.id);
        } else {
            this.typeIndex.set(raw.type, [raw.id]);
        }
    }

    get size() {
        return this.entities.size;
    }

    get decodedCount() {
        return this.decoder.decodedCount;
    }

    has(id: EntityId) {
        return this.entities.has(id);
    }

    ids(): IterableIterator<EntityId> {
        return this.entities.keys();
    }

    getRaw(id: EntityId): IRawEntity | undefined {
        return this.entities.get(id);
    }

    /**
     * Decodes on first access. Throws `EntityDecodeError` when the record's arguments are
     * malformed.
     */
    get(id: EntityId): IDecodedEntity | undefined {
        const raw = this.entities.get(id);
        return raw && this.decoder.decode(raw);
    }

    findByTypeName(type: string): readonly EntityId[] {
        return this.typeIndex.get(type) ?? [];
    }

    typeNames(): string[] {
        return [...this.typeIndex.keys()];
    }

    countByType(): Map<string, number> {
        return new Map([...this.typeIndex].map(([type, ids]) => [type, ids.length]));
    }

    resolveRef(ref: EntityId | RefValue): IDecodedEntity {
        const id = typeof ref === "number" ? ref : ref.id;
        const entity = this.get(id);
        if (!entity) {
            throw new EntityNotFoundError(id);
        }
        return entity;
    }

    resolveRefs(refs: readonly (EntityId | RefValue)[]): IDecodedEntity[] {
        return refs.map((x) => this.resolveRef(x));
    }

    rawText(id: EntityId): string | undefined {
        const raw = this.entities.get(id);
        if (!raw) return undefined;
        return `${this.source.slice(raw.offset, raw.argsEnd)};`;
    }
}
