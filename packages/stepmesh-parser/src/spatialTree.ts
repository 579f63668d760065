// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { Logger, StepError, type EntityId } from "stepmesh-core";
import type { EntityStore, IEntityResolver } from "./entityStore";
import { EntityAttributes, type IDecodedEntity } from "./stepEntity";

const IFC_REL_AGGREGATES = "IFCRELAGGREGATES";
const IFC_REL_CONTAINED = "IFCRELCONTAINEDINSPATIALSTRUCTURE";
const IFC_PROJECT = "IFCPROJECT";

export type SpatialNodeKind =
    | "project"
    | "site"
    | "building"
    | "storey"
    | "space"
    | "facility"
    | "facilityPart"
    | "element";

const NODE_KINDS: Readonly<Record<string, SpatialNodeKind>> = {
    IFCPROJECT: "project",
    IFCSITE: "site",
    IFCBUILDING: "building",
    IFCBUILDINGSTOREY: "storey",
    IFCSPACE: "space",
    IFCFACILITY: "facility",
    IFCBRIDGE: "facility",
    IFCROAD: "facility",
    IFCRAILWAY: "facility",
    IFCMARINEFACILITY: "facility",
    IFCFACILITYPART: "facilityPart",
    IFCBRIDGEPART: "facilityPart",
    IFCROADPART: "facilityPart",
    IFCRAILWAYPART: "facilityPart",
    IFCMARINEPART: "facilityPart",
};

export interface ISpatialNode {
    readonly id: EntityId;
    readonly kind: SpatialNodeKind;
    readonly entityType: string;
    readonly name: string;
    /** Storey elevation in file units. */
    readonly elevation: number | undefined;
    readonly hasGeometry: boolean;
    readonly parent: EntityId | undefined;
    readonly children: readonly EntityId[];
}

/**
 * A parent claim on a child that already has a different parent, or that would close a cycle.
 * The claim is not applied.
 */
export interface ISpatialConflict {
    readonly child: EntityId;
    /** Undefined when the claim was rejected for closing a cycle. */
    readonly keptParent: EntityId | undefined;
    readonly rejectedParent: EntityId;
    readonly relation: EntityId;
}

export interface IStoreyInfo {
    readonly id: EntityId;
    readonly name: string;
    readonly elevation: number;
    readonly elementCount: number;
}

interface IRelation {
    id: EntityId;
    offset: number;
    parent: EntityId;
    children: EntityId[];
}

export class SpatialTree {
    constructor(
        readonly root: EntityId | undefined,
        private readonly nodes: ReadonlyMap<EntityId, ISpatialNode>,
        readonly conflicts: readonly ISpatialConflict[],
    ) {}

    get size() {
        return this.nodes.size;
    }

    node(id: EntityId): ISpatialNode | undefined {
        return this.nodes.get(id);
    }

    children(id: EntityId): readonly EntityId[] {
        return this.nodes.get(id)?.children ?? [];
    }

    parent(id: EntityId): EntityId | undefined {
        return this.nodes.get(id)?.parent;
    }

    /**
     * Depth-first, parent before children, in relation order.
     */
    *descendants(id: EntityId): Generator<ISpatialNode> {
        const stack = [...this.children(id)].reverse();
        while (stack.length > 0) {
            const current = stack.pop();
            const node = current === undefined ? undefined : this.nodes.get(current);
            if (!node) continue;
            yield node;
            for (let i = node.children.length - 1; i >= 0; i--) {
                stack.push(node.children[i]);
            }
        }
    }

    storeys(): IStoreyInfo[] {
        return [...this.nodes.values()]
            .filter((x) => x.kind === "storey")
            .map((x) => ({
                id: x.id,
                name: x.name,
                elevation: x.elevation ?? 0,
                elementCount: this.elementsInStorey(x.id).length,
            }))
            .sort((a, b) => a.elevation - b.elevation);
    }

    elementsInStorey(storeyId: EntityId): EntityId[] {
        return [...this.descendants(storeyId)].filter((x) => x.kind === "element").map((x) => x.id);
    }

    containingStorey(id: EntityId): EntityId | undefined {
        for (let current = this.parent(id); current !== undefined; current = this.parent(current)) {
            if (this.nodes.get(current)?.kind === "storey") return current;
        }
        return undefined;
    }

    /**
     * Case-insensitive match on node name or entity type.
     */
    search(text: string): ISpatialNode[] {
        const query = text.trim().toLowerCase();
        if (query.length === 0) return [];
        return [...this.nodes.values()].filter(
            (x) => x.name.toLowerCase().includes(query) || x.entityType.toLowerCase().includes(query),
        );
    }
}

export class SpatialTreeBuilder {
    /**
     * Builds the containment tree from aggregation and containment relations. The first claim
     * on a child in file order wins; later claims by other parents, and claims that would close
     * a cycle, are reported as conflicts.
     */
    static build(store: EntityStore): SpatialTree {
        const relations = collectRelations(store);
        const parents = new Map<EntityId, EntityId>();
        const children = new Map<EntityId, EntityId[]>();
        const conflicts: ISpatialConflict[] = [];

        for (const relation of relations) {
            for (const child of relation.children) {
                const existing = parents.get(child);
                if (existing === relation.parent) continue;

                if (existing !== undefined || createsCycle(parents, relation.parent, child)) {
                    conflicts.push({ child, keptParent: existing, rejectedParent: relation.parent, relation: relation.id });
                    Logger.warn(
                        existing === undefined
                            ? `#${relation.id} would place #${child} under its own descendant #${relation.parent}`
                            : `#${relation.id} places #${child} under #${relation.parent}, already placed under #${existing}`,
                    );
                    continue;
                }

                parents.set(child, relation.parent);
                const siblings = children.get(relation.parent);
                if (siblings) {
                    siblings.push(child);
                } else {
                    children.set(relation.parent, [child]);
                }
            }
        }

        const nodes = new Map<EntityId, ISpatialNode>();
        const ids = new Set<EntityId>([...parents.keys(), ...children.keys()]);
        const root = store.findByTypeName(IFC_PROJECT)[0];
        if (root !== undefined) ids.add(root);

        for (const id of ids) {
            nodes.set(id, createNode(store, id, parents.get(id), children.get(id) ?? []));
        }

        return new SpatialTree(root, nodes, conflicts);
    }
}

function collectRelations(store: EntityStore): IRelation[] {
    const relations: IRelation[] = [];

    for (const type of [IFC_REL_AGGREGATES, IFC_REL_CONTAINED]) {
        for (const id of store.findByTypeName(type)) {
            const relation = tryDecode(store, id);
            if (!relation) continue;

            const parent = EntityAttributes.getRef(relation, type === IFC_REL_AGGREGATES ? 4 : 5);
            const related = EntityAttributes.getRefs(relation, type === IFC_REL_AGGREGATES ? 5 : 4);
            if (parent === undefined) continue;

            relations.push({ id, offset: store.getRaw(id)?.offset ?? 0, parent, children: related });
        }
    }

    return relations.sort((a, b) => a.offset - b.offset);
}

function createsCycle(parents: ReadonlyMap<EntityId, EntityId>, parent: EntityId, child: EntityId) {
    const visited = new Set<EntityId>();
    for (let current: EntityId | undefined = parent; current !== undefined; current = parents.get(current)) {
        if (current === child || visited.has(current)) return true;
        visited.add(current);
    }
    return false;
}

function createNode(
    resolver: IEntityResolver,
    id: EntityId,
    parent: EntityId | undefined,
    children: EntityId[],
): ISpatialNode {
    const entity = tryDecode(resolver, id);
    const entityType = entity?.type ?? "UNKNOWN";
    const kind = NODE_KINDS[entityType] ?? "element";

    return {
        id,
        kind,
        entityType,
        name: (entity && EntityAttributes.getString(entity, 2)) ?? "",
        elevation: kind === "storey" && entity ? EntityAttributes.getFloat(entity, 9) : undefined,
        hasGeometry: entity !== undefined && EntityAttributes.getRef(entity, 6) !== undefined,
        parent,
        children,
    };
}

function tryDecode(resolver: IEntityResolver, id: EntityId): IDecodedEntity | undefined {
    try {
        return resolver.get(id);
    } catch (error) {
        if (!(error instanceof StepError)) throw error;
        Logger.warn(`Skipping #${id} in the spatial tree: ${error.message}`);
        return undefined;
    }
}
