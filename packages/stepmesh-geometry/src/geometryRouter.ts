// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { GeometryError, Logger, Result, StepError, UnsupportedTypeError, type EntityId } from "stepmesh-core";
import { EntityAttributes, type IDecodedEntity, type StepModel } from "stepmesh-parser";
import { Matrix4 } from "three";
import { Mesh } from "./mesh";
import { OpeningIndex } from "./openings";
import { readAxis2Placement3D, readCartesianTransformation, readObjectPlacement } from "./placement";
import { buildExtrusion, ExtrudedAreaSolidProcessor, readExtrusion } from "./processors/extrudedAreaSolid";
import { FacetedBrepProcessor } from "./processors/facetedBrep";
import type { IGeometryProcessor, IProcessorContext } from "./processors/processor";
import { RevolvedAreaSolidProcessor } from "./processors/revolvedAreaSolid";
import { SweptDiskSolidProcessor } from "./processors/sweptDiskSolid";
import { TriangulatedFaceSetProcessor } from "./processors/triangulatedFaceSet";

const PROCESSORS = {
    IFCEXTRUDEDAREASOLID: ExtrudedAreaSolidProcessor,
    IFCREVOLVEDAREASOLID: RevolvedAreaSolidProcessor,
    IFCSWEPTDISKSOLID: SweptDiskSolidProcessor,
    IFCFACETEDBREP: FacetedBrepProcessor,
    IFCTRIANGULATEDFACESET: TriangulatedFaceSetProcessor,
} as const satisfies Record<string, IGeometryProcessor>;

export type GeometryType = keyof typeof PROCESSORS;

export const SUPPORTED_GEOMETRY_TYPES: readonly GeometryType[] = Object.freeze([
    "IFCEXTRUDEDAREASOLID",
    "IFCREVOLVEDAREASOLID",
    "IFCSWEPTDISKSOLID",
    "IFCFACETEDBREP",
    "IFCTRIANGULATEDFACESET",
]);

export function isSupportedGeometryType(type: string): type is GeometryType {
    return Object.hasOwn(PROCESSORS, type);
}

export interface IGeometryOptions {
    /** Factor converting file lengths to output units; defaults to the model's length unit. */
    unitScale: number;
    /** Factor converting file plane angles to radians; defaults to the model's angle unit. */
    angleScale: number;
    /** Shape representations read by {@link GeometryRouter.processElement}. */
    representationIdentifiers: readonly string[];
    /** Cut openings attached by `IFCRELVOIDSELEMENT` out of parallel host extrusions. */
    subtractOpenings: boolean;
}

export const DEFAULT_REPRESENTATION_IDENTIFIERS: readonly string[] = Object.freeze(["Body", "Facetation"]);

export interface IGeometryResult {
    readonly id: EntityId;
    readonly type: string;
    readonly result: Result<Mesh, StepError>;
}

export interface ISkippedItem {
    readonly id: EntityId;
    readonly error: StepError;
}

export interface IElementGeometry {
    readonly id: EntityId;
    readonly type: string;
    /** World coordinates in output units. */
    readonly mesh: Mesh;
    /** Object placement in file units. */
    readonly placement: Matrix4;
    readonly skipped: readonly ISkippedItem[];
    /** Openings cut out of a host extrusion. */
    readonly subtractedOpenings: readonly EntityId[];
}

/**
 * A representation item reached through mapped items and boolean results, with the transform
 * from its coordinates to the element's.
 */
export interface IResolvedItem {
    readonly entity: IDecodedEntity;
    readonly transform: Matrix4;
    /** Reached through a representation map, so its mesh is shared by every instance. */
    readonly mapped: boolean;
}

/**
 * Dispatches geometry entities to their processor and assembles element meshes.
 */
export class GeometryRouter {
    readonly options: IGeometryOptions;
    private readonly context: IProcessorContext;
    private openingIndex: OpeningIndex | undefined;
    private readonly mappedSources = new Map<EntityId, Mesh>();

    constructor(
        readonly model: StepModel,
        options: Partial<IGeometryOptions> = {},
    ) {
        this.options = {
            unitScale: model.units.lengthScale,
            angleScale: model.units.angleScale,
            representationIdentifiers: DEFAULT_REPRESENTATION_IDENTIFIERS,
            subtractOpenings: true,
            ...options,
        };
        this.context = { resolver: model, angleScale: this.options.angleScale };
    }

    /**
     * Mesh of one geometry entity in its own coordinates, scaled to output units.
     */
    process(id: EntityId): Result<Mesh, StepError> {
        return this.attempt(() => this.processRaw(this.model.resolveRef(id)).scaled(this.options.unitScale));
    }

    /**
     * Number of representation map items tessellated so far.
     */
    get mappedSourceCount() {
        return this.mappedSources.size;
    }

    *processAll(): Generator<IGeometryResult> {
        for (const type of SUPPORTED_GEOMETRY_TYPES) {
            for (const id of this.model.findByTypeName(type)) {
                yield { id, type, result: this.process(id) };
            }
        }
    }

    /**
     * World mesh of a product: its body representations, their items through mapped items and
     * boolean results, and the object placement chain. Items that fail are skipped and
     * reported.
     */
    processElement(id: EntityId): Result<IElementGeometry, StepError> {
        return this.attempt(() => {
            const element = this.model.resolveRef(id);
            const placement = readObjectPlacement(this.model, EntityAttributes.getRef(element, 5));
            const skipped: ISkippedItem[] = [];
            const meshes: Mesh[] = [];
            const subtractedOpenings = new Set<EntityId>();

            for (const item of this.elementItems(element, skipped)) {
                try {
                    const mesh = this.processItem(element.id, item, placement, subtractedOpenings);
                    meshes.push(mesh.transformed(item.transform));
                } catch (error) {
                    if (!(error instanceof StepError)) throw error;
                    Logger.warn(`Skipping item #${item.entity.id} of #${id}: ${error.message}`);
                    skipped.push({ id: item.entity.id, error });
                }
            }

            const mesh = Mesh.merge(meshes)
                .transformed(placement)
                .scaled(this.options.unitScale);
            return {
                id,
                type: element.type,
                mesh,
                placement,
                skipped,
                subtractedOpenings: [...subtractedOpenings],
            };
        });
    }

    /**
     * Representation items of a product that match the configured identifiers, with mapped
     * items and boolean results resolved. Items that cannot be resolved go to `skipped`.
     */
    elementItems(element: IDecodedEntity, skipped: ISkippedItem[] = []): IResolvedItem[] {
        const shapeRef = EntityAttributes.getRef(element, 6);
        if (shapeRef === undefined) {
            throw GeometryError.geometry(`${element.type} #${element.id} has no product representation`);
        }
        const shape = this.model.resolveRef(shapeRef);
        if (shape.type !== "IFCPRODUCTDEFINITIONSHAPE") {
            throw GeometryError.geometry(`#${shapeRef} is ${shape.type}, expected IFCPRODUCTDEFINITIONSHAPE`);
        }

        const items: IResolvedItem[] = [];
        for (const representationId of EntityAttributes.getRefs(shape, 2)) {
            const representation = this.model.resolveRef(representationId);
            const identifier = EntityAttributes.getString(representation, 1);
            if (identifier === undefined || !this.options.representationIdentifiers.includes(identifier)) {
                Logger.debug(`Ignoring representation #${representationId} (${identifier ?? "$"})`);
                continue;
            }
            for (const itemId of EntityAttributes.getRefs(representation, 3)) {
                this.resolveItem(itemId, new Matrix4(), new Set<EntityId>(), false, items, skipped);
            }
        }
        return items;
    }

    private resolveItem(
        id: EntityId,
        transform: Matrix4,
        visited: Set<EntityId>,
        mapped: boolean,
        items: IResolvedItem[],
        skipped: ISkippedItem[],
    ) {
        try {
            if (visited.has(id)) {
                throw GeometryError.geometry(`Representation item #${id} refers to itself`);
            }
            visited.add(id);

            const entity = this.model.resolveRef(id);
            switch (entity.type) {
                case "IFCMAPPEDITEM": {
                    const map = this.model.resolveRef(EntityAttributes.requireRef(entity, 0));
                    const origin = readAxis2Placement3D(this.model, EntityAttributes.getRef(map, 0));
                    const target = readCartesianTransformation(this.model, EntityAttributes.getRef(entity, 1));
                    const instance = transform.clone().multiply(target).multiply(origin);
                    const representation = this.model.resolveRef(EntityAttributes.requireRef(map, 1));
                    for (const itemId of EntityAttributes.getRefs(representation, 3)) {
                        this.resolveItem(itemId, instance, new Set(visited), true, items, skipped);
                    }
                    break;
                }
                case "IFCBOOLEANRESULT":
                case "IFCBOOLEANCLIPPINGRESULT":
                    Logger.debug(`Using the first operand of ${entity.type} #${id}`);
                    this.resolveItem(EntityAttributes.requireRef(entity, 1), transform, visited, mapped, items, skipped);
                    break;
                default:
                    if (!isSupportedGeometryType(entity.type)) throw new UnsupportedTypeError(entity.type);
                    items.push({ entity, transform, mapped });
            }
        } catch (error) {
            if (!(error instanceof StepError)) throw error;
            Logger.warn(`Skipping representation item #${id}: ${error.message}`);
            skipped.push({ id, error });
        }
    }

    private processItem(
        elementId: EntityId,
        item: IResolvedItem,
        placement: Matrix4,
        subtracted: Set<EntityId>,
    ): Mesh {
        const cutsOpenings =
            this.options.subtractOpenings &&
            item.entity.type === ExtrudedAreaSolidProcessor.type &&
            this.openings().openingsOf(elementId).length > 0;
        if (!cutsOpenings) {
            return item.mapped ? this.mappedSource(item.entity) : this.processRaw(item.entity);
        }

        const extrusion = readExtrusion(this.context, item.entity);
        const hostToWorld = placement.clone().multiply(item.transform).multiply(extrusion.position);
        const voids = this.openings().voidsFor(elementId, hostToWorld, extrusion);
        for (const opening of voids.openings) subtracted.add(opening);

        return buildExtrusion(extrusion, voids.voids);
    }

    private openings() {
        this.openingIndex ??= new OpeningIndex(this.model, this.context, (element) => this.elementItems(element));
        return this.openingIndex;
    }

    private mappedSource(entity: IDecodedEntity): Mesh {
        let mesh = this.mappedSources.get(entity.id);
        if (!mesh) {
            mesh = this.processRaw(entity);
            this.mappedSources.set(entity.id, mesh);
        }
        return mesh;
    }

    private processRaw(entity: IDecodedEntity): Mesh {
        if (!isSupportedGeometryType(entity.type)) {
            throw new UnsupportedTypeError(entity.type);
        }
        return PROCESSORS[entity.type].process(this.context, entity);
    }

    private attempt<T>(fn: () => T): Result<T, StepError> {
        try {
            return Result.ok(fn());
        } catch (error) {
            if (error instanceof StepError) return Result.err(error);
            throw error;
        }
    }
}
