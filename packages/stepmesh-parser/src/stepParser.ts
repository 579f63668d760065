// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { Logger, ProgressPhase, StepSyntaxError, type ProgressCallback } from "stepmesh-core";
import { EntityScanner } from "./entityScanner";
import { EntityStore } from "./entityStore";
import { PropertyReader, type PropertyIndex } from "./propertyReader";
import { SpatialTreeBuilder, type SpatialTree } from "./spatialTree";
import { StepHeaderReader } from "./stepHeader";
import { StepModel } from "./stepModel";
import { UnitReader } from "./units";

export interface IParseOptions {
    buildSpatialTree: boolean;
    extractProperties: boolean;
    /** Throw the first malformed record instead of collecting it on the model. */
    strict: boolean;
    /** Records between two progress reports while scanning. */
    progressInterval: number;
    onProgress?: ProgressCallback;
    signal?: AbortSignal;
}

export const DEFAULT_PARSE_OPTIONS: Readonly<IParseOptions> = Object.freeze({
    buildSpatialTree: true,
    extractProperties: true,
    strict: false,
    progressInterval: 10_000,
});

const SCAN_SHARE = 0.7;

export class StepParser {
    static parse(text: string, options: Partial<IParseOptions> = {}): StepModel {
        const config: IParseOptions = { ...DEFAULT_PARSE_OPTIONS, ...options };
        const started = performance.now();
        const report = monotonic(config.onProgress);

        const header = StepHeaderReader.read(text);
        const store = new EntityStore(text);
        const errors = scan(text, store, config, report);

        report(ProgressPhase.units, 0.75);
        const units = UnitReader.read(store);

        let spatialTree: SpatialTree | undefined;
        if (config.buildSpatialTree) {
            report(ProgressPhase.spatial, 0.85);
            spatialTree = SpatialTreeBuilder.build(store);
        }

        let properties: PropertyIndex | undefined;
        if (config.extractProperties) {
            report(ProgressPhase.properties, 0.95);
            properties = PropertyReader.read(store, units);
        }

        report(ProgressPhase.complete, 1);
        Logger.info(
            `Parsed ${store.size} entities (${errors.length} malformed) in ${(performance.now() - started).toFixed(1)} ms`,
        );

        return new StepModel(store, { header, units, errors, spatialTree, properties });
    }

    /**
     * Options that skip spatial and property extraction, for callers that only need meshes.
     */
    static geometryOnly(options: Partial<IParseOptions> = {}): Partial<IParseOptions> {
        return { ...options, buildSpatialTree: false, extractProperties: false };
    }
}

function scan(text: string, store: EntityStore, config: IParseOptions, report: ProgressCallback): StepSyntaxError[] {
    const errors: StepSyntaxError[] = [];
    const scanner = new EntityScanner(text, {
        progressInterval: config.progressInterval,
        signal: config.signal,
        onProgress: (phase, fraction) => report(phase, fraction * SCAN_SHARE),
    });

    while (true) {
        try {
            const entity = scanner.next();
            if (!entity) break;
            store.add(entity);
        } catch (error) {
            if (!(error instanceof StepSyntaxError) || config.strict) throw error;
            Logger.warn(`Skipping malformed record: ${error.message}`);
            errors.push(error);
        }
    }

    return errors;
}

function monotonic(callback: ProgressCallback | undefined): ProgressCallback {
    let last = 0;
    return (phase, fraction) => {
        last = Math.max(last, Math.min(1, fraction));
        callback?.(phase, last);
    };
}
