// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { Logger, StepError, type EntityId } from "stepmesh-core";
import type { IEntityResolver } from "./entityStore";
import { asFloat, asInteger, EntityAttributes, type IDecodedEntity } from "./stepEntity";

export const SI_PREFIXES: Readonly<Record<string, { factor: number; symbol: string }>> = {
    EXA: { factor: 1e18, symbol: "E" },
    PETA: { factor: 1e15, symbol: "P" },
    TERA: { factor: 1e12, symbol: "T" },
    GIGA: { factor: 1e9, symbol: "G" },
    MEGA: { factor: 1e6, symbol: "M" },
    KILO: { factor: 1e3, symbol: "k" },
    HECTO: { factor: 1e2, symbol: "h" },
    DECA: { factor: 1e1, symbol: "da" },
    DECI: { factor: 1e-1, symbol: "d" },
    CENTI: { factor: 1e-2, symbol: "c" },
    MILLI: { factor: 1e-3, symbol: "m" },
    MICRO: { factor: 1e-6, symbol: "µ" },
    NANO: { factor: 1e-9, symbol: "n" },
    PICO: { factor: 1e-12, symbol: "p" },
    FEMTO: { factor: 1e-15, symbol: "f" },
    ATTO: { factor: 1e-18, symbol: "a" },
};

const SI_UNIT_SYMBOLS: Readonly<Record<string, string>> = {
    METRE: "m",
    SQUARE_METRE: "m²",
    CUBIC_METRE: "m³",
    GRAM: "g",
    SECOND: "s",
    RADIAN: "rad",
    STERADIAN: "sr",
    DEGREE_CELSIUS: "°C",
    KELVIN: "K",
    AMPERE: "A",
    CANDELA: "cd",
    MOLE: "mol",
    NEWTON: "N",
    PASCAL: "Pa",
    JOULE: "J",
    WATT: "W",
    HERTZ: "Hz",
    VOLT: "V",
    OHM: "Ω",
    LUMEN: "lm",
    LUX: "lx",
};

export interface IUnitContext {
    /** Factor converting file lengths to metres. */
    lengthScale: number;
    /** Factor converting file plane angles to radians. */
    angleScale: number;
    /** Display label of each project unit, keyed by unit type (`LENGTHUNIT`, `AREAUNIT`, ...). */
    labels: ReadonlyMap<string, string>;
}

export const DEFAULT_UNITS: IUnitContext = Object.freeze({
    lengthScale: 1,
    angleScale: 1,
    labels: new Map<string, string>(),
});

export class UnitReader {
    /**
     * Reads the unit assignment of the first `IFCPROJECT`. Missing or unreadable units fall back
     * to metres and radians.
     */
    static read(resolver: IEntityResolver): IUnitContext {
        const projectId = resolver.findByTypeName("IFCPROJECT")[0];
        if (projectId === undefined) return DEFAULT_UNITS;

        try {
            const project = resolver.resolveRef(projectId);
            const assignmentRef = EntityAttributes.getRef(project, 8);
            if (assignmentRef === undefined) return DEFAULT_UNITS;

            const assignment = resolver.resolveRef(assignmentRef);
            let lengthScale = 1;
            let angleScale = 1;
            const labels = new Map<string, string>();

            for (const unitRef of EntityAttributes.getRefs(assignment, 0)) {
                const unit = resolver.resolveRef(unitRef);
                const unitType = EntityAttributes.getEnum(unit, 1);
                if (unitType === undefined) continue;

                labels.set(unitType, formatUnit(resolver, unit.id));
                if (unitType === "LENGTHUNIT") lengthScale = unitScale(resolver, unit.id);
                if (unitType === "PLANEANGLEUNIT") angleScale = unitScale(resolver, unit.id);
            }

            return { lengthScale, angleScale, labels };
        } catch (error) {
            if (!(error instanceof StepError)) throw error;
            Logger.warn(`Falling back to default units: ${error.message}`);
            return DEFAULT_UNITS;
        }
    }
}

/**
 * Factor converting a value in the given unit to its SI base unit.
 */
export function unitScale(resolver: IEntityResolver, unitId: EntityId, depth = 0): number {
    if (depth > 8) return 1;
    const unit = resolver.resolveRef(unitId);

    if (unit.type === "IFCSIUNIT") {
        return siPrefixFactor(EntityAttributes.getEnum(unit, 2));
    }

    if (unit.type === "IFCCONVERSIONBASEDUNIT" || unit.type === "IFCCONVERSIONBASEDUNITWITHOFFSET") {
        const measureRef = EntityAttributes.getRef(unit, 3);
        if (measureRef === undefined) return 1;
        const measure = resolver.resolveRef(measureRef);
        const factor = EntityAttributes.getFloat(measure, 0) ?? 1;
        const baseRef = EntityAttributes.getRef(measure, 1);
        return baseRef === undefined ? factor : factor * unitScale(resolver, baseRef, depth + 1);
    }

    return 1;
}

export function siPrefixFactor(prefix: string | undefined): number {
    return prefix === undefined ? 1 : (SI_PREFIXES[prefix]?.factor ?? 1);
}

/**
 * Short display label of a unit entity, for instance `mm`, `m²` or `FOOT`.
 */
export function formatUnit(resolver: IEntityResolver, unitId: EntityId): string {
    return formatUnitEntity(resolver, resolver.resolveRef(unitId));
}

function formatUnitEntity(resolver: IEntityResolver, unit: IDecodedEntity): string {
    switch (unit.type) {
        case "IFCSIUNIT": {
            const name = EntityAttributes.getEnum(unit, 3) ?? "";
            const prefix = EntityAttributes.getEnum(unit, 2);
            const prefixSymbol = prefix === undefined ? "" : (SI_PREFIXES[prefix]?.symbol ?? "");
            const symbol = SI_UNIT_SYMBOLS[name];
            return `${prefixSymbol}${symbol ?? name}`;
        }
        case "IFCCONVERSIONBASEDUNIT":
        case "IFCCONVERSIONBASEDUNITWITHOFFSET":
            return EntityAttributes.getString(unit, 2) ?? "";
        case "IFCDERIVEDUNIT":
            return EntityAttributes.getRefs(unit, 0)
                .map((ref) => resolver.resolveRef(ref))
                .map((element) => {
                    const baseRef = EntityAttributes.getRef(element, 0);
                    const exponent = asInteger(element.attributes[1]) ?? asFloat(element.attributes[1]) ?? 1;
                    const base = baseRef === undefined ? "" : formatUnit(resolver, baseRef);
                    return exponent === 1 ? base : `${base}^${exponent}`;
                })
                .join("·");
        case "IFCCONTEXTDEPENDENTUNIT":
            return EntityAttributes.getString(unit, 2) ?? "";
        default:
            return "";
    }
}
