// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { EntityDecodeError, StepSyntaxError, type EntityId } from "stepmesh-core";
import type { AttributeValue, IDecodedEntity, IRawEntity } from "./stepEntity";
import { StepTokenizer, type StepToken } from "./stepTokenizer";

const NULL_VALUE = frozen({ kind: "null" });
const DERIVED_VALUE = frozen({ kind: "derived" });

/**
 * Decodes the escapes of a STEP string literal body: `''`, `\\`, `\S\c`, `\X\hh`,
 * `\X2\hhhh...\X0\` and `\X4\hhhhhhhh...\X0\`. `\P?\` code page switches are dropped.
 */
export function decodeStepString(raw: string): string {
    if (!raw.includes("'") && !raw.includes("\\")) return raw;

    let result = "";
    let i = 0;
    while (i < raw.length) {
        const ch = raw[i];

        if (ch === "'" && raw[i + 1] === "'") {
            result += "'";
            i += 2;
            continue;
        }

        if (ch !== "\\") {
            result += ch;
            i++;
            continue;
        }

        if (raw[i + 1] === "\\") {
            result += "\\";
            i += 2;
            continue;
        }

        const directive = raw.slice(i, i + 4).toUpperCase();
        if (directive === "\\X2\\" || directive === "\\X4\\") {
            const width = directive === "\\X2\\" ? 4 : 8;
            const close = raw.toUpperCase().indexOf("\\X0\\", i + 4);
            if (close >= 0) {
                result += decodeHexRun(raw.slice(i + 4, close), width);
                i = close + 4;
                continue;
            }
        }

        if (directive.startsWith("\\X\\")) {
            const code = Number.parseInt(raw.slice(i + 3, i + 5), 16);
            if (Number.isFinite(code)) {
                result += String.fromCharCode(code);
                i += 5;
                continue;
            }
        }

        if (directive.startsWith("\\S\\") && i + 3 < raw.length) {
            result += String.fromCharCode(raw.charCodeAt(i + 3) + 128);
            i += 4;
            continue;
        }

        if (directive[1] === "P" && directive[3] === "\\") {
            i += 4;
            continue;
        }

        result += ch;
        i++;
    }

    return result;
}

function decodeHexRun(hex: string, width: number): string {
    let result = "";
    for (let i = 0; i + width <= hex.length; i += width) {
        const code = Number.parseInt(hex.slice(i, i + width), 16);
        if (!Number.isFinite(code)) continue;
        result += width === 4 ? String.fromCharCode(code) : String.fromCodePoint(code);
    }
    return result;
}

function frozen(value: AttributeValue): AttributeValue {
    return Object.freeze(value);
}

export function tokenToAttribute(token: StepToken): AttributeValue {
    switch (token.kind) {
        case "ref":
            return frozen({ kind: "ref", id: token.id });
        case "string":
            return frozen({ kind: "string", value: decodeStepString(token.raw) });
        case "integer":
            return frozen({ kind: "integer", value: token.value });
        case "float":
            return frozen({ kind: "float", value: token.value });
        case "enum":
            return frozen({ kind: "enum", value: token.value });
        case "list":
            return frozen({ kind: "list", items: Object.freeze(token.items.map(tokenToAttribute)) });
        case "typed":
            return frozen({ kind: "typed", name: token.name, args: Object.freeze(token.args.map(tokenToAttribute)) });
        case "null":
            return NULL_VALUE;
        case "derived":
            return DERIVED_VALUE;
    }
}

/**
 * Lazily turns raw records into frozen {@link IDecodedEntity} values. Each id is tokenized at
 * most once; failures are not cached and fail the same way on every call.
 */
export class EntityDecoder {
    private readonly cache = new Map<EntityId, IDecodedEntity>();

    constructor(private readonly source: string) {}

    get decodedCount() {
        return this.cache.size;
    }

    cached(id: EntityId): IDecodedEntity | undefined {
        return this.cache.get(id);
    }

    decode(raw: IRawEntity): IDecodedEntity {
        const cached = this.cache.get(raw.id);
        if (cached) return cached;

        let tokens: StepToken[];
        try {
            tokens = StepTokenizer.tokenize(this.source, raw.argsStart, raw.argsEnd);
        } catch (error) {
            if (error instanceof StepSyntaxError) {
                throw new EntityDecodeError(raw.id, error);
            }
            throw error;
        }

        const entity: IDecodedEntity = Object.freeze({
            id: raw.id,
            type: raw.type,
            attributes: Object.freeze(tokens.map(tokenToAttribute)),
        });
        this.cache.set(raw.id, entity);
        return entity;
    }
}
