// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { ProgressPhase, StepSyntaxError, type EntityId, type ProgressCallback } from "stepmesh-core";
import type { IRawEntity } from "./stepEntity";
import { isDigit, isIdentifierChar, skipTrivia } from "./stepTokenizer";

const SECTION_END_REGEX = /(?:ENDSEC|END-ISO-10303-21)\s*;/iy;
const DATA_SECTION_REGEX = /\bDATA\s*;/i;
const LINE_RECORD_REGEX = /(?<=[\r\n])[ \t]*#/g;
const MAX_ENTITY_ID = 0xffffffff;

interface IRecordPrefix {
    id: EntityId;
    type: string;
    start: number;
    argsStart: number;
}

export interface IScanOptions {
    /** Records between two progress reports. */
    progressInterval?: number;
    onProgress?: ProgressCallback;
    signal?: AbortSignal;
}

/**
 * Index just past the `DATA;` keyword, or 0 when the text has no data section marker.
 */
export function findDataSection(text: string): number {
    const match = DATA_SECTION_REGEX.exec(text);
    return match ? match.index + match[0].length : 0;
}

/**
 * Index of the `;` closing the statement that starts at `start`, skipping quoted strings
 * (`''` is an escaped quote) and comments; -1 when the text ends first.
 */
export function findStatementEnd(text: string, start: number, end = text.length): number {
    let inString = false;

    for (let i = start; i < end; i++) {
        const ch = text[i];

        if (ch === "'") {
            if (inString && text[i + 1] === "'") {
                i++;
                continue;
            }
            inString = !inString;
            continue;
        }

        if (inString) continue;

        if (ch === "/" && text[i + 1] === "*") {
            const close = text.indexOf("*/", i + 2);
            if (close < 0) return -1;
            i = close + 1;
            continue;
        }

        if (ch === ";") {
            return i;
        }
    }

    return -1;
}

/**
 * Single forward pass over the data section that locates `#id=TYPE(...);` records without
 * tokenizing their arguments.
 *
 * `next()` throws a {@link StepSyntaxError} for a malformed record after moving past it, so a
 * caller that catches the error can keep scanning the rest of the file.
 */
export class EntityScanner {
    private pos: number;
    private done = false;
    private records = 0;
    private readonly seen = new Set<EntityId>();
    private readonly start: number;
    private readonly end: number;
    private readonly progressInterval: number;

    constructor(
        private readonly text: string,
        private readonly options: IScanOptions = {},
    ) {
        this.start = findDataSection(text);
        this.end = text.length;
        this.pos = this.start;
        this.progressInterval = Math.max(1, options.progressInterval ?? 10_000);
    }

    get position() {
        return this.pos;
    }

    get recordCount() {
        return this.records;
    }

    next(): IRawEntity | undefined {
        if (this.done) return undefined;

        this.options.signal?.throwIfAborted();

        const recordStart = this.skipToRecord();
        if (recordStart === undefined) {
            this.finish();
            return undefined;
        }

        const terminator = findStatementEnd(this.text, recordStart, this.end);
        const recordEnd = terminator < 0 ? this.end : terminator;
        let prefix: IRecordPrefix;
        try {
            prefix = this.readPrefix(recordStart, recordEnd);
        } catch (error) {
            this.pos = this.recoveryPoint(recordStart, terminator);
            this.countRecord();
            throw error;
        }

        this.pos = terminator < 0 ? this.end : terminator + 1;
        this.countRecord();
        if (terminator < 0) {
            throw this.fail("Entity record is missing its ';' terminator", recordStart);
        }

        const entity = this.readArguments(prefix, recordEnd);
        if (this.seen.has(entity.id)) {
            throw this.fail(`Duplicate entity id #${entity.id}`, recordStart);
        }
        this.seen.add(entity.id);
        return entity;
    }

    private countRecord() {
        this.records++;
        if (this.records % this.progressInterval === 0) {
            this.report(this.fraction());
        }
    }

    /**
     * Where scanning resumes after a record whose prefix is malformed: the next line that starts
     * with `#`, or just past the terminator when that comes first.
     */
    private recoveryPoint(start: number, terminator: number): number {
        const stop = terminator < 0 ? this.end : terminator;
        LINE_RECORD_REGEX.lastIndex = start + 1;
        const match = LINE_RECORD_REGEX.exec(this.text);
        if (match && match.index < stop) {
            return match.index;
        }
        return terminator < 0 ? this.end : terminator + 1;
    }

    private skipToRecord(): number | undefined {
        let pos: number;
        try {
            pos = skipTrivia(this.text, this.pos, this.end);
        } catch (error) {
            this.pos = this.end;
            throw error;
        }
        this.pos = pos;
        if (pos >= this.end) return undefined;

        SECTION_END_REGEX.lastIndex = pos;
        if (SECTION_END_REGEX.test(this.text)) return undefined;

        return pos;
    }

    private readPrefix(start: number, stop: number): IRecordPrefix {
        const text = this.text;
        if (text[start] !== "#") {
            throw this.fail("Expected '#' at the start of an entity record", start);
        }

        let p = start + 1;
        while (p < stop && isDigit(text[p])) p++;
        if (p === start + 1) {
            throw this.fail("Expected an entity id after '#'", start);
        }

        const id = Number.parseInt(text.slice(start + 1, p), 10);
        if (id > MAX_ENTITY_ID) {
            throw this.fail(`Entity id #${id} is out of range`, start);
        }

        p = skipTrivia(text, p, stop);
        if (text[p] !== "=" || p >= stop) {
            throw this.fail(`Expected '=' after #${id}`, start);
        }

        p = skipTrivia(text, p + 1, stop);
        const typeStart = p;
        while (p < stop && isIdentifierChar(text[p])) p++;
        if (p === typeStart) {
            throw this.fail(`Expected an entity type name for #${id}`, start);
        }
        const type = text.slice(typeStart, p).toUpperCase();

        p = skipTrivia(text, p, stop);
        if (text[p] !== "(" || p >= stop) {
            throw this.fail(`Expected '(' after ${type} in #${id}`, start);
        }

        return { id, type, start, argsStart: p };
    }

    private readArguments(prefix: IRecordPrefix, stop: number): IRawEntity {
        const { id, start, argsStart } = prefix;
        let close = stop - 1;
        while (close > argsStart && /\s/.test(this.text[close])) close--;
        if (close <= argsStart || this.text[close] !== ")") {
            throw this.fail(`Expected ')' before ';' in #${id}`, start);
        }

        return { id, type: prefix.type, offset: start, argsStart, argsEnd: close + 1 };
    }

    private fail(message: string, at: number) {
        return StepSyntaxError.at(message, this.text, at);
    }

    private fraction() {
        const span = this.end - this.start;
        return span <= 0 ? 1 : Math.min(1, (this.pos - this.start) / span);
    }

    private finish() {
        this.done = true;
        this.report(1);
    }

    private report(fraction: number) {
        this.options.onProgress?.(ProgressPhase.scanning, fraction);
    }
}

/**
 * Plain sequence over the records of `text`; stops at the first malformed record by throwing.
 */
export function* scanEntities(text: string, options?: IScanOptions): Generator<IRawEntity> {
    const scanner = new EntityScanner(text, options);
    for (let entity = scanner.next(); entity !== undefined; entity = scanner.next()) {
        yield entity;
    }
}
