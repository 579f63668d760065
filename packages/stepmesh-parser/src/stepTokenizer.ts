// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { StepSyntaxError } from "stepmesh-core";

/**
 * Structural token tree of one argument list. Strings keep their raw, still escaped text.
 */
export type StepToken =
    | { readonly kind: "ref"; readonly id: number }
    | { readonly kind: "string"; readonly raw: string }
    | { readonly kind: "integer"; readonly value: number }
    | { readonly kind: "float"; readonly value: number }
    | { readonly kind: "enum"; readonly value: string }
    | { readonly kind: "list"; readonly items: readonly StepToken[] }
    | { readonly kind: "typed"; readonly name: string; readonly args: readonly StepToken[] }
    | { readonly kind: "null" }
    | { readonly kind: "derived" };

const MAX_ENTITY_ID = 0xffffffff;

export function isDigit(ch: string | undefined) {
    return ch !== undefined && ch >= "0" && ch <= "9";
}

export function isIdentifierChar(ch: string | undefined) {
    return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

export function isWhitespace(ch: string | undefined) {
    return ch === " " || ch === "\t" || ch === "\r" || ch === "\n" || ch === "\f" || ch === "\v";
}

/**
 * Skips whitespace and `/* *\/` comments starting at `pos`, never past `end`.
 */
export function skipTrivia(source: string, pos: number, end: number): number {
    while (pos < end) {
        const ch = source[pos];
        if (isWhitespace(ch)) {
            pos++;
            continue;
        }
        if (ch === "/" && source[pos + 1] === "*") {
            const close = source.indexOf("*/", pos + 2);
            if (close < 0 || close + 2 > end) {
                throw StepSyntaxError.at("Unterminated comment", source, pos);
            }
            pos = close + 2;
            continue;
        }
        break;
    }
    return pos;
}

export class StepTokenizer {
    private pos: number;

    private constructor(
        private readonly source: string,
        start: number,
        private readonly end: number,
    ) {
        this.pos = start;
    }

    /**
     * Tokenizes the parenthesised argument list found in `source[start, end)`.
     */
    static tokenize(source: string, start = 0, end = source.length): StepToken[] {
        const tokenizer = new StepTokenizer(source, start, end);
        tokenizer.skip();
        if (tokenizer.peek() !== "(") {
            throw tokenizer.fail("Expected '(' to open the argument list", tokenizer.pos);
        }
        const open = tokenizer.pos;
        tokenizer.pos++;
        const items = tokenizer.readListBody(open);
        tokenizer.skip();
        if (tokenizer.pos < end) {
            throw tokenizer.fail("Unexpected content after the argument list", tokenizer.pos);
        }
        return items;
    }

    private fail(message: string, at: number) {
        return StepSyntaxError.at(message, this.source, at);
    }

    private peek(): string | undefined {
        return this.pos < this.end ? this.source[this.pos] : undefined;
    }

    private skip() {
        this.pos = skipTrivia(this.source, this.pos, this.end);
    }

    private readListBody(open: number): StepToken[] {
        const items: StepToken[] = [];
        this.skip();
        if (this.peek() === ")") {
            this.pos++;
            return items;
        }

        while (true) {
            items.push(this.readValue());
            this.skip();
            const ch = this.peek();
            if (ch === ",") {
                this.pos++;
                continue;
            }
            if (ch === ")") {
                this.pos++;
                return items;
            }
            if (ch === undefined) {
                throw this.fail("Unterminated list", open);
            }
            throw this.fail(`Expected ',' or ')' but found '${ch}'`, this.pos);
        }
    }

    private readValue(): StepToken {
        this.skip();
        const start = this.pos;
        const ch = this.peek();

        if (ch === undefined) {
            throw this.fail("Unexpected end of arguments", start);
        }
        if (ch === "#") {
            return this.readReference();
        }
        if (ch === "'") {
            return { kind: "string", raw: this.readString() };
        }
        if (ch === ".") {
            return this.readEnum();
        }
        if (ch === "(") {
            this.pos++;
            return { kind: "list", items: this.readListBody(start) };
        }
        if (ch === "$") {
            this.pos++;
            return { kind: "null" };
        }
        if (ch === "*") {
            this.pos++;
            return { kind: "derived" };
        }
        if (ch === "+" || ch === "-" || isDigit(ch)) {
            return this.readNumber();
        }
        if (/[A-Za-z_]/.test(ch)) {
            return this.readTypedValue();
        }

        throw this.fail(`Unexpected character '${ch}'`, start);
    }

    private readReference(): StepToken {
        const start = this.pos;
        this.pos++;
        const digitsStart = this.pos;
        while (isDigit(this.peek())) this.pos++;
        if (this.pos === digitsStart) {
            throw this.fail("Expected digits after '#'", start);
        }
        const id = Number.parseInt(this.source.slice(digitsStart, this.pos), 10);
        if (id > MAX_ENTITY_ID) {
            throw this.fail(`Entity reference #${id} is out of range`, start);
        }
        return { kind: "ref", id };
    }

    private readString(): string {
        const start = this.pos;
        let cursor = start + 1;
        while (true) {
            const quote = this.source.indexOf("'", cursor);
            if (quote < 0 || quote >= this.end) {
                throw this.fail("Unterminated string", start);
            }
            if (this.source[quote + 1] === "'" && quote + 1 < this.end) {
                cursor = quote + 2;
                continue;
            }
            this.pos = quote + 1;
            return this.source.slice(start + 1, quote);
        }
    }

    private readEnum(): StepToken {
        const start = this.pos;
        this.pos++;
        const nameStart = this.pos;
        while (isIdentifierChar(this.peek())) this.pos++;
        if (this.pos === nameStart || this.peek() !== ".") {
            throw this.fail("Malformed enumeration", start);
        }
        const value = this.source.slice(nameStart, this.pos).toUpperCase();
        this.pos++;
        return { kind: "enum", value };
    }

    private readNumber(): StepToken {
        const start = this.pos;
        let isFloat = false;

        if (this.peek() === "+" || this.peek() === "-") this.pos++;
        const digitsStart = this.pos;
        while (isDigit(this.peek())) this.pos++;
        if (this.pos === digitsStart) {
            throw this.fail("Expected digits in number", start);
        }

        if (this.peek() === ".") {
            isFloat = true;
            this.pos++;
            while (isDigit(this.peek())) this.pos++;
        }

        if (this.peek() === "E" || this.peek() === "e") {
            isFloat = true;
            this.pos++;
            if (this.peek() === "+" || this.peek() === "-") this.pos++;
            const exponentStart = this.pos;
            while (isDigit(this.peek())) this.pos++;
            if (this.pos === exponentStart) {
                throw this.fail("Expected digits in exponent", start);
            }
        }

        const text = this.source.slice(start, this.pos);
        return isFloat
            ? { kind: "float", value: Number.parseFloat(text) }
            : { kind: "integer", value: Number.parseInt(text, 10) };
    }

    private readTypedValue(): StepToken {
        const start = this.pos;
        while (isIdentifierChar(this.peek())) this.pos++;
        const name = this.source.slice(start, this.pos).toUpperCase();
        this.skip();
        if (this.peek() !== "(") {
            throw this.fail(`Bare identifier '${name}' is not a value`, start);
        }
        const open = this.pos;
        this.pos++;
        return { kind: "typed", name, args: this.readListBody(open) };
    }
}
