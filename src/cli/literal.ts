import { AttributeValue, setField } from '../models/types';

const BAREWORD_STOP = /[\s,()[\]{}:'"]/;

/**
 * Reads the comma-separated argument list of a dotted call such as
 * `User.update("1234", {'first_name': "Betty", 'age': 89})`.
 *
 * Accepts quoted strings ('...' or "..." with backslash escapes), barewords,
 * `[...]` lists and `{key: value}` mappings. Barewords, numbers included, are
 * kept as their text; typing them is left to attribute coercion.
 * @returns The parsed arguments, or `null` if the text is not a valid list.
 */
export function parseArgumentList(text: string): AttributeValue[] | null {
    const reader = new LiteralReader(text);
    try {
        return reader.readArguments();
    } catch (error: unknown) {
        if (error instanceof LiteralSyntaxError) {
            return null;
        }
        throw error;
    }
}

class LiteralSyntaxError extends Error {}

class LiteralReader {
    private pos = 0;

    constructor(private readonly text: string) {}

    readArguments(): AttributeValue[] {
        const values: AttributeValue[] = [];
        this.skipSpace();
        if (this.atEnd()) {
            return values;
        }
        for (;;) {
            values.push(this.readValue());
            this.skipSpace();
            if (this.atEnd()) {
                return values;
            }
            this.expect(',');
        }
    }

    private readValue(): AttributeValue {
        this.skipSpace();
        const ch = this.peek();
        if (ch === '"' || ch === "'") {
            return this.readString();
        }
        if (ch === '[') {
            return this.readList();
        }
        if (ch === '{') {
            return this.readMapping();
        }
        return this.readBareword();
    }

    private readString(): string {
        const quote = this.text[this.pos++];
        let value = '';
        while (!this.atEnd()) {
            const ch = this.text[this.pos++];
            if (ch === quote) {
                return value;
            }
            if (ch === '\\' && !this.atEnd()) {
                value += this.text[this.pos++];
            } else {
                value += ch;
            }
        }
        throw new LiteralSyntaxError('unterminated string');
    }

    private readList(): AttributeValue[] {
        this.expect('[');
        const items: AttributeValue[] = [];
        this.skipSpace();
        if (this.peek() === ']') {
            this.pos++;
            return items;
        }
        for (;;) {
            items.push(this.readValue());
            this.skipSpace();
            if (this.peek() === ']') {
                this.pos++;
                return items;
            }
            this.expect(',');
        }
    }

    private readMapping(): { [key: string]: AttributeValue } {
        this.expect('{');
        const mapping: { [key: string]: AttributeValue } = {};
        this.skipSpace();
        if (this.peek() === '}') {
            this.pos++;
            return mapping;
        }
        for (;;) {
            const key = this.readValue();
            if (typeof key !== 'string') {
                throw new LiteralSyntaxError('mapping keys must be strings');
            }
            this.skipSpace();
            this.expect(':');
            setField(mapping, key, this.readValue());
            this.skipSpace();
            if (this.peek() === '}') {
                this.pos++;
                return mapping;
            }
            this.expect(',');
        }
    }

    private readBareword(): string {
        const start = this.pos;
        while (!this.atEnd() && !BAREWORD_STOP.test(this.text[this.pos])) {
            this.pos++;
        }
        const word = this.text.slice(start, this.pos);
        if (word.length === 0) {
            throw new LiteralSyntaxError(`unexpected character at ${this.pos}`);
        }
        return word;
    }

    private expect(ch: string): void {
        this.skipSpace();
        if (this.peek() !== ch) {
            throw new LiteralSyntaxError(`expected "${ch}" at ${this.pos}`);
        }
        this.pos++;
    }

    private skipSpace(): void {
        while (!this.atEnd() && /\s/.test(this.text[this.pos])) {
            this.pos++;
        }
    }

    private peek(): string | undefined {
        return this.atEnd() ? undefined : this.text[this.pos];
    }

    private atEnd(): boolean {
        return this.pos >= this.text.length;
    }
}
