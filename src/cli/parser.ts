import { AttributeValue } from '../models/types';
import { parseArgumentList } from './literal';

/** Canonical shape both input syntaxes are reduced to before dispatch. */
export interface ParsedCommand {
    verb: string;
    args: string[];
    /** Attribute/value pairs from an inline mapping, in the order given. */
    mapping?: Record<string, AttributeValue>;
}

export type ParsedLine =
    | { type: 'empty' }
    | { type: 'invalid' }
    | { type: 'command'; command: ParsedCommand };

const DOTTED_CALL = /^([A-Za-z_]\w*)\.([A-Za-z_]\w*)\((.*)\)$/s;
const DOTTED_VERBS = new Set(['all', 'count', 'create', 'show', 'destroy', 'update']);

/**
 * Parses one input line. `<Kind>.<verb>(<args>)` is tried first; anything
 * else is split on whitespace with `tokenize`.
 */
export function parseLine(line: string): ParsedLine {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
        return { type: 'empty' };
    }
    const dotted = DOTTED_CALL.exec(trimmed);
    if (dotted) {
        const command = parseDottedCall(dotted[1], dotted[2], dotted[3]);
        return command ? { type: 'command', command } : { type: 'invalid' };
    }
    const [verb, ...args] = tokenize(trimmed);
    return { type: 'command', command: { verb, args } };
}

/**
 * Translates `Kind.verb(args)` into the space-separated form, e.g.
 * `User.update("42", "first_name", "Betty")` becomes
 * `{ verb: 'update', args: ['User', '42', 'first_name', 'Betty'] }`.
 * @returns `null` when the verb is not callable this way or the
 *   arguments do not form a supported shape.
 */
export function parseDottedCall(kind: string, verb: string, argumentText: string): ParsedCommand | null {
    if (!DOTTED_VERBS.has(verb)) {
        return null;
    }
    const values = parseArgumentList(argumentText);
    if (values === null || values.length > 3) {
        return null;
    }
    const command: ParsedCommand = { verb, args: [kind] };
    const [id, attribute, value] = values;
    if (id === undefined) {
        return command;
    }
    if (typeof id !== 'string') {
        return null;
    }
    command.args.push(id);
    if (attribute === undefined) {
        return command;
    }
    if (isMapping(attribute)) {
        if (value !== undefined) {
            return null;
        }
        command.mapping = attribute;
        return command;
    }
    if (typeof attribute !== 'string') {
        return null;
    }
    if (value === undefined) {
        command.args.push(attribute);
    } else if (typeof value === 'string') {
        command.args.push(attribute, value);
    } else {
        command.mapping = { [attribute]: value };
    }
    return command;
}

/**
 * Splits a line on whitespace. Double-quoted segments (with `\"` and `\\`
 * escapes) keep their spaces and lose their quotes; a segment glued to
 * unquoted text joins the same token. An unclosed quote runs to the end.
 */
export function tokenize(line: string): string[] {
    const tokens: string[] = [];
    let current = '';
    let inToken = false;
    let quoted = false;
    for (let i = 0; i < line.length; i++) {
        const ch = line[i];
        if (quoted) {
            const next = line[i + 1];
            if (ch === '\\' && (next === '"' || next === '\\')) {
                current += next;
                i++;
            } else if (ch === '"') {
                quoted = false;
            } else {
                current += ch;
            }
        } else if (ch === '"') {
            quoted = true;
            inToken = true;
        } else if (/\s/.test(ch)) {
            if (inToken) {
                tokens.push(current);
                current = '';
                inToken = false;
            }
        } else {
            current += ch;
            inToken = true;
        }
    }
    if (inToken) {
        tokens.push(current);
    }
    return tokens;
}

function isMapping(value: AttributeValue): value is { [key: string]: AttributeValue } {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
