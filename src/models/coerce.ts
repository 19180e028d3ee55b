import { MalformedAttributeError } from '../errors';
import { AttributeType, AttributeValue } from './types';

const INTEGER_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Best-effort reading of free text typed at the prompt:
 * numeric-looking values become numbers, everything else stays a string.
 * Integers a number cannot hold exactly, and floats that overflow, stay text.
 */
export function inferScalar(text: string): string | number {
    if (INTEGER_TEXT.test(text)) {
        const value = Number(text);
        return Number.isSafeInteger(value) ? value : text;
    }
    if (FLOAT_TEXT.test(text)) {
        const value = Number(text);
        return Number.isFinite(value) ? value : text;
    }
    return text;
}

/**
 * Coerces a value to the declared attribute type.
 * @throws MalformedAttributeError when no sensible conversion exists.
 */
export function coerceToType(attribute: string, type: AttributeType, value: AttributeValue): AttributeValue {
    switch (type) {
        case 'string':
            if (typeof value === 'string') {
                return value;
            }
            if (typeof value === 'number' || typeof value === 'boolean') {
                return String(value);
            }
            break;
        case 'integer': {
            const number = typeof value === 'string' && INTEGER_TEXT.test(value.trim()) ? Number(value.trim()) : value;
            if (typeof number === 'number' && Number.isSafeInteger(number)) {
                return number;
            }
            break;
        }
        case 'float': {
            const number = typeof value === 'string' && FLOAT_TEXT.test(value.trim()) ? Number(value.trim()) : value;
            if (typeof number === 'number' && Number.isFinite(number)) {
                return number;
            }
            break;
        }
        case 'list':
            if (Array.isArray(value) && value.every(item => typeof item === 'string')) {
                return [...value];
            }
            break;
    }
    throw new MalformedAttributeError(attribute, type);
}
