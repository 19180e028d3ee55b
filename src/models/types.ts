/** Any value an attribute may hold once it has been through JSON. */
export type AttributeValue =
    | string
    | number
    | boolean
    | null
    | AttributeValue[]
    | { [key: string]: AttributeValue };

export type AttributeType = 'string' | 'integer' | 'float' | 'list';

export interface AttributeSpec {
    type: AttributeType;
    default: AttributeValue;
}

/** Declared attributes of a kind, in display and serialization order. */
export type KindSchema = Readonly<Record<string, AttributeSpec>>;

export interface KindDefinition {
    name: string;
    schema: KindSchema;
}

/** The flat record an entity serializes to (and is restored from). */
export type SerializedEntity = Record<string, AttributeValue>;

export type Clock = () => Date;
export type IdGenerator = () => string;

export interface EntityDependencies {
    clock?: Clock;
    newId?: IdGenerator;
}

export const PROTECTED_ATTRIBUTES: readonly string[] = ['id', 'created_at', 'updated_at'];

/** Key under which the kind name travels in the persisted document. */
export const CLASS_KEY = '__class__';

/**
 * Adds `key` as an own field of `target`. Plain assignment would treat
 * `__proto__` as the prototype rather than as an attribute name.
 */
export function setField(target: { [key: string]: AttributeValue }, key: string, value: AttributeValue): void {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
