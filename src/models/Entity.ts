import * as uuid from 'uuid';
import { MalformedAttributeError } from '../errors';
import { coerceToType, inferScalar } from './coerce';
import { formatTimestamp, parseTimestamp } from './timestamps';
import {
    AttributeSpec,
    AttributeValue,
    CLASS_KEY,
    Clock,
    EntityDependencies,
    IdGenerator,
    KindDefinition,
    PROTECTED_ATTRIBUTES,
    SerializedEntity,
    setField,
} from './types';

const systemClock: Clock = () => new Date();
const uuidGenerator: IdGenerator = () => uuid.v4();

/**
 * One instance of a kind: identity, lifecycle timestamps, the kind's
 * declared attributes and an overflow bag for anything undeclared.
 *
 * Instances only come from `create` (fresh) or `restore` (persisted);
 * the constructor is private.
 */
export class Entity {
    private updatedAtValue: Date;

    private constructor(
        private readonly definition: KindDefinition,
        readonly id: string,
        readonly createdAt: Date,
        updatedAt: Date,
        private readonly declared: Map<string, AttributeValue>,
        private readonly extras: Map<string, AttributeValue>,
        private readonly clock: Clock,
    ) {
        this.updatedAtValue = updatedAt;
    }

    static create(definition: KindDefinition, deps: EntityDependencies = {}): Entity {
        const clock = deps.clock ?? systemClock;
        const newId = deps.newId ?? uuidGenerator;
        const now = clock();
        const declared = new Map<string, AttributeValue>();
        for (const [name, spec] of Object.entries(definition.schema)) {
            declared.set(name, cloneValue(spec.default));
        }
        return new Entity(definition, newId(), now, new Date(now.getTime()), declared, new Map(), clock);
    }

    /**
     * Rebuilds an entity from its serialized record, keeping identity and
     * timestamps verbatim.
     * @throws MalformedAttributeError if a lifecycle field is missing or a
     *   declared attribute cannot be coerced.
     */
    static restore(definition: KindDefinition, record: SerializedEntity, deps: EntityDependencies = {}): Entity {
        const id = record.id;
        if (typeof id !== 'string' || id.length === 0) {
            throw new MalformedAttributeError('id', 'string');
        }
        const createdAt = readTimestamp(record, 'created_at');
        const updatedAt = readTimestamp(record, 'updated_at');
        if (updatedAt.getTime() < createdAt.getTime()) {
            throw new MalformedAttributeError('updated_at', 'timestamp not before created_at');
        }

        const declared = new Map<string, AttributeValue>();
        for (const [name, spec] of Object.entries(definition.schema)) {
            declared.set(name, cloneValue(spec.default));
        }
        const extras = new Map<string, AttributeValue>();
        for (const [name, value] of Object.entries(record)) {
            if (name === CLASS_KEY || PROTECTED_ATTRIBUTES.includes(name)) {
                continue;
            }
            const spec = declaredSpec(definition, name);
            if (spec) {
                declared.set(name, coerceToType(name, spec.type, value));
            } else {
                extras.set(name, value);
            }
        }
        return new Entity(definition, id, createdAt, updatedAt, declared, extras, deps.clock ?? systemClock);
    }

    get kind(): string {
        return this.definition.name;
    }

    get updatedAt(): Date {
        return this.updatedAtValue;
    }

    get(name: string): AttributeValue | undefined {
        switch (name) {
            case 'id':
                return this.id;
            case 'created_at':
                return formatTimestamp(this.createdAt);
            case 'updated_at':
                return formatTimestamp(this.updatedAtValue);
        }
        return this.declared.has(name) ? this.declared.get(name) : this.extras.get(name);
    }

    /** Refreshes `updated_at`; it always moves strictly forward. */
    touch(): void {
        const now = this.clock();
        const previous = this.updatedAtValue.getTime();
        this.updatedAtValue = now.getTime() > previous ? now : new Date(previous + 1);
    }

    /**
     * Applies attribute changes in order, then touches the entity.
     * Protected lifecycle fields are skipped. Every value is coerced before
     * any is written, so a malformed pair leaves the entity unchanged.
     * @returns The attribute names that were written.
     */
    update(changes: ReadonlyArray<readonly [string, AttributeValue]>): string[] {
        const pending: Array<[string, AttributeValue]> = [];
        for (const [name, value] of changes) {
            if (name === CLASS_KEY || PROTECTED_ATTRIBUTES.includes(name)) {
                continue;
            }
            const spec = declaredSpec(this.definition, name);
            if (spec) {
                pending.push([name, coerceToType(name, spec.type, value)]);
            } else {
                pending.push([name, typeof value === 'string' ? inferScalar(value) : value]);
            }
        }
        for (const [name, value] of pending) {
            if (this.declared.has(name)) {
                this.declared.set(name, value);
            } else {
                this.extras.set(name, value);
            }
        }
        this.touch();
        return pending.map(([name]) => name);
    }

    toSerializable(): SerializedEntity {
        const record: SerializedEntity = {
            id: this.id,
            created_at: formatTimestamp(this.createdAt),
            updated_at: formatTimestamp(this.updatedAtValue),
        };
        for (const [name, value] of [...this.declared, ...this.extras]) {
            setField(record, name, cloneValue(value));
        }
        return record;
    }

    describe(): string {
        return `[${this.kind}] (${this.id}) ${formatValue(this.toSerializable())}`;
    }
}

function declaredSpec(definition: KindDefinition, name: string): AttributeSpec | undefined {
    return Object.hasOwn(definition.schema, name) ? definition.schema[name] : undefined;
}

function readTimestamp(record: SerializedEntity, field: 'created_at' | 'updated_at'): Date {
    const raw = record[field];
    const parsed = typeof raw === 'string' ? parseTimestamp(raw) : undefined;
    if (!parsed) {
        throw new MalformedAttributeError(field, 'timestamp');
    }
    return parsed;
}

function cloneValue(value: AttributeValue): AttributeValue {
    if (Array.isArray(value)) {
        return value.map(cloneValue);
    }
    if (value !== null && typeof value === 'object') {
        const copy: { [key: string]: AttributeValue } = {};
        for (const [key, item] of Object.entries(value)) {
            setField(copy, key, cloneValue(item));
        }
        return copy;
    }
    return value;
}

function quote(text: string): string {
    return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function formatValue(value: AttributeValue): string {
    if (typeof value === 'string') {
        return quote(value);
    }
    if (Array.isArray(value)) {
        return `[${value.map(formatValue).join(', ')}]`;
    }
    if (value !== null && typeof value === 'object') {
        const fields = Object.entries(value).map(([key, item]) => `${quote(key)}: ${formatValue(item)}`);
        return `{${fields.join(', ')}}`;
    }
    return String(value);
}
