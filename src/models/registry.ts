import { UnknownKindError } from '../errors';
import { Entity } from './Entity';
import { BUILT_IN_KINDS } from './kinds';
import { EntityDependencies, KindDefinition, KindSchema, SerializedEntity } from './types';

/** Builds entities of one kind, either fresh or from a persisted record. */
export interface KindConstructor {
    readonly name: string;
    readonly schema: KindSchema;
    create(): Entity;
    restore(record: SerializedEntity): Entity;
}

export function kindConstructor(definition: KindDefinition, deps: EntityDependencies = {}): KindConstructor {
    return {
        name: definition.name,
        schema: definition.schema,
        create: () => Entity.create(definition, deps),
        restore: (record) => Entity.restore(definition, record, deps),
    };
}

/**
 * Maps kind names to their constructors. Populated once at startup;
 * `resolve` is the single place an unknown kind name is rejected.
 */
export class KindRegistry {
    private readonly kinds = new Map<string, KindConstructor>();

    register(kindName: string, constructor: KindConstructor): void {
        if (this.kinds.has(kindName)) {
            throw new Error(`KindRegistry: kind "${kindName}" is already registered.`);
        }
        if (constructor.name !== kindName) {
            throw new Error(`KindRegistry: constructor for "${constructor.name}" cannot be registered as "${kindName}".`);
        }
        this.kinds.set(kindName, constructor);
    }

    resolve(kindName: string): KindConstructor {
        const constructor = this.kinds.get(kindName);
        if (!constructor) {
            throw new UnknownKindError(kindName);
        }
        return constructor;
    }

    has(kindName: string): boolean {
        return this.kinds.has(kindName);
    }

    /** Registered kind names, in registration order. */
    knownKinds(): string[] {
        return [...this.kinds.keys()];
    }
}

export function createDefaultRegistry(deps: EntityDependencies = {}): KindRegistry {
    const registry = new KindRegistry();
    for (const definition of BUILT_IN_KINDS) {
        registry.register(definition.name, kindConstructor(definition, deps));
    }
    return registry;
}
