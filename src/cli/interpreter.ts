import { isRecoverable, MissingArgumentError, NotFoundError } from '../errors';
import { Entity } from '../models/Entity';
import { KindRegistry } from '../models/registry';
import { AttributeValue } from '../models/types';
import { FileStorage } from '../storage/FileStorage';
import { dbg, DbgFn, say, SayFn } from '../utils';
import { ParsedCommand, parseLine } from './parser';

export type CommandOutcome = 'continue' | 'quit';

type Handler = (args: string[], mapping?: Record<string, AttributeValue>) => Promise<void>;

interface VerbInfo {
    usage: string;
    summary: string;
}

const VERBS: Record<string, VerbInfo> = {
    create: { usage: 'create <class>', summary: 'Creates an instance, saves it and prints its id.' },
    show: { usage: 'show <class> <id>', summary: 'Prints an instance.' },
    destroy: { usage: 'destroy <class> <id>', summary: 'Deletes an instance and saves the change.' },
    all: { usage: 'all [<class>]', summary: 'Prints every instance, or every instance of a class.' },
    update: {
        usage: 'update <class> <id> <attribute> "<value>"',
        summary: 'Sets an attribute and saves the change. id, created_at and updated_at cannot be changed.',
    },
    count: { usage: 'count <class>', summary: 'Prints the number of instances of a class.' },
    help: { usage: 'help [<command>]', summary: 'Lists commands, or describes one.' },
    quit: { usage: 'quit', summary: 'Exits the console.' },
    EOF: { usage: 'EOF', summary: 'Exits the console (end of input).' },
};

export interface InterpreterOptions {
    registry: KindRegistry;
    storage: FileStorage;
    sayFn?: SayFn;
    dbgFn?: DbgFn;
}

/**
 * Turns input lines into operations on the registry and storage.
 * Validation failures are printed as `** <reason> **` and the session
 * carries on; the table is never left half-changed by a rejected command.
 */
export class CommandInterpreter {
    private readonly registry: KindRegistry;
    private readonly storage: FileStorage;
    private readonly sayFn: SayFn;
    private readonly dbgFn: DbgFn;
    private readonly handlers: Record<string, Handler>;

    constructor(options: InterpreterOptions) {
        this.registry = options.registry;
        this.storage = options.storage;
        this.sayFn = options.sayFn ?? say;
        this.dbgFn = options.dbgFn ?? dbg;
        this.handlers = {
            create: (args) => this.create(args),
            show: (args) => this.show(args),
            destroy: (args) => this.destroy(args),
            all: (args) => this.all(args),
            update: (args, mapping) => this.update(args, mapping),
            count: (args) => this.count(args),
            help: async (args) => this.help(args),
        };
    }

    async execute(line: string): Promise<CommandOutcome> {
        const parsed = parseLine(line);
        switch (parsed.type) {
            case 'empty':
                return 'continue';
            case 'invalid':
                this.unknownSyntax(line);
                return 'continue';
            case 'command':
                return this.dispatch(parsed.command, line);
        }
    }

    async dispatch(command: ParsedCommand, line: string): Promise<CommandOutcome> {
        if (command.verb === 'quit' || command.verb === 'EOF') {
            return 'quit';
        }
        const handler = Object.hasOwn(this.handlers, command.verb) ? this.handlers[command.verb] : undefined;
        if (!handler) {
            this.unknownSyntax(line);
            return 'continue';
        }
        this.dbgFn(`Interpreter: ${command.verb} ${command.args.join(' ')}`);
        try {
            await handler(command.args, command.mapping);
        } catch (error: unknown) {
            if (!isRecoverable(error)) {
                throw error;
            }
            this.sayFn(`** ${error.message} **`);
        }
        return 'continue';
    }

    private async create(args: string[]): Promise<void> {
        const [kindName] = args;
        if (!kindName) {
            throw new MissingArgumentError('class name');
        }
        const entity = this.registry.resolve(kindName).create();
        this.storage.put(entity);
        this.sayFn(entity.id);
        await this.storage.persist();
    }

    private async show(args: string[]): Promise<void> {
        this.sayFn(this.findEntity(args).describe());
    }

    private async destroy(args: string[]): Promise<void> {
        const entity = this.findEntity(args);
        this.storage.remove(entity.kind, entity.id);
        await this.storage.persist();
    }

    private async all(args: string[]): Promise<void> {
        const [kindName] = args;
        if (kindName !== undefined) {
            this.registry.resolve(kindName);
        }
        const described = [...this.storage.all(kindName)].map(entity => entity.describe());
        this.sayFn(JSON.stringify(described));
    }

    private async update(args: string[], mapping?: Record<string, AttributeValue>): Promise<void> {
        const entity = this.findEntity(args);
        let changes: Array<[string, AttributeValue]>;
        if (mapping) {
            changes = Object.entries(mapping);
            if (changes.length === 0) {
                throw new MissingArgumentError('attribute name');
            }
        } else {
            const [, , attribute, value] = args;
            if (attribute === undefined) {
                throw new MissingArgumentError('attribute name');
            }
            if (value === undefined) {
                throw new MissingArgumentError('value');
            }
            changes = [[attribute, value]];
        }
        entity.update(changes);
        this.storage.put(entity);
        await this.storage.persist();
    }

    private async count(args: string[]): Promise<void> {
        const [kindName] = args;
        if (!kindName) {
            throw new MissingArgumentError('class name');
        }
        this.registry.resolve(kindName);
        this.sayFn(String(this.storage.count(kindName)));
    }

    private help(args: string[]): void {
        const [topic] = args;
        if (topic === undefined) {
            this.sayFn(`Commands: ${Object.keys(VERBS).join(', ')}`);
            this.sayFn(`Classes: ${this.registry.knownKinds().join(', ')}`);
            this.sayFn('Classes also accept <class>.<command>(<args>), e.g. User.show("<id>").');
            return;
        }
        const info = Object.hasOwn(VERBS, topic) ? VERBS[topic] : undefined;
        if (!info) {
            this.sayFn(`*** No help on ${topic}`);
            return;
        }
        this.sayFn(`${info.usage}: ${info.summary}`);
    }

    /** Resolves `<class> <id>` arguments to a live entity. */
    private findEntity(args: string[]): Entity {
        const [kindName, id] = args;
        if (!kindName) {
            throw new MissingArgumentError('class name');
        }
        this.registry.resolve(kindName);
        if (id === undefined) {
            throw new MissingArgumentError('instance id');
        }
        const entity = this.storage.get(kindName, id);
        if (!entity) {
            throw new NotFoundError(kindName, id);
        }
        return entity;
    }

    private unknownSyntax(line: string): void {
        this.sayFn(`*** Unknown syntax: ${line.trim()}`);
    }
}
