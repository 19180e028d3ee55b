#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { CommandInterpreter } from './cli/interpreter';
import { startShell } from './cli/shell';
import { loadConfig } from './config';
import { createDefaultRegistry } from './models/registry';
import { loadStorageOrExit } from './startup';
import { FileStorage } from './storage/FileStorage';
import { dbg, setDebugLogging } from './utils';

const UNHANDLED_ERROR = 2;

// Load environment variables from .env file
dotenv.config();

async function main() {
    const config = loadConfig();
    setDebugLogging(config.debug);
    dbg(`Using storage file: ${config.storageFile}`);

    const registry = createDefaultRegistry();
    const storage = new FileStorage(registry, config.storageFile);

    // The table must be loaded before the first command is read
    await loadStorageOrExit(storage);

    const interpreter = new CommandInterpreter({
        registry,
        storage,
        sayFn: (s) => process.stdout.write(`${s}\n`),
    });
    await startShell({ interpreter, input: process.stdin, output: process.stdout });
    dbg('Console session ended.');
}

main().catch(error => {
    console.error(`Unhandled application error: ${error}`);
    process.exit(UNHANDLED_ERROR);
});
