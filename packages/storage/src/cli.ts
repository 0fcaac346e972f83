#!/usr/bin/env node
import { runCommand } from './commands.js';

runCommand(process.argv.slice(2)).catch((error: unknown) => {
    console.error('❌', error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
