#!/usr/bin/env node
/**
 * Main entry point for the hook harvester CLI
 */

import { createProgram, reportFailure } from './cli.js';

async function start(): Promise<void> {
    try {
        await createProgram().parseAsync(process.argv);
    } catch (error) {
        reportFailure(error);
        process.exitCode = 1;
    }
}

void start();
