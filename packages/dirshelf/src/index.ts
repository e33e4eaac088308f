#!/usr/bin/env node
/**
 * Entry point for the dirshelf CLI application.
 *
 * This module is the executable wrapper that bootstraps the CLI by invoking
 * the main function from `@dirshelf/cli`. It reports fatal errors that escape
 * the CLI's own error handling.
 *
 * @packageDocumentation
 */

import { main } from '@dirshelf/cli';

main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`\n[dirshelf] A fatal, unhandled error occurred: ${message}`);
    if (process.env.DEBUG && error instanceof Error) {
        console.error(error.stack);
    }
    process.exit(1);
});
