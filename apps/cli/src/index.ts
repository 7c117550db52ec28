#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Library logging is quiet unless LOG_LEVEL asks otherwise. The level has to
 * be set before any package module creates its logger.
 */

process.env['LOG_LEVEL'] ??= 'warn';

const { program } = await import('./program.js');

await program.parseAsync();
