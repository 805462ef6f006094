#!/usr/bin/env node
/**
 * @module accord-cli
 * CLI entry point for accord.
 *
 * Registers all sub-commands and parses process.argv via Commander.js.
 */

import { createProgram } from './program.js';

const program = createProgram();
await program.parseAsync();
