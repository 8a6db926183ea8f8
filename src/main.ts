#!/usr/bin/env node
/**
 * csvsieve executable entry point
 */

import { createProgram } from './cli.js';

await createProgram().parseAsync(process.argv);
