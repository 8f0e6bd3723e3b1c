#!/usr/bin/env node
/**
 * @fileoverview Entry point for the `pdb-mirror` executable.
 * @module src/index
 */
import 'reflect-metadata';

import { createProgram } from './cli/index.js';

await createProgram().parseAsync(process.argv);
