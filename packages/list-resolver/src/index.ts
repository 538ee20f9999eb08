#!/usr/bin/env node
/**
 * list-resolver - resolve exported movie lists into Radarr-importable JSON
 */

import { fileURLToPath } from 'node:url';

import { makeResolveCommand } from './cli/resolve.js';

const baseDir = fileURLToPath(new URL('..', import.meta.url));

await makeResolveCommand(baseDir).parseAsync(process.argv);
