#!/usr/bin/env node

/**
 * Series index CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);
