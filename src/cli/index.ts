#!/usr/bin/env node

/**
 * CLI entry point for mf4copy
 * Copies .mf4 files through the shared converter executable
 */

import { runConverter } from "./executable";
import { CopyConverter } from "../plugins/copy-converter";

process.exitCode = await runConverter(new CopyConverter(), process.argv.slice(2));
