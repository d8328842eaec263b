#!/usr/bin/env tsx
/**
 * irdump - print a textual dump of an IR executable described in YAML
 *
 * Usage: irdump <file.yaml> [--indent <n>] [--validate] [--output <path>]
 */

import { handleDumpCommand } from "#cli";

process.exitCode = await handleDumpCommand(process.argv.slice(2));
