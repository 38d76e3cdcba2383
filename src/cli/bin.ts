#!/usr/bin/env node
/**
 * tierdata — Executable entry point
 */

import { runCli } from './cli.js';

process.exitCode = await runCli(process.argv.slice(2));
