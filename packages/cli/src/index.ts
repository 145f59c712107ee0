#!/usr/bin/env tsx
/**
 * vtfkit CLI entry point
 */

import { run } from './cli'

process.exitCode = run(process.argv.slice(2))
