#!/usr/bin/env node
// CLI entry point for dataflag

// Suppress dotenv output so stdout stays machine-readable
process.env.DOTENV_CONFIG_QUIET = 'true';

import { runCli } from './cli/index.js';
import { handleCliError } from './cli/utils/errors.js';

runCli(process.argv.slice(2)).catch(handleCliError);
