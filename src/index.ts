#!/usr/bin/env node
/**
 * inventory-check
 * Entry point - cron: 0 6 * * * inventory-check
 */

import { main } from './cli.js';

process.exit(await main(process.argv.slice(2), process.env));
