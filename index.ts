#!/usr/bin/env node
/**
 * Fear & Greed Index Scraper - Entry Point
 *
 * Usage:
 *   npx ts-node index.ts [scrape] [options]
 *   npx ts-node index.ts info
 *
 * See cli.ts for the option list.
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { runCli } from './cli';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('❌ Fatal error:', error);
    process.exitCode = 1;
  });
