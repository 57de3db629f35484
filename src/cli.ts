#!/usr/bin/env node
/**
 * CLI entrypoint for takeout-merge.
 *
 * Usage:
 *   takeout-merge --root ~/exports
 *   takeout-merge --root ~/exports --mode validate-only --test-limit 2
 */
import { main } from "./main.js";

process.exitCode = await main(process.argv.slice(2));
