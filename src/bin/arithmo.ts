#!/usr/bin/env node
import { main } from '../cli-repl.js';

process.exitCode = await main(process.argv.slice(2));
