#!/usr/bin/env node
import { main } from '../cli-eval.js';

process.exitCode = main(process.argv.slice(2));
