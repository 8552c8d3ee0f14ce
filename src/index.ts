#!/usr/bin/env node
// src/index.ts is the main entry point to run CLI
import { main } from './cli/index.js';

await main();
