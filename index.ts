#!/usr/bin/env node
import { loadDotenv } from './config/dotenvLoader.js';

loadDotenv();
import { runApp } from './app.js';

const { exitCode } = runApp(process.argv.slice(2));
process.exitCode = exitCode;
