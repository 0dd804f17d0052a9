#!/usr/bin/env node
import dotenv from 'dotenv';
import { runCli } from './cli.js';

// Load environment variables
dotenv.config();

process.exitCode = await runCli(process.argv.slice(2));
