#!/usr/bin/env node
// CLI entry point: emit build instructions on stdout for the host build tool
import dotenv from 'dotenv';

import { runCli } from './runCli.js';

// Load environment variables
dotenv.config();

process.exitCode = runCli(process.env);
