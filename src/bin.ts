#!/usr/bin/env node
import dotenv from 'dotenv';
import { buildProgram } from './cli/program.js';

dotenv.config();

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
