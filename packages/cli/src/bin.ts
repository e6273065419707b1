#!/usr/bin/env node
import { createProgram } from './index.js';

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
