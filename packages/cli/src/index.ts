#!/usr/bin/env tsx

import { createProgram } from './program.js';

// Parse and run
await createProgram().parseAsync();
