#!/usr/bin/env tsx

import { createProgram } from './program.js';

await createProgram().parseAsync();
