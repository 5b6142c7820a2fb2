#!/usr/bin/env node

import { createProgram, handleError } from './program.js';

createProgram().parseAsync().catch(handleError);
