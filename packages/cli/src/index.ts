#!/usr/bin/env node

import { createProgram } from './program.js';
import { reportError } from './utils/cli.js';

createProgram().parseAsync(process.argv).catch(reportError);
