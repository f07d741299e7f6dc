#!/usr/bin/env node

import { createProgram } from './program.js';
import { createSessionOpener, reportFailure } from './helpers.js';

createProgram(createSessionOpener(process.env))
  .parseAsync()
  .catch(reportFailure);
