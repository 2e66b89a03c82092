#!/usr/bin/env node
// infra-drift CLI

import { buildProgram } from './program.js';
import { handleError } from './utils/error-handler.js';

buildProgram().parseAsync().catch(handleError);
