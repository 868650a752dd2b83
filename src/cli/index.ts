#!/usr/bin/env node
/**
 * sandbox-chat CLI - Chat with a hosted model that can use sandboxed file tools
 */

import 'dotenv/config';
import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
