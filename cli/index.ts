#!/usr/bin/env node
/**
 * Tunny CLI - Encrypt and decrypt text with a simulated Lorenz cipher
 */

import { createProgram } from './program.js';

createProgram().parse();
