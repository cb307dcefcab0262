#!/usr/bin/env node
/**
 * bin/capstack.ts — entry point for the `capstack` command.
 *
 * Loads `.env` from the working directory before anything reads
 * CAPSTACK_HOME, CAPSTACK_PORT or CAPSTACK_LOG.
 */

import 'dotenv/config'
import { program } from '../commands/index.js'

await program.parseAsync()
