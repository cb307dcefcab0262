/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/capstack.ts   (entry point)
 *   src/index.ts          (library export)
 */

import { Command } from 'commander'
import { runCommand } from './run.js'
import { validateCommand } from './validate.js'
import { callCommand } from './call.js'
import { logsCommand } from './logs.js'
import { providersCommand } from './providers.js'

export const program = new Command()

program
  .name('capstack')
  .description(
    'Capstack — assemble an AI service stack from a manifest and serve it.\n' +
    'Every capability call is routed to the provider the manifest binds.',
  )
  .version('0.1.0')

program.addCommand(runCommand)
program.addCommand(validateCommand)
program.addCommand(callCommand)
program.addCommand(logsCommand)
program.addCommand(providersCommand)
