#!/usr/bin/env node
/**
 * CLI entry point for pocket-rsa.
 *
 * argv[0]=node, argv[1]=script, argv[2]=subcommand, argv[3..]=commandArgs
 *
 * @internal
 */

import { main } from './main.js'

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
