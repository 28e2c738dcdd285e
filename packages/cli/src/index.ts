/**
 * @pocket-rsa/cli — command-line front end for pocket-rsa.
 *
 * @packageDocumentation
 */

export { main, printHelp } from './main.js'
export type { CommandHandler, DemoCommandOptions, GenkeyCommandOptions } from './types.js'
