/**
 * Subcommand dispatch for the pocket-rsa CLI.
 *
 * Each subcommand is lazy-loaded via dynamic import() so only the requested
 * command's module is loaded.
 *
 * argv layout: [subcommand, ...commandArgs]
 *
 * @internal
 */

import type { CommandHandler } from './types.js'

const COMMANDS: Record<string, () => Promise<CommandHandler>> = {
  genkey: async () => (await import('./commands/genkey.js')).genkeyCommand,
  encrypt: async () => (await import('./commands/encrypt.js')).encryptCommand,
  decrypt: async () => (await import('./commands/decrypt.js')).decryptCommand,
  modexp: async () => (await import('./commands/modexp.js')).modexpCommand,
  demo: async () => (await import('./commands/demo.js')).demoCommand,
}

export function printHelp(): void {
  process.stdout.write(
    'Usage: pocket-rsa <command> [options]\n\n' +
      'Commands:\n' +
      '  genkey    Generate a key pair [--verbose] [--config <dir>]\n' +
      '  encrypt   Encrypt a u32 message: encrypt <n> <message>\n' +
      '  decrypt   Decrypt a ciphertext: decrypt <p> <q> <ciphertext>\n' +
      '  modexp    Compute x^y mod m: modexp <x> <y> <m>\n' +
      '  demo      Generate a key and round-trip a message [--message <u32>]\n',
  )
}

export async function main(argv: string[]): Promise<number> {
  const [subcommand, ...commandArgs] = argv

  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  const load = Object.hasOwn(COMMANDS, subcommand) ? COMMANDS[subcommand] : undefined
  if (load === undefined) {
    process.stderr.write(`Unknown command: ${subcommand}\n`)
    printHelp()
    return 1
  }

  const command = await load()
  return command(commandArgs)
}
