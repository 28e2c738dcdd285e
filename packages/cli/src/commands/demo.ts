import { parseArgs } from 'node:util'
import { decrypt, encrypt, genkey, keygenOptions, loadConfig, publicModulus } from 'pocket-rsa'
import { formatError, formatFields } from '../output.js'
import { parseU32 } from '../parse.js'
import type { DemoCommandOptions } from '../types.js'

const DEFAULT_MESSAGE = 42

function parseDemoArgs(args: string[]): DemoCommandOptions {
  const { values } = parseArgs({
    args,
    options: {
      message: { type: 'string', short: 'm' },
      config: { type: 'string' },
    },
    strict: true,
  })
  return {
    message: values.message === undefined ? DEFAULT_MESSAGE : parseU32(values.message, 'message'),
    configDir: values.config,
  }
}

/** Generate a throwaway key and round-trip one message through it. */
export async function demoCommand(args: string[]): Promise<number> {
  try {
    const options = parseDemoArgs(args)
    const config = await loadConfig(options.configDir)

    const key = genkey(keygenOptions(config))
    const encrypted = encrypt(publicModulus(key), options.message)
    const decrypted = decrypt(key, encrypted)

    process.stdout.write(
      formatFields([
        ['Original', options.message],
        ['Encrypted', encrypted],
        ['Decrypted', decrypted],
      ]),
    )
    return decrypted === options.message ? 0 : 1
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
