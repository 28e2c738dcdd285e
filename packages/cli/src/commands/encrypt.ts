import { parseArgs } from 'node:util'
import { encrypt } from 'pocket-rsa'
import { formatError } from '../output.js'
import { parseU32, parseU64 } from '../parse.js'

export function encryptCommand(args: string[]): Promise<number> {
  try {
    const { positionals } = parseArgs({ args, allowPositionals: true, strict: true })
    const [nText, messageText] = positionals
    if (nText === undefined || messageText === undefined || positionals.length > 2) {
      process.stderr.write('Usage: pocket-rsa encrypt <n> <message>\n')
      return Promise.resolve(1)
    }

    const ciphertext = encrypt(parseU64(nText, 'n'), parseU32(messageText, 'message'))
    process.stdout.write(`${String(ciphertext)}\n`)
    return Promise.resolve(0)
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return Promise.resolve(1)
  }
}
