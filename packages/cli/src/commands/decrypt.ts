import { parseArgs } from 'node:util'
import { decrypt } from 'pocket-rsa'
import { formatError } from '../output.js'
import { parseU32, parseU64 } from '../parse.js'

export function decryptCommand(args: string[]): Promise<number> {
  try {
    const { positionals } = parseArgs({ args, allowPositionals: true, strict: true })
    const [pText, qText, ciphertextText] = positionals
    if (
      pText === undefined ||
      qText === undefined ||
      ciphertextText === undefined ||
      positionals.length > 3
    ) {
      process.stderr.write('Usage: pocket-rsa decrypt <p> <q> <ciphertext>\n')
      return Promise.resolve(1)
    }

    const message = decrypt(
      [parseU32(pText, 'p'), parseU32(qText, 'q')],
      parseU64(ciphertextText, 'ciphertext'),
    )
    process.stdout.write(`${String(message)}\n`)
    return Promise.resolve(0)
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return Promise.resolve(1)
  }
}
