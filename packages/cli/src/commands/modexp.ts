import { parseArgs } from 'node:util'
import { modexp } from 'pocket-rsa'
import { formatError } from '../output.js'
import { parseU64 } from '../parse.js'

export function modexpCommand(args: string[]): Promise<number> {
  try {
    const { positionals } = parseArgs({ args, allowPositionals: true, strict: true })
    const [x, y, m] = positionals
    if (x === undefined || y === undefined || m === undefined || positionals.length > 3) {
      process.stderr.write('Usage: pocket-rsa modexp <x> <y> <m>\n')
      return Promise.resolve(1)
    }

    const result = modexp(parseU64(x, 'x'), parseU64(y, 'y'), parseU64(m, 'm'))
    process.stdout.write(`${String(result)}\n`)
    return Promise.resolve(0)
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return Promise.resolve(1)
  }
}
