import { parseArgs } from 'node:util'
import { PUBLIC_EXPONENT, genkey, keygenOptions, loadConfig, publicModulus } from 'pocket-rsa'
import { dim, formatError, formatFields, formatRejection } from '../output.js'
import type { GenkeyCommandOptions } from '../types.js'

function parseGenkeyArgs(args: string[]): GenkeyCommandOptions {
  const { values } = parseArgs({
    args,
    options: {
      verbose: { type: 'boolean', short: 'v' },
      config: { type: 'string' },
    },
    strict: true,
  })
  return { verbose: values.verbose ?? false, configDir: values.config }
}

export async function genkeyCommand(args: string[]): Promise<number> {
  try {
    const options = parseGenkeyArgs(args)
    const config = await loadConfig(options.configDir)

    const key = genkey({
      ...keygenOptions(config),
      onReject: options.verbose
        ? (rejection) => {
            process.stderr.write(`${dim(formatRejection(rejection), process.stderr)}\n`)
          }
        : undefined,
    })

    const [p, q] = key
    process.stdout.write(
      formatFields([
        ['p', p],
        ['q', q],
        ['n', publicModulus(key)],
        ['e', PUBLIC_EXPONENT],
      ]),
    )
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
