/** Options parsed from the `pocket-rsa genkey` command line. */
export interface GenkeyCommandOptions {
  /** Report every rejected prime pair on stderr. */
  verbose: boolean
  /** Directory holding config.json. Defaults to the platform config dir. */
  configDir?: string | undefined
}

/** Options parsed from the `pocket-rsa demo` command line. */
export interface DemoCommandOptions {
  /** Plaintext to round-trip. Defaults to 42. */
  message: number
  /** Directory holding config.json. Defaults to the platform config dir. */
  configDir?: string | undefined
}

/** A command handler: takes the arguments after the subcommand, returns an exit code. */
export type CommandHandler = (args: string[]) => Promise<number>
