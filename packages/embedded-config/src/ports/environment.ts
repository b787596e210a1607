/** Environment variables as seen by the locator. `process.env` satisfies it. */
export type Environment = Readonly<Record<string, string | undefined>>
