import { applyGlobalFlags, buildProgram } from './program'
import { logger } from './utils/logger'

async function main(): Promise<void> {
  applyGlobalFlags(process.argv)
  await buildProgram().parseAsync(process.argv)
}

main().catch((err: unknown) => {
  logger.error(err instanceof Error ? err.message : String(err))
  process.exitCode = 1
})
