import { runApp } from './app'
import { ConfigError, getErrorMessage, StartupError } from './shared/lib/error'

const main = async () => {
  try {
    process.exitCode = await runApp({ startDir: process.argv[2] })
  } catch (err) {
    if (err instanceof ConfigError || err instanceof StartupError) {
      process.stderr.write(`panewalk: ${err.message}\n`)
      process.exitCode = 1
      return
    }
    throw err
  }
}

main().catch((err) => {
  process.stderr.write(`panewalk: unexpected failure: ${getErrorMessage(err)}\n`)
  process.exitCode = 1
})
