/* eslint-disable no-console */
import { run } from './cli'

run(process.argv.slice(2), {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
})
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error)
    console.error(`[trace-stats] failed: ${message}`)
    process.exit(1)
  })
