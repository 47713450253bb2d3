#!/usr/bin/env node
import { run } from "@/src/cli"
import { handleError } from "@/src/utils/handle-error"
import { signalExitCode, trapSignals } from "@/src/utils/signals"

const trap = trapSignals()

async function main() {
  const exitCode = await run(process.argv.slice(2), { signal: trap.signal })
  const received = trap.received()
  process.exitCode = received ? signalExitCode(received) : exitCode
}

main()
  .catch((error: unknown) => {
    process.exitCode = handleError(error)
  })
  .finally(() => trap.dispose())
