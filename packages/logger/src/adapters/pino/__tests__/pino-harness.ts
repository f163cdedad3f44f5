import { Writable } from "node:stream"
import type { CapturedLog, LoggerHarness } from "../../../ports/__tests__/logger-harness"
import type { LogLevelName } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

const levelNames: Record<number, LogLevelName> = {
  10: "trace",
  20: "debug",
  30: "info",
  40: "warn",
  50: "error",
  60: "fatal",
}

export function captureLines(): { lines: string[]; destination: Writable } {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    make: (opts) => {
      const { lines, destination } = captureLines()

      return {
        logger: new PinoLogger({ destination }, { level: opts?.level ?? "trace" }),
        read: (): CapturedLog[] =>
          lines.map((line) => {
            const payload: Record<string, unknown> = JSON.parse(line)

            return { level: levelNames[Number(payload.level)] ?? "info", payload }
          }),
      }
    },
  }
}
