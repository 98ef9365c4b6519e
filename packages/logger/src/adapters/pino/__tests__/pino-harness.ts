import { Writable } from "node:stream"
import type { CapturedLog, LoggerHarness } from "../../../ports/__tests__/logger-harness"
import { type LogLevelName, LogLevels } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

const pinoLevelToName = new Map<number, LogLevelName>([
  [LogLevels.Trace, "trace"],
  [LogLevels.Debug, "debug"],
  [LogLevels.Info, "info"],
  [LogLevels.Warn, "warn"],
  [LogLevels.Error, "error"],
  [LogLevels.Fatal, "fatal"],
])

export function parseLine(line: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(line)

  if (typeof parsed !== "object" || parsed === null) {
    throw new TypeError(`expected a JSON object, got: ${line}`)
  }

  return Object.fromEntries(Object.entries(parsed))
}

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    make: (opts) => {
      const captured: CapturedLog[] = []

      const destination = new Writable({
        write(chunk: Buffer, _encoding, cb) {
          const payload = parseLine(chunk.toString("utf8"))
          const level = pinoLevelToName.get(Number(payload.level)) ?? "info"

          captured.push({ level, payload })

          cb()
        },
      })

      return {
        logger: new PinoLogger({ destination }, { level: opts?.level ?? "trace" }),
        read: () => [...captured],
        clear: () => {
          captured.length = 0
        },
      }
    },
  }
}
