/**
 * Structured console logger.
 * Every line carries `key=value` context (repo, branch, pull request, event)
 * so a failed sync or check can be traced from the log alone.
 */

type LogContext = Record<string, unknown>

export type LogLevel = "debug" | "info" | "warn" | "error"

interface FormattedError {
  message: string
  status?: number
  code?: string
  stack?: string
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER

const formatContext = (ctx: LogContext): string => {
  const parts: string[] = []
  for (const [key, value] of Object.entries(ctx)) {
    if (value === undefined || value === null) continue
    parts.push(`${key}=${typeof value === "string" ? value : JSON.stringify(value)}`)
  }
  return parts.join(" ")
}

const readNumberField = (obj: object, field: string): number | undefined => {
  const value: unknown = Reflect.get(obj, field)
  return typeof value === "number" ? value : undefined
}

const readStringField = (obj: object, field: string): string | undefined => {
  const value: unknown = Reflect.get(obj, field)
  return typeof value === "string" ? value : undefined
}

const formatError = (error: unknown): FormattedError => {
  if (error instanceof Error) {
    const result: FormattedError = {
      message: error.message,
      stack: error.stack,
    }
    const status = readNumberField(error, "status")
    if (status !== undefined) result.status = status
    const code = readStringField(error, "code")
    if (code !== undefined) result.code = code
    return result
  }
  if (error && typeof error === "object") {
    return {
      message: readStringField(error, "message") ?? readStringField(error, "type") ?? "Unknown error",
      status: readNumberField(error, "status"),
    }
  }
  return { message: String(error) }
}

const minimumLevel = (): LogLevel => {
  const configured = process.env.LOG_LEVEL?.toLowerCase()
  if (configured && isLogLevel(configured)) return configured
  return process.env.NODE_ENV === "production" ? "info" : "debug"
}

const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()]

const line = (level: LogLevel, message: string, ctx: LogContext) => {
  const ctxStr = formatContext(ctx)
  return `[${level}] ${message}${ctxStr ? ` | ${ctxStr}` : ""}`
}

export const log = {
  debug: (message: string, ctx: LogContext = {}) => {
    if (!enabled("debug")) return
    console.warn(line("debug", message, ctx))
  },

  info: (message: string, ctx: LogContext = {}) => {
    if (!enabled("info")) return
    console.warn(line("info", message, ctx))
  },

  warn: (message: string, ctx: LogContext = {}) => {
    if (!enabled("warn")) return
    console.warn(line("warn", message, ctx))
  },

  error: (message: string, error: unknown, ctx: LogContext = {}) => {
    const err = formatError(error)
    console.error(line("error", message, { ...ctx, error: err.message, status: err.status, code: err.code }))
    if (err.stack && enabled("debug")) {
      console.error(err.stack)
    }
  },
}

export { formatError, formatContext }
