/**
 * Application logger singleton backed by Winston.
 *
 * - Writes daily rotated log files to `<logsDir>/application-<DATE>.log`.
 * - Outside production, logs are also written to the console with
 *   colorized output.
 * - Under `NODE_ENV=test` a single silent console transport is used and no
 *   files or directories are created.
 *
 * The level comes from `LOG_LEVEL`, then `config.json` `logging.level`,
 * then `info`.
 */
import fs from 'fs'
import { createLogger, format, transports } from 'winston'
import type Transport from 'winston-transport'
import DailyRotateFile from 'winston-daily-rotate-file'

const { combine, timestamp, printf, colorize } = format

const logFormat = printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`
})

const isTest = process.env.NODE_ENV === 'test'

type LoggingSettings = {
  logsDir: string
  level: string
  dailyRotate: boolean
  maxSize: string
  maxFiles: string
  console: boolean
}

const str = (v: unknown, fallback: string) => (typeof v === 'string' && v ? v : fallback)
const flag = (v: unknown, fallback: boolean) => (typeof v === 'boolean' ? v : fallback)
const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v)
const section = (obj: unknown, key: string): Record<string, unknown> => {
  const v = isRecord(obj) ? obj[key] : undefined
  return isRecord(v) ? v : {}
}

/**
 * Read the `logging` and `paths` sections of `config.json` synchronously.
 * The logger is built at import time, before any async config load.
 */
function loadSettings(cfgPath = 'config.json'): LoggingSettings {
  let parsed: unknown = {}
  try {
    if (fs.existsSync(cfgPath)) parsed = JSON.parse(fs.readFileSync(cfgPath, 'utf8'))
  } catch (e) {
    // the logger is not up yet; report and continue with defaults
    console.warn(`Ignoring unreadable ${cfgPath}: ${e instanceof Error ? e.message : String(e)}`)
  }
  const logging = section(parsed, 'logging')
  return {
    logsDir: str(section(parsed, 'paths').logsDir, 'logs'),
    level: process.env.LOG_LEVEL || str(logging.level, 'info'),
    dailyRotate: flag(logging.dailyRotate, true),
    maxSize: str(logging.maxSize, '20m'),
    maxFiles: str(logging.maxFiles, '14d'),
    console: flag(logging.console, process.env.NODE_ENV !== 'production'),
  }
}

function buildTransports(settings: LoggingSettings): Transport[] {
  if (isTest) return [new transports.Console({ silent: true })]

  if (!fs.existsSync(settings.logsDir)) fs.mkdirSync(settings.logsDir, { recursive: true })

  const list: Transport[] = []
  if (settings.dailyRotate) {
    list.push(
      new DailyRotateFile({
        filename: `${settings.logsDir}/application-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: settings.maxSize,
        maxFiles: settings.maxFiles,
        level: settings.level,
      }),
    )
  } else {
    list.push(new transports.File({ filename: `${settings.logsDir}/application.log`, level: settings.level }))
  }
  if (settings.console) {
    list.push(new transports.Console({ format: combine(colorize(), timestamp(), logFormat) }))
  }
  return list
}

const settings = loadSettings()

const logger = createLogger({
  level: settings.level,
  format: combine(timestamp(), logFormat),
  transports: buildTransports(settings),
})

export default logger
