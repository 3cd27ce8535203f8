import winston from 'winston'
import { loadConfig, type Config } from './config.js'

// "<time> [fallible:<scope>] <level>: <message> {meta}"
const line = winston.format.printf(({ timestamp, level, message, service, scope, stack, ...meta }) => {
  const origin = scope === undefined ? String(service) : `${String(service)}:${String(scope)}`
  let text = `${String(timestamp)} [${origin}] ${level}: ${String(message)}`
  if (stack) {
    text += `\n${String(stack)}`
  }
  if (Object.keys(meta).length) {
    text += ` ${JSON.stringify(meta)}`
  }
  return text
})

const fileTransport = (logging: Config['logging'], filename: string): winston.transport => {
  const options: winston.transports.FileTransportOptions = {
    filename,
    level: logging.level,
    maxFiles: logging.maxFiles ?? 5,
    tailable: true,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.splat(),
      line
    )
  }
  if (logging.maxSizeMB) {
    options.maxsize = logging.maxSizeMB * 1024 * 1024
  }
  return new winston.transports.File(options)
}

const createLogger = (): winston.Logger => {
  const { logging } = loadConfig()

  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        line
      )
    })
  ]
  if (logging.filePath) {
    transports.push(fileTransport(logging, logging.filePath))
  }

  return winston.createLogger({
    level: logging.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { service: 'fallible' },
    transports
  })
}

let root: winston.Logger | undefined

/** The shared logger, built from configuration on first use. */
export const getLogger = (): winston.Logger => {
  if (!root) {
    root = createLogger()
  }
  return root
}

/** Accessor for a child logger whose lines are tagged with `scope`. */
export const scopedLogger = (scope: string): (() => winston.Logger) => {
  let child: winston.Logger | undefined
  return () => {
    if (!child) {
      child = getLogger().child({ scope })
    }
    return child
  }
}
