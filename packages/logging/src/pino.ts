import pino, { type Logger, type LoggerOptions, type LogFn } from 'pino'
import pinoPretty from 'pino-pretty'
import {
    type ChannelLogger,
    type LoggerBundle,
    LogChannel
} from './types.js'
import { CHANNELS, ANSI, RESET } from './channels.js'

const CHANNEL_NAMES = new Set<string>(Object.values(LogChannel))

function isLogChannel(value: unknown): value is LogChannel {
    return typeof value === 'string' && CHANNEL_NAMES.has(value)
}

function channelOf(arg: unknown): LogChannel | undefined {
    if (typeof arg !== 'object' || arg === null || !('channel' in arg)) return undefined
    return isLogChannel(arg.channel) ? arg.channel : undefined
}

/**
 * Diagnostics go to stderr (fd 2): stdout carries the monitored device output.
 */
export function createLogger(service: string): LoggerBundle {
    const PRETTY = String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = process.env.LOG_LEVEL ?? 'warn'

    const options: LoggerOptions = {
        level: LOG_LEVEL,
        base: { service },
        hooks: {
            logMethod(this: Logger, args: Parameters<LogFn>, method: LogFn): void {
                const ch = args.length > 0 ? channelOf(args[0]) : undefined

                if (ch) {
                    const meta = CHANNELS[ch]
                    const prefix = `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`

                    if (args.length >= 2 && typeof args[1] === 'string') {
                        args[1] = `${prefix} ${args[1]}`
                    } else {
                        args.push(prefix)
                    }
                }

                method.apply(this, args)
            }
        }
    }

    const destination = PRETTY
        ? pinoPretty({
            translateTime: 'SYS:standard', // [YYYY-MM-DD HH:mm:ss.SSS +0000]
            colorize: true,
            singleLine: false,
            destination: 2,
            // keep these ignored fields out of output
            ignore: 'pid,hostname,service,channel'
        })
        : pino.destination(2)

    const base: Logger = pino(options, destination)

    const withChannel = (ch: LogChannel, extra?: Record<string, unknown>): Record<string, unknown> =>
        extra ? { channel: ch, ...extra } : { channel: ch }

    const channel = (ch: LogChannel): ChannelLogger => ({
        debug: (msg: string, extra?: Record<string, unknown>): void => {
            base.debug(withChannel(ch, extra), msg)
        },
        info: (msg: string, extra?: Record<string, unknown>): void => {
            base.info(withChannel(ch, extra), msg)
        },
        warn: (msg: string, extra?: Record<string, unknown>): void => {
            base.warn(withChannel(ch, extra), msg)
        },
        error: (msg: string, extra?: Record<string, unknown>): void => {
            base.error(withChannel(ch, extra), msg)
        },
        fatal: (msg: string, extra?: Record<string, unknown>): void => {
            base.fatal(withChannel(ch, extra), msg)
        }
    })

    return { base, channel }
}
