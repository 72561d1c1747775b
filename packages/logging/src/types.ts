// packages/logging/src/types.ts

export enum LogChannel {
    cli = 'cli',
    connection = 'connection',
    session = 'session',
    sink = 'sink',
    device = 'device',
}

export type ChannelColor =
    | 'blue'
    | 'yellow'
    | 'cyan'
    | 'red'
    | 'purple'

export interface ChannelLogger {
    debug: (msg: string, extra?: Record<string, unknown>) => void
    info:  (msg: string, extra?: Record<string, unknown>) => void
    warn:  (msg: string, extra?: Record<string, unknown>) => void
    error: (msg: string, extra?: Record<string, unknown>) => void
    fatal: (msg: string, extra?: Record<string, unknown>) => void
}

export interface LoggerBundle {
    base: import('pino').Logger
    channel: (ch: LogChannel) => ChannelLogger
}
