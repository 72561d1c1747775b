// services/monitor/src/config.ts

import yargs from 'yargs'
import { DEFAULT_RETRY_INTERVAL_MS, type ConnectionPolicy } from './core/connection/ConnectionManager.js'
import { DEFAULT_HEX_COLUMNS } from './core/format/hex.js'
import {
    OUTPUT_FORMATS,
    type FormatterOptions,
    type OutputConfig,
    type OutputFormat,
} from './core/format/types.js'
import type { StatusOptions } from './core/status/StatusReporter.js'

export const VERSION = '0.1.0'

export const DEFAULT_PORT = '/dev/ttyACM0'
export const DEFAULT_BAUD = 9600

export interface MonitorConfig {
    port: string
    baudRate: number
    /** Also write received data (uncolored) to this file */
    logFile: string | null
    formatter: FormatterOptions
    output: OutputConfig
    status: StatusOptions
    connection: ConnectionPolicy
}

export type CliAction =
    | { kind: 'version' }
    | { kind: 'list'; json: boolean }
    | { kind: 'monitor'; config: MonitorConfig }

/* -------------------------------------------------------------------------- */
/*  Env → default helpers                                                     */
/* -------------------------------------------------------------------------- */

type Env = Record<string, string | undefined>

function readIntEnv(env: Env, name: string, fallback: number): number {
    const raw = env[name]
    if (!raw) return fallback
    const n = Number(raw)
    return Number.isFinite(n) ? n : fallback
}

function readBoolEnv(env: Env, name: string, fallback: boolean): boolean {
    const raw = env[name]
    if (!raw) return fallback
    const v = raw.trim().toLowerCase()
    if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true
    if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false
    return fallback
}

function readStringEnv(env: Env, name: string): string | undefined {
    const raw = env[name]
    if (raw === undefined || raw.trim() === '') return undefined
    return raw.trim()
}

export function isOutputFormat(value: unknown): value is OutputFormat {
    return typeof value === 'string' && OUTPUT_FORMATS.some((f) => f === value)
}

function resolveFormatEnv(env: Env): OutputFormat {
    const raw = readStringEnv(env, 'SERIALWATCH_FORMAT')?.toLowerCase()
    return isOutputFormat(raw) ? raw : 'raw'
}

/* -------------------------------------------------------------------------- */
/*  Command line                                                              */
/* -------------------------------------------------------------------------- */

/**
 * Parses argv (without the node/script prefix). Environment variables supply
 * the defaults; flags override them. Throws on invalid arguments.
 */
export function parseCommandLine(argv: string[], env: Env = process.env): CliAction {
    const args = yargs(argv)
        .scriptName('serialwatch')
        .usage(`Serial monitor ${VERSION}\n\nUsage: $0 [options]`)
        .option('port', {
            alias: 'p',
            type: 'string',
            description: 'Serial port',
            default: readStringEnv(env, 'SERIALWATCH_PORT') ?? DEFAULT_PORT,
        })
        .option('baudrate', {
            alias: 'b',
            type: 'number',
            description: 'Serial baudrate',
            default: readIntEnv(env, 'SERIALWATCH_BAUD', DEFAULT_BAUD),
        })
        .option('log', {
            alias: 'l',
            type: 'string',
            description: 'Also write the received data to this file',
            default: readStringEnv(env, 'SERIALWATCH_LOG_FILE'),
        })
        .option('format', {
            alias: 'f',
            type: 'string',
            choices: OUTPUT_FORMATS,
            description: 'Output format',
            default: resolveFormatEnv(env),
        })
        .option('wait', {
            alias: 'w',
            type: 'boolean',
            description: 'If the serial port is not available, wait until it shows up',
            default: readBoolEnv(env, 'SERIALWATCH_WAIT', false),
        })
        .option('color', {
            alias: 'c',
            type: 'boolean',
            description: 'Use color for output',
            default: readBoolEnv(env, 'SERIALWATCH_COLOR', false),
        })
        .option('timestamp', {
            alias: 't',
            type: 'boolean',
            description: 'Add a timestamp to each line (or hex row)',
            default: readBoolEnv(env, 'SERIALWATCH_TIMESTAMP', false),
        })
        .option('ascii', {
            alias: 'a',
            type: 'boolean',
            description: 'Add ASCII representation to hex output',
            default: readBoolEnv(env, 'SERIALWATCH_ASCII', false),
        })
        .option('quiet', {
            alias: 'q',
            type: 'boolean',
            description: 'Print nothing but the serial data (no status or error messages)',
            default: readBoolEnv(env, 'SERIALWATCH_QUIET', false),
        })
        .option('hexbytes', {
            type: 'number',
            description: 'Bytes per row in hex format',
            default: readIntEnv(env, 'SERIALWATCH_HEX_BYTES', DEFAULT_HEX_COLUMNS),
        })
        .option('persist', {
            type: 'boolean',
            description: 'Start over and reconnect if the serial connection drops',
            default: readBoolEnv(env, 'SERIALWATCH_PERSIST', false),
        })
        .option('list', {
            type: 'boolean',
            description: 'List available serial ports',
            default: false,
        })
        .option('listjson', {
            type: 'boolean',
            description: 'List available serial ports as JSON',
            default: false,
        })
        .version(false)
        .option('version', {
            type: 'boolean',
            description: 'Print version',
            default: false,
        })
        .strict()
        .help()
        .fail((msg, err) => {
            throw err ?? new Error(msg)
        })
        .parseSync()

    if (args.version) return { kind: 'version' }
    if (args.listjson) return { kind: 'list', json: true }
    if (args.list) return { kind: 'list', json: false }

    if (!isOutputFormat(args.format)) {
        throw new Error(`unknown format "${String(args.format)}"`)
    }
    if (!Number.isFinite(args.baudrate) || args.baudrate <= 0) {
        throw new Error(`invalid baudrate ${args.baudrate}`)
    }

    const maxColumns = Number.isFinite(args.hexbytes) ? Math.max(1, Math.floor(args.hexbytes)) : DEFAULT_HEX_COLUMNS

    return {
        kind: 'monitor',
        config: {
            port: args.port,
            baudRate: args.baudrate,
            logFile: args.log ?? null,
            formatter: {
                format: args.format,
                showAscii: args.ascii,
                maxColumns,
            },
            output: {
                addTimestamp: args.timestamp,
                useColor: args.color,
            },
            status: {
                quiet: args.quiet,
                color: args.color,
            },
            connection: {
                waitForDevice: args.wait,
                persistOnDrop: args.persist,
                retryIntervalMs: DEFAULT_RETRY_INTERVAL_MS,
            },
        },
    }
}
