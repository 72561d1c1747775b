#!/usr/bin/env node
import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import { hideBin } from 'yargs/helpers'
import {
    createLogger,
    LogChannel
} from '@serialwatch/logging'
import { parseCommandLine, VERSION, type MonitorConfig } from './config.js'
import { ConnectionManager } from './core/connection/ConnectionManager.js'
import { errorMessage } from './core/errors.js'
import { sessionRunner } from './core/monitor/session.js'
import { FileLogDestination, StreamDestination } from './core/sink/destinations.js'
import { StatusReporter } from './core/status/StatusReporter.js'
import { listPorts } from './devices/serial/listPorts.js'
import { formatPortTable } from './devices/serial/utils.js'
import { SerialDeviceOpener } from './devices/serial/SerialDeviceOpener.js'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
(function loadEnv() {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
})()

async function monitor(config: MonitorConfig): Promise<number> {
    const { channel } = createLogger('serialwatch')
    const logCli = channel(LogChannel.cli)

    const primary = new StreamDestination(process.stdout)
    const status = new StatusReporter(primary, config.status)

    // Opened once for the whole run; every session mirrors into it.
    let logDestination: FileLogDestination | null = null
    if (config.logFile) {
        try {
            logDestination = new FileLogDestination(config.logFile)
        } catch (err) {
            status.error(`Failed to open logfile: ${errorMessage(err)}`)
            return 1
        }
    }

    const controller = new AbortController()
    const shutdown = (signal: NodeJS.Signals): void => {
        logCli.info(`received ${signal}, shutting down`)
        controller.abort()
    }
    const onSigint = (): void => shutdown('SIGINT')
    const onSigterm = (): void => shutdown('SIGTERM')
    process.on('SIGINT', onSigint)
    process.on('SIGTERM', onSigterm)

    logCli.info('starting monitor', {
        port: config.port,
        baudRate: config.baudRate,
        format: config.formatter.format,
        wait: config.connection.waitForDevice,
        persist: config.connection.persistOnDrop,
    })

    try {
        const manager = new ConnectionManager(
            { path: config.port, baudRate: config.baudRate },
            config.connection,
            {
                opener: new SerialDeviceOpener(channel(LogChannel.device)),
                status,
                log: channel(LogChannel.connection),
            }
        )

        const result = await manager.run(
            sessionRunner({
                formatter: config.formatter,
                output: config.output,
                primary,
                logDestination,
                log: channel(LogChannel.session),
            }),
            controller.signal
        )

        logCli.info(`monitor finished reason=${result.reason} sessions=${result.sessions}`)
        return result.exitCode
    } finally {
        process.off('SIGINT', onSigint)
        process.off('SIGTERM', onSigterm)
        logDestination?.close()
    }
}

async function main(): Promise<number> {
    const action = parseCommandLine(hideBin(process.argv))

    switch (action.kind) {
        case 'version':
            process.stdout.write(`serialwatch ${VERSION}\n`)
            return 0
        case 'list': {
            const listing = await listPorts()
            process.stdout.write(action.json ? `${JSON.stringify(listing)}\n` : formatPortTable(listing))
            return 0
        }
        case 'monitor':
            return monitor(action.config)
    }
}

main().then(
    (code) => {
        process.exitCode = code
    },
    (err: unknown) => {
        process.stderr.write(`serialwatch: ${errorMessage(err)}\n`)
        process.exitCode = 1
    }
)
