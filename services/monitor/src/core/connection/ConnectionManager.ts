// services/monitor/src/core/connection/ConnectionManager.ts

import type { ChannelLogger } from '@serialwatch/logging'
import { DeviceOpenError, DeviceUnavailable, errorMessage } from '../errors.js'
import type { RunSession } from '../monitor/session.js'
import type { StatusReporter } from '../status/StatusReporter.js'
import type { DeviceOpener, DeviceStream } from '../stream/types.js'
import { delay } from './delay.js'

export const DEFAULT_RETRY_INTERVAL_MS = 500

export interface ConnectionPolicy {
    /** Retry opening while the device is not present */
    waitForDevice: boolean
    /** Start over (open + new session) when a running session fails */
    persistOnDrop: boolean
    retryIntervalMs: number
}

export interface ConnectionTarget {
    path: string
    baudRate: number
}

export interface ConnectionManagerDeps {
    opener: DeviceOpener
    status: StatusReporter
    log: ChannelLogger
    /** Injected for tests; resolves early on abort */
    sleep?: (ms: number, signal: AbortSignal) => Promise<void>
}

export type ConnectionExitReason = 'interrupted' | 'open-failed' | 'stream-failed'

export interface ConnectionResult {
    exitCode: number
    reason: ConnectionExitReason
    /** Sessions that reached the monitor loop */
    sessions: number
}

type AcquireResult =
    | { kind: 'connected'; stream: DeviceStream }
    | { kind: 'failed'; error: Error }
    | { kind: 'interrupted' }

/**
 * Owns the connect → monitor → (maybe) reconnect cycle.
 *
 * wait-for-device applies to every open, including the ones after a drop:
 * a reconnect is a full re-entry, not a resume.
 */
export class ConnectionManager {
    private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>

    constructor(
        private readonly target: ConnectionTarget,
        private readonly policy: ConnectionPolicy,
        private readonly deps: ConnectionManagerDeps
    ) {
        this.sleep = deps.sleep ?? delay
    }

    async run(runSession: RunSession, signal: AbortSignal): Promise<ConnectionResult> {
        const { status, log } = this.deps
        let sessions = 0

        for (;;) {
            const acquired = await this.acquire(signal)

            if (acquired.kind === 'interrupted') {
                return { exitCode: 0, reason: 'interrupted', sessions }
            }
            if (acquired.kind === 'failed') {
                return { exitCode: 1, reason: 'open-failed', sessions }
            }

            sessions += 1
            const outcome = await runSession(acquired.stream, signal)

            if (outcome.kind === 'interrupted') {
                status.blank()
                return { exitCode: 0, reason: 'interrupted', sessions }
            }

            log.warn('session failed', { path: this.target.path, error: outcome.error.message })
            status.blank()
            status.error(`Connection to ${this.target.path} lost: ${outcome.error.message}`)
            status.blank()

            if (!this.policy.persistOnDrop) {
                return { exitCode: 1, reason: 'stream-failed', sessions }
            }

            log.info('persist-on-drop: starting over', { path: this.target.path, sessions })
        }
    }

    private async acquire(signal: AbortSignal): Promise<AcquireResult> {
        const { opener, status, log } = this.deps
        const { path, baudRate } = this.target

        status.info(`Trying to connect to ${path}`)

        let waited = 0
        const endProgress = (): void => {
            if (waited > 0) status.blank()
        }

        for (;;) {
            if (signal.aborted) {
                endProgress()
                return { kind: 'interrupted' }
            }

            let stream: DeviceStream
            try {
                stream = await opener.open(path, baudRate)
            } catch (err) {
                if (err instanceof DeviceUnavailable && this.policy.waitForDevice) {
                    waited += 1
                    status.progress()
                    log.debug('device not available; waiting', { path, attempt: waited })
                    await this.sleep(this.policy.retryIntervalMs, signal)
                    continue
                }

                endProgress()
                const error = err instanceof Error ? err : new DeviceOpenError(path, errorMessage(err))
                status.error(`Failed to connect: ${error.message}`)
                log.error('device open failed', {
                    path,
                    kind: error instanceof DeviceUnavailable ? 'unavailable' : 'open-error',
                    error: error.message,
                })
                return { kind: 'failed', error }
            }

            try {
                endProgress()
                status.info('Successfully connected')
            } catch (err) {
                await stream.close()
                throw err
            }
            log.info('device opened', { path, baudRate, waitedAttempts: waited })
            return { kind: 'connected', stream }
        }
    }
}
