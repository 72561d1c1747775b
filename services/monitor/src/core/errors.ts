// services/monitor/src/core/errors.ts

/**
 * Error taxonomy for the monitor.
 *
 *   DeviceUnavailable - device not present at open time (retried only when waiting)
 *   DeviceOpenError   - any other open failure (always fatal)
 *   StreamFailure     - read/write failure during a session (persist-on-drop decides)
 *   SinkWriteError    - log mirror failure (warning only)
 */
export class DeviceUnavailable extends Error {
    override readonly name = 'DeviceUnavailable'

    constructor(readonly path: string, options?: ErrorOptions) {
        super(`device ${path} is not available`, options)
    }
}

export class DeviceOpenError extends Error {
    override readonly name = 'DeviceOpenError'

    constructor(readonly path: string, message: string, options?: ErrorOptions) {
        super(`failed to open ${path}: ${message}`, options)
    }
}

export class StreamFailure extends Error {
    override readonly name = 'StreamFailure'
}

export class SinkWriteError extends Error {
    override readonly name = 'SinkWriteError'
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

export function toStreamFailure(err: unknown): StreamFailure {
    if (err instanceof StreamFailure) return err
    return new StreamFailure(errorMessage(err), { cause: err })
}
