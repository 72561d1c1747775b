// services/monitor/src/devices/serial/errors.ts

import { DeviceOpenError, DeviceUnavailable } from '../../core/errors.js'

/**
 * Messages the serialport bindings use when the device node does not exist
 * (Linux/macOS) or the COM port is unknown (Windows), e.g.
 *   "Error: No such file or directory, cannot open /dev/ttyACM0"
 *   "Opening COM7: File not found"
 */
const NOT_PRESENT_PATTERNS: RegExp[] = [
    /no such file or directory/i,
    /\bENOENT\b/,
    /no such device/i,
    /\bENODEV\b/,
    /\bENXIO\b/,
    /file not found/i,
    /cannot find the file/i,
]

function errorCode(err: Error): string | undefined {
    return 'code' in err && typeof err.code === 'string' ? err.code : undefined
}

export function isDeviceNotPresent(err: Error): boolean {
    const code = errorCode(err)
    if (code === 'ENOENT' || code === 'ENODEV' || code === 'ENXIO') return true
    return NOT_PRESENT_PATTERNS.some((re) => re.test(err.message))
}

export function classifyOpenError(path: string, err: Error): DeviceUnavailable | DeviceOpenError {
    if (isDeviceNotPresent(err)) return new DeviceUnavailable(path, { cause: err })
    return new DeviceOpenError(path, err.message, { cause: err })
}
