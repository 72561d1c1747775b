/** One batch of bytes returned by a single read. */
export type ByteChunk = Buffer

/**
 * An open device connection. `read()` resolves with the next chunk and
 * rejects with StreamFailure once the device errors or goes away.
 */
export interface DeviceStream {
    readonly path: string
    read(): Promise<ByteChunk>
    close(): Promise<void>
}

/**
 * Opens a device. Rejects with DeviceUnavailable when the device is not
 * present, DeviceOpenError for anything else.
 */
export interface DeviceOpener {
    open(path: string, baudRate: number): Promise<DeviceStream>
}
