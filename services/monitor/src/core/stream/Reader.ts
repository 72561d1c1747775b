import type { ByteChunk, DeviceStream } from './types.js'

/**
 * Pulls chunks from a device stream. Failures propagate as StreamFailure;
 * an empty chunk means "no data yet".
 */
export class Reader {
    constructor(private readonly stream: DeviceStream) {}

    read(): Promise<ByteChunk> {
        return this.stream.read()
    }
}
