// services/monitor/src/core/format/markers.ts

import type { OutputConfig, TextSink } from './types.js'

export const COLOR = {
    magenta: '\x1b[0;35m',
    blue: '\x1b[0;34m',
    green: '\x1b[0;32m',
    reset: '\x1b[0;m',
} as const

/** Text in two renderings: `styled` for the terminal, `plain` for the log. */
export interface Rendered {
    styled: string
    plain: string
}

const TIMESTAMP_WIDTH = 18
const TIMESTAMP_DECIMALS = 7

/**
 * Right-aligned seconds since epoch followed by a `|` separator, e.g.
 * `"1700000000.5000000 | "`.
 */
export function renderTimestamp(epochMs: number, useColor: boolean): Rendered {
    const value = (epochMs / 1000).toFixed(TIMESTAMP_DECIMALS).padStart(TIMESTAMP_WIDTH)
    const plain = `${value} | `
    if (!useColor) return { styled: plain, plain }
    return {
        styled: `${COLOR.magenta}${value} ${COLOR.blue}|${COLOR.reset} `,
        plain,
    }
}

/** Annotated line such as the hex ASCII gutter. Always ends with `\n`. */
export function renderMetaLine(content: string, useColor: boolean): Rendered {
    const plain = `| ${content}\n`
    if (!useColor) return { styled: plain, plain }
    return {
        styled: `${COLOR.blue}| ${COLOR.green}${content}${COLOR.reset}\n`,
        plain,
    }
}

/** Printable ASCII only; CR, LF, other control and non-ASCII bytes are dropped. */
export function asciiGutter(bytes: readonly number[]): string {
    let out = ''
    for (const b of bytes) {
        if (b >= 0x20 && b <= 0x7e) out += String.fromCharCode(b)
    }
    return out
}

export function hexByte(byte: number): string {
    return byte.toString(16).toUpperCase().padStart(2, '0')
}

/**
 * Collects one chunk's worth of output so the sink sees a single write per
 * chunk, in order.
 */
export class OutputBuffer {
    private styled = ''
    private plain = ''

    constructor(private readonly output: OutputConfig, private readonly clock: () => number) {}

    text(s: string): void {
        this.styled += s
        this.plain += s
    }

    rendered(r: Rendered): void {
        this.styled += r.styled
        this.plain += r.plain
    }

    timestamp(): void {
        if (!this.output.addTimestamp) return
        this.rendered(renderTimestamp(this.clock(), this.output.useColor))
    }

    metaLine(content: string): void {
        this.rendered(renderMetaLine(content, this.output.useColor))
    }

    flushTo(sink: TextSink): void {
        if (this.styled.length === 0) return
        const styled = this.styled
        const plain = this.plain
        this.styled = ''
        this.plain = ''
        sink.write(styled, plain)
    }
}
