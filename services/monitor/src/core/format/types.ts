// services/monitor/src/core/format/types.ts

import type { TextDecoder } from 'node:util'

export type OutputFormat = 'raw' | 'line' | 'hex'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['raw', 'line', 'hex'] as const

/** Immutable for one session. */
export interface OutputConfig {
    readonly addTimestamp: boolean
    readonly useColor: boolean
}

/**
 * Where formatted text goes. `plain` is the uncolored form for the log
 * mirror; it defaults to `text`.
 */
export interface TextSink {
    write(text: string, plain?: string): void
}

export interface FormatterContext {
    readonly sink: TextSink
    readonly output: OutputConfig
    /** Epoch milliseconds */
    readonly clock: () => number
}

export interface FormatterOptions {
    format: OutputFormat
    /** Hex only */
    showAscii: boolean
    /** Hex only: bytes per row */
    maxColumns: number
}

interface FormatterBase {
    readonly ctx: FormatterContext
    finalized: boolean
}

export interface RawFormatter extends FormatterBase {
    readonly kind: 'raw'
    readonly decoder: TextDecoder
}

export interface LineFormatter extends FormatterBase {
    readonly kind: 'line'
    readonly decoder: TextDecoder
    /** True until the first character of the session has been written */
    atLineStart: boolean
}

export interface HexFormatter extends FormatterBase {
    readonly kind: 'hex'
    /** Bytes of the current row, kept for the ASCII gutter */
    pendingLineBytes: number[]
    /** Bytes written in the current row, 0..maxColumns */
    columnCount: number
    readonly maxColumns: number
    readonly showAscii: boolean
}

export type Formatter = RawFormatter | LineFormatter | HexFormatter
