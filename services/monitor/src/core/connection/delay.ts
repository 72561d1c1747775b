/** Resolves after `ms`, or as soon as the signal aborts. Never rejects. */
export function delay(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
        if (signal.aborted) {
            resolve()
            return
        }

        const done = (): void => {
            clearTimeout(timer)
            signal.removeEventListener('abort', done)
            resolve()
        }

        const timer = setTimeout(done, ms)
        signal.addEventListener('abort', done, { once: true })
    })
}
