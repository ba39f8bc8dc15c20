/**
 * @fileoverview Server-Sent Events helpers for the streaming audit endpoint.
 */

/**
 * The parts of an HTTP response an event stream writes to.
 * Express's Response satisfies it.
 */
export interface EventStreamResponse {
  readonly writableEnded: boolean
  setHeader(name: string, value: string): unknown
  flushHeaders(): void
  write(chunk: string): boolean
  end(): unknown
}

/**
 * Prepare a response for an SSE stream.
 */
export function openEventStream(res: EventStreamResponse): void {
  res.setHeader('Content-Type', 'text/event-stream')
  res.setHeader('Cache-Control', 'no-cache')
  res.setHeader('Connection', 'keep-alive')
  res.setHeader('X-Accel-Buffering', 'no')
  res.flushHeaders()
}

/**
 * Send a named event to the SSE stream.
 * Does nothing once the stream has ended.
 *
 * @param res - Response carrying the SSE stream
 * @param type - Event type name
 * @param data - Data object to serialize as JSON
 */
export function sendEvent(res: EventStreamResponse, type: string, data: object): void {
  if (res.writableEnded) return
  res.write(`event: ${type}\n`)
  res.write(`data: ${JSON.stringify(data)}\n\n`)
}

/**
 * Send a progress event to the SSE stream.
 *
 * @param res - Response carrying the SSE stream
 * @param step - Current step identifier (e.g., 'launch', 'navigate', 'snapshot')
 * @param message - Human-readable progress message
 * @param progress - Progress percentage (0-100)
 */
export function sendProgress(res: EventStreamResponse, step: string, message: string, progress: number): void {
  sendEvent(res, 'progress', { step, message, progress })
}
