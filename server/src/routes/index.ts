// Route handler exports

export { createAuditStreamHandler, parseAuditQuery, type AuditQuery } from './audit-stream.js'
export { sendEvent, sendProgress, openEventStream, type EventStreamResponse } from './sse.js'
