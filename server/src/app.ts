/**
 * @fileoverview Server entry point - Express app setup and route configuration.
 * Sets up the Express server with CORS, JSON parsing and the streaming audit route.
 */

import express from 'express'
import cors from 'cors'
import 'dotenv/config'

import { createAuditStreamHandler } from './routes/index.js'
import { getVendorCatalog } from './data/index.js'
import { getErrorMessage, loadConfig, logger, type AppConfig } from './utils/index.js'

/**
 * Read configuration and load the vendor catalog, exiting on failure
 * so a broken .env or catalog stops the server at startup.
 */
function startupConfig(): AppConfig {
  try {
    const config = loadConfig()
    getVendorCatalog()
    return config
  } catch (error) {
    logger.error('Startup failed', { error: getErrorMessage(error) })
    process.exit(1)
  }
}

const config = startupConfig()

const app = express()

// ============================================================================
// Middleware
// ============================================================================

app.use(cors())
app.use(express.json())

// ============================================================================
// API Routes
// ============================================================================

// Script audit endpoint (SSE) - Streams scan progress and the final report
app.get('/api/audit-stream', createAuditStreamHandler(config.scan))

app.get('/api/health', (_req, res) => {
  res.json({ status: 'ok' })
})

// ============================================================================
// Start Server
// ============================================================================

app.listen(config.port, () => {
  logger.info(`Server running on http://localhost:${config.port}`)
})
