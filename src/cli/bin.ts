#!/usr/bin/env node
/**
 * catalog-sync executable
 */

import { config } from 'dotenv'
import { main } from './index'

config()

main().then(
  code => process.exit(code),
  (error: unknown) => {
    process.stderr.write(`[ERROR] ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`)
    process.exit(1)
  }
)
