#!/usr/bin/env node
import { logger } from '../logger'
import { runCli } from './cli'

void runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    logger.fatal({ err: error }, 'Unexpected CLI failure')
    process.exitCode = 1
  }
)
