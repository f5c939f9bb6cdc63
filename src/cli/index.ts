#!/usr/bin/env node
import { loadEnvironment } from '../node/core/config'
import { log } from '../shared/logger'
import { run } from './run'

loadEnvironment()

// Overwritten once run settles; exiting before then is a failure
process.exitCode = 1

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    log.error('Unexpected error:', error)
    process.exitCode = 1
  })
