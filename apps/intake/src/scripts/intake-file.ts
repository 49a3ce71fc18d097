/**
 * Intake a JSON batch file
 *
 * Runs every submission of a batch file against an in-memory registry and
 * prints the batch report. Optionally writes the report to a file.
 *
 * Usage:
 *   tsx src/scripts/intake-file.ts <batch.json> [--out report.json]
 *
 * Resolver and rule thresholds come from the environment (.env is loaded),
 * see config/resolver-config.ts and config/rules-config.ts.
 */

import 'dotenv/config'
import * as fs from 'fs'
import * as path from 'path'
import { loadResolverConfig } from '../config/resolver-config'
import { loadRulesConfig } from '../config/rules-config'
import { logger } from '../config/logger'
import { processBatch } from '../orchestrator/batch'
import { IntakeMetrics } from '../orchestrator/metrics'
import { InMemoryRegistry } from '../registry/in-memory-registry'

const log = logger.script

function getArg(flag: string): string | undefined {
  const index = process.argv.indexOf(flag)
  if (index === -1) return undefined
  return process.argv[index + 1]
}

async function main(): Promise<number> {
  const inputPath = process.argv[2]
  if (!inputPath || inputPath.startsWith('--')) {
    console.error('Usage: intake-file <batch.json> [--out report.json]')
    return 2
  }

  const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(inputPath), 'utf8'))
  const metrics = new IntakeMetrics()
  const controller = new AbortController()
  process.once('SIGINT', () => {
    log.warn('INTAKE_FILE_INTERRUPTED', { inputPath })
    controller.abort()
  })

  const report = await processBatch(raw, new InMemoryRegistry(), {
    resolverConfig: loadResolverConfig(),
    rulesConfig: loadRulesConfig(),
    metrics,
    signal: controller.signal,
  })

  const output = JSON.stringify({ ...report, metrics: metrics.snapshot() }, null, 2)
  const outPath = getArg('--out')
  if (outPath) {
    fs.writeFileSync(path.resolve(outPath), output)
    log.info('INTAKE_FILE_REPORT_WRITTEN', { outPath })
  } else {
    console.log(output)
  }

  return report.envelopeError ? 1 : 0
}

main()
  .then(code => {
    process.exitCode = code
  })
  .catch(err => {
    log.error('INTAKE_FILE_FATAL', {}, err)
    process.exitCode = 1
  })
