/**
 * Intake Logger Configuration
 *
 * Pre-configured loggers for intake components
 */

import { createLogger } from '@guitar-registry/logger'

// Root logger for the intake service
const rootLogger = createLogger('intake')

// Pre-configured child loggers for intake components
export const logger = {
  resolver: rootLogger.child('resolver'),
  orchestrator: rootLogger.child('orchestrator'),
  registry: rootLogger.child('registry'),
  script: rootLogger.child('script'),
}

// Export root logger for custom child creation
export { rootLogger }
