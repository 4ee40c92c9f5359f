/**
 * CLI utilities - barrel export
 */

export { formatOrder, formatPlan } from './format.js'
export { formatError, unknownCommandError, invalidOptionError, getErrorMessage } from './errors.js'
