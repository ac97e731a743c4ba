/**
 * Rules barrel export.
 */

export { checkMissingInput } from './missingInput';
export { checkUnreachableOutput } from './unreachableOutput';
export { checkIsolatedNodes } from './isolatedNodes';
