export type { FluidProperties, AnalyteSet } from './properties';
export { lookupFluid, lookupAnalytes, fluidNames } from './properties';
