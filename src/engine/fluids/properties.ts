/**
 * Fluid Property Library
 *
 * Densities in kg/m^3, resistivities in Ohm*m, viscosities in Pa*s.
 * A missing value means the property is left for the solver to bound.
 */

import { UnknownAnalyteError, UnknownFluidError } from '../errors';

// ─── Types ───

export interface FluidProperties {
    density: number | null;
    resistivity: number | null;
    viscosity: number | null;
    /** Key into the analyte table; 'default' carries no analytes */
    analyteRef: string;
}

/** Per-species arrays, index i describes the same analyte in each. */
export interface AnalyteSet {
    diffusivities: readonly number[];
    initialConcentrations: readonly number[];
    charges: readonly number[];
    radii: readonly number[];
}

// ─── Tables ───

const FLUIDS: Readonly<Record<string, FluidProperties>> = {
    default: { density: null, resistivity: null, viscosity: null, analyteRef: 'default' },
    water: { density: 999.87, resistivity: 182000, viscosity: 0.001, analyteRef: 'default' },
    mineraloil: { density: 800, resistivity: 10000000000, viscosity: 0.0003051, analyteRef: 'default' },
    polyacrylamide: { density: 1100, resistivity: 14.28, viscosity: 0.003, analyteRef: 'default' },
    // Placeholder sample for separation experiments; analyte values are illustrative
    'buffered-sample': { density: 999.87, resistivity: 18200, viscosity: 0.001, analyteRef: 'four-species-mix' },
};

const ANALYTES: Readonly<Record<string, AnalyteSet | null>> = {
    default: null,
    'four-species-mix': {
        diffusivities: [0.1, 0.1, 0.1, 0.1],
        initialConcentrations: [0.2, 0.2, 0.2, 0.2],
        charges: [-1, -2, -3, -4],
        radii: [0.05, 0.05, 0.05, 0.05],
    },
};

// ─── Lookups ───

export function lookupFluid(fluidName: string): FluidProperties {
    if (!Object.hasOwn(FLUIDS, fluidName)) throw new UnknownFluidError(fluidName);
    return FLUIDS[fluidName];
}

/** Analyte arrays for a reference; null for fluids without analytes. */
export function lookupAnalytes(analyteRef: string): AnalyteSet | null {
    if (!Object.hasOwn(ANALYTES, analyteRef)) throw new UnknownAnalyteError(analyteRef);
    return ANALYTES[analyteRef] ?? null;
}

export function fluidNames(): string[] {
    return Object.keys(FLUIDS);
}
