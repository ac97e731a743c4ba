/**
 * Schematic error taxonomy.
 *
 * ValidationError is raised by builder calls, TopologyError by the
 * translator. Neither is ever raised once a script has reached the solver.
 */

export class SchematicError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SchematicError';
    }
}

export class ValidationError extends SchematicError {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class UnknownFluidError extends ValidationError {
    fluid: string;

    constructor(fluid: string) {
        super(`Unknown fluid "${fluid}"`);
        this.name = 'UnknownFluidError';
        this.fluid = fluid;
    }
}

export class UnknownAnalyteError extends ValidationError {
    analyte: string;

    constructor(analyte: string) {
        super(`Unknown analyte set "${analyte}"`);
        this.name = 'UnknownAnalyteError';
        this.analyte = analyte;
    }
}

export class TopologyError extends SchematicError {
    /** Node or channel the violation was found at, when there is one */
    element: string | null;

    constructor(message: string, element: string | null = null) {
        super(message);
        this.name = 'TopologyError';
        this.element = element;
    }
}
