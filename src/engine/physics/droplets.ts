/**
 * Droplet generation at a T-junction (squeezing regime).
 *
 * Normalised fill/pinch model of van Steijn, Kleijn and Kreutzer,
 * Lab Chip 2010, DOI:10.1039/c002625e. Volume in m^3.
 */

import { add, div, mul, pow, sqrt, sub, type Expr, type Term } from '../expr';

/** Fraction of continuous phase bypassing the forming droplet */
export const GUTTER_FLOW_FRACTION = 0.1;

/**
 * @param height - height of the output channel
 * @param width - width of the continuous/output channel
 * @param inletWidth - width of the dispersed channel
 * @param epsilon - rounding of the junction corner
 * @param dispersedFlow - dispersed phase flow rate
 * @param continuousFlow - continuous phase flow rate
 */
export function dropletVolume(
    height: Term,
    width: Term,
    inletWidth: Term,
    epsilon: Term,
    dispersedFlow: Term,
    continuousFlow: Term,
): Expr {
    const { PI } = Math;
    const aspect = div(height, width);

    const fillVolume = sub((3 * PI) / 8, mul((PI / 2) * (1 - PI / 4), aspect));
    const hwParallel = div(mul(height, width), add(height, width));
    const pinchRadius = add(
        width,
        add(
            sub(inletWidth, sub(hwParallel, epsilon)),
            sqrt(mul(2, mul(sub(inletWidth, hwParallel), sub(width, hwParallel)))),
        ),
    );
    const fillRadius = width;
    const pinchRatio = div(pinchRadius, width);
    const fillRatio = div(fillRadius, width);

    const alpha = mul(
        (1 - PI / 4) / (1 - GUTTER_FLOW_FRACTION),
        add(
            sub(pow(pinchRatio, 2), pow(fillRatio, 2)),
            mul(sub(mul(PI / 4, pinchRatio), fillRatio), aspect),
        ),
    );

    return mul(mul(height, mul(width, width)), add(fillVolume, mul(alpha, div(dispersedFlow, continuousFlow))));
}
