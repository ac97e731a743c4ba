/**
 * Electrophoretic cross: injection of an analyte band into a
 * separation channel under an applied field, and the conditions for
 * adjacent analyte peaks to be resolvable at the detector.
 *
 * Four channels meet at the cross:
 *   tail        cathode -> cross, phase "tail"
 *   separation  cross -> anode, phase "separation"
 *   injection   input port -> cross, untagged
 *   waste       cross -> output port, untagged
 *
 * Peak model after Chou et al.: analyte i arrives at the detector at
 * t_peak_i = x_d / v_i; between peaks i and i+1 the concentration dips
 * at t_min_i, and the dip must stay below c times either peak.
 */

import {
    add,
    and,
    differentiate,
    div,
    eq,
    ite,
    le,
    lt,
    mul,
    sqrt,
    sub,
    type Constraint,
    type Expr,
    type VariableExpr,
} from '../../expr';
import { TopologyError } from '../../errors';
import { connectedChannels, incomingChannels, outgoingChannels, type Channel } from '../../graph';
import { concentration, electricField, mobility, particleVelocity } from '../../physics';
import { JUNCTION_BOUNDS, bounded, pinOrBound } from '../bounds';
import type { NodeHandler, TranslationContext } from '../types';
import { translateNodeBase } from './node';

/** FWHM of a Gaussian band is 2.355 sigma */
const FWHM_PER_SIGMA = 2.355;

/** Peak height ratios inside this band are compared directly */
const CLOSE_PEAKS = { min: 0.1, max: 10 } as const;

function single(channels: Channel[], junction: string, role: string): Channel {
    if (channels.length !== 1) {
        throw new TopologyError(
            `Electrophoretic cross "${junction}" needs exactly one ${role} channel, found ${channels.length}`,
            junction,
        );
    }
    return channels[0];
}

interface CrossChannels {
    tail: Channel;
    separation: Channel;
    injection: Channel;
    waste: Channel;
}

function classifyChannels(ctx: TranslationContext, name: string): CrossChannels {
    const connected = connectedChannels(ctx.state, name);
    if (connected.length !== 4) {
        throw new TopologyError(
            `Electrophoretic cross "${name}" must have 4 connections, found ${connected.length}`,
            name,
        );
    }

    const incoming = incomingChannels(ctx.state, name);
    const outgoing = outgoingChannels(ctx.state, name);
    const untagged = (ch: Channel) => ch.phase === 'none';

    return {
        tail: single(incoming.filter((ch) => ch.phase === 'tail'), name, 'incoming tail'),
        separation: single(outgoing.filter((ch) => ch.phase === 'separation'), name, 'outgoing separation'),
        injection: single(
            incoming.filter((ch) => untagged(ch) && ctx.node(ch.from).kind === 'input'),
            name,
            'injection (from an input port)',
        ),
        waste: single(
            outgoing.filter((ch) => untagged(ch) && ctx.node(ch.to).kind === 'output'),
            name,
            'waste (to an output port)',
        ),
    };
}

export const epCrossHandler: NodeHandler = {
    kind: 'ep-cross',
    translate(ctx, node) {
        const name = node.name;
        const { tail, separation, injection, waste } = classifyChannels(ctx, name);

        const delta = separation.pins.samplingInterval;
        if (delta === null) {
            throw new TopologyError(`Separation channel of "${name}" has no samplingInterval`, name);
        }

        const analytes = ctx.node(injection.from).analytes;
        if (!analytes) {
            throw new TopologyError(`No analytes defined at injection port "${injection.from}" of "${name}"`, name);
        }
        const { diffusivities: D, initialConcentrations: C0, charges: q, radii: r } = analytes;
        const n = D.length;
        if (n === 0) {
            throw new TopologyError(`Injection port "${injection.from}" defines no analytes`, name);
        }
        const columns: Array<[string, readonly number[]]> = [
            ['initialConcentrations', C0],
            ['charges', q],
            ['radii', r],
        ];
        for (const [field, values] of columns) {
            if (values.length !== n) {
                throw new TopologyError(
                    `Expecting ${n} values, found ${values.length} for ${field} at "${injection.from}"`,
                    name,
                );
            }
        }

        const { peakRatio: c, peakHeight: p, qualityFactor: qf } = node.junction;
        const anode = separation.to;
        const cathode = tail.from;
        const xd = separation.symbols.detectorPosition;
        const W = injection.symbols.width;
        const local = (quantity: string) => ctx.local(name, quantity);

        const result = translateNodeBase(ctx, node);
        const constraints: Constraint[] = [
            eq(tail.symbols.width, separation.symbols.width),
            eq(tail.symbols.height, separation.symbols.height),
            eq(injection.symbols.width, waste.symbols.width),
            eq(injection.symbols.height, waste.symbols.height),
            eq(injection.symbols.height, separation.symbols.height),
        ];

        const E = local('E');
        constraints.push(
            ...bounded(E, JUNCTION_BOUNDS.field),
            eq(E, electricField(ctx.state, anode, cathode)),
        );

        // Detector lies along the separation channel, measured from the cross
        constraints.push(
            ...pinOrBound(xd, separation.pins.detectorPosition, { min: 0 }),
            le(xd, separation.symbols.length),
        );

        const mu: VariableExpr[] = [];
        const v: VariableExpr[] = [];
        const tPeak: VariableExpr[] = [];
        for (let i = 0; i < n; i++) {
            mu.push(local(`mu_${i}`));
            v.push(local(`v_${i}`));
            tPeak.push(local(`t_peak_${i}`));
            constraints.push(
                ...bounded(mu[i], JUNCTION_BOUNDS.mobility),
                eq(mu[i], mobility(separation, q[i], r[i])),
                ...bounded(v[i], JUNCTION_BOUNDS.velocity),
                eq(v[i], particleVelocity(mu[i], E)),
                ...bounded(tPeak[i], JUNCTION_BOUNDS.time),
                eq(tPeak[i], div(xd, v[i])),
            );
        }

        const sigma0 = local('sigma0');
        const cFloor = local('C_floor');
        const cNegligible = local('C_negligible');
        constraints.push(
            eq(sigma0, div(W, 2 * FWHM_PER_SIGMA)),
            eq(cFloor, div(Math.min(...C0), add(sigma0, sqrt(div(mul(2 * Math.max(...D), xd), v[n - 1]))))),
            eq(cNegligible, mul(p, cFloor)),
        );

        // Concentration of analyte k at the detector at time t
        const F = (k: number, t: Expr): Expr => concentration(C0[k], D[k], W, v[k], xd, t);
        const background = n > 3 ? ((n - 2) * (1 - qf)) / (n - 3) : 0;

        for (let i = 0; i + 1 < n; i++) {
            const tMin = local(`t_min_${i}`);
            const diff = local(`diff_${i}`);
            const here = F(i, tMin);
            const nextPeak = F(i + 1, tMin);

            constraints.push(
                ...bounded(tMin, JUNCTION_BOUNDS.time),
                lt(add(tPeak[i], delta), tMin),
                lt(add(tMin, delta), tPeak[i + 1]),
                eq(diff, mul(C0[i] / C0[i + 1], sqrt(div(mul(D[i + 1], mu[i]), mul(D[i], mu[i + 1]))))),
            );

            // Similar heights: the valley is where the profiles cross; else where their slopes cancel
            constraints.push(eq(
                ite(
                    and(lt(CLOSE_PEAKS.min, diff), lt(diff, CLOSE_PEAKS.max)),
                    sub(here, nextPeak),
                    add(differentiate(here, tMin.name), differentiate(nextPeak, tMin.name)),
                ),
                0,
            ));

            const valley = background === 0
                ? add(here, nextPeak)
                : add(here, nextPeak, mul(background, cNegligible));
            constraints.push(
                le(div(valley, F(i, tPeak[i])), c),
                le(div(valley, F(i + 1, tPeak[i + 1])), c),
            );
        }

        return { constraints: [...result.constraints, ...constraints], next: result.next };
    },
};
