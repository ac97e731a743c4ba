/**
 * Handlers barrel export.
 */

import type { ChannelHandler, NodeHandler } from '../types';
import { nodeHandler } from './node';
import { inputHandler, outputHandler } from './ports';
import { rectangleHandler } from './channel';
import { tJunctionHandler } from './tJunction';
import { epCrossHandler } from './epCross';

export const DEFAULT_NODE_HANDLERS: readonly NodeHandler[] = [
    inputHandler,
    outputHandler,
    nodeHandler,
    tJunctionHandler,
    epCrossHandler,
];

export const DEFAULT_CHANNEL_HANDLERS: readonly ChannelHandler[] = [rectangleHandler];

export { translateNodeBase, nodeHandler } from './node';
export { inputHandler, outputHandler } from './ports';
export { rectangleHandler } from './channel';
export { tJunctionHandler } from './tJunction';
export { epCrossHandler } from './epCross';
