/**
 * Translation Engine — Public API
 */

export { Translator, translateSchematic } from './translator';
export type { TranslatorOptions } from './translator';

export type {
    TraversalStep,
    HandlerResult,
    TranslationContext,
    NodeHandler,
    ChannelHandler,
} from './types';

export { createTranslationContext } from './context';
export { NODE_BOUNDS, CHANNEL_BOUNDS, JUNCTION_BOUNDS, bounded, pinOrBound, chipBounds } from './bounds';
export type { Bound } from './bounds';

export {
    DEFAULT_NODE_HANDLERS,
    DEFAULT_CHANNEL_HANDLERS,
    translateNodeBase,
    nodeHandler,
    inputHandler,
    outputHandler,
    rectangleHandler,
    tJunctionHandler,
    epCrossHandler,
} from './handlers';
