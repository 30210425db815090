// =============================================================================
// REACTION ENGINE - PUBLIC API
// =============================================================================
// This is the stable public API for the ring and its reactions. Callers
// (game loops, UIs, tools) should only import from this file.
//
// Design principles:
// - NARROW: Only essential functions are exported
// - STABLE: Changes inside the engine don't break callers
// - SYNCHRONOUS: Every mutation, cascade included, completes before returning
// =============================================================================

// =============================================================================
// TOKENS
// =============================================================================

export type {
  Token,
  TokenKind,
  NumberedToken,
  AcceleratorToken,
  DarkAcceleratorToken,
  TokenVisitor,
} from '../types/token';

export {
  ACCELERATOR,
  DARK_ACCELERATOR,
  ACCELERATOR_KEY,
  DARK_ACCELERATOR_KEY,
  isNumbered,
  isAccelerator,
  isDarkAccelerator,
  matchToken,
  sameToken,
  tokenKey,
  describeToken,
} from '../types/token';

// =============================================================================
// CATALOG
// =============================================================================

export { ElementCatalog } from '../catalog/ElementCatalog';
export type { TokenCatalog } from '../catalog/ElementCatalog';
export { parseCatalogCsv, catalogFromCsv } from '../catalog/catalogCsv';
export type { CatalogRow } from '../validation/schemas';

// =============================================================================
// RING & REACTIONS
// =============================================================================

export { Ring } from './Ring';
export { createReactionContext, isDegenerate } from './reactionContext';
export type { ReactionContext } from './reactionContext';
export { ACCELERATOR_RULE, DARK_ACCELERATOR_RULE, REACTION_RULES } from './reactionRules';
export type { ReactionRule, ReactionRuleName } from './reactionRules';
export { RingEventRecorder } from './ringListener';
export type { RingListener, RingEvent, ReactionEvent } from './ringListener';
export { setReactionDebugLogger } from './reactionDebug';
export type { ReactionDebugLogger } from './reactionDebug';

// =============================================================================
// RULE CONSTANTS
// =============================================================================

export {
  MAX_RING_SIZE,
  DARK_BOTH_ACCELERATORS_RESULT,
  DARK_FUSION_BONUS,
  ACCELERATOR_FUSION_BONUS,
  CENTER_FUSION_BONUS,
  FLANK_FUSION_BONUS,
  isRingOverflowing,
} from './rulesConfig';

// =============================================================================
// NOTATION & SNAPSHOTS
// =============================================================================

export { formatToken, formatRing, parseToken, parseRing } from './notation';
export type { NotationCatalog } from './notation';
export { toRingSnapshot, tokensFromSnapshot } from './ringSnapshot';
export type { RingSnapshot } from './ringSnapshot';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineErrorCode,
  EngineError,
  InvalidArgument,
  IndexOutOfRange,
  InvalidState,
  CatalogError,
  isEngineError,
  isInvalidArgument,
  isIndexOutOfRange,
  isInvalidState,
  isCatalogError,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON } from './errors';
